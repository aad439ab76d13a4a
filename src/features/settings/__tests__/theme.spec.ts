import { describe, it, expect } from 'vitest';
import { InMemoryStorage } from '@unistate/core';
import { ThemeCubit } from '../index';

describe('ThemeCubit', () => {
  it('toggles and restores the stored theme', () => {
    const storage = new InMemoryStorage();
    const first = new ThemeCubit({ storage });
    first.toggle();
    expect(first.state).toBe('dark');

    expect(new ThemeCubit({ storage }).state).toBe('dark');
  });

  it('ignores stored values that are not a theme', () => {
    const storage = new InMemoryStorage();
    storage.write('ThemeCubit', 'sepia');
    expect(new ThemeCubit({ storage }).state).toBe('light');
  });
});
