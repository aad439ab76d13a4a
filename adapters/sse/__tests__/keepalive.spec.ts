import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger } from '../../../host/logger';
import { SseAdapter } from '../index';
import type { SseResponse } from '../hub';

class FakeResponse implements SseResponse {
  readonly writes: string[] = [];
  readonly headers: Record<string, string> = {};
  status = 0;
  ended = 0;
  failing = false;
  private readonly listeners: Array<{ event: string; listener: () => void }> = [];

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  writeHead(status: number): void {
    this.status = status;
  }

  write(chunk: string): boolean {
    if (this.failing) throw new Error('socket closed');
    this.writes.push(chunk);
    return true;
  }

  end(): void {
    this.ended++;
  }

  on(event: 'close' | 'finish', listener: () => void): void {
    this.listeners.push({ event, listener });
  }

  emit(event: string): void {
    for (const l of this.listeners) if (l.event === event) l.listener();
  }
}

const logger = createLogger({ level: 'silent' });

afterEach(() => {
  vi.useRealTimers();
});

describe('SSE keep-alive', () => {
  it('opens the stream with retry and a comment', () => {
    const sse = new SseAdapter(undefined, { logger });
    const res = new FakeResponse();
    sse.handler({}, res);

    expect(res.status).toBe(200);
    expect(res.headers['Content-Type']).toBe('text/event-stream');
    expect(res.writes).toEqual(['retry: 2000\n\n', ': connected\n\n']);
  });

  it('keeps the connection alive for 30s via heartbeats', () => {
    vi.useFakeTimers();
    const sse = new SseAdapter(undefined, { logger });
    const res = new FakeResponse();
    sse.handler({}, res);

    vi.advanceTimersByTime(30_000);
    expect(res.writes.filter(w => w === ':\n\n')).toHaveLength(2);
  });

  it('stops heartbeats once the client goes away', () => {
    vi.useFakeTimers();
    const sse = new SseAdapter(undefined, { logger });
    const res = new FakeResponse();
    sse.handler({}, res);

    res.emit('close');
    vi.advanceTimersByTime(30_000);
    expect(res.writes.filter(w => w === ':\n\n')).toHaveLength(0);
    expect(sse.hub.size).toBe(0);
    expect(res.ended).toBe(1);
  });

  it('drops a client whose heartbeat write fails', () => {
    vi.useFakeTimers();
    const sse = new SseAdapter(undefined, { logger });
    const res = new FakeResponse();
    sse.handler({}, res);

    res.failing = true;
    vi.advanceTimersByTime(15_000);
    expect(sse.hub.size).toBe(0);
  });
});

describe('SSE broadcast', () => {
  it('writes records as data frames with bigint as a string', async () => {
    const sse = new SseAdapter(undefined, { logger });
    const res = new FakeResponse();
    sse.handler({}, res);

    await sse.onNotify({ type: 'Change', source: 'counter', kind: 'bloc', state: 1, previous: 0, seq: 7n, ts: 't', version: 1 });
    expect(res.writes[2]).toBe(
      'data: {"type":"Change","source":"counter","kind":"bloc","state":1,"previous":0,"seq":"7","ts":"t","version":1}\n\n',
    );
  });

  it('ends every stream on drain', async () => {
    const sse = new SseAdapter(undefined, { logger });
    const a = new FakeResponse();
    const b = new FakeResponse();
    sse.handler({}, a);
    sse.handler({}, b);

    await sse.drain();
    expect([a.ended, b.ended]).toEqual([1, 1]);
    expect(await sse.health()).toEqual({ ok: true, detail: '0 client(s)' });
  });
});
