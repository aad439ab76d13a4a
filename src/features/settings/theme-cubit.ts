import { HydratedCubit, type HydratedOptions } from "@unistate/core";

export type Theme = "light" | "dark";

/** Survives restarts through whatever HydratedStorage is registered. */
export class ThemeCubit extends HydratedCubit<Theme> {
  constructor(opts?: HydratedOptions<Theme>) {
    super("light", opts);
  }

  toggle(): void {
    this.emit(this.state === "light" ? "dark" : "light");
  }

  fromJson(json: unknown): Theme | undefined {
    return json === "light" || json === "dark" ? json : undefined;
  }

  toJson(state: Theme): unknown {
    return state;
  }
}
