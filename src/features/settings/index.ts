export { ThemeCubit } from "./theme-cubit";
export type { Theme } from "./theme-cubit";
