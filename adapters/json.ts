const bigintSafe = (_key: string, value: unknown): unknown => (typeof value === "bigint" ? value.toString() : value);

/** JSON.stringify with `bigint` written as a decimal string. */
export function stringify(value: unknown): string {
  return JSON.stringify(value, bigintSafe);
}
