import { isUnistateError } from "@unistate/core";
import type { ErrorInfo } from "../adapters/types";

export function errorInfo(error: unknown): ErrorInfo {
  if (isUnistateError(error)) return { name: error.name, message: error.message, code: error.code };
  if (error instanceof Error) return { name: error.name, message: error.message };
  return { name: "Error", message: String(error) };
}

const replacer = (_key: string, value: unknown): unknown => {
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "function" || typeof value === "symbol") return undefined;
  if (value instanceof Error) return errorInfo(value);
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return Array.from(value);
  return value;
};

/**
 * Copy a state or event into plain JSON data, so records never alias live
 * state and every adapter can serialise them.
 */
export function toPlain(value: unknown): unknown {
  if (value === undefined) return undefined;
  const json = JSON.stringify(value, replacer);
  if (json === undefined) return undefined;
  const plain: unknown = JSON.parse(json);
  return plain;
}
