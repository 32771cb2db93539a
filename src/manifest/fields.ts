import { isPlainObject } from "../grammar/parser.js";

/** Narrowing readers over an already validated document. */

export function readString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

export function readNumber(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  return typeof value === "number" ? value : undefined;
}

export function readStringList(obj: Record<string, unknown>, key: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string");
}

export function readRecord(obj: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = obj[key];
  return isPlainObject(value) ? { ...value } : {};
}

export function readStringRecord(obj: Record<string, unknown>, key: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [k, v] of Object.entries(readRecord(obj, key))) {
    if (typeof v === "string") result[k] = v;
  }
  return result;
}

export function readScalarRecord(obj: Record<string, unknown>, key: string): Record<string, string | number> {
  const result: Record<string, string | number> = {};
  for (const [k, v] of Object.entries(readRecord(obj, key))) {
    if (typeof v === "string" || typeof v === "number") result[k] = v;
  }
  return result;
}

export function oneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === "string" && values.some((v) => v === value);
}

/** Entries of `obj` whose keys are not in `known`. */
export function remainingProperties(obj: Record<string, unknown>, known: ReadonlySet<string>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (!known.has(k)) result[k] = v;
  }
  return result;
}

/** Replace `$NAME` and `${NAME}` with environment entries; unknown names stay as written. */
export function expandVariables(value: string, environment: Readonly<Record<string, string>>): string {
  return value.replace(/\$\{(\w+)\}|\$(\w+)/g, (match, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare;
    if (name === undefined) return match;
    return Object.prototype.hasOwnProperty.call(environment, name) ? (environment[name] ?? match) : match;
  });
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
