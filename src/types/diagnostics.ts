import type { SelectorContext } from "./context.js";

export type RuleId =
  | "type"
  | "pattern"
  | "enum"
  | "length"
  | "range"
  | "unique-items"
  | "grammar"
  | "required"
  | "key-pattern"
  | "unknown-key"
  | "dependency"
  | "adopt-info"
  | "base-type"
  | "passthrough-duplicates"
  | "content-interface";

/** A single breach of a structural or cross-field constraint. */
export type Violation = {
  /** Dotted/indexed field path, e.g. `parts.mypart.source-type`; `""` is the document root. */
  path: string;
  rule: RuleId;
  message: string;
};

export type ValidationResult = { ok: true } | { ok: false; violations: Violation[] };

export type ResolutionRule = "else-fail" | "type-mismatch" | "orphan-else";

export type ResolutionFailure = {
  path: string;
  rule: ResolutionRule;
  message: string;
  context: SelectorContext;
};

/** Informative output of manifest assembly (defaults applied, deprecations). */
export type Notice = {
  level: "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

/** Order by field path, then rule id. Array.prototype.sort is stable, so ties keep discovery order. */
export function sortByPathAndRule<T extends { path: string; rule: string }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => compare(a.path, b.path) || compare(a.rule, b.rule));
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
