import type { GrammarShape } from "./grammar.js";
import type { RuleId } from "./diagnostics.js";

export type ValueType = "string" | "integer" | "number" | "boolean" | "array" | "object" | "null";

/** Holds when every listed field is in one of its allowed values, every `requires` is present and no `forbids` is. */
export type ExclusiveBranch = {
  readonly when?: Readonly<Record<string, readonly string[]>>;
  readonly requires?: readonly string[];
  readonly forbids?: readonly string[];
};

/**
 * One declarative rule. Rules live in a table keyed by schema path, where
 * `*` stands for any mapping entry and `[]` for any array item.
 *
 * `message` overrides the default template of the rule. Templates may
 * reference `{value}`, `{key}`, `{field}`, `{fields}`, `{expected}` and `{limit}`.
 */
export type ConstraintRule =
  | { readonly id: "type"; readonly types: readonly ValueType[]; readonly message?: string }
  | { readonly id: "pattern"; readonly pattern: RegExp; readonly message?: string }
  | { readonly id: "enum"; readonly values: readonly string[]; readonly message?: string }
  /** String length, array item count or mapping entry count. */
  | { readonly id: "length"; readonly min?: number; readonly max?: number; readonly message?: string }
  | { readonly id: "range"; readonly min?: number; readonly max?: number; readonly message?: string }
  | { readonly id: "unique-items" }
  | { readonly id: "grammar"; readonly shape: GrammarShape }
  | { readonly id: "required"; readonly fields: readonly string[] }
  /** Entries are validated under `<path>.*`; with `key`, keys must match (closed mapping). */
  | { readonly id: "mapping"; readonly key?: { readonly pattern: RegExp; readonly message: string } }
  /** Keys without a rule entry of their own are rejected. */
  | { readonly id: "closed" }
  | { readonly id: "dependency"; readonly field: string; readonly requires: readonly string[] }
  /** At least one group must be fully present. */
  | {
      readonly id: "alternatives";
      readonly reportAs: RuleId;
      readonly groups: readonly (readonly string[])[];
      readonly message: string;
    }
  /** Exactly one branch must hold. */
  | {
      readonly id: "exclusive";
      readonly reportAs: RuleId;
      readonly field: string;
      readonly defaults: Readonly<Record<string, string>>;
      readonly branches: readonly ExclusiveBranch[];
      readonly message: string;
    }
  | { readonly id: "passthrough-duplicates" }
  | { readonly id: "content-interface"; readonly role: "plug" | "slot" };

export type RuleTable = Readonly<Record<string, readonly ConstraintRule[]>>;
