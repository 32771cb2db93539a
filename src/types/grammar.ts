/** Grammar expression tree: conditional values inside manifest fields. */

export type Scalar = {
  readonly kind: "scalar";
  readonly value: string;
};

export type Sequence = {
  readonly kind: "sequence";
  readonly items: readonly GrammarNode[];
};

/**
 * One `on <sel>[,<sel>...]` (or `to ...`) key and its body.
 * `targets` is only set for the compound `on <sel> to <sel>` form.
 */
export type SelectorBranch = {
  readonly key: string;
  readonly selectors: readonly string[];
  readonly targets?: readonly string[];
  readonly body: GrammarNode;
};

export type ElseClause = {
  readonly kind: "else";
  readonly body: GrammarNode;
};

export type ElseFail = {
  readonly kind: "else-fail";
};

export type Fallback = ElseClause | ElseFail;

export type OnClause = {
  readonly kind: "on";
  readonly branches: readonly SelectorBranch[];
  readonly orElse?: Fallback;
};

export type ToClause = {
  readonly kind: "to";
  readonly branches: readonly SelectorBranch[];
  readonly orElse?: Fallback;
};

export type TryClause = {
  readonly kind: "try";
  readonly body: GrammarNode;
  readonly orElse?: Fallback;
};

export type ConditionalNode = OnClause | ToClause | TryClause;

export type GrammarNode = Scalar | Sequence | OnClause | ToClause | TryClause | ElseClause | ElseFail;

/** `grammar-array` fields resolve to a list, `grammar-string` fields to at most one string. */
export type GrammarShape = "array" | "string";

export const ELSE_FAIL = "else fail";
