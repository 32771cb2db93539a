import {
  ELSE_FAIL,
  type ConditionalNode,
  type Fallback,
  type GrammarNode,
  type GrammarShape,
  type SelectorBranch,
} from "../types/grammar.js";
import { describeType, formatValue } from "../schema/messages.js";

export type GrammarIssue = {
  path: string;
  rule: "type" | "grammar";
  message: string;
};

export type ParseResult = { ok: true; node: GrammarNode } | { ok: false; issues: GrammarIssue[] };

type ClauseFamily = "on" | "to" | "try";

type ClauseKey =
  | { family: "try" }
  | { family: "on" | "to"; selectors: string[]; targets?: string[] }
  | { family: "on" | "to"; invalid: string };

const ON_KEY = /^on\s+(.+?)(?:\s+to\s+(.+))?$/;
const TO_KEY = /^to\s+(.+)$/;
const SELECTOR = /^[^\s,]+$/;

/**
 * Parse the raw value of a grammar field into a node tree.
 *
 * A field holds either a plain string or a list. List items are strings or
 * clause mappings; an `else` mapping (or the string `else fail`) attaches to
 * the clause item right before it. A clause mapping may also carry its
 * `else` key inline.
 */
export function parseGrammar(raw: unknown, path: string, shape: GrammarShape): ParseResult {
  const issues: GrammarIssue[] = [];
  const node = parseField(raw, path, shape, issues);
  if (!node || issues.length > 0) return { ok: false, issues };
  return { ok: true, node };
}

function parseField(raw: unknown, path: string, shape: GrammarShape, issues: GrammarIssue[]): GrammarNode | undefined {
  if (Array.isArray(raw)) return parseList(raw, path, shape, true, issues);

  if (shape === "string" && typeof raw === "string") {
    if (raw === ELSE_FAIL) {
      issues.push({ path, rule: "grammar", message: `'${ELSE_FAIL}' must follow an 'on', 'to' or 'try' clause` });
      return undefined;
    }
    return { kind: "scalar", value: raw };
  }

  const expected = shape === "array" ? "'array'" : "'string', 'array'";
  issues.push({ path, rule: "type", message: `${formatValue(raw)} is not of type ${expected}` });
  return undefined;
}

function parseBody(raw: unknown, path: string, shape: GrammarShape, issues: GrammarIssue[]): GrammarNode | undefined {
  if (typeof raw === "string") {
    return raw === ELSE_FAIL ? { kind: "else-fail" } : { kind: "scalar", value: raw };
  }
  if (Array.isArray(raw)) return parseList(raw, path, shape, false, issues);

  issues.push({ path, rule: "grammar", message: `clause body must be a string or a list, got ${describeType(raw)}` });
  return undefined;
}

function parseList(
  items: readonly unknown[],
  path: string,
  shape: GrammarShape,
  topLevel: boolean,
  issues: GrammarIssue[],
): GrammarNode {
  const nodes: GrammarNode[] = [];
  // True while the last pushed node is a clause that an `else` may still follow.
  let afterClause = false;

  const attach = (fallback: Fallback, itemPath: string): void => {
    const last = nodes[nodes.length - 1];
    if (!afterClause || !last || !isConditional(last)) {
      issues.push({ path: itemPath, rule: "grammar", message: "'else' must follow an 'on', 'to' or 'try' clause" });
      return;
    }
    if (last.orElse) {
      issues.push({ path: itemPath, rule: "grammar", message: "a clause can only have one 'else'" });
      return;
    }
    nodes[nodes.length - 1] = withFallback(last, fallback);
  };

  items.forEach((item, index) => {
    const itemPath = `${path}[${index}]`;

    if (typeof item === "string") {
      if (item === ELSE_FAIL) {
        attach({ kind: "else-fail" }, itemPath);
        return;
      }
      if (shape === "string" && topLevel) {
        issues.push({
          path: itemPath,
          rule: "grammar",
          message: `${formatValue(item)} must be inside an 'on', 'to' or 'try' clause`,
        });
        return;
      }
      nodes.push({ kind: "scalar", value: item });
      afterClause = false;
      return;
    }

    if (isPlainObject(item)) {
      const keys = Object.keys(item);
      if (keys.length === 1 && keys[0] === "else") {
        const body = parseBody(item.else, `${itemPath}.else`, shape, issues);
        if (body) attach({ kind: "else", body }, itemPath);
        return;
      }
      const clause = parseClause(item, itemPath, shape, issues);
      if (clause) {
        nodes.push(clause);
        afterClause = true;
      }
      return;
    }

    issues.push({
      path: itemPath,
      rule: "grammar",
      message: `grammar items must be strings or clauses, got ${describeType(item)}`,
    });
  });

  return { kind: "sequence", items: nodes };
}

function parseClause(
  obj: Record<string, unknown>,
  path: string,
  shape: GrammarShape,
  issues: GrammarIssue[],
): ConditionalNode | undefined {
  let family: ClauseFamily | undefined;
  let tryBody: GrammarNode | undefined;
  let elseBody: GrammarNode | undefined;
  const branches: SelectorBranch[] = [];
  const seen = new Set<string>();

  if (Object.keys(obj).length === 0) {
    issues.push({ path, rule: "grammar", message: "empty clause" });
    return undefined;
  }

  for (const [key, value] of Object.entries(obj)) {
    const keyPath = `${path}.${key}`;

    if (key === "else") {
      elseBody = parseBody(value, keyPath, shape, issues);
      continue;
    }

    const parsed = parseClauseKey(key);
    if (!parsed) {
      issues.push({ path: keyPath, rule: "grammar", message: `'${key}' is not a valid grammar clause` });
      continue;
    }
    if (family && family !== parsed.family) {
      issues.push({
        path: keyPath,
        rule: "grammar",
        message: `'${parsed.family}' clauses cannot be mixed with '${family}' clauses in one mapping`,
      });
      continue;
    }
    family = parsed.family;

    if (parsed.family === "try") {
      tryBody = parseBody(value, keyPath, shape, issues);
      continue;
    }
    if ("invalid" in parsed) {
      issues.push({ path: keyPath, rule: "grammar", message: `invalid selector ${formatValue(parsed.invalid)} in '${key}'` });
      continue;
    }

    const id = selectorSetId(parsed.family, parsed.selectors, parsed.targets);
    if (seen.has(id)) {
      issues.push({ path: keyPath, rule: "grammar", message: `duplicate selector set in '${key}'` });
      continue;
    }
    seen.add(id);

    const body = parseBody(value, keyPath, shape, issues);
    if (!body) continue;
    branches.push(parsed.targets ? { key, selectors: parsed.selectors, targets: parsed.targets, body } : { key, selectors: parsed.selectors, body });
  }

  if (!family) {
    if ("else" in obj) {
      issues.push({ path, rule: "grammar", message: "'else' must follow an 'on', 'to' or 'try' clause" });
    }
    return undefined;
  }

  const orElse: Fallback | undefined = elseBody ? { kind: "else", body: elseBody } : undefined;

  if (family === "try") {
    if (!tryBody) return undefined;
    return orElse ? { kind: "try", body: tryBody, orElse } : { kind: "try", body: tryBody };
  }
  if (branches.length === 0) return undefined;
  if (family === "on") return orElse ? { kind: "on", branches, orElse } : { kind: "on", branches };
  return orElse ? { kind: "to", branches, orElse } : { kind: "to", branches };
}

function parseClauseKey(key: string): ClauseKey | undefined {
  const trimmed = key.trim();
  if (trimmed === "try") return { family: "try" };

  const on = ON_KEY.exec(trimmed);
  if (on) {
    const selectors = splitSelectors(on[1]);
    if (typeof selectors === "string") return { family: "on", invalid: selectors };
    if (on[2] === undefined) return { family: "on", selectors };
    const targets = splitSelectors(on[2]);
    if (typeof targets === "string") return { family: "on", invalid: targets };
    return { family: "on", selectors, targets };
  }

  const to = TO_KEY.exec(trimmed);
  if (to) {
    const selectors = splitSelectors(to[1]);
    if (typeof selectors === "string") return { family: "to", invalid: selectors };
    return { family: "to", selectors };
  }

  return undefined;
}

/** Returns the selectors, or the first offending token. */
function splitSelectors(text: string): string[] | string {
  const selectors = text.split(",").map((s) => s.trim());
  for (const selector of selectors) {
    if (!SELECTOR.test(selector)) return selector;
  }
  return selectors;
}

function selectorSetId(family: string, selectors: readonly string[], targets?: readonly string[]): string {
  const on = [...new Set(selectors)].sort().join(",");
  const to = targets ? [...new Set(targets)].sort().join(",") : "";
  return `${family}|${on}|${to}`;
}

export function isConditional(node: GrammarNode): node is ConditionalNode {
  return node.kind === "on" || node.kind === "to" || node.kind === "try";
}

function withFallback(node: ConditionalNode, orElse: Fallback): ConditionalNode {
  return { ...node, orElse };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
