import type { ConstraintRule, ExclusiveBranch, RuleTable, ValueType } from "../types/rules.js";
import { sortByPathAndRule, type RuleId, type ValidationResult, type Violation } from "../types/diagnostics.js";
import { isPlainObject, parseGrammar } from "../grammar/parser.js";
import { DEFAULT_MESSAGES, describeType, renderMessage, type TemplateVars } from "./messages.js";
import { MANIFEST_RULES } from "./rules.js";

/** The input is not a mapping at all; no field-level validation is possible. */
export class DocumentShapeError extends Error {
  constructor(readonly actualType: string) {
    super(`Manifest must be a mapping, got ${actualType}`);
    this.name = "DocumentShapeError";
  }
}

type Walk = {
  rules: RuleTable;
  violations: Violation[];
};

/**
 * Validate a parsed manifest tree against the constraint table.
 *
 * One recursive descent; every violation in the tree is collected, sorted
 * by field path then rule id. Throws DocumentShapeError only when the
 * document is not a mapping.
 */
export function validateDocument(document: unknown, rules: RuleTable = MANIFEST_RULES): ValidationResult {
  if (!isPlainObject(document)) {
    throw new DocumentShapeError(describeType(document));
  }

  const state: Walk = { rules, violations: [] };
  walk(state, document, "", "");

  if (state.violations.length === 0) return { ok: true };
  return { ok: false, violations: sortByPathAndRule(state.violations) };
}

function walk(state: Walk, value: unknown, path: string, schemaPath: string): void {
  const nodeRules = rulesAt(state.rules, schemaPath) ?? [];
  const key = lastSegment(path);
  const report = (rule: RuleId, at: string, template: string, vars: TemplateVars = {}): void => {
    state.violations.push({ path: at, rule, message: renderMessage(template, { key, ...vars }) });
  };

  // A value of the wrong type is reported once; nothing below it is checked.
  for (const rule of nodeRules) {
    if (rule.id === "type" && !rule.types.some((t) => matchesType(value, t))) {
      report("type", path, rule.message ?? DEFAULT_MESSAGES.type, { value, expected: rule.types });
      return;
    }
  }

  for (const rule of nodeRules) {
    checkValue(state, rule, value, path, report);
  }

  if (isPlainObject(value)) {
    descendObject(state, value, path, schemaPath, nodeRules, report);
    for (const rule of nodeRules) {
      checkGroup(rule, value, path, report);
    }
  } else if (Array.isArray(value)) {
    const itemSchema = `${schemaPath}[]`;
    if (rulesAt(state.rules, itemSchema)) {
      value.forEach((item, index) => walk(state, item, `${path}[${index}]`, itemSchema));
    }
  }
}

type Report = (rule: RuleId, at: string, template: string, vars?: TemplateVars) => void;

/** Rules about the value itself, run before descending into it. */
function checkValue(state: Walk, rule: ConstraintRule, value: unknown, path: string, report: Report): void {
  switch (rule.id) {
    case "pattern":
      if (typeof value === "string" && !rule.pattern.test(value)) {
        report("pattern", path, rule.message ?? DEFAULT_MESSAGES.pattern, { value });
      }
      return;

    case "enum":
      if (typeof value === "string" && !rule.values.includes(value)) {
        report("enum", path, rule.message ?? DEFAULT_MESSAGES.enum, { value, expected: rule.values });
      }
      return;

    case "length":
      checkLength(rule, value, path, report);
      return;

    case "range":
      if (typeof value !== "number") return;
      if (rule.min !== undefined && value < rule.min) {
        report("range", path, rule.message ?? DEFAULT_MESSAGES.minimum, { value, limit: rule.min });
      } else if (rule.max !== undefined && value > rule.max) {
        report("range", path, rule.message ?? DEFAULT_MESSAGES.maximum, { value, limit: rule.max });
      }
      return;

    case "unique-items":
      if (Array.isArray(value) && hasDuplicates(value)) {
        report("unique-items", path, DEFAULT_MESSAGES.uniqueItems, { value });
      }
      return;

    case "grammar": {
      const parsed = parseGrammar(value, path, rule.shape);
      if (!parsed.ok) {
        for (const issue of parsed.issues) {
          state.violations.push({ path: issue.path, rule: issue.rule === "type" ? "type" : "grammar", message: issue.message });
        }
      }
      return;
    }

    case "required":
      if (!isPlainObject(value)) return;
      for (const field of rule.fields) {
        if (!has(value, field)) {
          report("required", joinPath(path, field), DEFAULT_MESSAGES.required, { field });
        }
      }
      return;

    case "content-interface":
      checkContentInterface(rule.role, value, path, report);
      return;

    default:
      return;
  }
}

function checkLength(
  rule: Extract<ConstraintRule, { id: "length" }>,
  value: unknown,
  path: string,
  report: Report,
): void {
  let size: number;
  let templates: { min: string; max: string };
  if (typeof value === "string") {
    size = value.length;
    templates = { min: DEFAULT_MESSAGES.minLength, max: DEFAULT_MESSAGES.maxLength };
  } else if (Array.isArray(value)) {
    size = value.length;
    templates = { min: DEFAULT_MESSAGES.minItems, max: DEFAULT_MESSAGES.maxItems };
  } else if (isPlainObject(value)) {
    size = Object.keys(value).length;
    templates = { min: DEFAULT_MESSAGES.minEntries, max: DEFAULT_MESSAGES.maxEntries };
  } else {
    return;
  }

  if (rule.min !== undefined && size < rule.min) {
    report("length", path, rule.message ?? templates.min, { value, limit: rule.min });
  } else if (rule.max !== undefined && size > rule.max) {
    report("length", path, rule.message ?? templates.max, { value, limit: rule.max });
  }
}

function descendObject(
  state: Walk,
  value: Record<string, unknown>,
  path: string,
  schemaPath: string,
  nodeRules: readonly ConstraintRule[],
  report: Report,
): void {
  const mapping = nodeRules.find((r): r is Extract<ConstraintRule, { id: "mapping" }> => r.id === "mapping");
  const closed = nodeRules.some((r) => r.id === "closed");

  for (const [key, child] of Object.entries(value)) {
    const childPath = joinPath(path, key);

    if (mapping) {
      if (mapping.key && !mapping.key.pattern.test(key)) {
        report("key-pattern", childPath, mapping.key.message, { value: key });
        continue;
      }
      walk(state, child, childPath, joinPath(schemaPath, "*"));
      continue;
    }

    const childSchema = joinPath(schemaPath, key);
    if (rulesAt(state.rules, childSchema)) {
      walk(state, child, childPath, childSchema);
    } else if (closed) {
      report("unknown-key", childPath, DEFAULT_MESSAGES.unknownKey, { key });
    }
  }
}

/** Cross-field rules, run once the entries of the mapping have been checked. */
function checkGroup(rule: ConstraintRule, value: Record<string, unknown>, path: string, report: Report): void {
  switch (rule.id) {
    case "dependency": {
      if (!has(value, rule.field)) return;
      const missing = rule.requires.filter((f) => !has(value, f));
      if (missing.length > 0) {
        report("dependency", joinPath(path, rule.field), DEFAULT_MESSAGES.dependency, {
          field: rule.field,
          fields: missing,
        });
      }
      return;
    }

    case "alternatives": {
      const satisfied = rule.groups.some((group) => group.every((f) => has(value, f)));
      if (!satisfied) {
        const missing = (rule.groups[0] ?? []).filter((f) => !has(value, f));
        report(rule.reportAs, path, rule.message, { fields: missing });
      }
      return;
    }

    case "exclusive": {
      const holding = rule.branches.filter((b) => branchHolds(b, value, rule.defaults));
      if (holding.length !== 1) {
        report(rule.reportAs, joinPath(path, rule.field), rule.message, { value: value[rule.field] });
      }
      return;
    }

    case "passthrough-duplicates": {
      const passthrough = value.passthrough;
      if (!isPlainObject(passthrough)) return;
      const duplicates = Object.keys(passthrough).filter((k) => k !== "passthrough" && has(value, k));
      if (duplicates.length > 0) {
        report("passthrough-duplicates", joinPath(path, "passthrough"), DEFAULT_MESSAGES.passthrough, {
          fields: duplicates,
        });
      }
      return;
    }

    default:
      return;
  }
}

function branchHolds(
  branch: ExclusiveBranch,
  value: Record<string, unknown>,
  defaults: Readonly<Record<string, string>>,
): boolean {
  for (const [field, allowed] of Object.entries(branch.when ?? {})) {
    const actual = has(value, field) ? value[field] : has(defaults, field) ? defaults[field] : undefined;
    if (typeof actual !== "string" || !allowed.includes(actual)) return false;
  }
  if (branch.requires && !branch.requires.every((f) => has(value, f))) return false;
  if (branch.forbids && branch.forbids.some((f) => has(value, f))) return false;
  return true;
}

/** Content plugs need a target; content slots need something to share. */
function checkContentInterface(role: "plug" | "slot", value: unknown, path: string, report: Report): void {
  if (!isPlainObject(value) || value.interface !== "content") return;

  if (role === "plug") {
    const target = value.target;
    if (typeof target !== "string" || target.length === 0) {
      report("content-interface", path, "Failed to validate plug '{key}': 'target' is required");
    }
    return;
  }

  const source = isPlainObject(value.source) ? value.source : value;
  const shared = [source.read, source.write].some((paths) => Array.isArray(paths) && paths.length > 0);
  if (!shared) {
    report("content-interface", path, "Failed to validate slot '{key}': 'read' or 'write' is required");
  }
}

function matchesType(value: unknown, type: ValueType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return isPlainObject(value);
    case "null":
      return value === null;
  }
}

function hasDuplicates(items: readonly unknown[]): boolean {
  const seen = new Set<string>();
  for (const item of items) {
    const id = canonicalJson(item);
    if (seen.has(id)) return true;
    seen.add(id);
  }
  return false;
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "undefined";
}

/** Own keys only: a document key such as `constructor` must not find Object.prototype members. */
function rulesAt(rules: RuleTable, schemaPath: string): readonly ConstraintRule[] | undefined {
  return Object.hasOwn(rules, schemaPath) ? rules[schemaPath] : undefined;
}

function has(obj: object, key: string): boolean {
  return Object.hasOwn(obj, key);
}

export function joinPath(path: string, key: string): string {
  return path === "" ? key : `${path}.${key}`;
}

function lastSegment(path: string): string {
  const dot = path.lastIndexOf(".");
  return dot === -1 ? path : path.slice(dot + 1);
}
