import { isPlainObject, parseGrammar } from "../grammar/parser.js";
import { resolve, resolveString } from "../grammar/resolver.js";
import type { SelectorContext } from "../types/context.js";
import type { ResolutionFailure } from "../types/diagnostics.js";
import type { GrammarNode, GrammarShape } from "../types/grammar.js";
import type { BuildAttribute, PartSpec } from "../types/manifest.js";
import {
  BUILD_ATTRIBUTES,
  GRAMMAR_ARRAY_FIELDS,
  GRAMMAR_STRING_FIELDS,
  MANIFEST_RULES,
  OVERRIDE_DEFAULTS,
  SOURCE_TYPES,
} from "../schema/rules.js";
import { joinPath } from "../schema/validator.js";
import {
  expandVariables,
  oneOf,
  readNumber,
  readRecord,
  readString,
  readStringList,
  readStringRecord,
  remainingProperties,
} from "./fields.js";

export type PartResult = { ok: true; part: PartSpec } | { ok: false; failures: ResolutionFailure[] };

/** Keys the part schema knows about; everything else belongs to the plugin. */
const KNOWN_PART_KEYS: ReadonlySet<string> = new Set(
  Object.keys(MANIFEST_RULES)
    .filter((k) => k.startsWith("parts.*."))
    .map((k) => k.slice("parts.*.".length))
    .filter((k) => !/[.[]/.test(k)),
);

type Resolved = {
  arrays: Partial<Record<(typeof GRAMMAR_ARRAY_FIELDS)[number], string[]>>;
  strings: Partial<Record<(typeof GRAMMAR_STRING_FIELDS)[number], string>>;
};

/**
 * Resolve every grammar field of one part against the context and build
 * its spec. All failures of the part are returned together.
 */
export function resolvePart(
  name: string,
  raw: Record<string, unknown>,
  context: SelectorContext,
  path: string = joinPath("parts", name),
): PartResult {
  const failures: ResolutionFailure[] = [];
  const resolved: Resolved = { arrays: {}, strings: {} };

  for (const field of GRAMMAR_ARRAY_FIELDS) {
    if (!(field in raw)) continue;
    const fieldPath = joinPath(path, field);
    const node = parseField(raw[field], fieldPath, "array", context, failures);
    if (!node) continue;
    const res = resolve(node, context, fieldPath);
    if (res.ok) resolved.arrays[field] = res.values.map((v) => expandVariables(v, context.environment));
    else failures.push(res.failure);
  }

  for (const field of GRAMMAR_STRING_FIELDS) {
    if (!(field in raw)) continue;
    const fieldPath = joinPath(path, field);
    const node = parseField(raw[field], fieldPath, "string", context, failures);
    if (!node) continue;
    const res = resolveString(node, context, fieldPath);
    if (!res.ok) failures.push(res.failure);
    else if (res.value !== undefined) resolved.strings[field] = expandVariables(res.value, context.environment);
  }

  if (failures.length > 0) return { ok: false, failures };

  const sourceType = raw["source-type"];
  const part: PartSpec = {
    name,
    plugin: readString(raw, "plugin") ?? "",
    ...resolved.strings,
    ...(oneOf(SOURCE_TYPES, sourceType) ? { "source-type": sourceType } : {}),
    ...("source-depth" in raw ? { "source-depth": readNumber(raw, "source-depth") } : {}),
    "build-packages": resolved.arrays["build-packages"] ?? [],
    "build-snaps": resolved.arrays["build-snaps"] ?? [],
    "stage-packages": resolved.arrays["stage-packages"] ?? [],
    "stage-snaps": resolved.arrays["stage-snaps"] ?? [],
    after: readStringList(raw, "after"),
    "disable-parallel": raw["disable-parallel"] === true,
    "build-attributes": readStringList(raw, "build-attributes").filter((a): a is BuildAttribute =>
      oneOf(BUILD_ATTRIBUTES, a),
    ),
    "build-environment": readBuildEnvironment(raw),
    stage: readStringList(raw, "stage"),
    prime: readStringList(raw, "prime"),
    filesets: readFilesets(raw),
    organize: readStringRecord(raw, "organize"),
    "override-pull": readString(raw, "override-pull") ?? OVERRIDE_DEFAULTS["override-pull"],
    "override-build": readString(raw, "override-build") ?? OVERRIDE_DEFAULTS["override-build"],
    "override-stage": readString(raw, "override-stage") ?? OVERRIDE_DEFAULTS["override-stage"],
    "override-prime": readString(raw, "override-prime") ?? OVERRIDE_DEFAULTS["override-prime"],
    properties: remainingProperties(raw, KNOWN_PART_KEYS),
  };
  return { ok: true, part };
}

/** A grammar value that does not parse is a type mismatch at resolution time. */
function parseField(
  raw: unknown,
  path: string,
  shape: GrammarShape,
  context: SelectorContext,
  failures: ResolutionFailure[],
): GrammarNode | undefined {
  const parsed = parseGrammar(raw, path, shape);
  if (parsed.ok) return parsed.node;
  for (const issue of parsed.issues) {
    failures.push({ path: issue.path, rule: "type-mismatch", message: issue.message, context });
  }
  return undefined;
}

function readBuildEnvironment(raw: Record<string, unknown>): Record<string, string>[] {
  const value = raw["build-environment"];
  if (!Array.isArray(value)) return [];
  return value.filter(isPlainObject).map((entry) => {
    const vars: Record<string, string> = {};
    for (const [k, v] of Object.entries(entry)) {
      if (typeof v === "string") vars[k] = v;
    }
    return vars;
  });
}

function readFilesets(raw: Record<string, unknown>): Record<string, string[]> {
  const result: Record<string, string[]> = {};
  const filesets = readRecord(raw, "filesets");
  for (const name of Object.keys(filesets)) {
    result[name] = readStringList(filesets, name);
  }
  return result;
}
