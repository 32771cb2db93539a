import { isPlainObject } from "../grammar/parser.js";
import type { SelectorContext } from "../types/context.js";
import {
  sortByPathAndRule,
  type Notice,
  type ResolutionFailure,
  type Violation,
} from "../types/diagnostics.js";
import type {
  AppSpec,
  Confinement,
  Grade,
  HookSpec,
  Manifest,
  PartSpec,
  PlugSpec,
  SlotSpec,
  SnapType,
} from "../types/manifest.js";
import { describeType } from "../schema/messages.js";
import { DocumentShapeError, validateDocument } from "../schema/validator.js";
import { buildApp, buildHook } from "./apps.js";
import { deepFreeze, oneOf, readRecord, readScalarRecord, readString, readStringList } from "./fields.js";
import { resolvePart } from "./parts.js";
import { normalizePlug, normalizeSlot } from "./plugs.js";

export type AssembleResult =
  | { ok: true; manifest: Manifest; notices: Notice[] }
  | { ok: false; stage: "validate"; violations: Violation[] }
  | { ok: false; stage: "resolve"; failures: ResolutionFailure[] };

const SNAP_TYPES: readonly SnapType[] = ["app", "base", "gadget", "kernel", "snapd"];
const CONFINEMENTS: readonly Confinement[] = ["classic", "devmode", "strict"];
const GRADES: readonly Grade[] = ["stable", "devel"];

/**
 * Validate, resolve and freeze a parsed manifest.
 *
 * Grammar is only resolved for a structurally valid document. Resolution
 * failures of every part are collected before giving up.
 *
 * @throws DocumentShapeError when `input` is not a mapping
 */
export function assembleManifest(input: unknown, context: SelectorContext): AssembleResult {
  if (!isPlainObject(input)) throw new DocumentShapeError(describeType(input));
  const validation = validateDocument(input);
  if (!validation.ok) return { ok: false, stage: "validate", violations: validation.violations };
  // The frozen manifest shares no structure with the caller's tree.
  const document = structuredClone(input);

  const failures: ResolutionFailure[] = [];
  const parts: Record<string, PartSpec> = {};
  for (const [name, raw] of Object.entries(readRecord(document, "parts"))) {
    if (!isPlainObject(raw)) continue;
    const res = resolvePart(name, raw, context);
    if (res.ok) parts[name] = res.part;
    else failures.push(...res.failures);
  }
  if (failures.length > 0) return { ok: false, stage: "resolve", failures: sortByPathAndRule(failures) };

  const notices: Notice[] = [];
  const apps: Record<string, AppSpec> = {};
  for (const [name, raw] of Object.entries(readRecord(document, "apps"))) {
    if (isPlainObject(raw)) apps[name] = buildApp(name, raw);
  }
  const hooks: Record<string, HookSpec> = {};
  for (const [name, raw] of Object.entries(readRecord(document, "hooks"))) {
    hooks[name] = buildHook(name, raw);
  }

  const manifest: Manifest = {
    name: readString(document, "name") ?? "",
    version: readString(document, "version"),
    "version-script": readString(document, "version-script"),
    summary: readString(document, "summary"),
    description: readString(document, "description"),
    title: readString(document, "title"),
    "adopt-info": readString(document, "adopt-info"),
    type: oneOf(SNAP_TYPES, document.type) ? document.type : "app",
    confinement: withDefault(document, "confinement", CONFINEMENTS, "strict", notices),
    grade: withDefault(document, "grade", GRADES, "stable", notices),
    base: readString(document, "base"),
    "build-base": readString(document, "build-base"),
    icon: readString(document, "icon"),
    license: readString(document, "license"),
    "license-agreement": readString(document, "license-agreement"),
    "license-version": readString(document, "license-version"),
    ...(typeof document.epoch === "string" || typeof document.epoch === "number" ? { epoch: document.epoch } : {}),
    assumes: assumptions(document, Object.values(apps)),
    architectures: Array.isArray(document.architectures) ? [...document.architectures] : [],
    environment: readScalarRecord(document, "environment"),
    layout: readRecord(document, "layout"),
    passthrough: readRecord(document, "passthrough"),
    plugs: mapEntries(readRecord(document, "plugs"), normalizePlug),
    slots: mapEntries(readRecord(document, "slots"), normalizeSlot),
    apps,
    hooks,
    parts,
  };

  if (manifest["version-script"] !== undefined) {
    notices.push({
      level: "warn",
      code: "VERSION_SCRIPT_DEPRECATED",
      message: "'version-script' is deprecated in favour of setting the version from a part with 'adopt-info'",
      path: "version-script",
    });
  }

  return { ok: true, manifest: deepFreeze(manifest), notices };
}

function withDefault<T extends string>(
  document: Record<string, unknown>,
  field: "confinement" | "grade",
  allowed: readonly T[],
  fallback: T,
  notices: Notice[],
): T {
  const value = document[field];
  if (oneOf(allowed, value)) return value;
  notices.push({
    level: "info",
    code: `${field.toUpperCase()}_DEFAULTED`,
    message: `'${field}' property not specified: defaulting to '${fallback}'`,
    path: field,
  });
  return fallback;
}

/** Apps using `command-chain` need a snapd that supports it. */
function assumptions(document: Record<string, unknown>, apps: readonly AppSpec[]): string[] {
  const assumes = readStringList(document, "assumes");
  if (apps.some((app) => app["command-chain"].length > 0) && !assumes.includes("command-chain")) {
    assumes.push("command-chain");
  }
  return assumes;
}

function mapEntries<T extends PlugSpec | SlotSpec>(
  record: Record<string, unknown>,
  build: (name: string, raw: unknown) => T,
): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [name, raw] of Object.entries(record)) result[name] = build(name, raw);
  return result;
}
