import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { createSelectorContext, hostArchitecture } from "../grammar/context.js";
import { assembleManifest } from "../manifest/assemble.js";
import { DocumentShapeError } from "../schema/validator.js";
import type { OutputFormat, SnapspecConfig } from "../types/config.js";
import type { SelectorContext } from "../types/context.js";
import type { Notice, ResolutionFailure, Violation } from "../types/diagnostics.js";
import type { Manifest } from "../types/manifest.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type CommandOptions = {
  file: string;
  configDir?: string;
  env?: string;
  buildArch?: string;
  targetArch?: string;
  format?: OutputFormat;
};

export type CommandResult =
  | { ok: true; format: OutputFormat; manifest: Manifest; diagnostics: Diagnostic[] }
  | { ok: false; format: OutputFormat; exitCode: ExitCode; diagnostics: Diagnostic[] };

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export function fromViolation(v: Violation): Diagnostic {
  return diag("error", "MANIFEST_INVALID", v.message, { path: v.path, details: { rule: v.rule } });
}

export function fromFailure(f: ResolutionFailure): Diagnostic {
  return diag("error", "GRAMMAR_UNRESOLVED", f.message, {
    path: f.path,
    details: { rule: f.rule, build_arch: f.context.buildArch, target_arch: f.context.targetArch },
  });
}

export function fromNotice(n: Notice): Diagnostic {
  return diag(n.level, n.code, n.message, n.path === undefined ? undefined : { path: n.path });
}

/** Command-line flags take precedence over the layered config. */
export function contextFromConfig(config: SnapspecConfig, opts: Pick<CommandOptions, "buildArch" | "targetArch">): SelectorContext {
  const configured = opts.buildArch ?? config.build_arch;
  const buildArch = configured === "host" ? hostArchitecture() : configured;
  return createSelectorContext({
    buildArch,
    targetArch: opts.targetArch ?? config.target_arch,
    environment: config.environment,
  });
}

function readManifestFile(filePath: string): { ok: true; document: unknown } | { ok: false; error: Diagnostic } {
  const rel = path.relative(process.cwd(), filePath);
  try {
    return { ok: true, document: YAML.parse(fs.readFileSync(filePath, "utf8")) };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return {
      ok: false,
      error: diag("error", "MANIFEST_READ_FAILED", `Failed to read manifest (${rel}): ${message}`, { path: filePath }),
    };
  }
}

/**
 * Load config, read the manifest and run it through validation and grammar
 * resolution for the configured architectures.
 */
export async function validateManifest(opts: CommandOptions): Promise<CommandResult> {
  const loaded = await validateConfig(loadConfig(opts.env, opts.configDir));
  if (!loaded.valid) {
    return {
      ok: false,
      format: opts.format ?? "human",
      exitCode: EXIT.INVALID_ARGS,
      diagnostics: [diag("error", "CONFIG_INVALID", `Config invalid: ${loaded.errors}`)],
    };
  }
  const config = loaded.config;
  const format = opts.format ?? config.format;

  const filePath = path.resolve(opts.file);
  const read = readManifestFile(filePath);
  if (!read.ok) return { ok: false, format, exitCode: EXIT.INPUT_UNREADABLE, diagnostics: [read.error] };

  const context = contextFromConfig(config, opts);
  try {
    const res = assembleManifest(read.document, context);
    if (res.ok) {
      return { ok: true, format, manifest: res.manifest, diagnostics: res.notices.map(fromNotice) };
    }
    if (res.stage === "validate") {
      return { ok: false, format, exitCode: EXIT.MANIFEST_INVALID, diagnostics: res.violations.map(fromViolation) };
    }
    return { ok: false, format, exitCode: EXIT.GRAMMAR_UNRESOLVED, diagnostics: res.failures.map(fromFailure) };
  } catch (e) {
    if (!(e instanceof DocumentShapeError)) throw e;
    return {
      ok: false,
      format,
      exitCode: EXIT.MANIFEST_INVALID,
      diagnostics: [diag("error", "MANIFEST_SHAPE", e.message, { path: filePath })],
    };
  }
}
