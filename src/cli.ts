#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { validateManifest, type CommandOptions, type CommandResult, type Diagnostic } from "./commands/validate.js";
import { renderManifest } from "./commands/resolve.js";
import { EXIT } from "./commands/exit-codes.js";
import type { OutputFormat } from "./types/config.js";

type CliOptions = {
  config?: string;
  env?: string;
  buildArch?: string;
  targetArch?: string;
  format?: OutputFormat;
};

function parseFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("expected human or jsonl");
}

function toCommandOptions(file: string, opts: CliOptions): CommandOptions {
  return {
    file,
    configDir: opts.config,
    env: opts.env,
    buildArch: opts.buildArch,
    targetArch: opts.targetArch,
    format: opts.format,
  };
}

function print(diagnostics: Diagnostic[], format: OutputFormat): void {
  for (const d of diagnostics) {
    if (format === "jsonl") {
      process.stdout.write(JSON.stringify(d) + "\n");
    } else {
      const line = d.path ? `${d.path}: ${d.message}` : d.message;
      if (d.level === "error") console.error(line);
      else console.log(`${d.level}: ${line}`);
    }
  }
}

/** Print failure diagnostics and exit; returns only on success. */
function exitOnFailure(res: CommandResult): asserts res is Extract<CommandResult, { ok: true }> {
  if (res.ok) return;
  print(res.diagnostics, res.format);
  process.exit(res.exitCode);
}

const program = new Command();

program
  .name("snapspec")
  .description("Validate build manifests and resolve their architecture grammar")
  .version("0.1.0")
  .exitOverride();

function withCommonOptions(cmd: Command): Command {
  return cmd
    .argument("<file>", "Manifest file (YAML)")
    .option("--config <path>", "Path to config directory")
    .option("--env <name>", "Config environment layer (config/<name>.yaml)")
    .option("--build-arch <arch>", "Build architecture (default from config; 'host' for this machine)")
    .option("--target-arch <arch>", "Target architecture (default: build architecture)")
    .option("--format <format>", "Output format: human|jsonl", parseFormat);
}

withCommonOptions(program.command("validate"))
  .description("Validate a manifest and check that its grammar resolves")
  .action(async (file: string, opts: CliOptions) => {
    const res = await validateManifest(toCommandOptions(file, opts));
    exitOnFailure(res);
    print(res.diagnostics, res.format);
    if (res.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

withCommonOptions(program.command("resolve"))
  .description("Print the manifest with every grammar field resolved")
  .action(async (file: string, opts: CliOptions) => {
    const res = await validateManifest(toCommandOptions(file, opts));
    exitOnFailure(res);
    // Notices go to stderr so the manifest on stdout stays parseable.
    for (const d of res.diagnostics) console.error(`${d.level}: ${d.message}`);
    process.stdout.write(renderManifest(res.manifest, res.format));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  // commander has already printed usage errors, help and version
  if (err instanceof CommanderError) process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INVALID_ARGS);
});
