import YAML from "yaml";
import type { OutputFormat } from "../types/config.js";
import type { Manifest } from "../types/manifest.js";

/**
 * Render a resolved manifest: YAML for people, a single JSON line for
 * machines.
 */
export function renderManifest(manifest: Manifest, format: OutputFormat): string {
  if (format === "jsonl") {
    return JSON.stringify({ level: "info", code: "RESOLVED", manifest }) + "\n";
  }
  return YAML.stringify(manifest);
}
