import { loadAjv } from "../schema/ajv.js";
import type { SnapspecConfig } from "../types/config.js";

const ARCH = { type: "string", pattern: "^[a-z0-9][a-z0-9_-]*$" };

/** Config schema; missing keys take their defaults. */
const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1, default: "1" },
    build_arch: { ...ARCH, default: "host" },
    target_arch: ARCH,
    format: { type: "string", enum: ["human", "jsonl"], default: "human" },
    environment: {
      type: "object",
      propertyNames: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
      additionalProperties: { type: "string" },
      default: {},
    },
  },
};

export type ConfigValidationResult = { valid: true; config: SnapspecConfig } | { valid: false; errors: string };

/** Validate a loaded config, filling in defaults. The input is not modified. */
export async function validateConfig(raw: Record<string, unknown>): Promise<ConfigValidationResult> {
  const ajv = await loadAjv({ useDefaults: true });
  const validate = ajv.compile<SnapspecConfig>(CONFIG_SCHEMA);
  const config: unknown = structuredClone(raw);
  if (validate(config)) return { valid: true, config };
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
