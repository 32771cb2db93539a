/** Tool configuration: base.yaml ← <env>.yaml ← SNAPSPEC_* variables. */
export type OutputFormat = "human" | "jsonl";

export type SnapspecConfig = {
  schema_version: string;
  /** Architecture token, or `host` for the machine running the tool. */
  build_arch: string;
  /** Defaults to the build architecture. */
  target_arch?: string;
  format: OutputFormat;
  /** Substituted for `$NAME` references in resolved grammar values. */
  environment: Record<string, string>;
};
