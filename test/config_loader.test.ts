import { describe, expect, it, afterEach } from "vitest";
import path from "node:path";
import { loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

function clearSnapspecEnv(): void {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith("SNAPSPEC_")) delete process.env[key];
  }
}

describe("config loader", () => {
  afterEach(clearSnapspecEnv);

  it("loads base config", () => {
    expect(loadConfig(undefined, CONFIG_DIR)).toEqual({
      schema_version: "1",
      build_arch: "host",
      format: "human",
      environment: {},
    });
  });

  it("merges env-specific config over base", () => {
    expect(loadConfig("ci", CONFIG_DIR)).toEqual({
      schema_version: "1",
      build_arch: "amd64",
      target_arch: "arm64",
      format: "jsonl",
      environment: { SNAPCRAFT_ARCH_TRIPLET: "aarch64-linux-gnu" },
    });
  });

  it("applies environment variable overrides", () => {
    process.env.SNAPSPEC_BUILD_ARCH = "riscv64";
    process.env.SNAPSPEC_ENV_CFLAGS = "-O2";
    const config = loadConfig("ci", CONFIG_DIR);
    expect(config.build_arch).toBe("riscv64");
    expect(config.environment).toEqual({ SNAPCRAFT_ARCH_TRIPLET: "aarch64-linux-gnu", CFLAGS: "-O2" });
  });

  it("returns base config when env yaml does not exist", () => {
    expect(loadConfig("nonexistent-env", CONFIG_DIR).build_arch).toBe("host");
  });
});

describe("config validator", () => {
  it("validates the base config", async () => {
    const res = await validateConfig(loadConfig(undefined, CONFIG_DIR));
    expect(res).toEqual({
      valid: true,
      config: { schema_version: "1", build_arch: "host", format: "human", environment: {} },
    });
  });

  it("fills in defaults without touching the input", async () => {
    const raw = {};
    const res = await validateConfig(raw);
    expect(res).toEqual({
      valid: true,
      config: { schema_version: "1", build_arch: "host", format: "human", environment: {} },
    });
    expect(raw).toEqual({});
  });

  it("rejects an unknown output format", async () => {
    const res = await validateConfig({ format: "xml" });
    expect(res.valid).toBe(false);
    if (res.valid) return;
    expect(res.errors).toContain("data/format must be equal to one of the allowed values");
  });

  it("rejects unknown keys", async () => {
    const res = await validateConfig({ colour: "red" });
    expect(res.valid).toBe(false);
    if (res.valid) return;
    expect(res.errors).toContain("must NOT have additional properties");
  });

  it("rejects non-string environment values", async () => {
    const res = await validateConfig({ environment: { JOBS: 4 } });
    expect(res.valid).toBe(false);
  });
});
