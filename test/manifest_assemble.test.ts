import { describe, expect, it } from "vitest";
import { createSelectorContext } from "../src/grammar/context.js";
import { assembleManifest } from "../src/manifest/assemble.js";
import { DocumentShapeError } from "../src/schema/validator.js";

const amd64 = createSelectorContext({ buildArch: "amd64" });
const arm64 = createSelectorContext({ buildArch: "arm64" });
const cross = createSelectorContext({ buildArch: "amd64", targetArch: "arm64" });

function document(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: "hello",
    version: "1.0",
    summary: "Hello",
    description: "Says hello",
    base: "core22",
    apps: {
      hello: { command: "bin/hello", "command-chain": ["bin/wrapper"], plugs: ["network"] },
    },
    plugs: {
      themes: {
        interface: "content",
        target: "$SNAP/data-dir/themes",
        "default-provider": "gtk-common-themes:gtk-3-themes",
      },
    },
    parts: {
      hello: {
        plugin: "make",
        source: [{ "on amd64": "https://example.com/hello-amd64.tar.gz" }, { else: "https://example.com/hello.tar.gz" }],
        "build-packages": ["gcc", { "on arm64": ["gcc-aarch64-linux-gnu"] }, { "to arm64": ["libc6-dev-arm64-cross"] }],
        "stage-packages": [{ "on amd64": ["libfoo"] }],
        "make-parameters": ["PREFIX=/usr"],
      },
    },
    ...overrides,
  };
}

function assembled(doc: unknown, context = amd64) {
  const res = assembleManifest(doc, context);
  if (!res.ok) throw new Error(`assembly failed: ${JSON.stringify(res)}`);
  return res;
}

describe("assembleManifest: grammar", () => {
  it("resolves every grammar field for the build architecture", () => {
    const part = assembled(document()).manifest.parts.hello;
    expect(part?.source).toBe("https://example.com/hello-amd64.tar.gz");
    expect(part?.["build-packages"]).toEqual(["gcc"]);
    expect(part?.["stage-packages"]).toEqual(["libfoo"]);
  });

  it("resolves differently for another context", () => {
    const native = assembled(document(), arm64).manifest.parts.hello;
    expect(native?.source).toBe("https://example.com/hello.tar.gz");
    expect(native?.["build-packages"]).toEqual(["gcc", "gcc-aarch64-linux-gnu", "libc6-dev-arm64-cross"]);
    expect(native?.["stage-packages"]).toEqual([]);

    const crossBuilt = assembled(document(), cross).manifest.parts.hello;
    expect(crossBuilt?.["build-packages"]).toEqual(["gcc", "libc6-dev-arm64-cross"]);
  });

  it("expands environment references in resolved values", () => {
    const context = createSelectorContext({ buildArch: "amd64", environment: { ARCH_TRIPLET: "aarch64-linux-gnu" } });
    const parts = { p: { plugin: "nil", "build-packages": ["gcc-$ARCH_TRIPLET", "lib${ARCH_TRIPLET}-dev", "$UNKNOWN"] } };
    const part = assembled(document({ parts }), context).manifest.parts.p;
    expect(part?.["build-packages"]).toEqual(["gcc-aarch64-linux-gnu", "libaarch64-linux-gnu-dev", "$UNKNOWN"]);
  });

  it("collects resolution failures of every part, sorted by path", () => {
    const parts = {
      b: { plugin: "nil", source: [{ "on arm64": "https://example.com/b.tar.gz" }, "else fail"] },
      a: { plugin: "nil", "build-packages": [{ "on arm64": ["x"] }, "else fail"] },
    };
    const res = assembleManifest(document({ parts }), amd64);
    expect(res.ok).toBe(false);
    if (res.ok || res.stage !== "resolve") throw new Error("expected resolution failures");
    expect(res.failures).toEqual([
      {
        path: "parts.a.build-packages",
        rule: "else-fail",
        message: "Unable to satisfy 'on arm64', failure forced (build architecture 'amd64', target architecture 'amd64')",
        context: amd64,
      },
      {
        path: "parts.b.source",
        rule: "else-fail",
        message: "Unable to satisfy 'on arm64', failure forced (build architecture 'amd64', target architecture 'amd64')",
        context: amd64,
      },
    ]);
  });

  it("reports a string field that resolves to several values", () => {
    const parts = { p: { plugin: "nil", source: [{ "on amd64": ["a", "b"] }] } };
    const res = assembleManifest(document({ parts }), amd64);
    if (res.ok || res.stage !== "resolve") throw new Error("expected resolution failures");
    expect(res.failures.map((f) => [f.path, f.rule])).toEqual([["parts.p.source", "type-mismatch"]]);
  });

  it("does not resolve a structurally invalid document", () => {
    const parts = { p: { plugin: "nil", "build-packages": [{ "on arm64": ["x"] }, "else fail"] } };
    const res = assembleManifest(document({ parts, grade: "beta" }), amd64);
    expect(res).toEqual({
      ok: false,
      stage: "validate",
      violations: [{ path: "grade", rule: "enum", message: "'beta' is not one of ['stable', 'devel']" }],
    });
  });

  it("throws for input that is not a mapping", () => {
    expect(() => assembleManifest([], amd64)).toThrow(DocumentShapeError);
  });
});

describe("assembleManifest: model", () => {
  it("applies defaults and reports them", () => {
    const { manifest, notices } = assembled(document());
    expect(manifest.type).toBe("app");
    expect(manifest.confinement).toBe("strict");
    expect(manifest.grade).toBe("stable");
    expect(notices).toEqual([
      {
        level: "info",
        code: "CONFINEMENT_DEFAULTED",
        message: "'confinement' property not specified: defaulting to 'strict'",
        path: "confinement",
      },
      {
        level: "info",
        code: "GRADE_DEFAULTED",
        message: "'grade' property not specified: defaulting to 'stable'",
        path: "grade",
      },
    ]);
  });

  it("builds a hook with no settings", () => {
    const { manifest } = assembled(document({ hooks: { install: null } }));
    expect(manifest.hooks.install).toEqual({ name: "install", plugs: [], passthrough: {} });
  });

  it("keeps explicit confinement and grade without notices", () => {
    const { manifest, notices } = assembled(document({ confinement: "devmode", grade: "devel" }));
    expect(manifest.confinement).toBe("devmode");
    expect(manifest.grade).toBe("devel");
    expect(notices).toEqual([]);
  });

  it("warns about version-script", () => {
    const { notices } = assembled(document({ confinement: "strict", grade: "stable", "version-script": "git describe" }));
    expect(notices.map((n) => [n.level, n.code])).toEqual([["warn", "VERSION_SCRIPT_DEPRECATED"]]);
  });

  it("fills in part defaults and keeps plugin properties", () => {
    const part = assembled(document()).manifest.parts.hello;
    expect(part).toMatchObject({
      name: "hello",
      plugin: "make",
      after: [],
      "disable-parallel": false,
      "build-snaps": [],
      "override-pull": "snapcraftctl pull",
      "override-build": "snapcraftctl build",
      "override-stage": "snapcraftctl stage",
      "override-prime": "snapcraftctl prime",
      properties: { "make-parameters": ["PREFIX=/usr"] },
    });
  });

  it("uses the full adapter and assumes command-chain for command chains", () => {
    const { manifest } = assembled(document());
    expect(manifest.apps.hello?.adapter).toBe("full");
    expect(manifest.assumes).toEqual(["command-chain"]);

    const plain = assembled(document({ apps: { hello: { command: "bin/hello" } } })).manifest;
    expect(plain.apps.hello?.adapter).toBe("legacy");
    expect(plain.assumes).toEqual([]);
  });

  it("builds apps, sockets and hooks", () => {
    const apps = {
      srv: { command: "bin/srv", daemon: "simple", "restart-condition": "always", sockets: { web: { "listen-stream": 8080 } } },
    };
    const hooks = { install: { plugs: ["network"] } };
    const { manifest } = assembled(document({ apps, hooks }));
    expect(manifest.apps.srv).toEqual({
      name: "srv",
      command: "bin/srv",
      adapter: "legacy",
      daemon: "simple",
      "command-chain": [],
      plugs: [],
      slots: [],
      sockets: { web: { "listen-stream": 8080 } },
      environment: {},
      passthrough: {},
      properties: { "restart-condition": "always" },
    });
    expect(manifest.hooks.install).toEqual({ name: "install", plugs: ["network"], passthrough: {} });
  });

  it("normalizes plugs and slots", () => {
    const { manifest } = assembled(
      document({
        plugs: {
          themes: { interface: "content", target: "$SNAP/themes", "default-provider": "gtk-common-themes:gtk-3-themes" },
          net: "network",
        },
        slots: { data: { interface: "content", read: ["$SNAP/share"] } },
      }),
    );
    expect(manifest.plugs.themes).toEqual({
      name: "themes",
      interface: "content",
      attributes: { target: "$SNAP/themes", "default-provider": "gtk-common-themes:gtk-3-themes" },
      content: "themes",
      target: "$SNAP/themes",
      provider: "gtk-common-themes",
    });
    expect(manifest.plugs.net).toEqual({ name: "net", interface: "network", attributes: {} });
    expect(manifest.slots.data).toEqual({
      name: "data",
      interface: "content",
      attributes: { read: ["$SNAP/share"] },
      read: ["$SNAP/share"],
      write: [],
    });
  });

  it("returns a frozen manifest", () => {
    const { manifest } = assembled(document());
    expect(Object.isFrozen(manifest)).toBe(true);
    expect(Object.isFrozen(manifest.parts.hello?.["build-packages"])).toBe(true);
    expect(Reflect.set(manifest, "name", "other")).toBe(false);
  });

  it("does not modify the input document", () => {
    const doc = document();
    const before = JSON.stringify(doc);
    assembled(doc);
    expect(JSON.stringify(doc)).toBe(before);
    expect(Object.isFrozen(doc.parts)).toBe(false);
  });
});
