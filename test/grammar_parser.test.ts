import { describe, expect, it } from "vitest";
import { parseGrammar } from "../src/grammar/parser.js";

describe("parseGrammar: structure", () => {
  it("parses a plain list into a sequence of scalars", () => {
    const res = parseGrammar(["a", "b"], "f", "array");
    expect(res).toEqual({
      ok: true,
      node: {
        kind: "sequence",
        items: [
          { kind: "scalar", value: "a" },
          { kind: "scalar", value: "b" },
        ],
      },
    });
  });

  it("attaches a following else item to the clause before it", () => {
    const res = parseGrammar([{ "on amd64": ["x"] }, { else: ["y"] }], "f", "array");
    expect(res).toEqual({
      ok: true,
      node: {
        kind: "sequence",
        items: [
          {
            kind: "on",
            branches: [{ key: "on amd64", selectors: ["amd64"], body: { kind: "sequence", items: [{ kind: "scalar", value: "x" }] } }],
            orElse: { kind: "else", body: { kind: "sequence", items: [{ kind: "scalar", value: "y" }] } },
          },
        ],
      },
    });
  });

  it("accepts else inline in the clause mapping", () => {
    const res = parseGrammar([{ try: ["x"], else: "y" }], "f", "array");
    expect(res).toEqual({
      ok: true,
      node: {
        kind: "sequence",
        items: [
          {
            kind: "try",
            body: { kind: "sequence", items: [{ kind: "scalar", value: "x" }] },
            orElse: { kind: "else", body: { kind: "scalar", value: "y" } },
          },
        ],
      },
    });
  });

  it("reads 'else fail' as a clause body and as a trailing item", () => {
    const body = parseGrammar([{ "on amd64": "else fail" }], "f", "array");
    expect(body.ok && body.node).toEqual({
      kind: "sequence",
      items: [{ kind: "on", branches: [{ key: "on amd64", selectors: ["amd64"], body: { kind: "else-fail" } }] }],
    });

    const trailing = parseGrammar([{ "to arm64": ["x"] }, "else fail"], "f", "array");
    expect(trailing.ok && trailing.node).toEqual({
      kind: "sequence",
      items: [
        {
          kind: "to",
          branches: [{ key: "to arm64", selectors: ["arm64"], body: { kind: "sequence", items: [{ kind: "scalar", value: "x" }] } }],
          orElse: { kind: "else-fail" },
        },
      ],
    });
  });

  it("splits comma-separated selectors and the compound on/to key", () => {
    const res = parseGrammar([{ "on amd64, i386": ["a"], "on arm64 to armhf,arm64": ["b"] }], "f", "array");
    expect(res.ok).toBe(true);
    if (!res.ok || res.node.kind !== "sequence") return;
    const clause = res.node.items[0];
    expect(clause?.kind).toBe("on");
    if (clause?.kind !== "on") return;
    expect(clause.branches.map((b) => [b.selectors, b.targets])).toEqual([
      [["amd64", "i386"], undefined],
      [["arm64"], ["armhf", "arm64"]],
    ]);
  });

  it("parses a plain string for string-shaped fields", () => {
    expect(parseGrammar("https://example.com/src.tar.gz", "source", "string")).toEqual({
      ok: true,
      node: { kind: "scalar", value: "https://example.com/src.tar.gz" },
    });
  });
});

describe("parseGrammar: issues", () => {
  it("rejects values of the wrong type", () => {
    expect(parseGrammar(42, "f", "array")).toEqual({
      ok: false,
      issues: [{ path: "f", rule: "type", message: "42 is not of type 'array'" }],
    });
    expect(parseGrammar({ a: 1 }, "source", "string")).toEqual({
      ok: false,
      issues: [{ path: "source", rule: "type", message: `{"a":1} is not of type 'string', 'array'` }],
    });
  });

  it("rejects an else with nothing to attach to", () => {
    expect(parseGrammar([{ else: ["y"] }], "f", "array")).toEqual({
      ok: false,
      issues: [{ path: "f[0]", rule: "grammar", message: "'else' must follow an 'on', 'to' or 'try' clause" }],
    });
    expect(parseGrammar(["a", "else fail"], "f", "array")).toEqual({
      ok: false,
      issues: [{ path: "f[1]", rule: "grammar", message: "'else' must follow an 'on', 'to' or 'try' clause" }],
    });
  });

  it("rejects a second else on one clause", () => {
    const res = parseGrammar([{ "on amd64": ["a"], else: ["b"] }, { else: ["c"] }], "f", "array");
    expect(res).toEqual({
      ok: false,
      issues: [{ path: "f[1]", rule: "grammar", message: "a clause can only have one 'else'" }],
    });
  });

  it("rejects duplicate selector sets regardless of order", () => {
    const res = parseGrammar([{ "on amd64,i386": ["a"], "on i386,amd64": ["b"] }], "f", "array");
    expect(res).toEqual({
      ok: false,
      issues: [{ path: "f[0].on i386,amd64", rule: "grammar", message: "duplicate selector set in 'on i386,amd64'" }],
    });
  });

  it("rejects mixed clause families in one mapping", () => {
    const res = parseGrammar([{ "on amd64": ["a"], "to arm64": ["b"] }], "f", "array");
    expect(res).toEqual({
      ok: false,
      issues: [
        {
          path: "f[0].to arm64",
          rule: "grammar",
          message: "'to' clauses cannot be mixed with 'on' clauses in one mapping",
        },
      ],
    });
  });

  it("rejects empty selectors and unknown clause keys", () => {
    expect(parseGrammar([{ "on amd64,,i386": ["a"] }], "f", "array")).toEqual({
      ok: false,
      issues: [{ path: "f[0].on amd64,,i386", rule: "grammar", message: "invalid selector '' in 'on amd64,,i386'" }],
    });
    expect(parseGrammar([{ when: ["a"] }], "f", "array")).toEqual({
      ok: false,
      issues: [{ path: "f[0].when", rule: "grammar", message: "'when' is not a valid grammar clause" }],
    });
    expect(parseGrammar([{}], "f", "array")).toEqual({
      ok: false,
      issues: [{ path: "f[0]", rule: "grammar", message: "empty clause" }],
    });
  });

  it("rejects items and bodies of the wrong kind", () => {
    expect(parseGrammar([3], "f", "array")).toEqual({
      ok: false,
      issues: [{ path: "f[0]", rule: "grammar", message: "grammar items must be strings or clauses, got number" }],
    });
    expect(parseGrammar([{ "on amd64": 5 }], "f", "array")).toEqual({
      ok: false,
      issues: [{ path: "f[0].on amd64", rule: "grammar", message: "clause body must be a string or a list, got number" }],
    });
  });

  it("requires list items of string-shaped fields to be clauses", () => {
    expect(parseGrammar(["x"], "source", "string")).toEqual({
      ok: false,
      issues: [{ path: "source[0]", rule: "grammar", message: "'x' must be inside an 'on', 'to' or 'try' clause" }],
    });
  });

  it("collects every issue of a field", () => {
    const res = parseGrammar([{ else: ["y"] }, 3, { bogus: ["z"] }], "f", "array");
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.issues.map((i) => i.path)).toEqual(["f[0]", "f[1]", "f[2].bogus"]);
  });
});
