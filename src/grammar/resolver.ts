import type { SelectorContext } from "../types/context.js";
import type { ResolutionFailure } from "../types/diagnostics.js";
import type { Fallback, GrammarNode, SelectorBranch } from "../types/grammar.js";
import { matchesSelector } from "./context.js";

export type ResolvedValue = { ok: true; values: string[] } | { ok: false; failure: ResolutionFailure };

export type ResolvedString = { ok: true; value: string | undefined } | { ok: false; failure: ResolutionFailure };

/**
 * Collapse a grammar tree to a flat, ordered list of strings.
 *
 * Pure function of (node, context): depth-first, left to right, no
 * deduplication. An unmatched `on`/`to` without `else` yields nothing; only
 * an `else fail` on the active branch (or a malformed tree) fails.
 *
 * `path` is the field path reported on failure.
 */
export function resolve(node: GrammarNode, context: SelectorContext, path: string = ""): ResolvedValue {
  switch (node.kind) {
    case "scalar":
      return { ok: true, values: [node.value] };

    case "sequence": {
      const values: string[] = [];
      for (const item of node.items) {
        const res = resolve(item, context, path);
        if (!res.ok) return res;
        values.push(...res.values);
      }
      return { ok: true, values };
    }

    case "on":
    case "to": {
      const branch = node.branches.find((b) => branchMatches(node.kind, b, context));
      if (branch) {
        if (branch.body.kind === "else-fail") return forcedFailure(branch.key, context, path);
        return resolve(branch.body, context, path);
      }
      return resolveFallback(node.orElse, describeBranches(node.branches), context, path);
    }

    case "try": {
      const res = resolve(node.body, context, path);
      // An empty body leaves the try unsatisfied just like a failed one.
      if (res.ok && res.values.length > 0) return res;
      return resolveFallback(node.orElse, "try", context, path);
    }

    case "else":
      return {
        ok: false,
        failure: {
          path,
          rule: "orphan-else",
          message: "'else' without a preceding 'on', 'to' or 'try' clause",
          context,
        },
      };

    case "else-fail":
      return forcedFailure("else fail", context, path);

    default:
      return assertNever(node);
  }
}

/** Resolve a `grammar-string` field: at most one value. */
export function resolveString(node: GrammarNode, context: SelectorContext, path: string = ""): ResolvedString {
  const res = resolve(node, context, path);
  if (!res.ok) return res;
  if (res.values.length > 1) {
    return {
      ok: false,
      failure: {
        path,
        rule: "type-mismatch",
        message: `expected a single value, resolved to ${res.values.length}: ${res.values.map((v) => `'${v}'`).join(", ")}`,
        context,
      },
    };
  }
  return { ok: true, value: res.values[0] };
}

function branchMatches(kind: "on" | "to", branch: SelectorBranch, context: SelectorContext): boolean {
  if (kind === "to") return matchesSelector(branch.selectors, context.targetArch);
  if (!matchesSelector(branch.selectors, context.buildArch)) return false;
  return branch.targets === undefined || matchesSelector(branch.targets, context.targetArch);
}

function resolveFallback(
  orElse: Fallback | undefined,
  statement: string,
  context: SelectorContext,
  path: string,
): ResolvedValue {
  if (!orElse) return { ok: true, values: [] };
  if (orElse.kind === "else-fail") return forcedFailure(statement, context, path);
  return resolve(orElse.body, context, path);
}

function forcedFailure(statement: string, context: SelectorContext, path: string): ResolvedValue {
  return {
    ok: false,
    failure: {
      path,
      rule: "else-fail",
      message:
        `Unable to satisfy '${statement}', failure forced ` +
        `(build architecture '${context.buildArch}', target architecture '${context.targetArch}')`,
      context,
    },
  };
}

function describeBranches(branches: readonly SelectorBranch[]): string {
  return branches.map((b) => b.key.trim()).join("', '");
}

function assertNever(node: never): never {
  throw new Error(`Unhandled grammar node: ${JSON.stringify(node)}`);
}
