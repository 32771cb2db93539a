import type { SelectorContext } from "../types/context.js";

/** Node.js `process.arch` → platform architecture token. */
const NODE_ARCH_MAP: Record<string, string> = {
  x64: "amd64",
  arm64: "arm64",
  arm: "armhf",
  ia32: "i386",
  ppc64: "ppc64el",
  s390x: "s390x",
  riscv64: "riscv64",
};

export function hostArchitecture(nodeArch: string = process.arch): string {
  return NODE_ARCH_MAP[nodeArch] ?? nodeArch;
}

export function createSelectorContext(opts: {
  buildArch: string;
  targetArch?: string;
  environment?: Record<string, string>;
}): SelectorContext {
  return Object.freeze({
    buildArch: opts.buildArch,
    targetArch: opts.targetArch ?? opts.buildArch,
    environment: Object.freeze({ ...(opts.environment ?? {}) }),
  });
}

/** Comma-separated selectors in one clause key are a logical OR of exact tokens. */
export function matchesSelector(selectors: readonly string[], arch: string): boolean {
  return selectors.includes(arch);
}
