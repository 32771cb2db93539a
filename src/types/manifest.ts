/** Validated, grammar-resolved manifest handed to the build orchestrator. */
export type SnapType = "app" | "base" | "gadget" | "kernel" | "snapd";
export type Confinement = "classic" | "devmode" | "strict";
export type Grade = "stable" | "devel";
export type Adapter = "none" | "full" | "legacy";

export type SourceType =
  | "bzr"
  | "git"
  | "hg"
  | "mercurial"
  | "subversion"
  | "svn"
  | "tar"
  | "zip"
  | "deb"
  | "rpm"
  | "7z"
  | "local"
  | "snap";

export type BuildAttribute = "no-patchelf" | "no-install" | "debug" | "keep-execstack";

export type SocketSpec = {
  readonly "listen-stream": number | string;
  readonly "socket-mode"?: number;
};

/**
 * App entry. Fields other than the ones typed here (daemon settings,
 * timeouts, desktop, ...) are kept verbatim in `properties`.
 */
export type AppSpec = {
  readonly name: string;
  readonly command: string;
  readonly adapter: Adapter;
  readonly daemon?: string;
  readonly "command-chain": readonly string[];
  readonly plugs: readonly string[];
  readonly slots: readonly string[];
  readonly sockets: Readonly<Record<string, SocketSpec>>;
  readonly environment: Readonly<Record<string, string | number>>;
  readonly passthrough: Readonly<Record<string, unknown>>;
  readonly properties: Readonly<Record<string, unknown>>;
};

export type HookSpec = {
  readonly name: string;
  readonly plugs: readonly string[];
  readonly passthrough: Readonly<Record<string, unknown>>;
};

export type PlugSpec = {
  readonly name: string;
  readonly interface: string;
  readonly attributes: Readonly<Record<string, unknown>>;
  /** Content plugs: the content tag, defaulting to the plug name. */
  readonly content?: string;
  readonly target?: string;
  /** Content plugs: snap name of `default-provider` (`gtk-common-themes:gtk-3-themes` → `gtk-common-themes`). */
  readonly provider?: string;
};

export type SlotSpec = {
  readonly name: string;
  readonly interface: string;
  readonly attributes: Readonly<Record<string, unknown>>;
  readonly read?: readonly string[];
  readonly write?: readonly string[];
};

export type PartSpec = {
  readonly name: string;
  readonly plugin: string;
  readonly source?: string;
  readonly "source-type"?: SourceType;
  readonly "source-branch"?: string;
  readonly "source-checksum"?: string;
  readonly "source-commit"?: string;
  readonly "source-subdir"?: string;
  readonly "source-tag"?: string;
  readonly "source-depth"?: number;
  readonly "build-packages": readonly string[];
  readonly "build-snaps": readonly string[];
  readonly "stage-packages": readonly string[];
  readonly "stage-snaps": readonly string[];
  readonly after: readonly string[];
  readonly "disable-parallel": boolean;
  readonly "build-attributes": readonly BuildAttribute[];
  readonly "build-environment": readonly Readonly<Record<string, string>>[];
  readonly stage: readonly string[];
  readonly prime: readonly string[];
  readonly filesets: Readonly<Record<string, readonly string[]>>;
  readonly organize: Readonly<Record<string, string>>;
  readonly "override-pull": string;
  readonly "override-build": string;
  readonly "override-stage": string;
  readonly "override-prime": string;
  /** Plugin-specific properties, passed through untouched. */
  readonly properties: Readonly<Record<string, unknown>>;
};

export type Manifest = {
  readonly name: string;
  readonly version?: string;
  readonly "version-script"?: string;
  readonly summary?: string;
  readonly description?: string;
  readonly title?: string;
  readonly "adopt-info"?: string;
  readonly type: SnapType;
  readonly base?: string;
  readonly "build-base"?: string;
  readonly confinement: Confinement;
  readonly grade: Grade;
  readonly icon?: string;
  readonly epoch?: string | number;
  readonly license?: string;
  readonly "license-agreement"?: string;
  readonly "license-version"?: string;
  readonly assumes: readonly string[];
  readonly architectures: readonly unknown[];
  readonly environment: Readonly<Record<string, string | number>>;
  readonly layout: Readonly<Record<string, unknown>>;
  readonly passthrough: Readonly<Record<string, unknown>>;
  readonly plugs: Readonly<Record<string, PlugSpec>>;
  readonly slots: Readonly<Record<string, SlotSpec>>;
  readonly apps: Readonly<Record<string, AppSpec>>;
  readonly hooks: Readonly<Record<string, HookSpec>>;
  readonly parts: Readonly<Record<string, PartSpec>>;
};
