import type { ConstraintRule, RuleTable } from "../types/rules.js";

/**
 * Constraint table for the build manifest, keyed by schema path.
 *
 * `*` matches any entry of a mapping, `[]` any item of an array. A node with
 * a `closed` rule only accepts keys that have an entry of their own here.
 */

const str = (...extra: ConstraintRule[]): ConstraintRule[] => [{ id: "type", types: ["string"] }, ...extra];
const int = (...extra: ConstraintRule[]): ConstraintRule[] => [{ id: "type", types: ["integer"] }, ...extra];
const bool: ConstraintRule[] = [{ id: "type", types: ["boolean"] }];
const obj = (...extra: ConstraintRule[]): ConstraintRule[] => [{ id: "type", types: ["object"] }, ...extra];
const arr = (...extra: ConstraintRule[]): ConstraintRule[] => [{ id: "type", types: ["array"] }, ...extra];
const stringList: ConstraintRule[] = arr({ id: "unique-items" });
const grammarArray: ConstraintRule[] = [{ id: "grammar", shape: "array" }, { id: "unique-items" }];
const grammarString: ConstraintRule[] = [{ id: "grammar", shape: "string" }];
const enumOf = (...values: string[]): ConstraintRule[] => str({ id: "enum", values });

const NAME_MESSAGE =
  "{value} is not a valid snap name. Snap names can only use ASCII lowercase letters, numbers, and hyphens, " +
  "and must have at least one letter. They cannot start or end with a hyphen, or contain two hyphens in a row.";
const VERSION_MESSAGE =
  "{value} is not a valid snap version string. Snap versions consist of upto 32 printable characters chosen " +
  "from the set [a-zA-Z0-9:.+~-], and must start and end with a letter or number.";
const COMMAND_MESSAGE =
  "{value} is not a valid command. Commands can only use ASCII alphanumeric characters and the following " +
  "special characters: / . _ # : $ - = , space";
const COMMAND_CHAIN_MESSAGE =
  "{value} is not a valid command-chain entry. Command chain entries must be strings, and can only use " +
  "ASCII alphanumeric characters and the following special characters: / . _ # : $ -";
const APP_NAME_MESSAGE =
  "{value} is not a valid app name. App names consist of upper- and lower-case alphanumeric characters and " +
  "hyphens. They cannot start or end with a hyphen.";
const HOOK_NAME_MESSAGE =
  "{value} is not a valid hook name. Hook names consist of lower-case alphanumeric characters and hyphens. " +
  "They cannot start or end with a hyphen.";
const SOCKET_NAME_MESSAGE =
  "{value} is not a valid socket name. Socket names consist of lower-case alphanumeric characters, " +
  "hyphens and underscores, and must start with a letter.";
const PART_NAME_MESSAGE =
  "{value} is not a valid part name. Part names consist of lower-case alphanumeric characters, hyphens and " +
  "plus signs. As a special case, 'plugins' is also not a valid part name.";
const TIMEOUT_MESSAGE = "{value} is not a valid timeout value, expected a number with an optional unit (ns, us, ms, s, m)";
const BASE_TYPE_MESSAGE =
  "snaps of type 'base', 'kernel' or 'snapd' cannot set 'base'; other snaps must set 'base', " +
  "and may only set 'build-base' together with 'base: bare'";
const ADOPT_INFO_MESSAGE = "'summary', 'description' and 'version' are required unless 'adopt-info' is set (missing: {fields})";

const COMMAND_PATTERN = /^[A-Za-z0-9/. _#:$,=-]*$/;
const TIMEOUT = str({ id: "pattern", pattern: /^[0-9]+(ns|us|ms|s|m)*$/, message: TIMEOUT_MESSAGE });

/** App fields only meaningful for daemons. */
export const DAEMON_ONLY_FIELDS = [
  "bus-name",
  "stop-mode",
  "refresh-mode",
  "stop-command",
  "post-stop-command",
  "reload-command",
  "start-timeout",
  "stop-timeout",
  "watchdog-timeout",
  "before",
  "after",
  "timer",
  "restart-condition",
  "restart-delay",
  "install-mode",
] as const;

export const BASE_TYPES = ["base", "kernel", "snapd"] as const;

/** Canonical orchestration commands for the part lifecycle overrides. */
export const OVERRIDE_DEFAULTS = {
  "override-pull": "snapcraftctl pull",
  "override-build": "snapcraftctl build",
  "override-stage": "snapcraftctl stage",
  "override-prime": "snapcraftctl prime",
} as const;

/** Grammar-typed part fields, by resolved shape. */
export const GRAMMAR_ARRAY_FIELDS = ["build-packages", "build-snaps", "stage-packages", "stage-snaps"] as const;
export const GRAMMAR_STRING_FIELDS = [
  "source",
  "source-branch",
  "source-checksum",
  "source-commit",
  "source-subdir",
  "source-tag",
] as const;

export const SOURCE_TYPES = [
  "bzr",
  "git",
  "hg",
  "mercurial",
  "subversion",
  "svn",
  "tar",
  "zip",
  "deb",
  "rpm",
  "7z",
  "local",
  "snap",
] as const;

export const BUILD_ATTRIBUTES = ["no-patchelf", "no-install", "debug", "keep-execstack"] as const;

export const MANIFEST_RULES: RuleTable = {
  "": [
    { id: "type", types: ["object"] },
    { id: "closed" },
    { id: "required", fields: ["name", "parts"] },
    {
      id: "alternatives",
      reportAs: "adopt-info",
      groups: [["summary", "description", "version"], ["adopt-info"]],
      message: ADOPT_INFO_MESSAGE,
    },
    {
      id: "exclusive",
      reportAs: "base-type",
      field: "base",
      defaults: { type: "app" },
      branches: [
        { when: { type: [...BASE_TYPES] }, forbids: ["base"] },
        { when: { type: ["app", "gadget"] }, requires: ["base"], forbids: ["build-base"] },
        { when: { base: ["bare"] }, requires: ["build-base"] },
      ],
      message: BASE_TYPE_MESSAGE,
    },
    { id: "dependency", field: "license-agreement", requires: ["license"] },
    { id: "dependency", field: "license-version", requires: ["license"] },
    { id: "passthrough-duplicates" },
  ],

  name: str(
    { id: "length", max: 40 },
    { id: "pattern", pattern: /^(?=.*[a-z])(?:[a-z0-9]|(?<=[a-z0-9])-)*[a-z0-9]$/, message: NAME_MESSAGE },
  ),
  title: str({ id: "length", max: 40 }),
  version: str(
    { id: "length", max: 32 },
    { id: "pattern", pattern: /^[a-zA-Z0-9](?:[a-zA-Z0-9:.+~-]{0,30}[a-zA-Z0-9+~])?$/, message: VERSION_MESSAGE },
  ),
  "version-script": str(),
  summary: str({ id: "length", max: 78 }),
  description: str(),
  "adopt-info": str(),
  type: enumOf("app", "base", "gadget", "kernel", "snapd"),
  icon: str(),
  base: str(),
  "build-base": str(),
  confinement: enumOf("classic", "devmode", "strict"),
  grade: enumOf("stable", "devel"),
  epoch: [{ id: "type", types: ["string", "integer"] }],
  license: str(),
  "license-agreement": str(),
  "license-version": str(),
  architectures: arr(),
  "architectures[]": [{ id: "type", types: ["string", "object"] }],
  assumes: stringList,
  "assumes[]": str(),
  environment: obj({ id: "mapping" }),
  "environment.*": [{ id: "type", types: ["string", "number"] }],
  layout: obj(),
  passthrough: obj(),
  plugs: obj({ id: "mapping" }),
  "plugs.*": [{ id: "content-interface", role: "plug" }],
  slots: obj({ id: "mapping" }),
  "slots.*": [{ id: "content-interface", role: "slot" }],

  apps: obj({
    id: "mapping",
    key: { pattern: /^[a-zA-Z0-9](?:-?[a-zA-Z0-9])*$/, message: APP_NAME_MESSAGE },
  }),
  "apps.*": obj(
    { id: "closed" },
    { id: "required", fields: ["command"] },
    ...DAEMON_ONLY_FIELDS.map((field): ConstraintRule => ({ id: "dependency", field, requires: ["daemon"] })),
    { id: "passthrough-duplicates" },
  ),
  "apps.*.command": str({ id: "length", min: 1 }, { id: "pattern", pattern: COMMAND_PATTERN, message: COMMAND_MESSAGE }),
  "apps.*.common-id": str(),
  "apps.*.bus-name": str({ id: "pattern", pattern: /^[A-Za-z0-9][A-Za-z0-9_.-]*$/ }),
  "apps.*.desktop": str(),
  "apps.*.completer": str(),
  "apps.*.autostart": str(),
  "apps.*.daemon": enumOf("simple", "forking", "oneshot", "notify", "dbus"),
  "apps.*.stop-mode": enumOf(
    "sigterm",
    "sigterm-all",
    "sighup",
    "sighup-all",
    "sigusr1",
    "sigusr1-all",
    "sigusr2",
    "sigusr2-all",
  ),
  "apps.*.refresh-mode": enumOf("endure", "restart"),
  "apps.*.stop-command": str({ id: "pattern", pattern: COMMAND_PATTERN, message: COMMAND_MESSAGE }),
  "apps.*.post-stop-command": str({ id: "pattern", pattern: COMMAND_PATTERN, message: COMMAND_MESSAGE }),
  "apps.*.reload-command": str({ id: "pattern", pattern: COMMAND_PATTERN, message: COMMAND_MESSAGE }),
  "apps.*.start-timeout": TIMEOUT,
  "apps.*.stop-timeout": TIMEOUT,
  "apps.*.watchdog-timeout": TIMEOUT,
  "apps.*.restart-delay": TIMEOUT,
  "apps.*.restart-condition": enumOf(
    "on-success",
    "on-failure",
    "on-abnormal",
    "on-abort",
    "on-watchdog",
    "always",
    "never",
  ),
  "apps.*.install-mode": enumOf("enable", "disable"),
  "apps.*.timer": str(),
  "apps.*.before": stringList,
  "apps.*.before[]": str(),
  "apps.*.after": stringList,
  "apps.*.after[]": str(),
  "apps.*.adapter": enumOf("none", "full", "legacy"),
  "apps.*.command-chain": arr(),
  "apps.*.command-chain[]": str({ id: "pattern", pattern: /^[A-Za-z0-9/._#:$-]*$/, message: COMMAND_CHAIN_MESSAGE }),
  "apps.*.environment": obj({ id: "mapping" }),
  "apps.*.environment.*": [{ id: "type", types: ["string", "number"] }],
  "apps.*.plugs": stringList,
  "apps.*.plugs[]": str(),
  "apps.*.slots": stringList,
  "apps.*.slots[]": str(),
  "apps.*.aliases": stringList,
  "apps.*.aliases[]": str(),
  "apps.*.extensions": stringList,
  "apps.*.extensions[]": str(),
  "apps.*.passthrough": obj(),
  "apps.*.sockets": obj({
    id: "mapping",
    key: { pattern: /^[a-z][a-z0-9_-]*$/, message: SOCKET_NAME_MESSAGE },
  }),
  "apps.*.sockets.*": obj({ id: "closed" }, { id: "required", fields: ["listen-stream"] }),
  "apps.*.sockets.*.listen-stream": [
    { id: "type", types: ["integer", "string"] },
    { id: "range", min: 1, max: 65535 },
    { id: "length", min: 1 },
  ],
  "apps.*.sockets.*.socket-mode": int(),

  hooks: obj({
    id: "mapping",
    key: { pattern: /^[a-z](?:-?[a-z0-9])*$/, message: HOOK_NAME_MESSAGE },
  }),
  // `install:` with nothing under it is a hook without settings.
  "hooks.*": [{ id: "type", types: ["object", "null"] }, { id: "closed" }, { id: "passthrough-duplicates" }],
  "hooks.*.plugs": stringList,
  "hooks.*.plugs[]": str(),
  "hooks.*.passthrough": obj(),

  parts: obj(
    { id: "length", min: 1, message: "'parts' must contain at least one part" },
    { id: "mapping", key: { pattern: /^(?!plugins$)[a-z0-9][a-z0-9+-]*$/, message: PART_NAME_MESSAGE } },
  ),
  // Not closed: plugins contribute their own part properties.
  "parts.*": obj({ id: "required", fields: ["plugin"] }),
  "parts.*.plugin": str({ id: "length", min: 1 }),
  "parts.*.source": grammarString,
  "parts.*.source-branch": grammarString,
  "parts.*.source-checksum": grammarString,
  "parts.*.source-commit": grammarString,
  "parts.*.source-subdir": grammarString,
  "parts.*.source-tag": grammarString,
  "parts.*.source-depth": int({ id: "range", min: 0 }),
  "parts.*.source-type": enumOf(...SOURCE_TYPES),
  "parts.*.build-packages": grammarArray,
  "parts.*.build-snaps": grammarArray,
  "parts.*.stage-packages": grammarArray,
  "parts.*.stage-snaps": grammarArray,
  "parts.*.disable-parallel": bool,
  "parts.*.after": stringList,
  "parts.*.after[]": str(),
  "parts.*.build-attributes": stringList,
  "parts.*.build-attributes[]": enumOf(...BUILD_ATTRIBUTES),
  "parts.*.build-environment": arr(),
  "parts.*.build-environment[]": obj({ id: "mapping" }),
  "parts.*.build-environment[].*": str(),
  "parts.*.stage": stringList,
  "parts.*.stage[]": str(),
  "parts.*.prime": stringList,
  "parts.*.prime[]": str(),
  "parts.*.filesets": obj({ id: "mapping" }),
  "parts.*.filesets.*": arr(),
  "parts.*.filesets.*[]": str(),
  "parts.*.organize": obj({ id: "mapping" }),
  "parts.*.organize.*": str(),
  "parts.*.parse-info": stringList,
  "parts.*.parse-info[]": str(),
  "parts.*.override-pull": str(),
  "parts.*.override-build": str(),
  "parts.*.override-stage": str(),
  "parts.*.override-prime": str(),
};
