import { isPlainObject } from "../grammar/parser.js";
import type { Adapter, AppSpec, HookSpec, SocketSpec } from "../types/manifest.js";
import { oneOf, readNumber, readRecord, readScalarRecord, readString, readStringList } from "./fields.js";

const ADAPTERS: readonly Adapter[] = ["none", "full", "legacy"];

/** Keys with a typed slot on AppSpec; the rest go to `properties`. */
const TYPED_APP_KEYS = new Set([
  "command",
  "adapter",
  "daemon",
  "command-chain",
  "plugs",
  "slots",
  "sockets",
  "environment",
  "passthrough",
]);

export function buildApp(name: string, raw: Record<string, unknown>): AppSpec {
  const commandChain = readStringList(raw, "command-chain");
  const adapter = raw.adapter;

  const properties: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!TYPED_APP_KEYS.has(key)) properties[key] = value;
  }

  return {
    name,
    command: readString(raw, "command") ?? "",
    adapter: oneOf(ADAPTERS, adapter) ? adapter : commandChain.length > 0 ? "full" : "legacy",
    ...(typeof raw.daemon === "string" ? { daemon: raw.daemon } : {}),
    "command-chain": commandChain,
    plugs: readStringList(raw, "plugs"),
    slots: readStringList(raw, "slots"),
    sockets: readSockets(raw),
    environment: readScalarRecord(raw, "environment"),
    passthrough: readRecord(raw, "passthrough"),
    properties,
  };
}

export function buildHook(name: string, raw: unknown): HookSpec {
  const hook = isPlainObject(raw) ? raw : {};
  return { name, plugs: readStringList(hook, "plugs"), passthrough: readRecord(hook, "passthrough") };
}

function readSockets(raw: Record<string, unknown>): Record<string, SocketSpec> {
  const sockets: Record<string, SocketSpec> = {};
  for (const [name, value] of Object.entries(readRecord(raw, "sockets"))) {
    if (!isPlainObject(value)) continue;
    const listen = value["listen-stream"];
    if (typeof listen !== "string" && typeof listen !== "number") continue;
    const mode = readNumber(value, "socket-mode");
    sockets[name] = mode === undefined ? { "listen-stream": listen } : { "listen-stream": listen, "socket-mode": mode };
  }
  return sockets;
}
