import { isPlainObject } from "../grammar/parser.js";
import type { PlugSpec, SlotSpec } from "../types/manifest.js";
import { readString, readStringList, remainingProperties } from "./fields.js";

const INTERFACE_KEY = new Set(["interface"]);

/**
 * A plug is written as `name:` (interface named after the plug), `name: <interface>`
 * or a mapping with `interface` and attributes.
 */
export function normalizePlug(name: string, raw: unknown): PlugSpec {
  if (typeof raw === "string") return { name, interface: raw, attributes: {} };
  if (!isPlainObject(raw)) return { name, interface: name, attributes: {} };

  const iface = readString(raw, "interface") ?? name;
  const plug: PlugSpec = { name, interface: iface, attributes: remainingProperties(raw, INTERFACE_KEY) };
  if (iface !== "content") return plug;

  const defaultProvider = readString(raw, "default-provider");
  return {
    ...plug,
    content: readString(raw, "content") ?? name,
    target: readString(raw, "target"),
    provider: defaultProvider === undefined ? undefined : defaultProvider.split(":")[0],
  };
}

/** Content slots list their shared paths either directly or under `source`. */
export function normalizeSlot(name: string, raw: unknown): SlotSpec {
  if (typeof raw === "string") return { name, interface: raw, attributes: {} };
  if (!isPlainObject(raw)) return { name, interface: name, attributes: {} };

  const iface = readString(raw, "interface") ?? name;
  const slot: SlotSpec = { name, interface: iface, attributes: remainingProperties(raw, INTERFACE_KEY) };
  if (iface !== "content") return slot;

  const source = isPlainObject(raw.source) ? raw.source : raw;
  return { ...slot, read: readStringList(source, "read"), write: readStringList(source, "write") };
}
