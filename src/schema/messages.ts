/** Message templates and value rendering for violations. */

export type TemplateVars = {
  value?: unknown;
  key?: string;
  field?: string;
  fields?: readonly string[];
  expected?: readonly string[];
  limit?: number;
};

/** Default templates, used when a rule carries no `message` of its own. */
export const DEFAULT_MESSAGES = {
  type: "{value} is not of type {expected}",
  pattern: "{value} does not match the required pattern",
  enum: "{value} is not one of [{expected}]",
  minLength: "{value} is too short (minimum length is {limit})",
  maxLength: "{value} is too long (maximum length is {limit})",
  minItems: "{value} has fewer than {limit} items",
  maxItems: "{value} has more than {limit} items",
  minEntries: "'{key}' must have at least {limit} entries",
  maxEntries: "'{key}' must have at most {limit} entries",
  minimum: "{value} is less than the minimum of {limit}",
  maximum: "{value} is greater than the maximum of {limit}",
  uniqueItems: "{value} has non-unique elements",
  required: "'{field}' is a required property",
  unknownKey: "additional properties are not allowed ('{key}' was unexpected)",
  dependency: "{fields} is a dependency of '{field}'",
  passthrough:
    "the following keys are specified in their regular location as well as in passthrough: {fields}. Remove duplicate keys.",
} as const;

/** Quote strings the way diagnostics show them: `'value'`. */
export function formatValue(value: unknown): string {
  if (typeof value === "string") return `'${value}'`;
  if (value === undefined) return "undefined";
  return JSON.stringify(value);
}

export function formatList(values: readonly string[]): string {
  return values.map((v) => `'${v}'`).join(", ");
}

export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") return "object";
  return typeof value;
}

/** Replace `{name}` placeholders; unknown placeholders are left as they are. */
export function renderMessage(template: string, vars: TemplateVars): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    switch (name) {
      case "value":
        return formatValue(vars.value);
      case "key":
        return vars.key ?? match;
      case "field":
        return vars.field ?? match;
      case "fields":
        return vars.fields ? formatList(vars.fields) : match;
      case "expected":
        return vars.expected ? formatList(vars.expected) : match;
      case "limit":
        return vars.limit === undefined ? match : String(vars.limit);
      default:
        return match;
    }
  });
}
