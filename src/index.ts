export { createSelectorContext, hostArchitecture, matchesSelector } from "./grammar/context.js";
export { parseGrammar, type GrammarIssue, type ParseResult } from "./grammar/parser.js";
export { resolve, resolveString, type ResolvedString, type ResolvedValue } from "./grammar/resolver.js";
export { DocumentShapeError, validateDocument } from "./schema/validator.js";
export { MANIFEST_RULES } from "./schema/rules.js";
export { renderMessage } from "./schema/messages.js";
export { assembleManifest, type AssembleResult } from "./manifest/assemble.js";
export { sortByPathAndRule } from "./types/diagnostics.js";
export { ELSE_FAIL } from "./types/grammar.js";
export { loadConfig } from "./config/loader.js";
export { validateConfig, type ConfigValidationResult } from "./config/validator.js";

export type { SelectorContext } from "./types/context.js";
export type * from "./types/grammar.js";
export type * from "./types/rules.js";
export type * from "./types/diagnostics.js";
export type * from "./types/manifest.js";
export type * from "./types/config.js";
