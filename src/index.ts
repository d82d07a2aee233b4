/**
 * scrubquery library entry point
 *
 * Parse source with a GrammarRegistry, compile queries, then scan:
 *
 *   const registry = createDefaultRegistry();
 *   const query = compile('((call function: (identifier) @fn) (#eq? @fn "eval"))', { language: "python" });
 *   const { findings } = await new Scanner({ registry }).collect(units, [query]);
 */

// Errors
export {
  ScrubQueryError,
  ScrubQueryErrorCode,
  UnsupportedLanguageError,
  GrammarUnavailableError,
  ParseError,
  QuerySyntaxError,
  UnknownPredicateError,
  QueryValidationError,
  UnboundCaptureError,
  RegistrySealedError,
  ConfigError,
  InternalConsistencyError,
  MissingCaptureError,
  isFileLevelError,
} from "./errors.js";

// Grammars and syntax trees
export * from "./treesitter/index.js";

// Query compiler
export { compile, compileAll, type QueryDefinition, type QueryFailure, type CompileAllResult } from "./query/compiler.js";
export { parseQuery, tokenize, type QueryToken } from "./query/query-parser.js";
export type * from "./query/types.js";

// Matching and predicates
export { evaluate, evaluateNode } from "./matcher/engine.js";
export { capturedNodes, firstCapture, type Capture, type CaptureSet, type NodeOutcome } from "./matcher/types.js";
export { accept } from "./predicates/evaluator.js";
export {
  PredicateRegistry,
  createDefaultPredicates,
  compileRegex,
  BUILTIN_PREDICATES,
  PREDICATE_COST,
  type PredicateDefinition,
} from "./predicates/registry.js";

// Findings
export { emit } from "./findings/emitter.js";
export type { Finding, FindingSpan } from "./findings/types.js";
export { summarize, sortBySeverity, atLeast, type FindingSummary } from "./findings/summary.js";
export { DEFAULT_SEVERITY, SEVERITY_ORDER, isSeverity, severityRank, type Severity } from "./findings/severity.js";

// Scanning
export {
  Scanner,
  readSourceUnit,
  type SourceUnit,
  type Diagnostic,
  type DiagnosticCode,
  type UnitResult,
  type ScanResult,
  type ScannerOptions,
  type ScanOptions,
} from "./scan/scanner.js";
export {
  loadRulePack,
  loadRulePacks,
  loadConfiguredRules,
  BUILTIN_RULES_DIR,
  type LoadRulePackOptions,
  type LoadConfiguredRulesOptions,
} from "./rules/rule-pack.js";

// Configuration and logging
export { configSchema, parseConfig, type ScrubQueryConfig, type GrammarConfig, type ScanConfig, type LoggingConfig } from "./config/schema.js";
export {
  loadConfig,
  saveConfig,
  getConfigPath,
  getCustomGrammars,
  addCustomGrammar,
  removeCustomGrammar,
  CONFIG_DIR,
  CONFIG_FILE,
  EXAMPLE_CONFIG,
} from "./config/grammar-config.js";
export { createLogger, silentLogger, type Logger } from "./logging/logger.js";
