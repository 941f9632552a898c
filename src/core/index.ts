export {
    SCHEMA_NAMES,
    SCHEMA_REGISTRY,
    AGENT_SCHEMAS,
    getSchema,
    findSchema,
    listSchemas,
    isSchemaName,
    resolveAgentName,
} from "./registry.js";
export type { SchemaName, SchemaFamily, SchemaDescriptor, AgentMatch } from "./registry.js";
export { extractBlock, parseBlock, extractDocument, DEFAULT_RAW_MAX_LENGTH } from "./extract.js";
export type { ExtractOptions } from "./extract.js";
export { detectSchema, classifyImprovements, classifyAssessments } from "./detector.js";
export { validateData } from "./validator.js";
export { collectWarnings, DEFAULT_MIN_SUMMARY_LENGTH } from "./warnings.js";
export type { WarningOptions } from "./warnings.js";
export {
    renderDecision,
    formatDecision,
    renderReport,
    formatError,
    hintFor,
    isPassing,
    DEFAULT_MAX_BLOCK_ERRORS,
} from "./reporter.js";
export type { DecisionOptions } from "./reporter.js";
export { validateText, validateDocument } from "./pipeline.js";
export type { ValidateOptions } from "./pipeline.js";
export { ERROR_KINDS, BOUNDS_CONSTRAINTS } from "./types.js";
export type {
    ErrorKind,
    BoundsConstraint,
    ValidationError,
    ValidationWarning,
    ValidationOutcome,
    DecisionRecord,
} from "./types.js";
