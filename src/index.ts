/**
 * Agent Output Contracts — Public API
 *
 * Schemas and validators for the structured output of plugin sub-agents.
 *
 * @see README.md for documentation index
 */

// Core
export * from "./core/index.js";

// Schemas
export * from "./schemas/index.js";

// Session
export * from "./session/index.js";

// Errors
export {
    UnknownSchemaError,
    OutputExtractionError,
    OutputParseError,
    SessionStateNotFoundError,
    SessionStateExistsError,
    SessionLockHeldError,
    UnknownSessionFieldError,
    InvalidSessionValueError,
    InvalidSessionStateError,
    FileNotCachedError,
    CachedFileReadError,
} from "./errors/index.js";
