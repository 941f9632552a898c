/**
 * Custom Error Classes — Library-specific errors for deterministic error handling.
 *
 * Bad agent output is never an exception: the validator returns it as data.
 * These classes cover programmer errors, extraction failures that the
 * pipeline turns into format-error outcomes, and session store failures.
 */

/**
 * Thrown when a caller asks the registry for a schema name it does not know.
 * This is a programmer error; use `findSchema` to probe.
 */
export class UnknownSchemaError extends Error {
    public readonly schemaName: string;
    public readonly knownSchemas: readonly string[];

    constructor(schemaName: string, knownSchemas: readonly string[]) {
        super(`Unknown schema "${schemaName}". Known schemas: ${knownSchemas.join(", ")}`);
        this.name = "UnknownSchemaError";
        this.schemaName = schemaName;
        this.knownSchemas = knownSchemas;
    }
}

/**
 * Thrown when no structured block can be found in agent output
 * (empty text, or prose without a fenced block or raw mapping).
 */
export class OutputExtractionError extends Error {
    public readonly inputLength: number;

    constructor(message: string, inputLength: number) {
        super(message);
        this.name = "OutputExtractionError";
        this.inputLength = inputLength;
    }
}

/**
 * Thrown when the extracted block is not valid YAML, or parses to
 * something other than a mapping.
 */
export class OutputParseError extends Error {
    public readonly detail: string;

    constructor(message: string, detail: string) {
        super(message);
        this.name = "OutputParseError";
        this.detail = detail;
    }
}

// --- Session store ---

export class SessionStateNotFoundError extends Error {
    public readonly statePath: string;

    constructor(statePath: string) {
        super(`State file not found: ${statePath}`);
        this.name = "SessionStateNotFoundError";
        this.statePath = statePath;
    }
}

export class SessionStateExistsError extends Error {
    public readonly statePath: string;

    constructor(statePath: string) {
        super(`State file already exists: ${statePath}`);
        this.name = "SessionStateExistsError";
        this.statePath = statePath;
    }
}

/** Thrown when an agent tries to take the logical session lock while another holds it. */
export class SessionLockHeldError extends Error {
    public readonly holder: string;

    constructor(holder: string) {
        super(`Lock already held by: ${holder}`);
        this.name = "SessionLockHeldError";
        this.holder = holder;
    }
}

export class UnknownSessionFieldError extends Error {
    public readonly field: string;

    constructor(field: string) {
        super(`Unknown mutable field: ${field}`);
        this.name = "UnknownSessionFieldError";
        this.field = field;
    }
}

/** Thrown when a new value for a mutable field is not valid JSON or has the wrong shape. */
export class InvalidSessionValueError extends Error {
    public readonly field: string;

    constructor(field: string, detail: string) {
        super(`Invalid value for ${field}: ${detail}`);
        this.name = "InvalidSessionValueError";
        this.field = field;
    }
}

/** Thrown when the state file on disk does not parse or match the session schema. */
export class InvalidSessionStateError extends Error {
    public readonly statePath: string;

    constructor(statePath: string, detail: string) {
        super(`Invalid session state in ${statePath}: ${detail}`);
        this.name = "InvalidSessionStateError";
        this.statePath = statePath;
    }
}

// --- File cache ---

export class FileNotCachedError extends Error {
    public readonly fileId: string;

    constructor(fileId: string) {
        super(`File ID not found in cache: ${fileId}`);
        this.name = "FileNotCachedError";
        this.fileId = fileId;
    }
}

/** Thrown when a cached reference points at a file that can no longer be read. */
export class CachedFileReadError extends Error {
    public readonly filePath: string;

    constructor(filePath: string, detail: string) {
        super(`Failed to load ${filePath}: ${detail}`);
        this.name = "CachedFileReadError";
        this.filePath = filePath;
    }
}
