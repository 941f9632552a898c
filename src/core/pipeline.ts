/**
 * Pipeline — Raw agent text in, validation outcome out.
 *
 * extract → parse → detect (unless a schema is given) → validate → warn.
 * Extraction and parse failures become `format-error` outcomes; anything
 * else thrown here is a programmer error and propagates.
 */
import { OutputExtractionError, OutputParseError } from "../errors/index.js";
import { detectSchema } from "./detector.js";
import { extractDocument } from "./extract.js";
import type { SchemaName } from "./registry.js";
import { validateData } from "./validator.js";
import { collectWarnings } from "./warnings.js";
import type { ValidationOutcome } from "./types.js";

export interface ValidateOptions {
    /** Skip detection and validate against this schema. */
    schema?: SchemaName;
    rawMaxLength?: number;
    minSummaryLength?: number;
}

/** Validate an already-parsed document. */
export function validateDocument(data: Record<string, unknown>, options: ValidateOptions = {}): ValidationOutcome {
    const schema = options.schema ?? detectSchema(data);
    if (!schema) return { status: "undetected", rootKeys: Object.keys(data) };
    return {
        status: "validated",
        schema,
        errors: validateData(schema, data),
        warnings: collectWarnings(schema, data, { minSummaryLength: options.minSummaryLength }),
    };
}

export function validateText(text: string, options: ValidateOptions = {}): ValidationOutcome {
    let data: Record<string, unknown>;
    try {
        data = extractDocument(text, { rawMaxLength: options.rawMaxLength });
    } catch (err) {
        if (err instanceof OutputExtractionError || err instanceof OutputParseError) {
            return { status: "format-error", message: err.message };
        }
        throw err;
    }
    return validateDocument(data, options);
}
