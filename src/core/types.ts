/**
 * Validation result types shared by the validator, the warning pass,
 * the reporter and the pipeline.
 */
import type { SchemaName } from "./registry.js";

export const ERROR_KINDS = [
    "missing-required",
    "enum-mismatch",
    "bounds-violation",
    "pattern-mismatch",
    "type-mismatch",
] as const;
export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Refines a bounds violation: which bound, on what kind of value. */
export const BOUNDS_CONSTRAINTS = [
    "number",
    "string-too-short",
    "string-too-long",
    "list-too-short",
    "list-too-long",
] as const;
export type BoundsConstraint = (typeof BOUNDS_CONSTRAINTS)[number];

export interface ValidationError {
    /** Dotted location with numeric list indices; empty for the document root. */
    path: string;
    message: string;
    kind: ErrorKind;
    constraint?: BoundsConstraint;
}

/** Advisory finding from the warning pass. Never blocks unless strict. */
export interface ValidationWarning {
    path: string;
    message: string;
}

/**
 * Result of validating one piece of agent output.
 *
 * - `format-error`: nothing could be validated (no block, bad YAML, not a mapping).
 * - `undetected`: parsed fine but no schema claims it.
 * - `validated`: a schema was applied; errors may still be present.
 */
export type ValidationOutcome =
    | { status: "format-error"; message: string }
    | { status: "undetected"; rootKeys: string[] }
    | {
          status: "validated";
          schema: SchemaName;
          errors: ValidationError[];
          warnings: ValidationWarning[];
      };

export type DecisionRecord = { decision: "continue" } | { decision: "block"; reason: string };

export function isErrorKind(value: unknown): value is ErrorKind {
    return ERROR_KINDS.some((kind) => kind === value);
}

export function isBoundsConstraint(value: unknown): value is BoundsConstraint {
    return BOUNDS_CONSTRAINTS.some((constraint) => constraint === value);
}
