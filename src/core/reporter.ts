/**
 * Error Reporter — Renders validation outcomes for machines and humans.
 *
 * The decision record drives the automatic retry harness and lists at most
 * `maxErrors` errors with hints. The verbose report lists everything.
 * Neither rendering throws; they only format what the validator produced.
 */
import type { DecisionRecord, ValidationError, ValidationOutcome, ValidationWarning } from "./types.js";

export const DEFAULT_MAX_BLOCK_ERRORS = 5;

export interface DecisionOptions {
    maxErrors?: number;
    /** Block on warnings even when there are no errors. */
    strict?: boolean;
    /** Name shown in the reason header, e.g. the sub-agent; defaults to the schema name. */
    label?: string;
}

const ROOT_PATH = "(root)";

function displayPath(path: string): string {
    return path === "" ? ROOT_PATH : path;
}

/** Remediation hint for an error, or `null` when its kind has none. */
export function hintFor(error: ValidationError): string | null {
    switch (error.kind) {
        case "missing-required":
            return `Add '${displayPath(error.path)}' field to output`;
        case "enum-mismatch":
            return "Check valid values in model definition";
        case "bounds-violation":
            if (error.constraint === "number") return "Value must be numeric in valid range";
            if (error.constraint === "string-too-short") return "Field requires more content";
            return null;
        default:
            return null;
    }
}

/** `- <path>: <message>` plus an indented hint line when one applies. */
export function formatError(error: ValidationError): string[] {
    const lines = [`- ${displayPath(error.path)}: ${error.message}`];
    const hint = hintFor(error);
    if (hint) lines.push(`  Hint: ${hint}`);
    return lines;
}

function formatWarning(warning: ValidationWarning): string {
    return `- ${displayPath(warning.path)}: ${warning.message}`;
}

/** True when the outcome passes; strict mode also requires zero warnings. */
export function isPassing(outcome: ValidationOutcome, strict = false): boolean {
    if (outcome.status !== "validated") return false;
    if (outcome.errors.length > 0) return false;
    return !strict || outcome.warnings.length === 0;
}

export function renderDecision(outcome: ValidationOutcome, options: DecisionOptions = {}): DecisionRecord {
    const maxErrors = options.maxErrors ?? DEFAULT_MAX_BLOCK_ERRORS;
    const strict = options.strict ?? false;

    if (outcome.status === "format-error") return { decision: "block", reason: outcome.message };
    if (outcome.status === "undetected") return { decision: "block", reason: undetectedMessage(outcome.rootKeys) };

    if (isPassing(outcome, strict)) return { decision: "continue" };

    const label = options.label ?? outcome.schema;
    const lines: string[] = [];
    if (outcome.errors.length > 0) {
        lines.push(`Validation failed for ${label} output:`);
        for (const error of outcome.errors.slice(0, maxErrors)) lines.push(...formatError(error));
        const hidden = outcome.errors.length - maxErrors;
        if (hidden > 0) lines.push(`(${hidden} more error${hidden === 1 ? "" : "s"} not shown)`);
    } else {
        lines.push(`Strict mode: ${label} output has warnings:`);
        for (const warning of outcome.warnings.slice(0, maxErrors)) lines.push(formatWarning(warning));
        const hidden = outcome.warnings.length - maxErrors;
        if (hidden > 0) lines.push(`(${hidden} more warning${hidden === 1 ? "" : "s"} not shown)`);
    }
    lines.push("Please fix these fields and regenerate the output.");
    return { decision: "block", reason: lines.join("\n") };
}

export function undetectedMessage(rootKeys: readonly string[]): string {
    return `Cannot detect output type. Root keys: [${rootKeys.join(", ")}]`;
}

/**
 * Text protocol consumed by the retry harness. The reason is a YAML literal
 * block so the whole output parses as YAML even when read line by line.
 */
export function formatDecision(record: DecisionRecord): string {
    if (record.decision === "continue") return "decision: continue";
    const body = record.reason.split("\n").map((line) => `  ${line}`);
    return ["decision: block", "reason: |", ...body].join("\n");
}

/** Verbose listing of every error and warning. */
export function renderReport(outcome: ValidationOutcome): string {
    if (outcome.status === "format-error") return `ERROR: ${outcome.message}`;
    if (outcome.status === "undetected") return `ERROR: ${undetectedMessage(outcome.rootKeys)}`;

    const lines: string[] = [];
    if (outcome.errors.length > 0) {
        lines.push(`ERRORS (${outcome.errors.length}):`);
        for (const error of outcome.errors) lines.push(...formatError(error).map((line) => `  ${line}`));
    }
    if (outcome.warnings.length > 0) {
        lines.push(`WARNINGS (${outcome.warnings.length}):`);
        for (const warning of outcome.warnings) lines.push(`  - ${warning.message}`);
    }
    if (lines.length === 0) lines.push("All checks passed");
    return lines.join("\n");
}
