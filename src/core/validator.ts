/**
 * Validator — Applies a registered schema and returns every violation.
 *
 * Bad agent output is the expected case, so nothing here throws on data.
 * Zod collects all issues in one pass; each issue becomes one error
 * (an unknown-keys issue becomes one error per key).
 */
import type { $ZodIssue } from "zod/v4/core";
import { getSchema } from "./registry.js";
import type { SchemaName } from "./registry.js";
import { describeValue, joinPath, lookupPath } from "./data.js";
import { isBoundsConstraint, isErrorKind } from "./types.js";
import type { BoundsConstraint, ValidationError } from "./types.js";

export function validateData(name: SchemaName, data: unknown): ValidationError[] {
    const result = getSchema(name).schema.safeParse(data);
    if (result.success) return [];
    return result.error.issues.flatMap((issue) => toValidationErrors(issue, data));
}

// --- Issue mapping ---

function quote(value: unknown): string {
    return typeof value === "string" ? `'${value}'` : String(value);
}

function sizeOf(value: unknown): string {
    if (typeof value === "string" || Array.isArray(value)) return String(value.length);
    return describeValue(value);
}

/** Zod's own messages start with these; anything else was written by a schema. */
function isDefaultMessage(message: string): boolean {
    return message.startsWith("Too small") || message.startsWith("Too big") || message.startsWith("Invalid");
}

function boundsConstraint(origin: string, side: "min" | "max"): BoundsConstraint {
    switch (origin) {
        case "string":
            return side === "min" ? "string-too-short" : "string-too-long";
        case "array":
        case "set":
            return side === "min" ? "list-too-short" : "list-too-long";
        default:
            return "number";
    }
}

function numberRelation(side: "min" | "max", inclusive: boolean): string {
    if (side === "min") return inclusive ? "greater than or equal to" : "greater than";
    return inclusive ? "less than or equal to" : "less than";
}

function boundsMessage(
    constraint: BoundsConstraint,
    side: "min" | "max",
    bound: number | bigint,
    inclusive: boolean,
    actual: unknown,
): string {
    switch (constraint) {
        case "string-too-short":
            return `String should have at least ${bound} characters, received ${sizeOf(actual)}`;
        case "string-too-long":
            return `String should have at most ${bound} characters, received ${sizeOf(actual)}`;
        case "list-too-short":
            return `List should have at least ${bound} items, received ${sizeOf(actual)}`;
        case "list-too-long":
            return `List should have at most ${bound} items, received ${sizeOf(actual)}`;
        case "number":
            return `Input should be ${numberRelation(side, inclusive)} ${bound}, received ${quote(actual)}`;
    }
}

function unionExpected(issue: Extract<$ZodIssue, { code: "invalid_union" }>): string[] {
    const expected = new Set<string>();
    const branches = "errors" in issue ? issue.errors : [];
    for (const branch of branches) {
        for (const inner of branch) {
            if (inner.code === "invalid_type" && inner.path.length === 0) expected.add(inner.expected);
        }
    }
    return [...expected];
}

function toValidationErrors(issue: $ZodIssue, data: unknown): ValidationError[] {
    const path = joinPath(issue.path);
    const { found, value } = lookupPath(data, issue.path);

    switch (issue.code) {
        case "invalid_type":
            if (!found) return [{ path, message: "Field required", kind: "missing-required" }];
            return [{
                path,
                message: `Expected ${issue.expected}, received ${describeValue(value)}`,
                kind: "type-mismatch",
            }];

        case "invalid_union": {
            if (!found) return [{ path, message: "Field required", kind: "missing-required" }];
            const expected = unionExpected(issue);
            const message = expected.length > 0
                ? `Expected ${expected.join(" or ")}, received ${describeValue(value)}`
                : issue.message;
            return [{ path, message, kind: "type-mismatch" }];
        }

        case "too_small":
        case "too_big": {
            const side = issue.code === "too_small" ? "min" : "max";
            const bound = issue.code === "too_small" ? issue.minimum : issue.maximum;
            const inclusive = issue.inclusive ?? true;
            const constraint = boundsConstraint(issue.origin, side);
            const message = isDefaultMessage(issue.message)
                ? boundsMessage(constraint, side, bound, inclusive, value)
                : issue.message;
            return [{ path, message, kind: "bounds-violation", constraint }];
        }

        case "invalid_value":
            if (!found) return [{ path, message: "Field required", kind: "missing-required" }];
            return [{
                path,
                message: `Input should be ${formatChoices(issue.values)}, received ${quote(value)}`,
                kind: "enum-mismatch",
            }];

        case "invalid_format": {
            const expected = issue.pattern ?? issue.format;
            return [{
                path,
                message: `String ${quote(value)} should match pattern ${expected}`,
                kind: "pattern-mismatch",
            }];
        }

        case "unrecognized_keys":
            return issue.keys.map((key) => ({
                path: joinPath([...issue.path, key]),
                message: "Extra inputs are not permitted",
                kind: "type-mismatch" as const,
            }));

        case "custom": {
            const params: Record<string, unknown> = issue.params ?? {};
            const kind = isErrorKind(params.kind) ? params.kind : "type-mismatch";
            const error: ValidationError = { path, message: issue.message, kind };
            if (isBoundsConstraint(params.constraint)) error.constraint = params.constraint;
            return [error];
        }

        default:
            return [{ path, message: issue.message, kind: "type-mismatch" }];
    }
}

function formatChoices(values: readonly unknown[]): string {
    const quoted = values.map(quote);
    if (quoted.length <= 1) return quoted.join("");
    return `${quoted.slice(0, -1).join(", ")} or ${quoted[quoted.length - 1]}`;
}
