/**
 * Common Schemas — Primitives shared by every agent output contract.
 *
 * Finding identifiers, the two confidence representations, and the
 * opaque JSON escape hatch used by free-form agent sections.
 */
import { z } from "zod/v4";

/** Stable cross-reference key between findings, assessments, fix plans and reports. */
export const FINDING_ID_PATTERN = /^[A-Z]{2,3}-\d{3}$/;

/** Percentage confidence used by the final report (e.g. "85%"). */
export const PERCENTAGE_PATTERN = /^\d{1,3}%$/;

export const FindingId = z.string().regex(FINDING_ID_PATTERN);
export type FindingId = z.infer<typeof FindingId>;

/** Strict percentage string, e.g. "85%". */
export const PercentageString = z.string().regex(PERCENTAGE_PATTERN);

/** A float in [0, 1]. */
export const UnitInterval = z.number().min(0).max(1);

/**
 * Free-form structured value. Sections that legitimately vary per agent
 * (fix plans, validation payloads, summaries) accept any mapping.
 */
export const OpaqueRecord = z.record(z.string(), z.unknown());
export type OpaqueRecord = z.infer<typeof OpaqueRecord>;

/**
 * Confidence as a tagged variant: a numeric probability or a percentage
 * string. Both are legal where an agent reports `confidence`.
 */
export type Confidence =
    | { kind: "numeric"; value: number }
    | { kind: "percentage"; value: string };

/** Problem found in a confidence value; `null` when it is acceptable. */
export interface ConfidenceProblem {
    kind: "bounds-violation" | "pattern-mismatch";
    message: string;
}

export function toConfidence(value: number | string): Confidence {
    return typeof value === "number"
        ? { kind: "numeric", value }
        : { kind: "percentage", value };
}

function checkNumericConfidence(value: number): ConfidenceProblem | null {
    if (value < 0 || value > 1) {
        return {
            kind: "bounds-violation",
            message: `Confidence ${value} must be between 0.0 and 1.0`,
        };
    }
    return null;
}

function checkPercentageConfidence(value: string): ConfidenceProblem | null {
    if (!value.endsWith("%")) {
        return {
            kind: "pattern-mismatch",
            message: `String confidence '${value}' should be numeric or end with %`,
        };
    }
    return null;
}

export function checkConfidence(confidence: Confidence): ConfidenceProblem | null {
    switch (confidence.kind) {
        case "numeric":
            return checkNumericConfidence(confidence.value);
        case "percentage":
            return checkPercentageConfidence(confidence.value);
    }
}

/**
 * Numeric-or-percentage confidence. Violations are reported as custom
 * issues carrying the error kind so the validator can classify them.
 */
export const ConfidenceValue = z.union([z.number(), z.string()]).superRefine((value, ctx) => {
    const problem = checkConfidence(toConfidence(value));
    if (problem) {
        ctx.addIssue({
            code: "custom",
            message: problem.message,
            params: {
                kind: problem.kind,
                constraint: problem.kind === "bounds-violation" ? "number" : undefined,
            },
        });
    }
});
export type ConfidenceValue = z.infer<typeof ConfidenceValue>;

/** Optional string that agents often emit as `null`. */
export const OptionalText = z.string().nullish();

/** Line ranges as `[[start, end], ...]`. */
export const LineRanges = z.array(z.array(z.number().int())).default([]);

/** A list of strings that defaults to empty. */
export const StringList = z.array(z.string()).default([]);
