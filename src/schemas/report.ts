/**
 * Report Schemas — The synthesized red-team report returned to the host.
 *
 * The report envelope is strict: a misspelled top-level section is an error
 * rather than silently dropped.
 */
import { z } from "zod/v4";
import { FindingId, OptionalText, PercentageString, StringList, UnitInterval } from "./common.js";
import { AnalysisMode, FindingSeverity, RiskCategoryName, Severity } from "./enums.js";

export const Evidence = z.object({
    quote: z.string(),
    source: z.string(),
    message_num: z.number().int().nullish(),
});

export const GroundingNotes = z.object({
    evidence_strength: UnitInterval,
    notes: OptionalText,
});

/** A finding as it appears in the final report (percentage confidence only). */
export const Finding = z.object({
    id: FindingId,
    category: z.string(),
    severity: FindingSeverity,
    title: z.string().min(10),
    confidence: PercentageString,
    evidence: Evidence.nullish(),
    issue: OptionalText,
    probing_question: OptionalText,
    recommendation: OptionalText,
    grounding_notes: GroundingNotes.nullish(),
});
export type Finding = z.infer<typeof Finding>;

export const Pattern = z.object({
    name: z.string(),
    description: z.string(),
    instances: z.number().int().min(1).default(1),
});

export const RiskCategory = z.object({
    category: RiskCategoryName,
    severity: Severity,
    count: z.number().int().min(0).default(0),
    confidence: PercentageString.nullish(),
});

export const RiskOverview = z.object({
    overall_risk_level: Severity,
    analysis_confidence: PercentageString.nullish(),
    categories: z.array(RiskCategory).default([]),
});

export const FindingsByLevel = z.object({
    critical: z.array(Finding).default([]),
    high: z.array(Finding).default([]),
    medium: z.array(Finding).default([]),
    low: z.array(Finding).default([]),
});

export const Recommendations = z.object({
    immediate: StringList,
    short_term: StringList,
    long_term: StringList,
});

export const Limitations = z.object({
    scope: OptionalText,
    coverage: OptionalText,
    confidence_note: OptionalText,
    temporal_note: OptionalText,
});

export const Methodology = z.object({
    mode: AnalysisMode.default("standard"),
    grounding_enabled: z.boolean().default(true),
    categories_analyzed: StringList,
});

export const RedTeamReport = z.strictObject({
    executive_summary: z.string().min(50),
    risk_overview: RiskOverview,
    findings: FindingsByLevel,
    patterns_detected: z.array(Pattern).default([]),
    recommendations: Recommendations.nullish(),
    limitations: Limitations.nullish(),
    methodology: Methodology.nullish(),
});
export type RedTeamReport = z.infer<typeof RedTeamReport>;
