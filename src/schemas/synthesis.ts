/**
 * Synthesis Schemas — The final improvement report returned to the host.
 */
import { z } from "zod/v4";
import { OptionalText, StringList, UnitInterval } from "./common.js";

const SignedUnit = z.number().min(-1).max(1);

export const FileDiff = z.object({
    before: OptionalText,
    after: OptionalText,
    /** Unified diff. */
    diff: OptionalText,
});

export const FileChange = z.object({
    file_path: z.string(),
    change_type: z.string(),
    description: z.string(),
    diff: FileDiff.nullish(),
});

export const TokenMetrics = z.object({
    before: z.number().int().min(0).default(0),
    after: z.number().int().min(0).default(0),
    reduction: z.number().int().default(0),
    reduction_percent: z.number().min(-100).max(100).default(0),
});

/** Before/after share of compliant agents (or of agents with a tier spec). */
export const ShareMetrics = z.object({
    before: UnitInterval.default(0),
    after: UnitInterval.default(0),
    improvement: SignedUnit.default(0),
});

const EMPTY_SHARE = { before: 0, after: 0, improvement: 0 };

export const BeforeAfterComparison = z.strictObject({
    total_tokens: TokenMetrics.default({ before: 0, after: 0, reduction: 0, reduction_percent: 0 }),
    pattern_compliance: ShareMetrics.default(EMPTY_SHARE),
    tier_coverage: ShareMetrics.default(EMPTY_SHARE),
});

export const AppliedImprovement = z.object({
    improvement_id: z.string(),
    description: z.string(),
    files_modified: StringList,
    token_reduction: z.number().int().nullish(),
    risk_level: OptionalText,
});

export const NextStep = z.object({
    description: z.string(),
    priority: z.string().default("MEDIUM"),
    rationale: OptionalText,
});

export const ImprovementReport = z.strictObject({
    executive_summary: z.string(),
    improvements_applied: z.array(AppliedImprovement).default([]),
    /** IDs of skipped improvements. */
    improvements_skipped: StringList,
    comparison: BeforeAfterComparison.default({
        total_tokens: { before: 0, after: 0, reduction: 0, reduction_percent: 0 },
        pattern_compliance: EMPTY_SHARE,
        tier_coverage: EMPTY_SHARE,
    }),
    files_modified: z.array(FileChange).default([]),
    files_created: StringList,
    files_deleted: StringList,
    total_improvements: z.number().int().default(0),
    applied_count: z.number().int().default(0),
    skipped_count: z.number().int().default(0),
    next_steps: z.array(NextStep).default([]),
    plugin_name: OptionalText,
    analysis_mode: OptionalText,
});
export type ImprovementReport = z.infer<typeof ImprovementReport>;

export const ImprovementReportOutput = z.object({
    improvement_report: ImprovementReport,
});
