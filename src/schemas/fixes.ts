/**
 * Fix Schemas — Outputs of the fix planning and fix execution agents.
 *
 * Planning agents propose 1–3 options per finding and batch them into
 * AskUserQuestion-compatible questions. Execution agents (reader, planner,
 * red teamer, applicator, committer, validator) carry free-form payloads
 * that vary per run, so those sections are opaque records.
 */
import { z } from "zod/v4";
import { FindingId, OpaqueRecord, OptionalText, StringList } from "./common.js";
import { BatchSeverityLevel, Complexity, FindingSeverity } from "./enums.js";

/** Complexity is accepted in any case and normalized to upper case. */
const NormalizedComplexity = z.string().toUpperCase().pipe(Complexity);

export const FixOption = z.object({
    label: z.string(),
    description: z.string(),
    pros: StringList,
    cons: StringList,
    complexity: NormalizedComplexity,
    affected_components: StringList,
});
export type FixOption = z.infer<typeof FixOption>;

const FixOptions = z.array(FixOption).min(1).max(3);

export const FixPlannerOutput = z.object({
    finding_id: FindingId,
    finding_title: z.string(),
    options: FixOptions,
});
export type FixPlannerOutput = z.infer<typeof FixPlannerOutput>;

export const FindingWithFixes = z.object({
    finding_id: FindingId,
    title: z.string(),
    severity: FindingSeverity,
    options: FixOptions,
});

/** Earlier coordinator shape: findings with their fix options, no batching. */
export const FixCoordinatorOutput = z.object({
    findings_with_fixes: z.array(FindingWithFixes).default([]),
});
export type FixCoordinatorOutput = z.infer<typeof FixCoordinatorOutput>;

// --- AskUserQuestion batches ---

export const AskUserQuestionOption = z.object({
    label: z.string().min(1),
    description: z.string(),
});

export const AskUserQuestion = z.object({
    question: z.string().min(10),
    header: z.string().min(1).max(12),
    multiSelect: z.boolean().default(false),
    options: z.array(AskUserQuestionOption).min(2).max(4),
});
export type AskUserQuestion = z.infer<typeof AskUserQuestion>;

export const QuestionBatch = z.object({
    batch_number: z.number().int().min(1),
    severity_level: BatchSeverityLevel,
    questions: z.array(AskUserQuestion).min(1).max(4),
});
export type QuestionBatch = z.infer<typeof QuestionBatch>;

export const FindingDetailOption = FixOption;

export const FindingDetail = z.object({
    finding_id: FindingId,
    title: z.string(),
    severity: FindingSeverity,
    full_options: z.array(FindingDetailOption).min(1).max(3),
});

export const FixCoordinatorAskUserOutput = z.object({
    question_batches: z.array(QuestionBatch).min(1),
    finding_details: z.array(FindingDetail).default([]),
});
export type FixCoordinatorAskUserOutput = z.infer<typeof FixCoordinatorAskUserOutput>;

// --- Fix execution pipeline ---

export const FixReaderOutput = z.object({
    finding_id: z.string(),
    parsed_intent: z.string(),
    context_hints: StringList,
});

export const FixPlanV2Output = z.object({
    finding_id: z.string(),
    fix_plan: OpaqueRecord,
});

export const FixRedTeamerOutput = z.object({
    finding_id: z.string(),
    validation: OpaqueRecord,
    approved: z.boolean(),
    adjusted_plan: OpaqueRecord.nullish(),
});

export const FixApplicatorOutput = z.object({
    finding_id: z.string(),
    applied_changes: OpaqueRecord,
    success: z.boolean(),
    error: OptionalText,
});

/** `commit_result` must be present but may be null when nothing was committed. */
export const FixCommitterOutput = z.object({
    finding_id: z.string(),
    commit_result: OpaqueRecord.nullable(),
    success: z.boolean(),
    error: OptionalText,
});

export const FixValidatorOutput = z.object({
    finding_id: z.string(),
    commit_hash: z.string(),
    validation_result: OpaqueRecord,
});

export const FixPhaseCoordinatorOutput = z.object({
    finding_id: z.string(),
    status: z.enum(["success", "failed"]),
    commit_hash: OptionalText,
    files_changed: StringList,
    validation: OptionalText,
    retry_count: z.number().int().min(0).max(2),
    error: OptionalText,
    revert_command: OptionalText,
});

export const FixOrchestratorOutput = z.object({
    execution_summary: OpaqueRecord.nullish(),
    question_batches: z.array(QuestionBatch).nullish(),
});
