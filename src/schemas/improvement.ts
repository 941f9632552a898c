/**
 * Improvement Schemas — Proposals from the context optimizer, the
 * orchestration improver and the handoff improver.
 *
 * All three agents emit `{ improvements: [...] }`; the detector tells them
 * apart by the fields of the first element.
 */
import { z } from "zod/v4";
import { OptionalText, StringList, UnitInterval } from "./common.js";
import { ContextTier, ImprovementType } from "./enums.js";

const NO_IMPROVEMENTS = "No improvements found in output";

export const CodeChange = z.object({
    before: z.string(),
    after: z.string(),
    explanation: OptionalText,
});

/** Proposal from the context optimizer, IDs like CTX-001. */
export const ContextImprovement = z.strictObject({
    id: z.string(),
    file: z.string(),
    improvement_type: ImprovementType,
    description: z.string(),
    code_change: CodeChange.nullish(),
    estimated_reduction: UnitInterval.nullish(),
    priority: z.string().default("MEDIUM"),
    recommended_tier: ContextTier.nullish(),
    fields_to_exclude: StringList,
});
export type ContextImprovement = z.infer<typeof ContextImprovement>;

export const AgentStructure = z.object({
    agents: StringList,
    /** parent -> children */
    hierarchy: z.record(z.string(), z.array(z.string())).default({}),
    entry_points: StringList,
});

export const MigrationStep = z.object({
    order: z.number().int(),
    description: z.string(),
    files_affected: StringList,
    is_breaking: z.boolean().default(false),
});

/** Proposal from the orchestration improver, IDs like ORCH-001. */
export const OrchestrationImprovement = z.strictObject({
    id: z.string(),
    improvement_type: ImprovementType,
    description: z.string(),
    current_structure: AgentStructure.nullish(),
    proposed_structure: AgentStructure.nullish(),
    files_affected: StringList,
    migration_steps: z.array(MigrationStep).default([]),
    estimated_complexity: z.string().default("MEDIUM"),
    priority: z.string().default("MEDIUM"),
});
export type OrchestrationImprovement = z.infer<typeof OrchestrationImprovement>;

export const HandoffTransition = z.object({
    from_agent: z.string(),
    to_agent: z.string(),
});

export const HandoffPayload = z.object({
    fields: StringList,
    excluded_fields: StringList,
    context_tier: ContextTier,
});

/** Proposal from the handoff improver, IDs like HO-001. */
export const HandoffImprovement = z.strictObject({
    id: z.string(),
    transition: HandoffTransition,
    description: z.string(),
    current_handoff: StringList,
    optimized_handoff: HandoffPayload.nullish(),
    yaml_schema: OptionalText,
    model_code: OptionalText,
    estimated_reduction: UnitInterval.nullish(),
    priority: z.string().default("MEDIUM"),
});
export type HandoffImprovement = z.infer<typeof HandoffImprovement>;

export const ContextImprovementOutput = z.object({
    improvements: z.array(ContextImprovement).min(1, NO_IMPROVEMENTS),
});

export const OrchestrationImprovementOutput = z.object({
    improvements: z.array(OrchestrationImprovement).min(1, NO_IMPROVEMENTS),
});

export const HandoffImprovementOutput = z.object({
    improvements: z.array(HandoffImprovement).min(1, NO_IMPROVEMENTS),
});
