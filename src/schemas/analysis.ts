/**
 * Analysis Schemas — Outputs of the plugin analyzer, plan analyzer and
 * context flow mapper.
 *
 * Each agent wraps its result in a single envelope key. The envelope
 * itself tolerates extra keys; the payload inside is strict.
 */
import { z } from "zod/v4";
import { OptionalText, StringList, UnitInterval } from "./common.js";
import { ContextTier, PatternType, ViolationType } from "./enums.js";

// --- Plugin analysis ---

export const PatternViolation = z.strictObject({
    violation_type: ViolationType,
    file: z.string(),
    line: z.number().int().nullish(),
    description: z.string(),
    current_code: OptionalText,
    recommendation: z.string(),
    severity: z.string().default("MEDIUM"),
});

export const DetectedPattern = z.object({
    pattern_type: PatternType,
    confidence: UnitInterval,
    evidence: StringList,
    files: StringList,
});

export const AgentAnalysis = z.object({
    file: z.string(),
    agent_type: z.string(),
    tools: StringList,
    context_tier: ContextTier.nullish(),
    receives: StringList,
    not_provided: StringList,
    estimated_tokens: z.number().int().nullish(),
    issues: StringList,
});
export type AgentAnalysis = z.infer<typeof AgentAnalysis>;

export const PluginMetrics = z.object({
    total_files: z.number().int().default(0),
    agent_count: z.number().int().default(0),
    entry_agents: z.number().int().default(0),
    sub_agents: z.number().int().default(0),
    command_count: z.number().int().default(0),
    skill_count: z.number().int().default(0),
    estimated_total_tokens: z.number().int().nullish(),
    /** Share of agents that declare a context tier. */
    tier_compliance: UnitInterval.default(0),
});

export const ImprovementOpportunity = z.object({
    category: z.string(),
    description: z.string(),
    files_affected: StringList,
    estimated_reduction: UnitInterval.nullish(),
    priority: z.string().default("MEDIUM"),
    improvement_type: z.string(),
});

export const PluginAnalysis = z.strictObject({
    plugin_name: z.string(),
    plugin_version: OptionalText,
    current_patterns: z.array(DetectedPattern).default([]),
    violations: z.array(PatternViolation).default([]),
    agents: z.array(AgentAnalysis).default([]),
    opportunities: z.array(ImprovementOpportunity).default([]),
    metrics: PluginMetrics.default({
        total_files: 0,
        agent_count: 0,
        entry_agents: 0,
        sub_agents: 0,
        command_count: 0,
        skill_count: 0,
        tier_compliance: 0,
    }),
    summary: OptionalText,
});
export type PluginAnalysis = z.infer<typeof PluginAnalysis>;

export const PluginAnalysisOutput = z.object({
    plugin_analysis: PluginAnalysis,
});

// --- Context flow map ---

export const FlowEdge = z.strictObject({
    from_agent: z.string(),
    to_agent: z.string(),
    data_passed: StringList,
    data_size_estimate: OptionalText,
    context_tier: ContextTier.nullish(),
    is_redundant: z.boolean().default(false),
    redundancy_reason: OptionalText,
});
export type FlowEdge = z.infer<typeof FlowEdge>;

export const RedundancyIssue = z.object({
    description: z.string(),
    agents_affected: StringList,
    data_duplicated: StringList,
    estimated_waste: OptionalText,
});

export const ContextFlowMap = z.strictObject({
    flows: z.array(FlowEdge).default([]),
    redundancies: z.array(RedundancyIssue).default([]),
    missing_tiers: StringList,
    total_flows: z.number().int().default(0),
    redundant_flows: z.number().int().default(0),
    agents_mapped: z.number().int().default(0),
});
export type ContextFlowMap = z.infer<typeof ContextFlowMap>;

export const ContextFlowMapOutput = z.object({
    context_flow_map: ContextFlowMap,
});

// --- Plan analysis ---

export const PlanPhase = z.object({
    name: z.string(),
    description: OptionalText,
    agents_involved: StringList,
    context_received: StringList,
    context_tier: ContextTier.nullish(),
    issues: StringList,
});

export const HandoffPoint = z.object({
    from_phase: z.string(),
    to_phase: z.string(),
    data_transferred: StringList,
    potential_issues: StringList,
});

export const PlanAnalysis = z.strictObject({
    plan_name: OptionalText,
    phases: z.array(PlanPhase).default([]),
    context_per_phase: z.record(z.string(), z.array(z.string())).default({}),
    handoff_points: z.array(HandoffPoint).default([]),
    violations: StringList,
    total_phases: z.number().int().default(0),
    phases_with_tier_spec: z.number().int().default(0),
    estimated_total_context: OptionalText,
});
export type PlanAnalysis = z.infer<typeof PlanAnalysis>;

export const PlanAnalysisOutput = z.object({
    plan_analysis: PlanAnalysis,
});
