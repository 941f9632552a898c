/**
 * Schema Registry — The fixed catalogue of agent output contracts.
 *
 * Every schema describes the whole document an agent emits, envelope key
 * included. Names form a closed union so dispatch never goes through
 * string-keyed reflection.
 */
import type { z } from "zod/v4";
import {
    AttackerOutput,
    AttackStrategyOutput,
    ContextAnalysisOutput,
    GroundingOutput,
} from "../schemas/attack.js";
import { RedTeamReport } from "../schemas/report.js";
import { CodeAttackerOutput, DiffAnalysisOutput, PrRedTeamReport } from "../schemas/pr.js";
import {
    FixApplicatorOutput,
    FixCommitterOutput,
    FixCoordinatorAskUserOutput,
    FixCoordinatorOutput,
    FixOrchestratorOutput,
    FixPhaseCoordinatorOutput,
    FixPlannerOutput,
    FixPlanV2Output,
    FixReaderOutput,
    FixRedTeamerOutput,
    FixValidatorOutput,
} from "../schemas/fixes.js";
import { ContextFlowMapOutput, PlanAnalysisOutput, PluginAnalysisOutput } from "../schemas/analysis.js";
import {
    ContextImprovementOutput,
    HandoffImprovementOutput,
    OrchestrationImprovementOutput,
} from "../schemas/improvement.js";
import {
    ChallengeAssessmentOutput,
    ConsistencyCheckOutput,
    PatternComplianceOutput,
    RiskAssessmentOutput,
    TokenEstimateOutput,
} from "../schemas/grounding.js";
import { ImprovementReportOutput } from "../schemas/synthesis.js";
import { UnknownSchemaError } from "../errors/index.js";

export const SCHEMA_NAMES = [
    // red-team analysis
    "attacker",
    "code_attacker",
    "grounding",
    "context",
    "strategy",
    "report",
    "diff_analysis",
    "pr_report",
    // fix pipeline
    "fix_planner",
    "fix_coordinator",
    "fix_coordinator_legacy",
    "fix_orchestrator",
    "fix_phase_coordinator",
    "fix_reader",
    "fix_planner_v2",
    "fix_red_teamer",
    "fix_applicator",
    "fix_committer",
    "fix_validator",
    // context engineering
    "plugin_analysis",
    "plan_analysis",
    "context_flow_map",
    "context_improvement",
    "orchestration_improvement",
    "handoff_improvement",
    "pattern_compliance",
    "token_estimate",
    "consistency_check",
    "risk_assessment",
    "challenge_assessment",
    "improvement_report",
] as const;

export type SchemaName = (typeof SCHEMA_NAMES)[number];

export type SchemaFamily = "red-team" | "context-engineering";

export interface SchemaDescriptor<N extends SchemaName = SchemaName> {
    readonly name: N;
    readonly family: SchemaFamily;
    /** One-line description shown by `agent-output schemas`. */
    readonly description: string;
    readonly schema: z.ZodType;
}

function redTeam<N extends SchemaName>(name: N, description: string, schema: z.ZodType): SchemaDescriptor<N> {
    return Object.freeze({ name, family: "red-team", description, schema });
}

function contextEngineering<N extends SchemaName>(
    name: N,
    description: string,
    schema: z.ZodType,
): SchemaDescriptor<N> {
    return Object.freeze({ name, family: "context-engineering", description, schema });
}

export const SCHEMA_REGISTRY: { readonly [N in SchemaName]: SchemaDescriptor<N> } = Object.freeze({
    attacker: redTeam("attacker", "Findings from a reasoning, context, hallucination or scope attacker", AttackerOutput),
    code_attacker: redTeam("code_attacker", "Findings from the code reasoning attacker", CodeAttackerOutput),
    grounding: redTeam("grounding", "Evidence assessments from a grounding checker", GroundingOutput),
    context: redTeam("context", "Claim and dependency analysis of the conversation", ContextAnalysisOutput),
    strategy: redTeam("strategy", "Attack vectors and attacker assignments", AttackStrategyOutput),
    report: redTeam("report", "Synthesized red-team report", RedTeamReport),
    diff_analysis: redTeam("diff_analysis", "Per-file risk analysis of a diff", DiffAnalysisOutput),
    pr_report: redTeam("pr_report", "Synthesized pull request red-team report", PrRedTeamReport),
    fix_planner: redTeam("fix_planner", "Fix options for one finding", FixPlannerOutput),
    fix_coordinator: redTeam("fix_coordinator", "Fix options batched as user questions", FixCoordinatorAskUserOutput),
    fix_coordinator_legacy: redTeam("fix_coordinator_legacy", "Findings with their fix options", FixCoordinatorOutput),
    fix_orchestrator: redTeam("fix_orchestrator", "Fix execution summary", FixOrchestratorOutput),
    fix_phase_coordinator: redTeam("fix_phase_coordinator", "Outcome of one fix phase", FixPhaseCoordinatorOutput),
    fix_reader: redTeam("fix_reader", "Parsed intent of a selected fix", FixReaderOutput),
    fix_planner_v2: redTeam("fix_planner_v2", "Execution plan for a selected fix", FixPlanV2Output),
    fix_red_teamer: redTeam("fix_red_teamer", "Review of a fix plan", FixRedTeamerOutput),
    fix_applicator: redTeam("fix_applicator", "Changes applied for a fix", FixApplicatorOutput),
    fix_committer: redTeam("fix_committer", "Commit created for a fix", FixCommitterOutput),
    fix_validator: redTeam("fix_validator", "Validation of a committed fix", FixValidatorOutput),
    plugin_analysis: contextEngineering("plugin_analysis", "Patterns, violations and metrics of a plugin", PluginAnalysisOutput),
    plan_analysis: contextEngineering("plan_analysis", "Phases and handoffs of a plan", PlanAnalysisOutput),
    context_flow_map: contextEngineering("context_flow_map", "Data flows between agents", ContextFlowMapOutput),
    context_improvement: contextEngineering("context_improvement", "Context tier improvements", ContextImprovementOutput),
    orchestration_improvement: contextEngineering(
        "orchestration_improvement",
        "Agent hierarchy improvements",
        OrchestrationImprovementOutput,
    ),
    handoff_improvement: contextEngineering("handoff_improvement", "Agent handoff improvements", HandoffImprovementOutput),
    pattern_compliance: contextEngineering("pattern_compliance", "Pattern compliance of improvements", PatternComplianceOutput),
    token_estimate: contextEngineering("token_estimate", "Token reduction estimates", TokenEstimateOutput),
    consistency_check: contextEngineering(
        "consistency_check",
        "Conflicts and dependencies between improvements",
        ConsistencyCheckOutput,
    ),
    risk_assessment: contextEngineering("risk_assessment", "Breaking change risk of improvements", RiskAssessmentOutput),
    challenge_assessment: contextEngineering(
        "challenge_assessment",
        "Challenges to improvement claims",
        ChallengeAssessmentOutput,
    ),
    improvement_report: contextEngineering("improvement_report", "Synthesized improvement report", ImprovementReportOutput),
});

export function isSchemaName(value: string): value is SchemaName {
    return SCHEMA_NAMES.some((name) => name === value);
}

export function findSchema(name: string): SchemaDescriptor | undefined {
    return isSchemaName(name) ? SCHEMA_REGISTRY[name] : undefined;
}

/**
 * Look up a schema by name.
 * @throws UnknownSchemaError when the name is not registered.
 */
export function getSchema(name: string): SchemaDescriptor {
    const descriptor = findSchema(name);
    if (!descriptor) throw new UnknownSchemaError(name, SCHEMA_NAMES);
    return descriptor;
}

export function listSchemas(family?: SchemaFamily): SchemaDescriptor[] {
    const all = SCHEMA_NAMES.map((name) => SCHEMA_REGISTRY[name]);
    return family ? all.filter((d) => d.family === family) : all;
}

// --- Agent names ---

/** Sub-agent name to the schema its output must satisfy. */
export const AGENT_SCHEMAS: Readonly<Record<string, SchemaName>> = Object.freeze({
    // red-team attackers
    "reasoning-attacker": "attacker",
    "context-attacker": "attacker",
    "hallucination-prober": "attacker",
    "scope-analyzer": "attacker",
    "code-reasoning-attacker": "code_attacker",
    "attack-strategist": "strategy",
    "context-analyzer": "context",
    // grounding
    "evidence-checker": "grounding",
    "proportion-checker": "grounding",
    "alternative-explorer": "grounding",
    calibrator: "grounding",
    // synthesis
    "insight-synthesizer": "report",
    // fixes
    "fix-planner": "fix_planner",
    "fix-coordinator": "fix_coordinator",
    "fix-orchestrator": "fix_orchestrator",
    "fix-phase-coordinator": "fix_phase_coordinator",
    "fix-reader": "fix_reader",
    "fix-planner-v2": "fix_planner_v2",
    "fix-red-teamer": "fix_red_teamer",
    "fix-applicator": "fix_applicator",
    "fix-committer": "fix_committer",
    "fix-validator": "fix_validator",
    // context engineering
    "plugin-analyzer": "plugin_analysis",
    "plan-analyzer": "plan_analysis",
    "context-flow-mapper": "context_flow_map",
    "context-optimizer": "context_improvement",
    "orchestration-improver": "orchestration_improvement",
    "handoff-improver": "handoff_improvement",
    "pattern-checker": "pattern_compliance",
    "token-estimator": "token_estimate",
    "consistency-checker": "consistency_check",
    "risk-assessor": "risk_assessment",
    challenger: "challenge_assessment",
    "improvement-synthesizer": "improvement_report",
    "audit-synthesizer": "improvement_report",
});

// Longest first, so "fix-planner-v2" wins over "fix-planner" and
// "code-reasoning-attacker" over "reasoning-attacker".
const AGENT_NAMES_BY_LENGTH = Object.keys(AGENT_SCHEMAS).sort((a, b) => b.length - a.length);

export interface AgentMatch {
    agent: string;
    schema: SchemaName;
}

/**
 * Find the first known agent name mentioned in the given texts
 * (a Task prompt, its description, or an explicit `--agent` value).
 */
export function resolveAgentName(...texts: string[]): AgentMatch | null {
    for (const agent of AGENT_NAMES_BY_LENGTH) {
        if (texts.some((text) => text.includes(agent))) {
            const schema = AGENT_SCHEMAS[agent];
            if (schema) return { agent, schema };
        }
    }
    return null;
}
