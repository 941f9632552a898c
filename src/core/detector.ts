/**
 * Type Detector — Infers which schema a parsed document claims to satisfy.
 *
 * Root keys are checked in priority order and the first match wins. Keys
 * shared by several schemas fall back to secondary hints. For `improvements`
 * and `assessments` only the first list element is inspected, so a batch is
 * classified by its head.
 */
import { field, hasField, isRecord, listField } from "./data.js";
import type { SchemaName } from "./registry.js";

type Rule = readonly [rootKey: string, classify: (data: Record<string, unknown>) => SchemaName | null];

const always =
    (name: SchemaName) =>
    (): SchemaName =>
        name;

function classifyAttack(data: Record<string, unknown>): SchemaName {
    return field(data.attack_results, "attack_type") === "code-reasoning-attacker" ? "code_attacker" : "attacker";
}

function classifySummaryReport(data: Record<string, unknown>): SchemaName {
    return hasField(data, "pr_summary") ? "pr_report" : "report";
}

const FIX_STAGE_HINTS: readonly (readonly [string, SchemaName])[] = [
    ["parsed_intent", "fix_reader"],
    ["fix_plan", "fix_planner_v2"],
    ["approved", "fix_red_teamer"],
    ["applied_changes", "fix_applicator"],
    ["commit_result", "fix_committer"],
    ["validation_result", "fix_validator"],
    ["retry_count", "fix_phase_coordinator"],
    ["status", "fix_phase_coordinator"],
    ["options", "fix_planner"],
];

function classifyFixStage(data: Record<string, unknown>): SchemaName | null {
    const hint = FIX_STAGE_HINTS.find(([key]) => hasField(data, key));
    return hint ? hint[1] : null;
}

/** Context, orchestration and handoff improvers all emit `improvements`. */
export function classifyImprovements(data: Record<string, unknown>): SchemaName {
    const first = listField(data, "improvements")[0];
    if (!isRecord(first)) return "context_improvement";
    if (hasField(first, "transition") || hasField(first, "current_handoff")) return "handoff_improvement";
    if (hasField(first, "current_structure") || hasField(first, "proposed_structure")) {
        return "orchestration_improvement";
    }
    return "context_improvement";
}

const ASSESSMENT_HINTS: readonly (readonly [string, SchemaName])[] = [
    ["pattern_compliant", "pattern_compliance"],
    ["before_tokens", "token_estimate"],
    ["is_internally_consistent", "consistency_check"],
    ["risk_level", "risk_assessment"],
];

/** The four context-engineering grounding agents all emit `assessments`. */
export function classifyAssessments(data: Record<string, unknown>): SchemaName | null {
    const first = listField(data, "assessments")[0];
    if (!isRecord(first)) return null;
    const hint = ASSESSMENT_HINTS.find(([key]) => hasField(first, key));
    return hint ? hint[1] : null;
}

const RULES: readonly Rule[] = [
    // red-team analysis
    ["attack_results", classifyAttack],
    ["grounding_results", always("grounding")],
    ["context_analysis", always("context")],
    ["attack_strategy", always("strategy")],
    ["diff_analysis", always("diff_analysis")],
    ["executive_summary", classifySummaryReport],
    // fix pipeline
    ["execution_summary", always("fix_orchestrator")],
    ["question_batches", always("fix_coordinator")],
    ["findings_with_fixes", always("fix_coordinator_legacy")],
    ["finding_id", classifyFixStage],
    // context engineering
    ["plugin_analysis", always("plugin_analysis")],
    ["plan_analysis", always("plan_analysis")],
    ["context_flow_map", always("context_flow_map")],
    ["improvement_report", always("improvement_report")],
    ["improvements", classifyImprovements],
    ["assessments", classifyAssessments],
    ["challenge_assessments", always("challenge_assessment")],
];

/** Return the schema a parsed document claims, or `null` when none matches. */
export function detectSchema(data: unknown): SchemaName | null {
    if (!isRecord(data)) return null;
    for (const [rootKey, classify] of RULES) {
        if (hasField(data, rootKey)) return classify(data);
    }
    return null;
}
