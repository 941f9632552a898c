/**
 * Attack Schemas — Outputs of the red-team analysis sub-agents:
 * attackers, grounding checkers, the context analyzer and the strategist.
 */
import { z } from "zod/v4";
import { ConfidenceValue, FindingId, OptionalText, OpaqueRecord, StringList, UnitInterval } from "./common.js";
import { ReportedSeverity } from "./enums.js";

// --- Attacker ---

export const FindingTarget = z.object({
    claim_id: OptionalText,
    claim_text: OptionalText,
    message_num: z.number().int().nullish(),
});
export type FindingTarget = z.infer<typeof FindingTarget>;

/** Attack style and the probe that exposed the weakness. */
export const AttackApplied = z.object({
    style: z.string(),
    probe: z.string(),
});

export const FindingEvidence = z.object({
    type: z.string(),
    description: OptionalText,
    quote: OptionalText,
    assumption: OptionalText,
    why_problematic: OptionalText,
});

export const FindingImpact = z.object({
    if_exploited: OptionalText,
    if_assumption_fails: OptionalText,
    affected_claims: StringList,
    likelihood: OptionalText,
});

/**
 * A finding reported by an attacker sub-agent.
 * `confidence` takes either a float in [0, 1] or a percentage string.
 */
export const AttackerFinding = z.object({
    id: FindingId,
    severity: ReportedSeverity,
    title: z.string(),
    confidence: ConfidenceValue,
    category: z.string(),
    target: FindingTarget,
    evidence: FindingEvidence,
    attack_applied: AttackApplied,
    impact: FindingImpact,
    recommendation: z.string().min(10),
});
export type AttackerFinding = z.infer<typeof AttackerFinding>;

export const AttackerPattern = z.object({
    pattern: z.string(),
    instances: z.number().int().min(1).default(1),
    description: z.string(),
    systemic_recommendation: OptionalText,
});

export const SeverityCounts = z.object({
    critical: z.number().int().default(0),
    high: z.number().int().default(0),
    medium: z.number().int().default(0),
    low: z.number().int().default(0),
    info: z.number().int().default(0),
});

export const AttackSummary = z.object({
    total_findings: z.number().int().default(0),
    by_severity: SeverityCounts.default({ critical: 0, high: 0, medium: 0, low: 0, info: 0 }),
    highest_risk_claim: OptionalText,
    primary_weakness: OptionalText,
});

/** Unknown `categories_probed` entries are tolerated here and flagged by the warning pass. */
export const AttackResults = z.object({
    attack_type: z.string(),
    findings: z.array(AttackerFinding).default([]),
    categories_probed: StringList,
    patterns_detected: z.array(AttackerPattern).default([]),
    summary: AttackSummary,
});

export const AttackerOutput = z.object({
    attack_results: AttackResults,
});
export type AttackerOutput = z.infer<typeof AttackerOutput>;

// --- Grounding ---

/** `true`, `false`, or a qualifier such as "partial". */
const Verdict = z.union([z.boolean(), z.string()]);

export const EvidenceReview = z.object({
    evidence_exists: z.boolean(),
    evidence_accurate: Verdict.default(true),
    evidence_sufficient: Verdict.default(true),
});

export const QuoteVerification = z.object({
    original_quote: OptionalText,
    actual_source: OptionalText,
    match_quality: z.string().default("exact"),
});

export const InferenceValidity = z.object({
    valid: Verdict.default(true),
    reasoning: OptionalText,
});

export const GroundingIssue = z.object({
    issue: z.string(),
    severity: z.string().default("medium"),
});

export const GroundingAssessment = z.object({
    finding_id: z.string(),
    evidence_strength: UnitInterval,
    original_confidence: UnitInterval,
    evidence_review: EvidenceReview,
    quote_verification: QuoteVerification,
    inference_validity: InferenceValidity,
    issues_found: z.array(GroundingIssue).default([]),
    adjusted_confidence: UnitInterval.nullish(),
    notes: OptionalText,
});
export type GroundingAssessment = z.infer<typeof GroundingAssessment>;

export const GroundingOutput = z.object({
    grounding_results: z.object({
        agent: z.string(),
        assessments: z.array(GroundingAssessment).default([]),
    }),
});
export type GroundingOutput = z.infer<typeof GroundingOutput>;

// --- Context analysis ---

export const ClaimAnalysis = z.object({
    claim_id: z.string(),
    risk_level: OptionalText,
    content: OptionalText,
    original_text: OptionalText,
    verifiability: OptionalText,
    risk_factors: StringList,
    depends_on: StringList,
});

export const DependencyChain = z.object({
    root: z.string(),
    depends: StringList,
    risk_if_root_fails: OptionalText,
});

export const ContextAnalysisOutput = z.object({
    context_analysis: z.object({
        summary: OpaqueRecord.nullish(),
        claim_analysis: z.array(ClaimAnalysis).default([]),
        reasoning_patterns: StringList,
        risk_surface: z.object({
            areas: StringList,
            exposure_level: OptionalText,
        }).nullish(),
        dependency_graph: z.object({
            roots: StringList,
            chains: z.array(DependencyChain).default([]),
        }).nullish(),
        key_observations: StringList,
    }),
});
export type ContextAnalysisOutput = z.infer<typeof ContextAnalysisOutput>;

// --- Attack strategy ---

export const StrategyTarget = z.object({
    claim_id: OptionalText,
    area: OptionalText,
    reason: z.string(),
});

export const SelectedVector = z.object({
    category: z.string(),
    priority: z.number().int().min(1),
    rationale: z.string(),
    attack_styles: StringList,
    targets: z.array(StrategyTarget).default([]),
});

export const AttackerAssignment = z.object({
    categories: StringList,
    targets: z.array(StrategyTarget).default([]),
});

export const AttackStrategyOutput = z.object({
    attack_strategy: z.object({
        mode: z.string(),
        total_vectors: z.number().int().min(0),
        selected_vectors: z.array(SelectedVector).default([]),
        attacker_assignments: z.record(z.string(), AttackerAssignment).default({}),
        grounding_plan: z.object({
            enabled: z.boolean().default(true),
            agents: StringList,
        }).nullish(),
        meta_analysis: z.object({
            enabled: z.boolean().default(false),
            focus: OptionalText,
        }).nullish(),
        notes: StringList,
    }),
});
export type AttackStrategyOutput = z.infer<typeof AttackStrategyOutput>;
