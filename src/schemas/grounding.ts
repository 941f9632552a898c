/**
 * Grounding Schemas — Checks run against each proposed improvement:
 * pattern compliance, token estimates, consistency, risk and the
 * challenger's claim review.
 */
import { z } from "zod/v4";
import { OptionalText, StringList, UnitInterval } from "./common.js";
import { ChallengeValidity, PatternType, RiskLevel } from "./enums.js";

const NO_ASSESSMENTS = "No assessments found in output";

/** Signed percentage, e.g. a negative reduction when tokens grow. */
const SignedPercent = z.number().min(-100).max(100);

export const PatternViolationDetail = z.object({
    pattern: PatternType,
    violation: z.string(),
    location: OptionalText,
    suggestion: OptionalText,
});

export const PatternCompliance = z.strictObject({
    improvement_id: z.string(),
    pattern_compliant: z.boolean(),
    patterns_checked: z.array(PatternType).default([]),
    violations: z.array(PatternViolationDetail).default([]),
    suggestions: StringList,
    confidence: UnitInterval.default(0.8),
});
export type PatternCompliance = z.infer<typeof PatternCompliance>;

export const TokenBreakdown = z.object({
    component: z.string(),
    before: z.number().int(),
    after: z.number().int(),
    reduction: z.number().int(),
    reduction_percent: SignedPercent,
});

export const TokenEstimate = z.strictObject({
    improvement_id: z.string(),
    before_tokens: z.number().int().min(0),
    after_tokens: z.number().int().min(0),
    reduction_tokens: z.number().int().default(0),
    reduction_percent: SignedPercent.default(0),
    confidence: UnitInterval.default(0.7),
    breakdown: z.array(TokenBreakdown).default([]),
    method: OptionalText,
    notes: OptionalText,
});
export type TokenEstimate = z.infer<typeof TokenEstimate>;

export const ConflictDetail = z.object({
    with_improvement_id: z.string(),
    conflict_type: z.string(),
    description: z.string(),
    resolution: OptionalText,
});

export const DependencyDetail = z.object({
    requires_improvement_id: z.string(),
    reason: z.string(),
    is_hard_dependency: z.boolean().default(true),
});

export const ConsistencyCheck = z.strictObject({
    improvement_id: z.string(),
    is_internally_consistent: z.boolean(),
    conflicts_with: z.array(ConflictDetail).default([]),
    depends_on: z.array(DependencyDetail).default([]),
    consistency_issues: StringList,
    recommended_order: z.number().int().nullish(),
});
export type ConsistencyCheck = z.infer<typeof ConsistencyCheck>;

export const ImprovementBreakingChange = z.object({
    description: z.string(),
    affected_component: z.string(),
    mitigation: OptionalText,
});

export const RiskAssessment = z.strictObject({
    improvement_id: z.string(),
    risk_level: RiskLevel,
    breaking_changes: z.array(ImprovementBreakingChange).default([]),
    rollback_possible: z.boolean().default(true),
    rollback_complexity: OptionalText,
    mitigation_strategy: OptionalText,
    testing_required: StringList,
    confidence: UnitInterval.default(0.8),
    notes: OptionalText,
});
export type RiskAssessment = z.infer<typeof RiskAssessment>;

export const ChallengeAssessment = z.strictObject({
    improvement_id: z.string(),
    claim: z.string(),
    validity: ChallengeValidity,
    evidence_strength: UnitInterval,
    gaps: StringList,
    alternatives: StringList,
    required_evidence: StringList,
});
export type ChallengeAssessment = z.infer<typeof ChallengeAssessment>;

/** An improvement with every grounding result attached, as the synthesizer sees it. */
export const GroundedImprovement = z.strictObject({
    improvement_id: z.string(),
    improvement_description: z.string(),
    improvement_type: z.string(),
    pattern_compliance: PatternCompliance.nullish(),
    token_estimate: TokenEstimate.nullish(),
    consistency_check: ConsistencyCheck.nullish(),
    risk_assessment: RiskAssessment.nullish(),
    is_approved: z.boolean().default(true),
    approval_notes: OptionalText,
});
export type GroundedImprovement = z.infer<typeof GroundedImprovement>;

export const PatternComplianceOutput = z.object({
    assessments: z.array(PatternCompliance).min(1, NO_ASSESSMENTS),
});

export const TokenEstimateOutput = z.object({
    assessments: z.array(TokenEstimate).min(1, NO_ASSESSMENTS),
});

export const ConsistencyCheckOutput = z.object({
    assessments: z.array(ConsistencyCheck).min(1, NO_ASSESSMENTS),
});

export const RiskAssessmentOutput = z.object({
    assessments: z.array(RiskAssessment).min(1, NO_ASSESSMENTS),
});

export const ChallengeAssessmentOutput = z.object({
    challenge_assessments: z.array(ChallengeAssessment).min(1, "No challenge_assessments found in output"),
});
