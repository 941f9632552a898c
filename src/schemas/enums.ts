/**
 * Enumerations — Closed value sets used across both agent families.
 */
import { z } from "zod/v4";

// --- Red-team family ---

export const Severity = z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO", "NONE"]);
export type Severity = z.infer<typeof Severity>;

/** Severity of a reported finding (no INFO or NONE). */
export const FindingSeverity = z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW"]);
export type FindingSeverity = z.infer<typeof FindingSeverity>;

/** Severity accepted from attacker and PR sub-agents. */
export const ReportedSeverity = z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO"]);
export type ReportedSeverity = z.infer<typeof ReportedSeverity>;

export const ConfidenceLevel = z.enum([
    "exploring",
    "low",
    "medium",
    "high",
    "very_high",
    "almost_certain",
    "certain",
]);
export type ConfidenceLevel = z.infer<typeof ConfidenceLevel>;

export const RISK_CATEGORY_NAMES = [
    "reasoning-flaws",
    "assumption-gaps",
    "context-manipulation",
    "authority-exploitation",
    "information-leakage",
    "hallucination-risks",
    "over-confidence",
    "scope-creep",
    "dependency-blindness",
    "temporal-inconsistency",
    "code-duplication",
] as const;

export const RiskCategoryName = z.enum(RISK_CATEGORY_NAMES);
export type RiskCategoryName = z.infer<typeof RiskCategoryName>;

export const AnalysisMode = z.enum(["quick", "standard", "deep"]);
export type AnalysisMode = z.infer<typeof AnalysisMode>;

export const MatchQuality = z.enum(["exact", "close", "partial", "mismatch", "not_found"]);
export type MatchQuality = z.infer<typeof MatchQuality>;

export const Complexity = z.enum(["LOW", "MEDIUM", "HIGH"]);
export type Complexity = z.infer<typeof Complexity>;

export const PrSize = z.enum(["tiny", "small", "medium", "large", "massive"]);
export type PrSize = z.infer<typeof PrSize>;

/** Severity grouping of a question batch shown to the user. */
export const BatchSeverityLevel = z.enum([
    "CRITICAL_HIGH",
    "CRITICAL",
    "HIGH",
    "MEDIUM_LOW",
    "MEDIUM",
    "LOW",
]);
export type BatchSeverityLevel = z.infer<typeof BatchSeverityLevel>;

// --- Context-engineering family ---

/** Context fidelity tiers, highest first. */
export const ContextTier = z.enum(["FULL", "SELECTIVE", "FILTERED", "MINIMAL", "METADATA"]);
export type ContextTier = z.infer<typeof ContextTier>;

export const ImprovementType = z.enum([
    // context
    "TIER_SPEC",
    "NOT_PASSED",
    "REFERENCE_PATTERN",
    "LAZY_LOAD",
    // orchestration
    "FIREWALL",
    "PHASE_SPLIT",
    "SUBAGENT_EXTRACT",
    // handoff
    "HANDOFF_SCHEMA",
    "TYPED_MODEL",
    "VALIDATION_HOOK",
    // general
    "SEVERITY_BATCH",
]);
export type ImprovementType = z.infer<typeof ImprovementType>;

export const PatternType = z.enum([
    "HIERARCHICAL",
    "SWARM",
    "REACT",
    "PLAN_EXECUTE",
    "REFLECTION",
    "HYBRID",
    "FIREWALL",
]);
export type PatternType = z.infer<typeof PatternType>;

export const RiskLevel = z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW"]);
export type RiskLevel = z.infer<typeof RiskLevel>;

export const ViolationType = z.enum([
    "FULL_SNAPSHOT",
    "UNNECESSARY_FIELDS",
    "MISSING_TIER",
    "WRONG_TIER",
    "LARGE_EMBEDDING",
    "REPEATED_CONTEXT",
    "UPFRONT_LOAD",
    "SNAPSHOT_BROADCAST",
    "DEFENSIVE_INCLUSION",
    "GROUNDING_EVERYTHING",
]);
export type ViolationType = z.infer<typeof ViolationType>;

export const ChallengeValidity = z.enum(["SUPPORTED", "UNSUPPORTED", "UNCERTAIN"]);
export type ChallengeValidity = z.infer<typeof ChallengeValidity>;

export const FocusArea = z.enum(["all", "context", "orchestration", "handoff"]);
export type FocusArea = z.infer<typeof FocusArea>;
