/**
 * Pull Request Schemas — Diff analysis, code-level attacks and the PR report.
 *
 * All objects here are strict: diff tooling emits a fixed envelope and
 * unexpected keys usually mean a renamed field.
 */
import { z } from "zod/v4";
import { FINDING_ID_PATTERN, FindingId, LineRanges, OptionalText, StringList, UnitInterval } from "./common.js";
import { PrSize, ReportedSeverity } from "./enums.js";

const Text = z.string().min(1);
const Count = z.number().int().min(0);

// --- Diff analysis ---

export const DiffSummary = z.strictObject({
    files_changed: Count,
    high_risk_files: Count,
    medium_risk_files: Count,
    low_risk_files: Count,
    total_insertions: Count,
    total_deletions: Count,
});

export const FileAnalysis = z.strictObject({
    file_id: Text,
    path: Text,
    risk_level: z.enum(["high", "medium", "low"]),
    risk_score: UnitInterval,
    change_summary: Text,
    risk_factors: StringList,
    line_ranges: LineRanges,
    change_type: z.enum(["addition", "modification", "deletion", "refactor"]),
    insertions: Count,
    deletions: Count,
});

export const RiskCategoryExposure = z.strictObject({
    category: Text,
    exposure: z.enum(["high", "medium", "low", "none"]),
    affected_files: StringList,
    notes: Text,
});

export const DiffPattern = z.strictObject({
    pattern: Text,
    description: Text,
    instances: z.number().int().min(1),
    affected_files: StringList,
    risk_implication: Text,
});

export const FocusArea = z.strictObject({
    area: Text,
    files: StringList,
    rationale: Text,
});

export const DiffAnalysisOutput = z.strictObject({
    diff_analysis: z.strictObject({
        summary: DiffSummary,
        file_analysis: z.array(FileAnalysis).default([]),
        risk_surface: z.array(RiskCategoryExposure).default([]),
        patterns_detected: z.array(DiffPattern).default([]),
        high_risk_files: StringList,
        focus_areas: z.array(FocusArea).default([]),
        key_observations: StringList,
    }),
});
export type DiffAnalysisOutput = z.infer<typeof DiffAnalysisOutput>;

// --- Code attacker ---

/** Prefixes the code reasoning attacker may use with a free-form suffix. */
export const CODE_FINDING_PREFIXES = ["LE-", "AG-", "EH-"] as const;

/**
 * Code finding IDs: any ID starting with a code attacker prefix, otherwise
 * the generic finding identifier format.
 */
export const CodeFindingId = Text.superRefine((value, ctx) => {
    if (CODE_FINDING_PREFIXES.some((prefix) => value.startsWith(prefix))) return;
    if (!FINDING_ID_PATTERN.test(value)) {
        ctx.addIssue({
            code: "custom",
            message: `Finding ID '${value}' must match XX-NNN or XXX-NNN format (e.g., RF-001)`,
            params: { kind: "pattern-mismatch" },
        });
    }
});

export const CodeFindingTarget = z.strictObject({
    file_path: Text,
    line_numbers: z.array(z.number().int()).default([]),
    diff_snippet: Text,
    function_name: OptionalText,
});

export const CodeFindingEvidence = z.strictObject({
    type: Text,
    description: OptionalText,
    code_quote: OptionalText,
    assumption: OptionalText,
    why_problematic: OptionalText,
    edge_case: OptionalText,
});

export const CodeFindingImpact = z.strictObject({
    if_exploited: OptionalText,
    affected_functionality: OptionalText,
    if_assumption_fails: OptionalText,
    likelihood: OptionalText,
    if_triggered: OptionalText,
    severity_justification: OptionalText,
});

export const CodeAttackerFinding = z.strictObject({
    id: CodeFindingId,
    category: Text,
    severity: ReportedSeverity,
    title: Text,
    target: CodeFindingTarget,
    evidence: CodeFindingEvidence,
    attack_applied: z.strictObject({
        style: Text,
        probe: Text,
    }),
    impact: CodeFindingImpact,
    recommendation: z.string().min(10),
    confidence: UnitInterval,
});
export type CodeAttackerFinding = z.infer<typeof CodeAttackerFinding>;

export const CodeAttackerOutput = z.strictObject({
    attack_results: z.strictObject({
        attack_type: Text,
        categories_probed: StringList,
        findings: z.array(CodeAttackerFinding).default([]),
        patterns_detected: z.array(z.strictObject({
            pattern: Text,
            instances: z.number().int().min(1),
            files_affected: StringList,
            description: Text,
            systemic_recommendation: OptionalText,
        })).default([]),
        summary: z.strictObject({
            total_findings: Count,
            by_severity: z.record(z.string(), z.number().int()).default({}),
            highest_risk_file: OptionalText,
            primary_weakness: OptionalText,
        }),
    }),
});
export type CodeAttackerOutput = z.infer<typeof CodeAttackerOutput>;

// --- PR report ---

export const PrSummary = z.strictObject({
    title: OptionalText,
    description: OptionalText,
    files_changed: Count,
    additions: Count,
    deletions: Count,
    pr_size: PrSize,
    high_risk_files: StringList,
});

export const PrFinding = z.strictObject({
    id: FindingId,
    severity: ReportedSeverity,
    title: Text,
    description: z.string().min(10),
    file_path: OptionalText,
    line_ranges: LineRanges,
    recommendation: z.string().min(10),
    confidence: UnitInterval,
});
export type PrFinding = z.infer<typeof PrFinding>;

export const BreakingChange = z.strictObject({
    type: Text,
    description: z.string().min(10),
    file_path: Text,
    impact: z.string().min(10),
    mitigation: OptionalText,
});

export const PrRedTeamReport = z.strictObject({
    executive_summary: z.string().min(50),
    pr_summary: PrSummary,
    risk_level: ReportedSeverity,
    findings: z.array(PrFinding).default([]),
    findings_by_file: z.record(z.string(), z.array(PrFinding)).default({}),
    breaking_changes: z.array(BreakingChange).default([]),
    recommendations: StringList,
    test_coverage_notes: OptionalText,
});
export type PrRedTeamReport = z.infer<typeof PrRedTeamReport>;
