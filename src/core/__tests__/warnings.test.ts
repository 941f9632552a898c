/**
 * Warning Pass Tests — Advisory checks per schema.
 */
import { describe, it, expect } from "vitest";
import { collectWarnings } from "../warnings.js";
import {
    attackerDocument,
    attackerFinding,
    fixPlannerDocument,
    improvementReportDocument,
    reportDocument,
} from "./fixtures.js";

describe("collectWarnings — attacker", () => {
    it("is quiet for a complete document", () => {
        expect(collectWarnings("attacker", attackerDocument())).toEqual([]);
    });

    it("flags an empty findings list", () => {
        expect(collectWarnings("attacker", attackerDocument([]))).toEqual([
            { path: "attack_results.findings", message: "No findings reported - verify this is intentional" },
        ]);
    });

    it("flags findings without evidence or recommendation", () => {
        const finding = attackerFinding();
        delete finding.evidence;
        delete finding.recommendation;
        expect(collectWarnings("attacker", attackerDocument([finding]))).toEqual([
            { path: "attack_results.findings.0", message: "Finding [0] (RF-001): missing 'evidence' field" },
            { path: "attack_results.findings.0", message: "Finding [0] (RF-001): missing 'recommendation' field" },
        ]);
    });

    it("flags unknown risk categories", () => {
        const data = {
            attack_results: {
                attack_type: "reasoning-attacker",
                findings: [attackerFinding()],
                categories_probed: ["reasoning-flaws", "vibes"],
            },
        };
        expect(collectWarnings("attacker", data)).toEqual([
            { path: "attack_results.categories_probed", message: "Unknown risk category: 'vibes'" },
        ]);
    });

    it("still runs on a malformed document", () => {
        expect(collectWarnings("attacker", { attack_results: "oops" })).toEqual([
            { path: "attack_results.findings", message: "No findings reported - verify this is intentional" },
        ]);
    });
});

describe("collectWarnings — report", () => {
    it("is quiet for a complete report", () => {
        expect(collectWarnings("report", reportDocument())).toEqual([]);
    });

    it("flags missing limitations and a short summary", () => {
        const data: Record<string, unknown> = { ...reportDocument(), executive_summary: "Brief." };
        delete data.limitations;
        expect(collectWarnings("report", data)).toEqual([
            { path: "limitations", message: "Missing 'limitations' section" },
            { path: "executive_summary", message: "Executive summary seems too short" },
        ]);
    });

    it("honours a custom summary threshold", () => {
        const data = { ...reportDocument(), executive_summary: "Brief." };
        expect(collectWarnings("report", data, { minSummaryLength: 5 })).toEqual([]);
    });
});

describe("collectWarnings — other schemas", () => {
    it("flags grounding assessments without adjusted confidence or notes", () => {
        const data = { grounding_results: { agent: "evidence-checker", assessments: [{ finding_id: "RF-001" }] } };
        expect(collectWarnings("grounding", data)).toEqual([
            { path: "grounding_results.assessments.0", message: "Assessment [0]: missing 'adjusted_confidence'" },
            { path: "grounding_results.assessments.0", message: "Assessment [0]: missing 'notes' - explain rationale" },
        ]);
    });

    it("flags claims without a risk level", () => {
        const data = { context_analysis: { claim_analysis: [{ claim_id: "C1", risk_level: "HIGH" }, { claim_id: "C2" }] } };
        expect(collectWarnings("context", data)).toEqual([
            { path: "context_analysis.claim_analysis.1", message: "Claim [1]: missing 'risk_level'" },
        ]);
    });

    it("flags a strategy without vectors or assignments", () => {
        expect(collectWarnings("strategy", { attack_strategy: { mode: "quick", total_vectors: 0 } })).toEqual([
            { path: "attack_strategy.selected_vectors", message: "No attack vectors selected" },
            { path: "attack_strategy.attacker_assignments", message: "No attacker assignments defined" },
        ]);
    });

    it("flags an empty diff analysis", () => {
        expect(collectWarnings("diff_analysis", { diff_analysis: {} })).toEqual([
            { path: "diff_analysis", message: "Empty diff_analysis section" },
        ]);
    });

    it("flags diff files without risk factors or line ranges", () => {
        const data = {
            diff_analysis: {
                summary: {},
                file_analysis: [{ file: "src/a.ts", risk_factors: ["auth"], line_ranges: [] }],
                risk_surface: { categories: {} },
            },
        };
        expect(collectWarnings("diff_analysis", data)).toEqual([
            { path: "diff_analysis.file_analysis.0", message: "File [0]: missing or empty 'line_ranges' - specify affected lines" },
        ]);
    });

    it("flags code findings without line numbers", () => {
        const data = {
            attack_results: {
                attack_type: "code-reasoning-attacker",
                findings: [{
                    id: "LE-001",
                    target: { file: "src/a.ts" },
                    evidence: {},
                    attack_applied: {},
                    recommendation: "Check the bounds",
                }],
                summary: {},
            },
        };
        expect(collectWarnings("code_attacker", data)).toEqual([
            { path: "attack_results.findings.0", message: "Finding [0] (LE-001): missing line numbers in target" },
        ]);
    });

    it("flags a thin PR report", () => {
        expect(collectWarnings("pr_report", { executive_summary: "Looks fine." })).toEqual([
            { path: "test_coverage_notes", message: "Missing 'test_coverage_notes' - consider test coverage" },
            { path: "executive_summary", message: "Executive summary seems too short" },
            { path: "findings", message: "No findings reported - verify this is intentional" },
            { path: "recommendations", message: "No recommendations provided" },
        ]);
    });

    it("flags a short improvement report summary", () => {
        expect(collectWarnings("improvement_report", improvementReportDocument("Done."))).toEqual([
            { path: "improvement_report.executive_summary", message: "Executive summary seems too short" },
        ]);
    });

    it("has no checks for fix planning", () => {
        expect(collectWarnings("fix_planner", fixPlannerDocument([]))).toEqual([]);
    });
});
