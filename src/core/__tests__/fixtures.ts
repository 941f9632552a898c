/**
 * Documents shared by the core tests. Each builder returns a fresh object
 * so tests can mutate it freely.
 */

export function attackerFinding(): Record<string, unknown> {
    return {
        id: "RF-001",
        severity: "HIGH",
        title: "Circular justification",
        confidence: 0.85,
        category: "reasoning-flaws",
        target: { claim_id: "C1", claim_text: "The cache is always warm" },
        evidence: { type: "quote", quote: "it is warm because it is fast" },
        attack_applied: { style: "socratic", probe: "What makes it fast?" },
        impact: { if_exploited: "Latency spikes on cold start", affected_claims: ["C1"] },
        recommendation: "Measure the cold-start path before relying on it",
    };
}

export function attackerDocument(findings: unknown[] = [attackerFinding()]): Record<string, unknown> {
    return {
        attack_results: {
            attack_type: "reasoning-attacker",
            findings,
            categories_probed: ["reasoning-flaws"],
            summary: { total_findings: findings.length },
        },
    };
}

export const LONG_SUMMARY = "One high severity reasoning flaw undermines the caching conclusion of the plan.";

export function reportDocument(): Record<string, unknown> {
    return {
        executive_summary: LONG_SUMMARY,
        risk_overview: { overall_risk_level: "HIGH", analysis_confidence: "80%" },
        findings: {
            high: [{
                id: "RF-001",
                category: "reasoning-flaws",
                severity: "HIGH",
                title: "Circular justification",
                confidence: "85%",
            }],
        },
        recommendations: { immediate: ["Measure cold starts"] },
        limitations: { scope: "Single conversation" },
    };
}

export function fixOption(label = "Add guard"): Record<string, unknown> {
    return {
        label,
        description: "Validate the input before use",
        complexity: "low",
    };
}

export function fixPlannerDocument(options: unknown[] = [fixOption()]): Record<string, unknown> {
    return { finding_id: "RF-001", finding_title: "Circular justification", options };
}

export function userQuestion(optionCount = 2, header = "RF-001 fix"): Record<string, unknown> {
    const options = Array.from({ length: optionCount }, (_, i) => ({
        label: `Option ${i + 1}`,
        description: "One way to address the finding",
    }));
    return { question: "How should RF-001 be fixed?", header, options };
}

export function fixCoordinatorDocument(
    questions: unknown[] = [userQuestion()],
    fullOptions: unknown[] = [fixOption()],
): Record<string, unknown> {
    return {
        question_batches: [{ batch_number: 1, severity_level: "CRITICAL_HIGH", questions }],
        finding_details: [{
            finding_id: "RF-001",
            title: "Circular justification",
            severity: "HIGH",
            full_options: fullOptions,
        }],
    };
}

export function contextImprovement(): Record<string, unknown> {
    return {
        id: "CTX-001",
        file: "agents/analyzer.md",
        improvement_type: "TIER_SPEC",
        description: "Declare a FILTERED tier for the analyzer",
        recommended_tier: "FILTERED",
    };
}

export function improvementReportDocument(summary = LONG_SUMMARY): Record<string, unknown> {
    return {
        improvement_report: {
            executive_summary: summary,
            improvements_applied: [{ improvement_id: "CTX-001", description: "Tier spec added" }],
            total_improvements: 1,
            applied_count: 1,
        },
    };
}

/** Wrap a YAML body the way agents are asked to. */
export function fenced(body: string): string {
    return `Analysis complete.\n\n\`\`\`yaml\n${body}\n\`\`\`\n`;
}
