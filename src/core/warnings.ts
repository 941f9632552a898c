/**
 * Warning Pass — Advisory checks that never fail validation on their own.
 *
 * Runs on the raw document independently of the schema result, so a
 * malformed document still gets whatever warnings apply to it.
 */
import { RISK_CATEGORY_NAMES } from "../schemas/enums.js";
import { field, hasField, isBlank, isRecord, listField, recordField } from "./data.js";
import type { SchemaName } from "./registry.js";
import type { ValidationWarning } from "./types.js";

export const DEFAULT_MIN_SUMMARY_LENGTH = 50;

export interface WarningOptions {
    /** Executive summaries shorter than this are flagged. */
    minSummaryLength?: number;
}

type WarningCheck = (data: unknown, options: Required<WarningOptions>) => ValidationWarning[];

function findingLabel(finding: unknown, idx: number): string {
    const id = field(finding, "id");
    return `Finding [${idx}] (${typeof id === "string" ? id : "unknown"})`;
}

function summaryTooShort(data: unknown, minLength: number): boolean {
    const summary = field(data, "executive_summary");
    return String(summary ?? "").length < minLength;
}

const attackerWarnings: WarningCheck = (data) => {
    const warnings: ValidationWarning[] = [];
    const attack = recordField(data, "attack_results");
    const findings = listField(attack, "findings");
    if (findings.length === 0) {
        warnings.push({ path: "attack_results.findings", message: "No findings reported - verify this is intentional" });
    }
    findings.forEach((finding, idx) => {
        const path = `attack_results.findings.${idx}`;
        for (const key of ["evidence", "recommendation"]) {
            if (!hasField(finding, key)) {
                warnings.push({ path, message: `${findingLabel(finding, idx)}: missing '${key}' field` });
            }
        }
    });
    for (const category of listField(attack, "categories_probed")) {
        if (!RISK_CATEGORY_NAMES.some((name) => name === category)) {
            warnings.push({ path: "attack_results.categories_probed", message: `Unknown risk category: '${String(category)}'` });
        }
    }
    return warnings;
};

const groundingWarnings: WarningCheck = (data) => {
    const assessments = listField(recordField(data, "grounding_results"), "assessments");
    return assessments.flatMap((assessment, idx) => {
        const path = `grounding_results.assessments.${idx}`;
        const warnings: ValidationWarning[] = [];
        if (!hasField(assessment, "adjusted_confidence")) {
            warnings.push({ path, message: `Assessment [${idx}]: missing 'adjusted_confidence'` });
        }
        if (!hasField(assessment, "notes")) {
            warnings.push({ path, message: `Assessment [${idx}]: missing 'notes' - explain rationale` });
        }
        return warnings;
    });
};

const contextWarnings: WarningCheck = (data) => {
    const claims = listField(recordField(data, "context_analysis"), "claim_analysis");
    return claims.flatMap((claim, idx) =>
        hasField(claim, "risk_level")
            ? []
            : [{ path: `context_analysis.claim_analysis.${idx}`, message: `Claim [${idx}]: missing 'risk_level'` }],
    );
};

const reportWarnings: WarningCheck = (data, { minSummaryLength }) => {
    const warnings: ValidationWarning[] = [];
    if (!hasField(data, "limitations")) {
        warnings.push({ path: "limitations", message: "Missing 'limitations' section" });
    }
    if (summaryTooShort(data, minSummaryLength)) {
        warnings.push({ path: "executive_summary", message: "Executive summary seems too short" });
    }
    return warnings;
};

const strategyWarnings: WarningCheck = (data) => {
    const strategy = recordField(data, "attack_strategy");
    const warnings: ValidationWarning[] = [];
    if (isBlank(field(strategy, "selected_vectors"))) {
        warnings.push({ path: "attack_strategy.selected_vectors", message: "No attack vectors selected" });
    }
    if (isBlank(field(strategy, "attacker_assignments"))) {
        warnings.push({ path: "attack_strategy.attacker_assignments", message: "No attacker assignments defined" });
    }
    return warnings;
};

const diffAnalysisWarnings: WarningCheck = (data) => {
    const analysis = recordField(data, "diff_analysis");
    if (!analysis || isBlank(analysis)) {
        return [{ path: "diff_analysis", message: "Empty diff_analysis section" }];
    }
    const warnings: ValidationWarning[] = [];
    if (!hasField(analysis, "summary")) {
        warnings.push({ path: "diff_analysis.summary", message: "Missing 'summary' section in diff_analysis" });
    }
    if (isBlank(analysis.file_analysis)) {
        warnings.push({ path: "diff_analysis.file_analysis", message: "Missing or empty 'file_analysis' section" });
    }
    if (isBlank(analysis.risk_surface)) {
        warnings.push({ path: "diff_analysis.risk_surface", message: "Missing or empty 'risk_surface' section" });
    }
    listField(analysis, "file_analysis").forEach((file, idx) => {
        const path = `diff_analysis.file_analysis.${idx}`;
        if (isBlank(field(file, "risk_factors"))) {
            warnings.push({ path, message: `File [${idx}]: missing or empty 'risk_factors' - explain risk rationale` });
        }
        if (isBlank(field(file, "line_ranges"))) {
            warnings.push({ path, message: `File [${idx}]: missing or empty 'line_ranges' - specify affected lines` });
        }
    });
    return warnings;
};

const codeAttackerWarnings: WarningCheck = (data) => {
    const attack = recordField(data, "attack_results");
    if (!attack || isBlank(attack)) {
        return [{ path: "attack_results", message: "Empty attack_results section" }];
    }
    const warnings: ValidationWarning[] = [];
    const findings = listField(attack, "findings");
    if (findings.length === 0) {
        warnings.push({ path: "attack_results.findings", message: "No findings reported - verify this is intentional" });
    }
    findings.forEach((finding, idx) => {
        const path = `attack_results.findings.${idx}`;
        const label = findingLabel(finding, idx);
        const target = field(finding, "target");
        if (isBlank(target)) {
            warnings.push({ path, message: `${label}: missing 'target' field` });
        } else if (isBlank(field(target, "line_numbers"))) {
            warnings.push({ path, message: `${label}: missing line numbers in target` });
        }
        for (const key of ["evidence", "attack_applied", "recommendation"]) {
            if (!hasField(finding, key)) {
                warnings.push({ path, message: `${label}: missing '${key}' field` });
            }
        }
    });
    if (!hasField(attack, "summary")) {
        warnings.push({ path: "attack_results.summary", message: "Missing 'summary' section in attack_results" });
    }
    return warnings;
};

const prReportWarnings: WarningCheck = (data, { minSummaryLength }) => {
    const warnings: ValidationWarning[] = [];
    if (!hasField(data, "test_coverage_notes")) {
        warnings.push({ path: "test_coverage_notes", message: "Missing 'test_coverage_notes' - consider test coverage" });
    }
    if (summaryTooShort(data, minSummaryLength)) {
        warnings.push({ path: "executive_summary", message: "Executive summary seems too short" });
    }
    if (isBlank(field(data, "findings"))) {
        warnings.push({ path: "findings", message: "No findings reported - verify this is intentional" });
    }
    if (isBlank(field(data, "recommendations"))) {
        warnings.push({ path: "recommendations", message: "No recommendations provided" });
    }
    return warnings;
};

const improvementReportWarnings: WarningCheck = (data, { minSummaryLength }) => {
    const report = recordField(data, "improvement_report");
    if (!isRecord(report)) return [];
    return summaryTooShort(report, minSummaryLength)
        ? [{ path: "improvement_report.executive_summary", message: "Executive summary seems too short" }]
        : [];
};

const WARNING_CHECKS: Partial<Record<SchemaName, WarningCheck>> = {
    attacker: attackerWarnings,
    code_attacker: codeAttackerWarnings,
    grounding: groundingWarnings,
    context: contextWarnings,
    report: reportWarnings,
    strategy: strategyWarnings,
    diff_analysis: diffAnalysisWarnings,
    pr_report: prReportWarnings,
    improvement_report: improvementReportWarnings,
};

/** Advisory warnings for a document; empty for schemas without checks. */
export function collectWarnings(name: SchemaName, data: unknown, options: WarningOptions = {}): ValidationWarning[] {
    const check = WARNING_CHECKS[name];
    if (!check) return [];
    return check(data, { minSummaryLength: options.minSummaryLength ?? DEFAULT_MIN_SUMMARY_LENGTH });
}
