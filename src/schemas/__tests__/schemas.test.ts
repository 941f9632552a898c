/**
 * Schema Tests — Shared primitives, session state and configuration.
 */
import { describe, it, expect } from "vitest";
import {
    ConfidenceValue,
    FindingId,
    CodeFindingId,
    SessionState,
    MutableState,
    ValidatorConfig,
    DEFAULT_CONFIG,
    configFromEnv,
    checkConfidence,
    toConfidence,
    FixPlannerOutput,
    AskUserQuestion,
} from "../../schemas/index.js";

describe("FindingId", () => {
    it("accepts two and three letter prefixes", () => {
        expect(FindingId.safeParse("RF-001").success).toBe(true);
        expect(FindingId.safeParse("HAL-123").success).toBe(true);
    });

    it("rejects other shapes", () => {
        expect(FindingId.safeParse("R-001").success).toBe(false);
        expect(FindingId.safeParse("RF-01").success).toBe(false);
        expect(FindingId.safeParse("rf-001").success).toBe(false);
    });
});

describe("CodeFindingId", () => {
    it("accepts code attacker prefixes", () => {
        expect(CodeFindingId.safeParse("LE-001").success).toBe(true);
        expect(CodeFindingId.safeParse("EH-010").success).toBe(true);
        expect(CodeFindingId.safeParse("RF-001").success).toBe(true);
    });

    it("explains the expected format", () => {
        const result = CodeFindingId.safeParse("BUG1");
        expect(result.success).toBe(false);
        expect(result.error?.issues[0]?.message).toBe(
            "Finding ID 'BUG1' must match XX-NNN or XXX-NNN format (e.g., RF-001)",
        );
    });
});

describe("Confidence", () => {
    it("tags the two representations", () => {
        expect(toConfidence(0.4)).toEqual({ kind: "numeric", value: 0.4 });
        expect(toConfidence("40%")).toEqual({ kind: "percentage", value: "40%" });
    });

    it("checks each representation", () => {
        expect(checkConfidence({ kind: "numeric", value: 0 })).toBeNull();
        expect(checkConfidence({ kind: "numeric", value: -0.1 })?.kind).toBe("bounds-violation");
        expect(checkConfidence({ kind: "percentage", value: "high" })?.kind).toBe("pattern-mismatch");
    });

    it("parses both forms unchanged", () => {
        expect(ConfidenceValue.parse(1)).toBe(1);
        expect(ConfidenceValue.parse("100%")).toBe("100%");
    });
});

describe("FixPlannerOutput", () => {
    it("normalizes complexity and fills list defaults", () => {
        const result = FixPlannerOutput.parse({
            finding_id: "RF-001",
            finding_title: "Unchecked assumption",
            options: [{ label: "Guard", description: "Add a guard clause", complexity: "high" }],
        });
        expect(result.options[0]).toEqual({
            label: "Guard",
            description: "Add a guard clause",
            complexity: "HIGH",
            pros: [],
            cons: [],
            affected_components: [],
        });
    });
});

describe("AskUserQuestion", () => {
    it("limits the header to twelve characters", () => {
        const question = {
            question: "Which fix should be applied?",
            header: "RF-001 fixes",
            options: [
                { label: "A", description: "Guard" },
                { label: "B", description: "Rewrite" },
            ],
        };
        expect(AskUserQuestion.parse(question).multiSelect).toBe(false);
        expect(AskUserQuestion.safeParse({ ...question, header: "RF-001 options" }).success).toBe(false);
    });
});

describe("SessionState", () => {
    const immutable = {
        plugin_path: "/plugins/demo",
        focus_area: "all",
        mode: "standard",
        user_request: "",
        session_id: "test-session",
    };

    it("fills mutable defaults", () => {
        const state = SessionState.parse({ immutable, mutable: {} });
        expect(state.version).toBe(1);
        expect(state.mutable).toEqual({
            file_cache: {},
            intermediate_results: {},
            phase_completed: [],
            user_selections: {},
        });
    });

    it("rejects an unknown focus area", () => {
        expect(SessionState.safeParse({ immutable: { ...immutable, focus_area: "ui" }, mutable: {} }).success).toBe(false);
    });

    it("validates cached file references", () => {
        const entry = { id: "f1", path: "agents/a.md", loaded: true, token_estimate: 120 };
        expect(MutableState.parse({ file_cache: { f1: entry } }).file_cache.f1).toEqual(entry);
        expect(MutableState.safeParse({ file_cache: { f1: { ...entry, loaded: "yes" } } }).success).toBe(false);
    });
});

describe("ValidatorConfig", () => {
    it("has defaults for every key", () => {
        expect(DEFAULT_CONFIG).toEqual({
            max_block_errors: 5,
            min_summary_length: 50,
            strict: false,
            raw_yaml_max_length: 500,
            state_filename: ".context-engineering-state.yaml",
        });
    });

    it("reads overrides from the environment", () => {
        const config = configFromEnv({
            AGENT_OUTPUT_MAX_BLOCK_ERRORS: "3",
            AGENT_OUTPUT_STRICT: "Yes",
            AGENT_OUTPUT_STATE_FILE: "state.yaml",
        });
        expect(config.max_block_errors).toBe(3);
        expect(config.strict).toBe(true);
        expect(config.state_filename).toBe("state.yaml");
        expect(config.min_summary_length).toBe(50);
    });

    it("ignores empty variables", () => {
        expect(configFromEnv({ AGENT_OUTPUT_MAX_BLOCK_ERRORS: "  " })).toEqual(DEFAULT_CONFIG);
    });

    it("rejects malformed values", () => {
        expect(() => configFromEnv({ AGENT_OUTPUT_MAX_BLOCK_ERRORS: "many" })).toThrow();
        expect(() => configFromEnv({ AGENT_OUTPUT_STRICT: "maybe" })).toThrow();
        expect(ValidatorConfig.safeParse({ max_block_errors: 0 }).success).toBe(false);
    });
});
