/**
 * Hook Tests — Task envelopes and raw agent output through to a decision.
 */
import { describe, it, expect } from "vitest";
import { stringify } from "yaml";
import { evaluateHookInput } from "../commands/hook.js";
import { DEFAULT_CONFIG } from "../../schemas/config.js";
import { attackerDocument, fenced } from "../../core/__tests__/fixtures.js";

function envelope(toolInput: Record<string, unknown>, toolResponse: unknown, toolName = "Task"): string {
    return JSON.stringify({ tool_name: toolName, tool_input: toolInput, tool_response: toolResponse });
}

const CLEAN_ATTACK = fenced(stringify(attackerDocument()));

describe("evaluateHookInput — Task envelopes", () => {
    it("passes other tools through", () => {
        const input = envelope({ command: "ls" }, "file.txt", "Bash");
        expect(evaluateHookInput(input, {}, DEFAULT_CONFIG)).toEqual({ decision: "continue" });
    });

    it("passes other tools through even when their input is malformed", () => {
        const input = envelope({ prompt: null, description: 7 }, null, "Read");
        expect(evaluateHookInput(input, {}, DEFAULT_CONFIG)).toEqual({ decision: "continue" });
    });

    it("treats a malformed Task input as an envelope", () => {
        const input = JSON.stringify({
            tool_name: "Task",
            tool_input: { prompt: null, subagent_type: "reasoning-attacker" },
            tool_response: CLEAN_ATTACK,
        });
        expect(evaluateHookInput(input, {}, DEFAULT_CONFIG)).toEqual({ decision: "continue" });
    });

    it("passes a Task without any input through", () => {
        const input = JSON.stringify({ tool_name: "Task", tool_input: "oops", tool_response: "done" });
        expect(evaluateHookInput(input, {}, DEFAULT_CONFIG)).toEqual({ decision: "continue" });
    });

    it("passes tasks for agents without a contract", () => {
        const input = envelope({ prompt: "Summarize the notes" }, "no yaml here");
        expect(evaluateHookInput(input, {}, DEFAULT_CONFIG)).toEqual({ decision: "continue" });
    });

    it("continues on a valid response", () => {
        const input = envelope({ prompt: "Launch reasoning-attacker to analyze" }, CLEAN_ATTACK);
        expect(evaluateHookInput(input, {}, DEFAULT_CONFIG)).toEqual({ decision: "continue" });
    });

    it("reads the result field of an object response", () => {
        const input = envelope({ description: "Run reasoning-attacker" }, { result: CLEAN_ATTACK });
        expect(evaluateHookInput(input, {}, DEFAULT_CONFIG)).toEqual({ decision: "continue" });
    });

    it("joins text parts of a list response", () => {
        const input = envelope({ subagent_type: "reasoning-attacker" }, [{ type: "text", text: CLEAN_ATTACK }]);
        expect(evaluateHookInput(input, {}, DEFAULT_CONFIG)).toEqual({ decision: "continue" });
    });

    it("validates against the named agent, not the detected type", () => {
        const input = envelope({ prompt: "Run the fix-reader" }, CLEAN_ATTACK);
        expect(evaluateHookInput(input, {}, DEFAULT_CONFIG)).toEqual({
            decision: "block",
            reason: [
                "Validation failed for fix-reader output:",
                "- finding_id: Field required",
                "  Hint: Add 'finding_id' field to output",
                "- parsed_intent: Field required",
                "  Hint: Add 'parsed_intent' field to output",
                "Please fix these fields and regenerate the output.",
            ].join("\n"),
        });
    });

    it("blocks a response without structured output", () => {
        const input = envelope({ prompt: "Launch reasoning-attacker" }, "I could not finish");
        expect(evaluateHookInput(input, {}, DEFAULT_CONFIG)).toEqual({
            decision: "block",
            reason: "No YAML content found in output. Wrap the output in ```yaml ... ``` with valid YAML syntax.",
        });
    });
});

describe("evaluateHookInput — raw output", () => {
    it("auto-detects the schema", () => {
        expect(evaluateHookInput(CLEAN_ATTACK, {}, DEFAULT_CONFIG)).toEqual({ decision: "continue" });
    });

    it("blocks empty output", () => {
        expect(evaluateHookInput("", {}, DEFAULT_CONFIG)).toEqual({ decision: "block", reason: "Empty output" });
    });

    it("blocks undetectable output", () => {
        expect(evaluateHookInput("foo: 1\nbar: 2", {}, DEFAULT_CONFIG)).toEqual({
            decision: "block",
            reason: "Cannot detect output type. Root keys: [foo, bar]",
        });
    });

    it("takes an explicit schema name", () => {
        const record = evaluateHookInput(CLEAN_ATTACK, { agent: "fix_reader" }, DEFAULT_CONFIG);
        expect(record.decision).toBe("block");
        if (record.decision === "block") {
            expect(record.reason.split("\n")[0]).toBe("Validation failed for fix_reader output:");
        }
    });

    it("escalates warnings under strict config", () => {
        const text = fenced(stringify(attackerDocument([])));
        expect(evaluateHookInput(text, {}, DEFAULT_CONFIG)).toEqual({ decision: "continue" });
        expect(evaluateHookInput(text, {}, { ...DEFAULT_CONFIG, strict: true })).toEqual({
            decision: "block",
            reason: [
                "Strict mode: attacker output has warnings:",
                "- attack_results.findings: No findings reported - verify this is intentional",
                "Please fix these fields and regenerate the output.",
            ].join("\n"),
        });
    });
});
