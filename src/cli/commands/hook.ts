/**
 * `agent-output hook` — PostToolUse hook for the automatic retry harness.
 *
 * Reads one hook invocation from stdin and prints a decision record. The
 * input is either a Task tool envelope (JSON with `tool_name`) or the raw
 * text of an agent's output. The command always exits 0; a failure of the
 * hook itself becomes a `block` decision.
 */
import { z } from "zod/v4";
import { field } from "../../core/data.js";
import { isSchemaName, resolveAgentName } from "../../core/registry.js";
import type { AgentMatch } from "../../core/registry.js";
import { validateText } from "../../core/pipeline.js";
import { formatDecision, renderDecision } from "../../core/reporter.js";
import type { DecisionRecord } from "../../core/types.js";
import { configFromEnv } from "../../schemas/config.js";
import type { ValidatorConfig } from "../../schemas/config.js";
import { readStdin } from "../io.js";

// Any JSON object with a string `tool_name` is an envelope; malformed
// inputs fall back to empty strings instead of being read as agent text.
const TaskEnvelope = z.object({
    tool_name: z.string(),
    tool_input: z.object({
        prompt: z.string().catch(""),
        description: z.string().catch(""),
        subagent_type: z.string().catch(""),
    }).catch({ prompt: "", description: "", subagent_type: "" }),
    tool_response: z.unknown(),
});
type TaskEnvelope = z.infer<typeof TaskEnvelope>;

export interface HookOptions {
    /** Agent or schema name to validate against, overriding detection. */
    agent?: string;
}

const CONTINUE: DecisionRecord = { decision: "continue" };

function parseEnvelope(input: string): TaskEnvelope | null {
    let json: unknown;
    try {
        json = JSON.parse(input);
    } catch {
        return null;
    }
    const parsed = TaskEnvelope.safeParse(json);
    return parsed.success ? parsed.data : null;
}

/** Agent text from `tool_response`: a string, `{ result }`, or a list of text parts. */
function responseText(response: unknown): string {
    if (typeof response === "string") return response;
    if (Array.isArray(response)) return response.map(responseText).join("\n");
    const result = field(response, "result") ?? field(response, "text");
    return typeof result === "string" ? result : "";
}

function explicitMatch(agent: string | undefined): AgentMatch | null {
    if (!agent) return null;
    const match = resolveAgentName(agent);
    if (match) return match;
    return isSchemaName(agent) ? { agent, schema: agent } : null;
}

function decide(text: string, match: AgentMatch | null, config: ValidatorConfig): DecisionRecord {
    const outcome = validateText(text, {
        schema: match?.schema,
        rawMaxLength: config.raw_yaml_max_length,
        minSummaryLength: config.min_summary_length,
    });
    return renderDecision(outcome, {
        maxErrors: config.max_block_errors,
        strict: config.strict,
        label: match?.agent,
    });
}

/** Decide one hook invocation. Pure apart from what `config` carries. */
export function evaluateHookInput(input: string, options: HookOptions, config: ValidatorConfig): DecisionRecord {
    const explicit = explicitMatch(options.agent);
    const envelope = parseEnvelope(input);

    if (envelope) {
        if (envelope.tool_name !== "Task") return CONTINUE;
        const { prompt, description, subagent_type } = envelope.tool_input;
        const match = explicit ?? resolveAgentName(subagent_type, prompt, description);
        // Tasks for agents without a contract pass through.
        if (!match) return CONTINUE;
        return decide(responseText(envelope.tool_response), match, config);
    }

    return decide(input, explicit, config);
}

export async function hookCommand(options: HookOptions): Promise<void> {
    let record: DecisionRecord;
    try {
        const config = configFromEnv();
        record = evaluateHookInput(await readStdin(), options, config);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        record = { decision: "block", reason: `Output validation hook failed: ${message}` };
    }
    console.log(formatDecision(record));
}
