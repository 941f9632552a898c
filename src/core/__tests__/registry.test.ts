/**
 * Registry Tests — Schema lookup and agent name resolution.
 */
import { describe, it, expect } from "vitest";
import {
    AGENT_SCHEMAS,
    SCHEMA_NAMES,
    SCHEMA_REGISTRY,
    findSchema,
    getSchema,
    isSchemaName,
    listSchemas,
    resolveAgentName,
} from "../registry.js";
import { UnknownSchemaError } from "../../errors/index.js";

describe("getSchema", () => {
    it("returns the descriptor for a known name", () => {
        const descriptor = getSchema("fix_planner");
        expect(descriptor.name).toBe("fix_planner");
        expect(descriptor.family).toBe("red-team");
    });

    it("throws for an unknown name", () => {
        expect(() => getSchema("nope")).toThrow(UnknownSchemaError);
        expect(() => getSchema("nope")).toThrow(/^Unknown schema "nope"\. Known schemas: attacker, code_attacker, /);
    });

    it("probes without throwing", () => {
        expect(findSchema("nope")).toBeUndefined();
        expect(findSchema("report")?.name).toBe("report");
    });
});

describe("registry contents", () => {
    it("keys every descriptor by its own name", () => {
        for (const name of SCHEMA_NAMES) {
            expect(SCHEMA_REGISTRY[name].name).toBe(name);
        }
    });

    it("splits the schemas into two families", () => {
        expect(listSchemas()).toHaveLength(31);
        expect(listSchemas("red-team")).toHaveLength(19);
        expect(listSchemas("context-engineering").map((d) => d.name)).toEqual([
            "plugin_analysis",
            "plan_analysis",
            "context_flow_map",
            "context_improvement",
            "orchestration_improvement",
            "handoff_improvement",
            "pattern_compliance",
            "token_estimate",
            "consistency_check",
            "risk_assessment",
            "challenge_assessment",
            "improvement_report",
        ]);
    });

    it("is frozen", () => {
        expect(Object.isFrozen(SCHEMA_REGISTRY)).toBe(true);
        expect(Object.isFrozen(SCHEMA_REGISTRY.attacker)).toBe(true);
    });

    it("maps every agent to a registered schema", () => {
        for (const schema of Object.values(AGENT_SCHEMAS)) {
            expect(isSchemaName(schema)).toBe(true);
        }
    });
});

describe("resolveAgentName", () => {
    it("finds an agent mentioned in a prompt", () => {
        expect(resolveAgentName("Run the context-analyzer on the transcript")).toEqual({
            agent: "context-analyzer",
            schema: "context",
        });
    });

    it("prefers the longest matching name", () => {
        expect(resolveAgentName("You are the fix-planner-v2 agent")).toEqual({
            agent: "fix-planner-v2",
            schema: "fix_planner_v2",
        });
        expect(resolveAgentName("code-reasoning-attacker: review the diff")).toEqual({
            agent: "code-reasoning-attacker",
            schema: "code_attacker",
        });
    });

    it("searches every text it is given", () => {
        expect(resolveAgentName("", "Handoff pass", "handoff-improver")?.schema).toBe("handoff_improvement");
    });

    it("returns null when no agent is named", () => {
        expect(resolveAgentName("Summarize the meeting")).toBeNull();
    });
});
