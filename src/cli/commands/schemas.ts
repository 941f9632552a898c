import * as p from "@clack/prompts";
import chalk from "chalk";
import { AGENT_SCHEMAS, listSchemas } from "../../core/registry.js";
import type { SchemaFamily } from "../../core/registry.js";

export interface SchemasCommandOptions {
    family?: string;
    agents?: boolean;
    json?: boolean;
}

const FAMILIES: readonly SchemaFamily[] = ["red-team", "context-engineering"];

function isFamily(value: string): value is SchemaFamily {
    return FAMILIES.some((family) => family === value);
}

export function schemasCommand(options: SchemasCommandOptions): void {
    if (options.family && !isFamily(options.family)) {
        p.log.error(`Unknown family "${options.family}". Known families: ${FAMILIES.join(", ")}`);
        process.exitCode = 1;
        return;
    }
    const family = options.family && isFamily(options.family) ? options.family : undefined;

    if (options.agents) {
        const agents = Object.entries(AGENT_SCHEMAS).map(([agent, schema]) => ({ agent, schema }));
        if (options.json) {
            console.log(JSON.stringify(agents, null, 2));
            return;
        }
        for (const { agent, schema } of agents) console.log(`${chalk.cyan(agent.padEnd(28))} ${schema}`);
        return;
    }

    const schemas = listSchemas(family).map(({ name, family, description }) => ({ name, family, description }));
    if (options.json) {
        console.log(JSON.stringify(schemas, null, 2));
        return;
    }
    for (const group of FAMILIES) {
        const members = schemas.filter((s) => s.family === group);
        if (members.length === 0) continue;
        console.log(chalk.bold(group));
        for (const { name, description } of members) {
            console.log(`  ${chalk.cyan(name.padEnd(28))} ${chalk.dim(description)}`);
        }
    }
}
