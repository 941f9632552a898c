/**
 * `agent-output validate` — Verbose validation of one agent output.
 *
 * Exit code 0 when the output passes (including warnings, unless strict),
 * 1 otherwise.
 */
import * as p from "@clack/prompts";
import chalk from "chalk";
import { validateText } from "../../core/pipeline.js";
import { getSchema } from "../../core/registry.js";
import { isPassing, renderReport } from "../../core/reporter.js";
import type { ValidationOutcome } from "../../core/types.js";
import { configFromEnv } from "../../schemas/config.js";
import { readInput } from "../io.js";

export interface ValidateCommandOptions {
    type?: string;
    strict?: boolean;
    json?: boolean;
}

function colorReport(report: string): string {
    return report
        .split("\n")
        .map((line) => {
            if (line.startsWith("ERROR")) return chalk.red.bold(line);
            if (line.startsWith("WARNINGS")) return chalk.yellow.bold(line);
            if (line.trimStart().startsWith("Hint:")) return chalk.dim(line);
            if (line === "All checks passed") return chalk.green(line);
            return line;
        })
        .join("\n");
}

function statusLine(outcome: ValidationOutcome, passed: boolean): string {
    const label = outcome.status === "validated" ? ` (${outcome.schema})` : "";
    return passed ? chalk.green.bold(`VALID${label}`) : chalk.red.bold(`INVALID${label}`);
}

export async function validateCommand(input: string, options: ValidateCommandOptions): Promise<void> {
    try {
        const config = configFromEnv();
        const strict = options.strict || config.strict;

        // getSchema throws UnknownSchemaError for a bad --type
        const schema = options.type ? getSchema(options.type).name : undefined;

        const text = await readInput(input);
        const outcome = validateText(text, {
            schema,
            rawMaxLength: config.raw_yaml_max_length,
            minSummaryLength: config.min_summary_length,
        });
        const passed = isPassing(outcome, strict);

        if (options.json) {
            console.log(JSON.stringify({ passed, strict, ...outcome }, null, 2));
        } else {
            console.log(statusLine(outcome, passed));
            console.log(colorReport(renderReport(outcome)));
        }
        process.exitCode = passed ? 0 : 1;
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exitCode = 1;
    }
}
