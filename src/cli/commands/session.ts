/**
 * `agent-output session` — Session state file operations for the
 * context-engineering orchestrator and its sub-agents.
 */
import * as p from "@clack/prompts";
import chalk from "chalk";
import { stringify } from "yaml";
import { InvalidSessionValueError } from "../../errors/index.js";
import { AnalysisMode, FocusArea } from "../../schemas/enums.js";
import { configFromEnv } from "../../schemas/config.js";
import { SessionStore } from "../../session/store.js";
import type { SessionSection } from "../../session/store.js";

export interface SessionInitOptions {
    focus?: string;
    mode?: string;
    request?: string;
}

export interface SessionReadOptions {
    field?: string;
}

export interface SessionLockOptions {
    holder?: string;
}

const SECTIONS: readonly SessionSection[] = ["immutable", "mutable", "all"];

function isSection(value: string): value is SessionSection {
    return SECTIONS.some((section) => section === value);
}

function openStore(pluginPath: string): SessionStore {
    const config = configFromEnv();
    return new SessionStore(pluginPath, { stateFilename: config.state_filename });
}

/** Run a session action; a failure is logged and sets exit code 1. */
async function guarded(action: () => Promise<void>): Promise<void> {
    try {
        await action();
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exitCode = 1;
    }
}

export function sessionInitCommand(pluginPath: string, options: SessionInitOptions): Promise<void> {
    return guarded(async () => {
        const focusArea = FocusArea.safeParse(options.focus ?? "all");
        if (!focusArea.success) {
            throw new Error(`Unknown focus area "${options.focus}". Expected one of: ${FocusArea.options.join(", ")}`);
        }
        const mode = AnalysisMode.safeParse(options.mode ?? "standard");
        if (!mode.success) {
            throw new Error(`Unknown mode "${options.mode}". Expected one of: ${AnalysisMode.options.join(", ")}`);
        }

        const store = openStore(pluginPath);
        const state = await store.init({
            focusArea: focusArea.data,
            mode: mode.data,
            userRequest: options.request ?? "",
        });
        p.log.success(`Initialized state file: ${chalk.cyan(store.statePath)}`);
        p.log.info(`Session ID: ${state.immutable.session_id}`);
    });
}

export function sessionReadCommand(pluginPath: string, options: SessionReadOptions): Promise<void> {
    return guarded(async () => {
        const section = options.field ?? "all";
        if (!isSection(section)) {
            throw new Error(`Unknown section "${section}". Known sections: ${SECTIONS.join(", ")}`);
        }
        const value = await openStore(pluginPath).readSection(section);
        process.stdout.write(stringify(value));
    });
}

export function sessionUpdateCommand(pluginPath: string, field: string, value: string): Promise<void> {
    return guarded(async () => {
        let parsed: unknown;
        try {
            parsed = JSON.parse(value);
        } catch (err) {
            throw new InvalidSessionValueError(field, err instanceof Error ? err.message : String(err));
        }
        const state = await openStore(pluginPath).update(field, parsed);
        p.log.success(`Updated ${chalk.cyan(field)}, new version: ${state.version}`);
    });
}

export function sessionLockCommand(pluginPath: string, options: SessionLockOptions): Promise<void> {
    return guarded(async () => {
        const state = await openStore(pluginPath).lock(options.holder);
        p.log.success(`Lock acquired by: ${chalk.cyan(state.lock_holder ?? "")}`);
    });
}

export function sessionUnlockCommand(pluginPath: string): Promise<void> {
    return guarded(async () => {
        const { releasedFrom } = await openStore(pluginPath).unlock();
        if (releasedFrom === null) {
            p.log.warn("No lock to release");
            return;
        }
        p.log.success(`Lock released from: ${chalk.cyan(releasedFrom)}`);
    });
}
