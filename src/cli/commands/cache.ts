/**
 * `agent-output cache` — File references in the session state: discover
 * plugin files, load one on demand, list what is cached.
 */
import path from "path";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { configFromEnv } from "../../schemas/config.js";
import type { FileRef } from "../../schemas/session.js";
import { DEFAULT_DISCOVER_PATTERN, FileCache } from "../../session/cache.js";
import type { RefFilter } from "../../session/cache.js";
import { SessionStore } from "../../session/store.js";

export interface CacheDiscoverOptions {
    pattern?: string;
}

export interface CacheRefsOptions {
    loadedOnly?: boolean;
    unloadedOnly?: boolean;
}

function openCache(pluginPath: string): FileCache {
    const config = configFromEnv();
    return new FileCache(new SessionStore(pluginPath, { stateFilename: config.state_filename }));
}

async function guarded(action: () => Promise<void>): Promise<void> {
    try {
        await action();
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exitCode = 1;
    }
}

/** One listing line per reference, followed by its path. */
export function formatRef(ref: FileRef): string[] {
    const status = ref.loaded ? "loaded" : "unloaded";
    const tokens = ref.loaded ? `(${ref.token_estimate} tokens)` : "(not loaded)";
    return [`${ref.id}: ${path.basename(ref.path)} [${status}] ${tokens}`, `  Path: ${ref.path}`];
}

export function refFilter(options: CacheRefsOptions): RefFilter {
    if (options.loadedOnly && options.unloadedOnly) {
        throw new Error("Cannot use --loaded-only and --unloaded-only together");
    }
    if (options.loadedOnly) return "loaded";
    if (options.unloadedOnly) return "unloaded";
    return "all";
}

export function cacheDiscoverCommand(pluginPath: string, options: CacheDiscoverOptions): Promise<void> {
    return guarded(async () => {
        const pattern = options.pattern ?? DEFAULT_DISCOVER_PATTERN;
        const { matched, added, total } = await openCache(pluginPath).discover(pattern);
        if (matched.length === 0) {
            p.log.warn(`No files found matching pattern: ${pattern}`);
            return;
        }
        for (const ref of added) {
            p.log.info(`Added: ${path.basename(ref.path)} ${chalk.dim(`(id: ${ref.id})`)}`);
        }
        p.log.success(`Added ${added.length} new files to cache, ${total} cached in total`);
    });
}

export function cacheFetchCommand(pluginPath: string, fileId: string): Promise<void> {
    return guarded(async () => {
        const { ref, alreadyLoaded } = await openCache(pluginPath).fetch(fileId);
        if (alreadyLoaded) {
            p.log.warn(`File already loaded: ${ref.path}`);
        } else {
            p.log.success(`Loaded: ${chalk.cyan(path.basename(ref.path))}`);
        }
        p.log.info(`Token estimate: ${ref.token_estimate}`);
    });
}

export function cacheRefsCommand(pluginPath: string, options: CacheRefsOptions): Promise<void> {
    return guarded(async () => {
        const filter = refFilter(options);
        const refs = await openCache(pluginPath).refs(filter);
        if (refs.length === 0) {
            p.log.warn(filter === "all" ? "No files in cache" : `No ${filter} files in cache`);
            return;
        }
        console.log(chalk.bold(`${refs.length} file references:`));
        for (const ref of refs) {
            const [line, where] = formatRef(ref);
            console.log(`  ${chalk.cyan(line)}`);
            console.log(`  ${chalk.dim(where)}`);
        }
        if (filter !== "unloaded") {
            const total = refs.reduce((sum, ref) => sum + (ref.loaded ? ref.token_estimate : 0), 0);
            console.log(`Total tokens (loaded): ${total}`);
        }
    });
}
