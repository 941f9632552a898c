/**
 * File Cache — References to plugin files kept in the session state.
 *
 * `discover` records unloaded references for files matching a glob,
 * `fetch` loads one file's content into its reference with a token
 * estimate, and `refs` lists what is cached. Sub-agents see what exists
 * without every file being pulled into their context.
 */
import { createHash } from "crypto";
import fs from "fs/promises";
import path from "path";
import { minimatch } from "minimatch";
import { CachedFileReadError, FileNotCachedError } from "../errors/index.js";
import type { FileRef } from "../schemas/session.js";
import type { SessionStore } from "./store.js";

export const DEFAULT_DISCOVER_PATTERN = "**/*.md";

const CHARS_PER_TOKEN = 4;

export type RefFilter = "all" | "loaded" | "unloaded";

export interface DiscoverResult {
    /** Absolute paths matching the pattern, sorted. */
    matched: string[];
    /** References created by this call; already cached files are skipped. */
    added: FileRef[];
    total: number;
}

export interface FetchResult {
    ref: FileRef;
    /** Nothing was read or written because the content was already loaded. */
    alreadyLoaded: boolean;
}

/** First 8 hex digits of the MD5 of an absolute path. */
export function fileIdFor(absolutePath: string): string {
    return createHash("md5").update(absolutePath).digest("hex").slice(0, 8);
}

export function estimateTokens(content: string): number {
    return Math.floor(content.length / CHARS_PER_TOKEN);
}

export class FileCache {
    private readonly store: SessionStore;

    constructor(store: SessionStore) {
        this.store = store;
    }

    async discover(pattern: string = DEFAULT_DISCOVER_PATTERN): Promise<DiscoverResult> {
        return this.store.modify<DiscoverResult>(async (state) => {
            const matched = await this.match(pattern);
            const fileCache: Record<string, FileRef> = { ...state.mutable.file_cache };
            const added: FileRef[] = [];
            for (const filePath of matched) {
                const id = fileIdFor(filePath);
                if (id in fileCache) continue;
                const ref: FileRef = { id, path: filePath, loaded: false, content: null, token_estimate: 0 };
                fileCache[id] = ref;
                added.push(ref);
            }
            return {
                mutable: added.length > 0 ? { ...state.mutable, file_cache: fileCache } : null,
                result: { matched, added, total: Object.keys(fileCache).length },
            };
        });
    }

    /**
     * @throws FileNotCachedError when `fileId` was never discovered.
     * @throws CachedFileReadError when the referenced file cannot be read.
     */
    async fetch(fileId: string): Promise<FetchResult> {
        return this.store.modify<FetchResult>(async (state) => {
            const cached = state.mutable.file_cache;
            if (!(fileId in cached)) throw new FileNotCachedError(fileId);
            const ref = cached[fileId];
            if (ref.loaded) return { mutable: null, result: { ref, alreadyLoaded: true } };

            let content: string;
            try {
                content = await fs.readFile(ref.path, "utf-8");
            } catch (err) {
                throw new CachedFileReadError(ref.path, err instanceof Error ? err.message : String(err));
            }
            const loaded: FileRef = { ...ref, loaded: true, content, token_estimate: estimateTokens(content) };
            return {
                mutable: { ...state.mutable, file_cache: { ...cached, [fileId]: loaded } },
                result: { ref: loaded, alreadyLoaded: false },
            };
        });
    }

    async refs(filter: RefFilter = "all"): Promise<FileRef[]> {
        const state = await this.store.read();
        const refs = Object.values(state.mutable.file_cache);
        if (filter === "loaded") return refs.filter((ref) => ref.loaded);
        if (filter === "unloaded") return refs.filter((ref) => !ref.loaded);
        return refs;
    }

    /** Files under the plugin directory matching `pattern`, minus the store's own files. */
    private async match(pattern: string): Promise<string[]> {
        const root = this.store.pluginPath;
        const entries = await fs.readdir(root, { recursive: true });
        const matched: string[] = [];
        for (const entry of entries.sort()) {
            if (!minimatch(entry.split(path.sep).join("/"), pattern)) continue;
            const absolute = path.join(root, entry);
            if (absolute.startsWith(this.store.statePath)) continue;
            if ((await fs.stat(absolute)).isFile()) matched.push(absolute);
        }
        return matched;
    }
}
