/**
 * FileCache Tests — Discovering, loading and listing plugin files.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { FileCache, estimateTokens, fileIdFor } from "../cache.js";
import { SessionStore } from "../store.js";
import { CachedFileReadError, FileNotCachedError, SessionStateNotFoundError } from "../../errors/index.js";

let pluginDir: string;
let store: SessionStore;
let cache: FileCache;
let agentPath: string;
let readmePath: string;

beforeEach(async () => {
    pluginDir = path.resolve(await fs.mkdtemp(path.join(os.tmpdir(), "file-cache-")));
    agentPath = path.join(pluginDir, "agents", "analyzer.md");
    readmePath = path.join(pluginDir, "README.md");

    await fs.mkdir(path.join(pluginDir, "agents"));
    await fs.mkdir(path.join(pluginDir, ".hidden"));
    await fs.writeFile(agentPath, "x".repeat(40));
    await fs.writeFile(readmePath, "# Plugin\n");
    await fs.writeFile(path.join(pluginDir, "notes.txt"), "not markdown");
    await fs.writeFile(path.join(pluginDir, ".hidden", "secret.md"), "skipped");

    store = new SessionStore(pluginDir, { lockPollMs: 5 });
    cache = new FileCache(store);
});

afterEach(async () => {
    await fs.rm(pluginDir, { recursive: true, force: true });
});

describe("fileIdFor / estimateTokens", () => {
    it("derives a stable 8 character ID", () => {
        expect(fileIdFor("/plugins/a.md")).toMatch(/^[0-9a-f]{8}$/);
        expect(fileIdFor("/plugins/a.md")).toBe(fileIdFor("/plugins/a.md"));
        expect(fileIdFor("/plugins/a.md")).not.toBe(fileIdFor("/plugins/b.md"));
    });

    it("estimates four characters per token, rounded down", () => {
        expect(estimateTokens("")).toBe(0);
        expect(estimateTokens("abcdefg")).toBe(1);
        expect(estimateTokens("x".repeat(40))).toBe(10);
    });
});

describe("FileCache.discover", () => {
    it("requires an initialized session", async () => {
        await expect(cache.discover()).rejects.toThrow(SessionStateNotFoundError);
    });

    it("adds unloaded references for matching files", async () => {
        await store.init();
        const result = await cache.discover();

        expect(result.matched).toEqual([readmePath, agentPath]);
        expect(result.total).toBe(2);
        expect(result.added).toEqual([
            { id: fileIdFor(readmePath), path: readmePath, loaded: false, content: null, token_estimate: 0 },
            { id: fileIdFor(agentPath), path: agentPath, loaded: false, content: null, token_estimate: 0 },
        ]);

        const state = await store.read();
        expect(state.version).toBe(2);
        expect(Object.keys(state.mutable.file_cache).sort()).toEqual([fileIdFor(readmePath), fileIdFor(agentPath)].sort());
    });

    it("skips files already cached without bumping the version", async () => {
        await store.init();
        await cache.discover();
        const again = await cache.discover();

        expect(again.added).toEqual([]);
        expect(again.total).toBe(2);
        expect((await store.read()).version).toBe(2);
    });

    it("honours a custom pattern", async () => {
        await store.init();
        const result = await cache.discover("agents/*.md");
        expect(result.matched).toEqual([agentPath]);
    });

    it("writes nothing when no file matches", async () => {
        await store.init();
        const result = await cache.discover("**/*.json");
        expect(result).toEqual({ matched: [], added: [], total: 0 });
        expect((await store.read()).version).toBe(1);
    });
});

describe("FileCache.fetch", () => {
    beforeEach(async () => {
        await store.init();
        await cache.discover();
    });

    it("loads content with a token estimate", async () => {
        const { ref, alreadyLoaded } = await cache.fetch(fileIdFor(agentPath));

        expect(alreadyLoaded).toBe(false);
        expect(ref).toEqual({
            id: fileIdFor(agentPath),
            path: agentPath,
            loaded: true,
            content: "x".repeat(40),
            token_estimate: 10,
        });
        const state = await store.read();
        expect(state.version).toBe(3);
        expect(state.mutable.file_cache[fileIdFor(agentPath)]?.loaded).toBe(true);
    });

    it("does not reload a loaded file", async () => {
        await cache.fetch(fileIdFor(agentPath));
        const second = await cache.fetch(fileIdFor(agentPath));

        expect(second.alreadyLoaded).toBe(true);
        expect(second.ref.token_estimate).toBe(10);
        expect((await store.read()).version).toBe(3);
    });

    it("rejects an unknown file ID", async () => {
        await expect(cache.fetch("00000000")).rejects.toThrow(FileNotCachedError);
    });

    it("reports a file removed since discovery", async () => {
        await fs.rm(agentPath);
        await expect(cache.fetch(fileIdFor(agentPath))).rejects.toThrow(CachedFileReadError);
        expect((await store.read()).version).toBe(2);
    });
});

describe("FileCache.refs", () => {
    beforeEach(async () => {
        await store.init();
        await cache.discover();
        await cache.fetch(fileIdFor(agentPath));
    });

    it("lists every reference by default", async () => {
        const paths = (await cache.refs()).map((ref) => ref.path).sort();
        expect(paths).toEqual([readmePath, agentPath].sort());
    });

    it("filters by load status", async () => {
        expect((await cache.refs("loaded")).map((ref) => ref.path)).toEqual([agentPath]);
        expect((await cache.refs("unloaded")).map((ref) => ref.path)).toEqual([readmePath]);
    });
});
