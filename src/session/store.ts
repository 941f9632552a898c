/**
 * Session Store — File-backed state shared by the sub-agents of one
 * context-engineering session.
 *
 * The state lives in a YAML file inside the plugin directory. Every
 * read-modify-write runs under one exclusive lock file next to it, created
 * with `wx` and polled until acquired. The lock file records the owner's
 * pid; a lock whose owner is gone, or which is older than `staleLockMs`, is
 * taken over. State is written to a temporary file and renamed into place.
 * `version` increases by one on every successful write. `lock_holder` is a
 * separate, logical lock that agents take and release through `lock()` /
 * `unlock()`.
 */
import fs from "fs/promises";
import type { FileHandle } from "fs/promises";
import path from "path";
import { setTimeout as sleep } from "timers/promises";
import { v4 as uuidv4 } from "uuid";
import { parse, stringify, YAMLError } from "yaml";
import { MUTABLE_FIELDS, MutableState, SessionState } from "../schemas/session.js";
import type { MutableField } from "../schemas/session.js";
import type { AnalysisMode, FocusArea } from "../schemas/enums.js";
import {
    InvalidSessionStateError,
    InvalidSessionValueError,
    SessionLockHeldError,
    SessionStateExistsError,
    SessionStateNotFoundError,
    UnknownSessionFieldError,
} from "../errors/index.js";

export const DEFAULT_STATE_FILENAME = ".context-engineering-state.yaml";

export const DEFAULT_STALE_LOCK_MS = 30_000;

/** Holder recorded when `lock()` is called without a name. */
export const UNKNOWN_HOLDER = "unknown";

export interface SessionStoreOptions {
    stateFilename?: string;
    /** Delay between attempts to take the file lock. */
    lockPollMs?: number;
    /** Age after which a lock file is taken over even if its owner looks alive. */
    staleLockMs?: number;
}

export interface InitOptions {
    focusArea?: FocusArea;
    mode?: AnalysisMode;
    userRequest?: string;
}

export type SessionSection = "immutable" | "mutable" | "all";

export interface Modification<T> {
    /** Next mutable section, or `null` to leave the file untouched. */
    mutable: MutableState | null;
    result: T;
}

export interface UnlockResult {
    state: SessionState;
    /** Previous holder, or `null` when no lock was held and nothing was written. */
    releasedFrom: string | null;
}

function isMutableField(value: string): value is MutableField {
    return MUTABLE_FIELDS.some((field) => field === value);
}

function hasCode(err: unknown, code: string): boolean {
    return err instanceof Error && "code" in err && err.code === code;
}

/** `false` only when the OS reports no such process. */
function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (err) {
        // EPERM: alive, owned by another user.
        return !hasCode(err, "ESRCH");
    }
}

export class SessionStore {
    public readonly pluginPath: string;
    public readonly statePath: string;
    public readonly lockPath: string;
    private readonly lockPollMs: number;
    private readonly staleLockMs: number;

    constructor(pluginPath: string, options: SessionStoreOptions = {}) {
        this.pluginPath = path.resolve(pluginPath);
        this.statePath = path.join(this.pluginPath, options.stateFilename ?? DEFAULT_STATE_FILENAME);
        this.lockPath = `${this.statePath}.lock`;
        this.lockPollMs = options.lockPollMs ?? 50;
        this.staleLockMs = options.staleLockMs ?? DEFAULT_STALE_LOCK_MS;
    }

    /**
     * Create the state file with a fresh session ID.
     * @throws SessionStateExistsError if a state file is already present.
     */
    async init(options: InitOptions = {}): Promise<SessionState> {
        return this.withFileLock(async () => {
            if (await this.exists()) throw new SessionStateExistsError(this.statePath);
            const state = SessionState.parse({
                version: 1,
                immutable: {
                    plugin_path: this.pluginPath,
                    focus_area: options.focusArea ?? "all",
                    mode: options.mode ?? "standard",
                    user_request: options.userRequest ?? "",
                    session_id: uuidv4(),
                },
                mutable: {},
                lock_holder: null,
            });
            await this.write(state);
            return state;
        });
    }

    async read(): Promise<SessionState> {
        return this.withFileLock(() => this.load());
    }

    /** Read one section (or the whole state) as a plain value for display. */
    async readSection(section: SessionSection = "all"): Promise<unknown> {
        const state = await this.read();
        if (section === "immutable") return state.immutable;
        if (section === "mutable") return state.mutable;
        return state;
    }

    /**
     * Replace one mutable field and bump the version.
     * @throws UnknownSessionFieldError for anything outside the mutable section.
     * @throws InvalidSessionValueError when the value does not fit the field.
     */
    async update(field: string, value: unknown): Promise<SessionState> {
        if (!isMutableField(field)) throw new UnknownSessionFieldError(field);
        return this.withFileLock(async () => {
            const state = await this.load();
            const parsed = MutableState.safeParse({ ...state.mutable, [field]: value });
            if (!parsed.success) {
                const detail = parsed.error.issues.map((issue) => issue.message).join("; ");
                throw new InvalidSessionValueError(field, detail);
            }
            const next: SessionState = { ...state, mutable: parsed.data, version: state.version + 1 };
            await this.write(next);
            return next;
        });
    }

    /**
     * Take the logical lock for `holder`.
     * @throws SessionLockHeldError when someone already holds it.
     */
    async lock(holder?: string): Promise<SessionState> {
        return this.withFileLock(async () => {
            const state = await this.load();
            if (state.lock_holder) throw new SessionLockHeldError(state.lock_holder);
            const next: SessionState = { ...state, lock_holder: holder || UNKNOWN_HOLDER, version: state.version + 1 };
            await this.write(next);
            return next;
        });
    }

    /** Release the logical lock. A no-op (no write, no version bump) when nobody holds it. */
    async unlock(): Promise<UnlockResult> {
        return this.withFileLock(async () => {
            const state = await this.load();
            if (!state.lock_holder) return { state, releasedFrom: null };
            const next: SessionState = { ...state, lock_holder: null, version: state.version + 1 };
            await this.write(next);
            return { state: next, releasedFrom: state.lock_holder };
        });
    }

    /**
     * Read-modify-write the mutable section under the file lock. The version
     * is bumped only when `fn` hands back a new mutable section.
     */
    async modify<T>(fn: (state: SessionState) => Promise<Modification<T>>): Promise<T> {
        return this.withFileLock(async () => {
            const state = await this.load();
            const { mutable, result } = await fn(state);
            if (mutable) await this.write({ ...state, mutable, version: state.version + 1 });
            return result;
        });
    }

    // --- File access ---

    private async exists(): Promise<boolean> {
        try {
            await fs.access(this.statePath);
            return true;
        } catch (err) {
            if (hasCode(err, "ENOENT")) return false;
            throw err;
        }
    }

    private async load(): Promise<SessionState> {
        let text: string;
        try {
            text = await fs.readFile(this.statePath, "utf-8");
        } catch (err) {
            if (hasCode(err, "ENOENT")) throw new SessionStateNotFoundError(this.statePath);
            throw err;
        }

        let raw: unknown;
        try {
            raw = parse(text);
        } catch (err) {
            if (err instanceof YAMLError) throw new InvalidSessionStateError(this.statePath, err.message);
            throw err;
        }

        const parsed = SessionState.safeParse(raw);
        if (!parsed.success) {
            const detail = parsed.error.issues
                .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
                .join("; ");
            throw new InvalidSessionStateError(this.statePath, detail);
        }
        return parsed.data;
    }

    private async write(state: SessionState): Promise<void> {
        const tmpPath = `${this.statePath}.${process.pid}.tmp`;
        await fs.writeFile(tmpPath, stringify(state), "utf-8");
        await fs.rename(tmpPath, this.statePath);
    }

    /** Run `fn` while holding the exclusive lock file. */
    private async withFileLock<T>(fn: () => Promise<T>): Promise<T> {
        const handle = await this.acquireFileLock();
        try {
            return await fn();
        } finally {
            await handle.close();
            await fs.rm(this.lockPath, { force: true });
        }
    }

    private async acquireFileLock(): Promise<FileHandle> {
        for (;;) {
            let handle: FileHandle;
            try {
                handle = await fs.open(this.lockPath, "wx");
            } catch (err) {
                // A missing plugin directory means there is no state to lock.
                if (hasCode(err, "ENOENT")) throw new SessionStateNotFoundError(this.statePath);
                if (!hasCode(err, "EEXIST")) throw err;
                if (await this.isLockStale()) {
                    await fs.rm(this.lockPath, { force: true });
                    continue;
                }
                await sleep(this.lockPollMs);
                continue;
            }
            await handle.writeFile(String(process.pid), "utf-8");
            return handle;
        }
    }

    /** A lock is stale when its owner has exited or it has outlived `staleLockMs`. */
    private async isLockStale(): Promise<boolean> {
        let text: string;
        let modifiedAt: number;
        try {
            text = await fs.readFile(this.lockPath, "utf-8");
            modifiedAt = (await fs.stat(this.lockPath)).mtimeMs;
        } catch (err) {
            // Released between our attempt and this check.
            if (hasCode(err, "ENOENT")) return false;
            throw err;
        }
        const pid = Number.parseInt(text.trim(), 10);
        if (Number.isInteger(pid) && pid > 0 && !isProcessAlive(pid)) return true;
        return Date.now() - modifiedAt > this.staleLockMs;
    }
}
