/**
 * Session State — The shared record a context-engineering session keeps
 * beside the plugin under analysis.
 *
 * `immutable` is fixed at init; `mutable` holds everything sub-agents write
 * back. `version` is bumped on every successful write.
 */
import { z } from "zod/v4";
import { OpaqueRecord, StringList } from "./common.js";
import { AnalysisMode, FocusArea } from "./enums.js";

export const FileRef = z.object({
    id: z.string(),
    path: z.string(),
    loaded: z.boolean(),
    content: z.string().nullish(),
    token_estimate: z.number().int(),
});
export type FileRef = z.infer<typeof FileRef>;

export const ImmutableState = z.object({
    /** Absolute path to the plugin directory. */
    plugin_path: z.string(),
    focus_area: FocusArea,
    mode: AnalysisMode,
    user_request: z.string(),
    session_id: z.string(),
}).readonly();
export type ImmutableState = z.infer<typeof ImmutableState>;

export const MutableState = z.object({
    file_cache: z.record(z.string(), FileRef).default({}),
    intermediate_results: OpaqueRecord.default({}),
    phase_completed: StringList,
    user_selections: OpaqueRecord.default({}),
});
export type MutableState = z.infer<typeof MutableState>;

export const MUTABLE_FIELDS = ["file_cache", "intermediate_results", "phase_completed", "user_selections"] as const;
export type MutableField = (typeof MUTABLE_FIELDS)[number];

export const SessionState = z.object({
    version: z.number().int().min(1).default(1),
    immutable: ImmutableState,
    mutable: MutableState,
    /** Name of the agent currently holding the logical lock. */
    lock_holder: z.string().nullish(),
});
export type SessionState = z.infer<typeof SessionState>;
