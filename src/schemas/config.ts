/**
 * Validator Configuration — All tunable parameters in one place.
 *
 * Every key has a default; the CLI overlays `AGENT_OUTPUT_*` environment
 * variables (after loading `.env`) through `configFromEnv`.
 */
import { z } from "zod/v4";

const EnvFlag = z.union([
    z.boolean(),
    z.string()
        .toLowerCase()
        .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
        .transform((v) => v === "true" || v === "1" || v === "yes"),
]);

export const ValidatorConfig = z.object({
    // --- Reporting ---
    /** Errors listed in a block decision before the rest are elided. */
    max_block_errors: z.coerce.number().int().min(1).default(5),
    /** Executive summaries shorter than this draw a warning. */
    min_summary_length: z.coerce.number().int().min(0).default(50),
    /** Escalate warnings to failures. */
    strict: EnvFlag.default(false),

    // --- Extraction ---
    /** Single-line text longer than this is never treated as a raw document. */
    raw_yaml_max_length: z.coerce.number().int().min(1).default(500),

    // --- Session ---
    /** Session state file name, created inside the plugin directory. */
    state_filename: z.string().min(1).default(".context-engineering-state.yaml"),
});
export type ValidatorConfig = z.infer<typeof ValidatorConfig>;
export type ValidatorConfigInput = z.input<typeof ValidatorConfig>;

/** Environment variable read for each config key. */
export const CONFIG_ENV_VARS = {
    max_block_errors: "AGENT_OUTPUT_MAX_BLOCK_ERRORS",
    raw_yaml_max_length: "AGENT_OUTPUT_RAW_MAX_LENGTH",
    min_summary_length: "AGENT_OUTPUT_MIN_SUMMARY_LENGTH",
    strict: "AGENT_OUTPUT_STRICT",
    state_filename: "AGENT_OUTPUT_STATE_FILE",
} as const satisfies Record<keyof ValidatorConfig, string>;

export const DEFAULT_CONFIG: ValidatorConfig = ValidatorConfig.parse({});

/**
 * Build a config from environment variables. Unset or empty variables fall
 * back to defaults; malformed values throw a ZodError.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ValidatorConfig {
    const input: Record<string, string> = {};
    for (const [key, variable] of Object.entries(CONFIG_ENV_VARS)) {
        const value = env[variable]?.trim();
        if (value) input[key] = value;
    }
    return ValidatorConfig.parse(input);
}
