/**
 * Extractor — Pulls the structured block out of raw agent text and parses it.
 *
 * A fenced ```yaml (or ```yml) block wins. Otherwise the whole text is
 * taken as a raw document when it contains a colon and is either
 * multi-line or shorter than the raw-length threshold. JSON parses too,
 * since it is valid YAML.
 */
import { parse, YAMLError } from "yaml";
import { OutputExtractionError, OutputParseError } from "../errors/index.js";
import { describeValue, isRecord } from "./data.js";
import type { DataRecord } from "./data.js";

export const DEFAULT_RAW_MAX_LENGTH = 500;

const FENCED_BLOCK = /```ya?ml[^\S\n]*\n?([\s\S]*?)```/i;

export interface ExtractOptions {
    /** Single-line text at or above this length is not treated as raw YAML. */
    rawMaxLength?: number;
}

/**
 * Return the YAML source embedded in agent output.
 * @throws OutputExtractionError when the text is empty or holds no block.
 */
export function extractBlock(text: string, options: ExtractOptions = {}): string {
    const rawMaxLength = options.rawMaxLength ?? DEFAULT_RAW_MAX_LENGTH;

    if (text.trim() === "") {
        throw new OutputExtractionError("Empty output", text.length);
    }

    const fenced = FENCED_BLOCK.exec(text);
    if (fenced) return fenced[1] ?? "";

    if (text.includes(":") && (text.includes("\n") || text.length < rawMaxLength)) {
        return text;
    }

    throw new OutputExtractionError(
        "No YAML content found in output. Wrap the output in ```yaml ... ``` with valid YAML syntax.",
        text.length,
    );
}

/**
 * Parse a YAML block and require a mapping at the top level.
 * @throws OutputParseError on syntax errors or a non-mapping document.
 */
export function parseBlock(source: string): DataRecord {
    let value: unknown;
    try {
        value = parse(source);
    } catch (err) {
        if (err instanceof YAMLError) {
            const detail = err.message.split("\n")[0] ?? err.message;
            throw new OutputParseError(`Invalid YAML: ${detail}`, err.message);
        }
        throw err;
    }

    if (!isRecord(value)) {
        const kind = value === undefined || value === null ? "empty document" : describeValue(value);
        throw new OutputParseError(`Expected a YAML mapping, got ${kind}`, kind);
    }
    return value;
}

/** Extract and parse in one step. */
export function extractDocument(text: string, options: ExtractOptions = {}): DataRecord {
    return parseBlock(extractBlock(text, options));
}
