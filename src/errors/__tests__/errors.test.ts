/**
 * Error Class Tests — Validate custom error classes.
 */
import { describe, it, expect } from "vitest";
import {
    UnknownSchemaError,
    OutputExtractionError,
    OutputParseError,
    SessionStateNotFoundError,
    SessionStateExistsError,
    SessionLockHeldError,
    UnknownSessionFieldError,
    InvalidSessionValueError,
    InvalidSessionStateError,
    FileNotCachedError,
    CachedFileReadError,
} from "../../errors/index.js";

describe("UnknownSchemaError", () => {
    it("is an instance of Error", () => {
        const err = new UnknownSchemaError("bogus", ["attacker", "report"]);
        expect(err).toBeInstanceOf(Error);
        expect(err.name).toBe("UnknownSchemaError");
        expect(err.schemaName).toBe("bogus");
        expect(err.message).toBe('Unknown schema "bogus". Known schemas: attacker, report');
    });
});

describe("OutputExtractionError", () => {
    it("keeps the input length", () => {
        const err = new OutputExtractionError("No YAML content found in output", 12);
        expect(err.name).toBe("OutputExtractionError");
        expect(err.inputLength).toBe(12);
    });
});

describe("OutputParseError", () => {
    it("separates message and parser detail", () => {
        const err = new OutputParseError("Invalid YAML: bad indentation", "bad indentation");
        expect(err.message).toBe("Invalid YAML: bad indentation");
        expect(err.detail).toBe("bad indentation");
    });
});

describe("session store errors", () => {
    it("name the state file", () => {
        expect(new SessionStateNotFoundError("/tmp/p/state.yaml").message).toBe("State file not found: /tmp/p/state.yaml");
        expect(new SessionStateExistsError("/tmp/p/state.yaml").statePath).toBe("/tmp/p/state.yaml");
    });

    it("carry the lock holder and field", () => {
        expect(new SessionLockHeldError("plugin-analyzer").holder).toBe("plugin-analyzer");
        expect(new UnknownSessionFieldError("version").message).toBe("Unknown mutable field: version");
        expect(new InvalidSessionValueError("phase_completed", "expected array").field).toBe("phase_completed");
    });

    it("reports invalid state details", () => {
        const err = new InvalidSessionStateError("/tmp/s.yaml", "immutable: Required");
        expect(err.name).toBe("InvalidSessionStateError");
        expect(err.message).toBe("Invalid session state in /tmp/s.yaml: immutable: Required");
    });
});

describe("file cache errors", () => {
    it("name the missing file ID", () => {
        const err = new FileNotCachedError("a1b2c3d4");
        expect(err.name).toBe("FileNotCachedError");
        expect(err.fileId).toBe("a1b2c3d4");
        expect(err.message).toBe("File ID not found in cache: a1b2c3d4");
    });

    it("keep the unreadable path", () => {
        const err = new CachedFileReadError("/tmp/p/agents/a.md", "no such file");
        expect(err.filePath).toBe("/tmp/p/agents/a.md");
        expect(err.message).toBe("Failed to load /tmp/p/agents/a.md: no such file");
    });
});
