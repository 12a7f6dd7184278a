import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import {
  DEFAULT_LOCATION,
  loadUsageRecord,
  locationFor,
  readSessionSettings,
  settingsPathFor,
} from "../../src/session/loader.js";
import { parseHookInput } from "../../src/session/schema.js";
import { findLastTimestamp } from "../../src/session/transcript.js";
import { SAMPLE_SETTINGS, SAMPLE_TRANSCRIPT, writeSessionFiles } from "../helpers/fixtures.js";

const FIXED_NOW = () => new Date("2025-06-01T12:00:00.000Z");

describe("parseHookInput", () => {
  it("maps the hook payload", () => {
    const input = parseHookInput(
      JSON.stringify({
        session_id: "s-1",
        transcript_path: "/t/s-1.jsonl",
        cwd: "/work/app",
        hook_event_name: "SessionEnd",
      }),
    );
    expect(input).toEqual({ sessionId: "s-1", transcriptPath: "/t/s-1.jsonl", cwd: "/work/app" });
  });

  it("defaults missing fields to empty strings", () => {
    expect(parseHookInput("{}")).toEqual({ sessionId: "", transcriptPath: "", cwd: "" });
  });

  it("throws on malformed JSON", () => {
    expect(() => parseHookInput("not json")).toThrow();
  });
});

describe("settingsPathFor", () => {
  it("swaps the transcript extension", () => {
    expect(settingsPathFor("/tmp/x/abc.jsonl")).toBe("/tmp/x/abc.settings.json");
  });

  it("expands the home directory", () => {
    expect(settingsPathFor("~/sessions/abc.jsonl")).toBe(
      join(homedir(), "sessions/abc.settings.json"),
    );
  });
});

describe("locationFor", () => {
  it("uses the directory name", () => {
    expect(locationFor("/home/dev/widgets")).toBe("widgets");
    expect(locationFor("/home/dev/widgets/")).toBe("widgets");
  });

  it("falls back when there is no cwd", () => {
    expect(locationFor("")).toBe(DEFAULT_LOCATION);
    expect(DEFAULT_LOCATION).toBe("The Cloud");
  });
});

describe("session files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "receipts-session-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("findLastTimestamp", () => {
    it("returns the last timestamp and skips malformed lines", () => {
      const { transcriptPath } = writeSessionFiles(dir, "s", SAMPLE_SETTINGS, SAMPLE_TRANSCRIPT);
      expect(findLastTimestamp(transcriptPath)).toBe("2025-03-01T09:15:30Z");
    });

    it("skips entries without a string timestamp", () => {
      const { transcriptPath } = writeSessionFiles(dir, "s", SAMPLE_SETTINGS, [
        JSON.stringify({ timestamp: "2025-03-01T08:00:00Z" }),
        JSON.stringify({ timestamp: 1740816000 }),
        JSON.stringify({ type: "summary" }),
        "[1, 2",
      ]);
      expect(findLastTimestamp(transcriptPath)).toBe("2025-03-01T08:00:00Z");
    });

    it("returns null for a missing file", () => {
      expect(findLastTimestamp(join(dir, "missing.jsonl"))).toBeNull();
      expect(findLastTimestamp("")).toBeNull();
    });
  });

  describe("readSessionSettings", () => {
    it("returns null when the file is missing", () => {
      expect(readSessionSettings(join(dir, "missing.settings.json"))).toBeNull();
    });

    it("applies defaults", () => {
      const path = join(dir, "s.settings.json");
      writeFileSync(path, JSON.stringify({ tokenUsage: { inputTokens: 1 } }));
      expect(readSessionSettings(path)).toEqual({
        tokenUsage: { inputTokens: 1 },
        model: "unknown",
        assistantActiveTimeMs: 0,
      });
    });

    it("rejects a negative active time", () => {
      const path = join(dir, "s.settings.json");
      writeFileSync(path, JSON.stringify({ assistantActiveTimeMs: -1 }));
      expect(() => readSessionSettings(path)).toThrow();
    });
  });

  describe("loadUsageRecord", () => {
    it("builds a usage record from the session files", () => {
      const { transcriptPath } = writeSessionFiles(dir, "s-1", SAMPLE_SETTINGS, SAMPLE_TRANSCRIPT);

      const result = loadUsageRecord(
        { sessionId: "s-1", transcriptPath, cwd: "/home/dev/widgets" },
        FIXED_NOW,
      );

      expect(result).toEqual({
        ok: true,
        record: {
          sessionId: "s-1",
          location: "widgets",
          modelId: "custom:gpt-5.1",
          inputTokens: 1000,
          outputTokens: 500,
          cacheWriteTokens: 0,
          cacheReadTokens: 200,
          endTimestamp: "2025-03-01T09:15:30Z",
          activeDurationMs: 45_000,
        },
      });
    });

    it("defaults missing token categories to zero", () => {
      const { transcriptPath } = writeSessionFiles(dir, "s-2", {
        tokenUsage: { inputTokens: 10 },
        model: "glm-5",
      });

      const result = loadUsageRecord({ sessionId: "s-2", transcriptPath, cwd: "" }, FIXED_NOW);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record.outputTokens).toBe(0);
      expect(result.record.cacheWriteTokens).toBe(0);
      expect(result.record.cacheReadTokens).toBe(0);
      expect(result.record.location).toBe("The Cloud");
    });

    it("falls back to the current time without transcript timestamps", () => {
      const { transcriptPath } = writeSessionFiles(dir, "s-3", SAMPLE_SETTINGS, ["garbage"]);

      const result = loadUsageRecord({ sessionId: "s-3", transcriptPath, cwd: "/w" }, FIXED_NOW);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.record.endTimestamp).toBe("2025-06-01T12:00:00.000Z");
    });

    it("skips when the settings file is missing", () => {
      const transcriptPath = join(dir, "nope.jsonl");
      const result = loadUsageRecord({ sessionId: "nope", transcriptPath, cwd: "" });
      expect(result).toEqual({
        ok: false,
        reason: `No session settings found at ${join(dir, "nope.settings.json")}`,
      });
    });

    it("skips when there is no token data", () => {
      const empty = writeSessionFiles(dir, "s-4", { tokenUsage: {}, model: "glm-5" });
      const absent = writeSessionFiles(dir, "s-5", { model: "glm-5" });

      expect(loadUsageRecord({ sessionId: "s-4", transcriptPath: empty.transcriptPath, cwd: "" })).toEqual({
        ok: false,
        reason: "No token usage data available",
      });
      expect(loadUsageRecord({ sessionId: "s-5", transcriptPath: absent.transcriptPath, cwd: "" })).toEqual({
        ok: false,
        reason: "No token usage data available",
      });
    });

    it("skips when the token data is null", () => {
      const nulled = writeSessionFiles(dir, "s-6", { tokenUsage: null, model: "glm-5" });

      expect(loadUsageRecord({ sessionId: "s-6", transcriptPath: nulled.transcriptPath, cwd: "" })).toEqual({
        ok: false,
        reason: "No token usage data available",
      });
    });

    it("skips without a session id", () => {
      expect(loadUsageRecord({ sessionId: "", transcriptPath: "", cwd: "" })).toEqual({
        ok: false,
        reason: "No session id in hook input",
      });
    });
  });
});
