import { describe, expect, it } from "vitest";
import { SEVERITY_TABLE, modeAtLeast, severityFor } from "../captions/severity";
import { QcMode, Severity, ViolationKind } from "../types/models";

describe("severityFor", () => {
  it("escalates timing checks from warn to fail", () => {
    expect(severityFor("max_cps", "warn", "script")).toBe("warn");
    expect(severityFor("max_cps", "strict", "audio")).toBe("fail");
    expect(severityFor("subtitle_end_delta", "broadcast", "audio")).toBe("fail");
  });

  it("fails text style checks only in broadcast", () => {
    expect(severityFor("end_punctuation", "strict", "script")).toBe("warn");
    expect(severityFor("end_punctuation", "broadcast", "script")).toBe("fail");
  });

  it("keeps advisory checks at warn", () => {
    expect(severityFor("cps_target", "broadcast", "audio")).toBe("warn");
    expect(severityFor("sentence_case", "broadcast", "script")).toBe("warn");
  });

  it("treats verbatim mismatches as advisory under the audio policy", () => {
    expect(severityFor("verbatim_mismatch", "strict", "audio")).toBe("warn");
    expect(severityFor("verbatim_mismatch", "strict", "script")).toBe("fail");
  });

  it("ranks pacing checks with timing and wording checks with text style", () => {
    expect(severityFor("early_end", "strict", "audio")).toBe("fail");
    expect(severityFor("cue_change_rate", "warn", "audio")).toBe("warn");
    expect(severityFor("median_duration", "strict", "script")).toBe("fail");
    expect(severityFor("orphan_line", "broadcast", "audio")).toBe("fail");
    expect(severityFor("canonical_term_missing", "strict", "script")).toBe("warn");
    expect(severityFor("canonical_term_missing", "broadcast", "script")).toBe("fail");
  });

  it("keeps dropped canonical terms advisory under the audio policy", () => {
    expect(severityFor("canonical_term_missing", "broadcast", "audio")).toBe("warn");
  });

  it("keeps term hygiene checks advisory", () => {
    expect(severityFor("bad_term", "broadcast", "script")).toBe("warn");
    expect(severityFor("bracket_only", "strict", "audio")).toBe("warn");
    expect(severityFor("metadata_tokens", "broadcast", "audio")).toBe("warn");
  });

  it("runs nothing when QC is off", () => {
    expect(severityFor("max_duration", "off", "script")).toBeNull();
  });

  it("never relaxes as the mode gets stricter", () => {
    const rank: Record<Severity, number> = { warn: 1, fail: 2 };
    const modes: QcMode[] = ["warn", "strict", "broadcast"];
    const kinds = Object.keys(SEVERITY_TABLE).filter((key): key is ViolationKind => key in SEVERITY_TABLE);
    kinds.forEach((kind) => {
      const ranks = modes.map((mode) => rank[severityFor(kind, mode, "script") ?? "warn"]);
      expect(ranks).toEqual([...ranks].sort((a, b) => a - b));
    });
  });
});

describe("modeAtLeast", () => {
  it("orders modes from off to broadcast", () => {
    expect(modeAtLeast("broadcast", "strict")).toBe(true);
    expect(modeAtLeast("warn", "strict")).toBe(false);
    expect(modeAtLeast("off", "off")).toBe(true);
  });
});
