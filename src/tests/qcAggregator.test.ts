import { describe, expect, it } from "vitest";
import { CaptionConfigInput, resolveCaptionConfig } from "../config/captionConfig";
import { computeDrift, evaluateQc } from "../captions/qcAggregator";
import { validateSafeArea } from "../captions/safeArea";
import { buildVerbatimReport } from "../captions/verbatimChecker";
import { Cue, QcReport, SafeAreaResult, Segment, VerbatimReport } from "../types/models";

const fittingLayout = validateSafeArea({
  fontSize: 39,
  outlineWidth: 4,
  frameWidth: 1080,
  frameHeight: 1920,
  maxLines: 2,
  maxCharsPerLine: 42,
  margins: { horizontal: 0.07, vertical: 0.12 },
});

interface Scenario {
  cues: Cue[];
  segments?: Segment[];
  audioDuration: number;
  videoDuration?: number;
  safeArea?: SafeAreaResult;
  verbatim?: VerbatimReport;
  config?: CaptionConfigInput;
  script?: string;
}

const evaluate = (scenario: Scenario): QcReport => {
  const config = resolveCaptionConfig(scenario.config ?? {});
  return evaluateQc({
    cues: scenario.cues,
    segments: scenario.segments ?? [],
    audioDuration: scenario.audioDuration,
    videoDuration: scenario.videoDuration,
    safeArea: scenario.safeArea ?? fittingLayout,
    verbatim:
      scenario.verbatim ??
      buildVerbatimReport(config.verbatimPolicy, { captions: scenario.cues.map((cue) => cue.lines.join(" ")).join(" ") }, []),
    script: scenario.script,
    config,
  });
};

const kindsAndSeverities = (report: QcReport): Array<[string, string]> =>
  report.violations.map((violation) => [violation.kind, violation.severity]);

const openingCue: Cue = { index: 1, start: 0, end: 1.8, lines: ["Welcome back."] };
const closingCue: Cue = { index: 2, start: 64.8, end: 66.56, lines: ["That is all for today."] };
const closingSegments: Segment[] = [
  { start: 0, end: 1.8, text: "Welcome back." },
  { start: 64.8, end: 66.56, text: "That is all for today." },
];

describe("evaluateQc subtitle end", () => {
  it("fails strict QC when the last cue ends a second before the audio", () => {
    const report = evaluate({
      cues: [openingCue, closingCue],
      segments: closingSegments,
      audioDuration: 67.584,
      config: { qcMode: "strict" },
    });
    expect(report.metrics.subtitleEndDelta).toBe(1.024);
    expect(kindsAndSeverities(report)).toEqual([
      ["subtitle_end_delta", "fail"],
      ["early_end", "fail"],
    ]);
    expect(report.status).toBe("fail");
  });

  it("only warns in warn mode", () => {
    const report = evaluate({
      cues: [openingCue, closingCue],
      segments: closingSegments,
      audioDuration: 67.584,
      config: { qcMode: "warn" },
    });
    expect(kindsAndSeverities(report)).toEqual([
      ["subtitle_end_delta", "warn"],
      ["early_end", "warn"],
    ]);
    expect(report.status).toBe("warn");
  });

  it("still measures when QC is off", () => {
    const report = evaluate({
      cues: [openingCue, closingCue],
      segments: closingSegments,
      audioDuration: 67.584,
      config: { qcMode: "off" },
    });
    expect(report.violations).toEqual([]);
    expect(report.status).toBe("pass");
    expect(report.metrics.subtitleEndDelta).toBe(1.024);
  });

  it("describes captions that stop before the audio", () => {
    const report = evaluate({
      cues: [openingCue, closingCue],
      segments: closingSegments,
      audioDuration: 67.584,
      config: { qcMode: "strict" },
    });
    expect(report.violations.find((violation) => violation.kind === "early_end")).toEqual({
      kind: "early_end",
      message: "Captions end 1.024s before the audio does",
      severity: "fail",
      measured: 1.024,
      limit: 0.2,
    });
  });
});

describe("evaluateQc cue checks", () => {
  const cues: Cue[] = [
    { index: 1, start: 0, end: 1.5, lines: ["stocks rose sharply and"] },
    { index: 2, start: 1.5, end: 2.3, lines: ["Bonds fell."] },
    { index: 3, start: 2.3, end: 4.3, lines: ["Investors looked to the", "central bank for news."] },
  ];

  it("fails text and pacing problems in broadcast", () => {
    const report = evaluate({ cues, audioDuration: 4.5, config: { qcMode: "broadcast" } });
    expect(kindsAndSeverities(report)).toEqual([
      ["cps_target", "warn"],
      ["sentence_case", "warn"],
      ["end_punctuation", "fail"],
      ["dangling_tail", "fail"],
      ["max_cps", "fail"],
      ["forbidden_line_end", "fail"],
    ]);
    expect(report.violations.map((violation) => violation.cueIndex)).toEqual([1, 1, 1, 1, 3, 3]);
    expect(report.status).toBe("fail");
  });

  it("downgrades text style checks in strict", () => {
    const report = evaluate({ cues, audioDuration: 4.5, config: { qcMode: "strict" } });
    expect(kindsAndSeverities(report)).toEqual([
      ["cps_target", "warn"],
      ["sentence_case", "warn"],
      ["end_punctuation", "warn"],
      ["dangling_tail", "warn"],
      ["max_cps", "fail"],
      ["forbidden_line_end", "warn"],
    ]);
  });

  it("records per-cue metrics", () => {
    const report = evaluate({ cues, audioDuration: 4.5 });
    expect(report.cues[0]).toEqual({ index: 1, start: 0, end: 1.5, duration: 1.5, chars: 23, cps: 15.33, gapBefore: null });
    expect(report.cues[2].cps).toBe(23);
    expect(report.metrics.cueCount).toBe(3);
    expect(report.metrics.subtitleEndDelta).toBe(0.2);
  });

  it("describes the violation", () => {
    const report = evaluate({ cues, audioDuration: 4.5, config: { qcMode: "strict" } });
    const maxCps = report.violations.find((violation) => violation.kind === "max_cps");
    expect(maxCps).toEqual({
      kind: "max_cps",
      message: "Cue 3 reads at 23 cps (max 17)",
      severity: "fail",
      cueIndex: 3,
      measured: 23,
      limit: 17,
    });
  });
});

describe("evaluateQc timing checks", () => {
  it("flags a first cue that appears late in the audio", () => {
    const report = evaluate({
      cues: [{ index: 1, start: 1.5, end: 3, lines: ["Hello there."] }],
      segments: [{ start: 1.5, end: 3, text: "Hello there." }],
      audioDuration: 3.1,
      config: { qcMode: "strict" },
    });
    expect(report.metrics.lateStart).toBe(true);
    expect(report.violations).toEqual([
      {
        kind: "late_start",
        message: "First cue appears 1.5s after the audio starts",
        severity: "fail",
        measured: 1.5,
        limit: 0.2,
      },
    ]);
  });

  it("accepts a first cue inside the start tolerance", () => {
    const report = evaluate({
      cues: [{ index: 1, start: 0.1, end: 1.7, lines: ["Hello there."] }],
      segments: [{ start: 0.1, end: 1.7, text: "Hello there." }],
      audioDuration: 1.8,
      config: { qcMode: "strict" },
    });
    expect(report.metrics.lateStart).toBe(false);
    expect(report.violations).toEqual([]);
  });

  it("applies the optional late start fraction", () => {
    const report = evaluate({
      cues: [{ index: 1, start: 0.15, end: 1.9, lines: ["Hello there."] }],
      audioDuration: 2,
      config: { qcMode: "warn", lateStartFraction: 0.05 },
    });
    expect(report.metrics.lateStart).toBe(true);
    expect(kindsAndSeverities(report)).toEqual([["late_start", "warn"]]);
    expect(report.violations[0].message).toBe("First cue appears 0.15s after the audio starts");
  });

  it("flags a video and audio length mismatch", () => {
    const report = evaluate({
      cues: [{ index: 1, start: 0, end: 1.5, lines: ["Hello there."] }],
      audioDuration: 1.6,
      videoDuration: 2.1,
    });
    expect(report.metrics.avDelta).toBe(0.5);
    expect(kindsAndSeverities(report)).toEqual([["av_duration_delta", "warn"]]);
  });

  it("reports an oversized layout", () => {
    const oversized = validateSafeArea({
      fontSize: 60,
      outlineWidth: 4,
      frameWidth: 1080,
      frameHeight: 1920,
      maxLines: 2,
      maxCharsPerLine: 42,
      margins: { horizontal: 0.07, vertical: 0.12 },
    });
    const report = evaluate({
      cues: [{ index: 1, start: 0, end: 1.5, lines: ["Hello there."] }],
      audioDuration: 1.6,
      safeArea: oversized,
    });
    expect(report.subtitleLayoutOk).toBe(false);
    expect(kindsAndSeverities(report)).toEqual([["safe_area_exceeded", "warn"]]);
    expect(report.warnings).toEqual(["Subtitle layout 1268x148 exceeds safe area 928.8x1459.2"]);
  });

  it("uses the tighter drift tolerance in broadcast", () => {
    const segments: Segment[] = [
      {
        start: 0,
        end: 3,
        text: "One two three.",
        words: [
          { text: "One", start: 0, end: 1 },
          { text: "two", start: 1, end: 2 },
          { text: "three.", start: 2, end: 3 },
        ],
      },
    ];
    const cues: Cue[] = [
      { index: 1, start: 0, end: 1.3, lines: ["One"] },
      { index: 2, start: 1.3, end: 3, lines: ["two three."] },
    ];
    const strict = evaluate({ cues, segments, audioDuration: 3.1, config: { qcMode: "strict" } });
    const broadcast = evaluate({ cues, segments, audioDuration: 3.1, config: { qcMode: "broadcast" } });

    expect(strict.metrics.drift).toEqual({ avg: 0.15, max: 0.3 });
    expect(strict.violations.some((violation) => violation.kind === "drift")).toBe(false);
    expect(broadcast.violations.find((violation) => violation.kind === "drift")?.severity).toBe("fail");
  });
});

describe("computeDrift", () => {
  it("compares segment starts with the nearest cue when words are missing", () => {
    const segments: Segment[] = [
      { start: 0, end: 2, text: "First." },
      { start: 2, end: 4, text: "Second." },
    ];
    const cues: Cue[] = [
      { index: 1, start: 0.1, end: 2, lines: ["First."] },
      { index: 2, start: 2.5, end: 4, lines: ["Second."] },
    ];
    expect(computeDrift(cues, segments)).toEqual({ avg: 0.3, max: 0.5 });
  });

  it("has nothing to measure for a single untimed segment", () => {
    const cues: Cue[] = [{ index: 1, start: 0, end: 2, lines: ["Only."] }];
    expect(computeDrift(cues, [{ start: 0, end: 2, text: "Only." }])).toBeNull();
  });
});

describe("evaluateQc verbatim", () => {
  const cue: Cue = { index: 1, start: 0, end: 1.5, lines: ["Hello here."] };

  it("fails a caption that departs from the script under the script policy", () => {
    const verbatim = buildVerbatimReport("script", { script: "Hello there.", captions: "Hello here." }, []);
    const report = evaluate({
      cues: [cue],
      audioDuration: 1.6,
      verbatim,
      config: { qcMode: "strict", verbatimPolicy: "script" },
    });
    expect(report.violations).toEqual([
      {
        kind: "verbatim_mismatch",
        message: 'Script and captions diverge at token 1: expected "there.", got "here."',
        severity: "fail",
      },
    ]);
    expect(report.verbatimDiff).toBe(verbatim);
  });

  it("warns when the transcript departs from the script under the audio policy", () => {
    const verbatim = buildVerbatimReport(
      "audio",
      { script: "Hello there.", asr: "Hello here.", captions: "Hello here." },
      [],
    );
    const report = evaluate({ cues: [cue], audioDuration: 1.6, verbatim, config: { qcMode: "strict" } });
    const message = 'Script and transcript diverge at token 1: expected "there.", got "here."';
    expect(report.violations).toEqual([{ kind: "verbatim_mismatch", message, severity: "warn" }]);
    expect(report.warnings).toEqual([message]);
    expect(report.status).toBe("warn");
  });

  it("lists likely ASR confusions as warnings", () => {
    const verbatim = buildVerbatimReport(
      "audio",
      { script: "A hostile bid.", asr: "A hostel bid.", captions: "A hostel bid." },
      [{ heard: "hostel", intended: "hostile" }],
    );
    const report = evaluate({
      cues: [{ index: 1, start: 0, end: 1.5, lines: ["A hostel bid."] }],
      audioDuration: 1.6,
      verbatim,
      config: { qcMode: "off" },
    });
    expect(report.violations).toEqual([]);
    expect(report.warnings).toEqual([
      'Script and transcript diverge at token 1: expected "hostile", got "hostel"',
      'Possible ASR confusion: heard "hostel", script says "hostile"',
    ]);
  });

  it("always attaches the diff in broadcast", () => {
    const clean: Cue = { index: 1, start: 0, end: 1.5, lines: ["Hello there."] };
    const verbatim = buildVerbatimReport("audio", { script: "Hello there.", captions: "Hello there." }, []);
    expect(evaluate({ cues: [clean], audioDuration: 1.6, verbatim, config: { qcMode: "broadcast" } }).verbatimDiff).toBe(
      verbatim,
    );
    expect(evaluate({ cues: [clean], audioDuration: 1.6, verbatim, config: { qcMode: "warn" } }).verbatimDiff).toBeNull();
  });
});

describe("evaluateQc line and punctuation checks", () => {
  it("expects terminal punctuation on every cue", () => {
    const report = evaluate({
      cues: [
        { index: 1, start: 0, end: 1.6, lines: ["Markets opened higher"] },
        { index: 2, start: 1.6, end: 3.2, lines: ["after the announcement."] },
      ],
      audioDuration: 3.3,
      config: { qcMode: "broadcast" },
    });
    expect(report.violations).toEqual([
      {
        kind: "end_punctuation",
        message: "Cue 1 does not end with terminal punctuation",
        severity: "fail",
        cueIndex: 1,
      },
    ]);
  });

  it("checks the outer edges of each line", () => {
    const report = evaluate({
      cues: [{ index: 1, start: 0, end: 2, lines: ["And stocks rose", "after results."] }],
      audioDuration: 2.1,
      config: { qcMode: "strict" },
    });
    expect(report.violations).toEqual([
      {
        kind: "forbidden_line_start",
        message: 'Cue 1 line 1 starts with "And"',
        severity: "warn",
        cueIndex: 1,
      },
    ]);
  });
});

describe("evaluateQc pacing checks", () => {
  const rapidCues: Cue[] = Array.from({ length: 8 }, (_, position) => ({
    index: position + 1,
    start: position * 1.25,
    end: (position + 1) * 1.25,
    lines: [`Cue ${position + 1}.`],
  }));

  it("fails cues that change too often and pass too quickly", () => {
    const report = evaluate({ cues: rapidCues, audioDuration: 10, config: { qcMode: "strict" } });
    expect(report.metrics.cueChangesPerTenSeconds).toBe(7);
    expect(report.metrics.duration?.median).toBe(1.25);
    expect(report.violations).toEqual([
      {
        kind: "cue_change_rate",
        message: "Cues change 7 times per 10s (max 5)",
        severity: "fail",
        measured: 7,
        limit: 5,
      },
      {
        kind: "median_duration",
        message: "Median cue lasts 1.25s (floor 1.5s)",
        severity: "fail",
        measured: 1.25,
        limit: 1.5,
      },
    ]);
  });

  it("uses the lower median floor in broadcast", () => {
    const report = evaluate({ cues: rapidCues, audioDuration: 10, config: { qcMode: "broadcast" } });
    expect(kindsAndSeverities(report)).toEqual([["cue_change_rate", "fail"]]);
  });

  it("flags orphan lines", () => {
    const cue: Cue = { index: 1, start: 0, end: 1.7, lines: ["Markets moved sharply", "up."] };
    const report = evaluate({ cues: [cue], audioDuration: 1.8, config: { qcMode: "strict" } });
    expect(report.metrics.orphanLineRate).toBe(1);
    expect(report.violations).toEqual([
      {
        kind: "orphan_line",
        message: "Orphan lines in cues 1 (rate 1, max 0.05)",
        severity: "fail",
        measured: 1,
        limit: 0.05,
      },
    ]);
  });

  it("lets an orphan stand once the cue stays up long enough", () => {
    const cue: Cue = { index: 1, start: 0, end: 1.9, lines: ["Markets moved sharply", "up."] };
    const report = evaluate({ cues: [cue], audioDuration: 2, config: { qcMode: "strict" } });
    expect(report.metrics.orphanLineRate).toBe(0);
    expect(report.violations).toEqual([]);
  });
});

describe("evaluateQc wording checks", () => {
  const cue: Cue = { index: 1, start: 0, end: 1.6, lines: ["We switched to email."] };
  const script = "We switched to Gmail.";

  it("fails dropped canonical terms under the script policy in broadcast", () => {
    const report = evaluate({
      cues: [cue],
      audioDuration: 1.7,
      script,
      config: { qcMode: "broadcast", verbatimPolicy: "script" },
    });
    expect(report.violations).toEqual([
      { kind: "canonical_term_missing", message: "Captions drop canonical terms: Gmail", severity: "fail" },
    ]);
  });

  it("only warns about dropped canonical terms under the audio policy", () => {
    const report = evaluate({
      cues: [cue],
      audioDuration: 1.7,
      script,
      config: { qcMode: "broadcast", verbatimPolicy: "audio" },
    });
    expect(kindsAndSeverities(report)).toEqual([["canonical_term_missing", "warn"]]);
  });

  it("skips the term check without a script", () => {
    const report = evaluate({ cues: [cue], audioDuration: 1.7, config: { qcMode: "broadcast" } });
    expect(report.violations).toEqual([]);
  });

  it("flags bad terms, bracket-only cues and production metadata", () => {
    const report = evaluate({
      cues: [
        { index: 1, start: 0, end: 1.6, lines: ["A hostel bid emerged."] },
        { index: 2, start: 1.6, end: 3.2, lines: ["[music]"] },
        { index: 3, start: 3.2, end: 4.8, lines: ["Anchor: back to you."] },
      ],
      audioDuration: 4.9,
      config: { qcMode: "warn" },
    });
    const wordingKinds = new Set(["bad_term", "bracket_only", "metadata_tokens"]);
    expect(
      report.violations
        .filter((violation) => wordingKinds.has(violation.kind))
        .map((violation) => [violation.kind, violation.cueIndex, violation.severity]),
    ).toEqual([
      ["bad_term", 1, "warn"],
      ["bracket_only", 2, "warn"],
      ["metadata_tokens", 2, "warn"],
      ["metadata_tokens", 3, "warn"],
    ]);
    expect(report.violations[0].message).toBe('Cue 1 contains "hostel bid"');
  });
});

describe("evaluateQc result", () => {
  it("returns a frozen report", () => {
    const report = evaluate({ cues: [openingCue, closingCue], audioDuration: 66.6 });
    expect(Object.isFrozen(report)).toBe(true);
  });
});
