import { CaptionConfig } from "../config/captionConfig";
import { profileMargins } from "../renderers/profiles";
import { Cue, RenderProfile, StyleSummary } from "../types/models";

const pad = (value: number, size = 2): string => value.toString().padStart(size, "0");

const toMillis = (sec: number): number => Math.max(0, Math.round(sec * 1000));

const clockParts = (totalMs: number): { hours: number; minutes: number; seconds: number; millis: number } => ({
  hours: Math.floor(totalMs / 3_600_000),
  minutes: Math.floor((totalMs % 3_600_000) / 60_000),
  seconds: Math.floor((totalMs % 60_000) / 1000),
  millis: totalMs % 1000,
});

export const toVttTimestamp = (sec: number): string => {
  const { hours, minutes, seconds, millis } = clockParts(toMillis(sec));
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(millis, 3)}`;
};

export const toSrtTimestamp = (sec: number): string => {
  return toVttTimestamp(sec).replace(".", ",");
};

export const toAssTimestamp = (sec: number): string => {
  const centis = Math.max(0, Math.round(sec * 100));
  const { hours, minutes, seconds } = clockParts(centis * 10);
  return `${hours}:${pad(minutes)}:${pad(seconds)}.${pad(centis % 100)}`;
};

export const cuesToVtt = (cues: readonly Cue[]): string => {
  const lines: string[] = ["WEBVTT", ""];
  cues.forEach((cue) => {
    lines.push(`${toVttTimestamp(cue.start)} --> ${toVttTimestamp(cue.end)}`);
    lines.push(...cue.lines);
    lines.push("");
  });
  return lines.join("\n");
};

export const cuesToSrt = (cues: readonly Cue[]): string => {
  const lines: string[] = [];
  cues.forEach((cue) => {
    lines.push(String(cue.index));
    lines.push(`${toSrtTimestamp(cue.start)} --> ${toSrtTimestamp(cue.end)}`);
    lines.push(...cue.lines);
    lines.push("");
  });
  return lines.join("\n");
};

const TIMESTAMP = /^(\d{1,2}):(\d{2}):(\d{2})[,.](\d{3})$/;

const toSeconds = (value: string): number => {
  const match = value.trim().match(TIMESTAMP);
  if (!match) {
    throw new Error(`Invalid subtitle timestamp: ${value}`);
  }
  const [, hours, minutes, seconds, millis] = match.map(Number);
  return (hours * 3_600_000 + minutes * 60_000 + seconds * 1000 + millis) / 1000;
};

const parseBlocks = (content: string, header?: string): Cue[] => {
  const normalized = content.replace(/\r/g, "").trim();
  if (!normalized) {
    return [];
  }

  const cues: Cue[] = [];
  normalized.split(/\n\s*\n/).forEach((block) => {
    const rows = block.split("\n");
    const timingRow = rows.findIndex((row) => row.includes("-->"));
    if (timingRow < 0) {
      if (header && rows[0]?.trim().startsWith(header)) {
        return;
      }
      throw new Error(`Invalid subtitle block: ${rows[0] ?? ""}`);
    }

    const [startRaw, endRaw] = rows[timingRow].split("-->").map((part) => part.trim().split(/\s+/)[0]);
    const indexRaw = timingRow > 0 ? Number(rows[timingRow - 1].trim()) : Number.NaN;
    cues.push({
      index: Number.isInteger(indexRaw) && indexRaw > 0 ? indexRaw : cues.length + 1,
      start: toSeconds(startRaw),
      end: toSeconds(endRaw),
      lines: rows.slice(timingRow + 1).filter((row) => row.trim().length > 0),
    });
  });

  return cues;
};

export const parseSrt = (content: string): Cue[] => parseBlocks(content);

export const parseVtt = (content: string): Cue[] => parseBlocks(content, "WEBVTT");

const escapeAssText = (value: string): string => {
  return value.replace(/\\/g, "\\\\").replace(/\{/g, "\\{").replace(/\}/g, "\\}").replace(/\n/g, "\\N");
};

const toAssColor = (hexRgb: string, alpha: number): string => {
  const cleaned = hexRgb.replace("#", "").toUpperCase();
  const rr = cleaned.slice(0, 2);
  const gg = cleaned.slice(2, 4);
  const bb = cleaned.slice(4, 6);
  const alphaByte = Math.max(0, Math.min(255, Math.round((1 - alpha) * 255)));
  return `&H${alphaByte.toString(16).toUpperCase().padStart(2, "0")}${bb}${gg}${rr}`;
};

/** Sidecar style derived from the same inputs the safe-area check uses. */
export const styleFromProfile = (profile: RenderProfile, config: CaptionConfig): StyleSummary => {
  const margins = profileMargins(profile, {
    horizontal: config.safeMarginHorizontalFraction,
    vertical: config.safeMarginVerticalFraction,
  });
  const marginX = Math.round(profile.width * margins.horizontal);
  return {
    fontFamily: profile.subtitleFont,
    fontSize: profile.fontSize,
    outline: profile.outline,
    shadow: profile.shadow,
    playResX: profile.width,
    playResY: profile.height,
    marginL: marginX,
    marginR: marginX,
    marginV: Math.round(profile.height * margins.vertical),
  };
};

export const cuesToAss = (cues: readonly Cue[], style: StyleSummary): string => {
  const stylesLine = [
    "Style: Default",
    style.fontFamily,
    style.fontSize,
    toAssColor("#FFFFFF", 1),
    toAssColor("#FFFFFF", 1),
    toAssColor("#000000", 1),
    toAssColor("#000000", 0.5),
    0,
    0,
    0,
    0,
    100,
    100,
    0,
    0,
    1,
    style.outline,
    style.shadow,
    2,
    style.marginL,
    style.marginR,
    style.marginV,
    1,
  ].join(",");

  const header = [
    "[Script Info]",
    "ScriptType: v4.00+",
    `PlayResX: ${style.playResX}`,
    `PlayResY: ${style.playResY}`,
    "WrapStyle: 2",
    "ScaledBorderAndShadow: yes",
    "",
    "[V4+ Styles]",
    "Format: Name,Fontname,Fontsize,PrimaryColour,SecondaryColour,OutlineColour,BackColour,Bold,Italic,Underline,StrikeOut,ScaleX,ScaleY,Spacing,Angle,BorderStyle,Outline,Shadow,Alignment,MarginL,MarginR,MarginV,Encoding",
    stylesLine,
    "",
    "[Events]",
    "Format: Layer,Start,End,Style,Name,MarginL,MarginR,MarginV,Effect,Text",
  ];

  const dialogues = cues.map((cue) => {
    const text = escapeAssText(cue.lines.join("\n"));
    return `Dialogue: 0,${toAssTimestamp(cue.start)},${toAssTimestamp(cue.end)},Default,,0,0,0,,${text}`;
  });

  return [...header, ...dialogues, ""].join("\n");
};
