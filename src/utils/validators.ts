import path from "node:path";
import { z } from "zod";
import { DEFAULT_PROFILE } from "../renderers/profiles";
import { Segment, Word } from "../types/models";

const allowedMediaExtensions = new Set([".mp3", ".wav", ".m4a", ".aac", ".ogg", ".flac", ".mp4", ".mov", ".webm"]);
const allowedMediaMimeTypes = new Set([
  "audio/mpeg",
  "audio/wav",
  "audio/x-wav",
  "audio/mp4",
  "audio/aac",
  "audio/ogg",
  "audio/flac",
  "video/mp4",
  "video/quicktime",
  "video/webm",
  "application/octet-stream",
]);

export const isAllowedMediaFile = (filename: string, mimeType: string): boolean => {
  const extension = path.extname(filename).toLowerCase();
  return allowedMediaExtensions.has(extension) && allowedMediaMimeTypes.has(mimeType);
};

export const isAllowedScriptFile = (filename: string, mimeType: string): boolean => {
  return (
    path.extname(filename).toLowerCase() === ".txt" &&
    (mimeType.startsWith("text/plain") || mimeType === "application/octet-stream")
  );
};

export const isAllowedTranscriptFile = (filename: string, mimeType: string): boolean => {
  return (
    path.extname(filename).toLowerCase() === ".json" &&
    (mimeType === "application/json" || mimeType === "application/octet-stream")
  );
};

const seconds = z.number().finite();

export const wordSchema = z.object({
  text: z.string().max(200),
  start: seconds,
  end: seconds,
});

// Sign and ordering are left to the cue builder.
export const segmentSchema = z.object({
  start: seconds,
  end: seconds,
  text: z.string().max(5000),
  words: z.array(wordSchema).max(5000).optional(),
});

const captionConfigOverrides = z.record(z.unknown()).optional();

const captionSourceSchema = z.object({
  script: z.string().max(50_000).optional(),
  segments: z.array(segmentSchema).max(5000).optional(),
  videoDuration: z.number().positive().optional(),
  profile: z.string().min(1).max(40).optional().default(DEFAULT_PROFILE),
  config: captionConfigOverrides,
});

export const captionRequestSchema = captionSourceSchema.extend({
  audioDuration: z.number().positive(),
});

export const profilesRequestSchema = captionRequestSchema.extend({
  profiles: z.array(z.string().min(1).max(40)).min(1).max(10).optional(),
});

export const srtQcRequestSchema = z.object({
  srt: z.string().min(1).max(500_000),
  script: z.string().max(50_000).optional(),
  audioDuration: z.number().positive(),
  videoDuration: z.number().positive().optional(),
  profile: z.string().min(1).max(40).optional().default(DEFAULT_PROFILE),
  config: captionConfigOverrides,
});

export const runRequestSchema = captionSourceSchema.extend({
  audioDuration: z.number().positive().optional(),
});

export type CaptionRequest = z.infer<typeof captionRequestSchema>;
export type ProfilesRequest = z.infer<typeof profilesRequestSchema>;
export type SrtQcRequest = z.infer<typeof srtQcRequestSchema>;
export type RunRequest = z.infer<typeof runRequestSchema>;

const transcriptWordSchema = z
  .object({
    word: z.string().optional(),
    text: z.string().optional(),
    start: seconds,
    end: seconds,
  })
  .refine((word) => typeof (word.word ?? word.text) === "string", { message: "word text is required" });

/** Verbose transcription payload: segments, optionally with nested or top-level word timings. */
export const transcriptPayloadSchema = z.object({
  text: z.string().optional(),
  duration: z.number().positive().optional(),
  segments: z
    .array(
      z.object({
        start: seconds,
        end: seconds,
        text: z.string(),
        words: z.array(transcriptWordSchema).optional(),
      }),
    )
    .max(5000),
  words: z.array(transcriptWordSchema).max(50_000).optional(),
});

export type TranscriptPayload = z.infer<typeof transcriptPayloadSchema>;

const toWord = (word: z.infer<typeof transcriptWordSchema>): Word => ({
  text: (word.word ?? word.text ?? "").trim(),
  start: word.start,
  end: word.end,
});

export const transcriptToSegments = (payload: TranscriptPayload): Segment[] => {
  const looseWords = (payload.words ?? []).map(toWord);

  return payload.segments.map((segment, index) => {
    const text = segment.text.trim();
    if (segment.words?.length) {
      return { start: segment.start, end: segment.end, text, words: segment.words.map(toWord) };
    }

    const next = payload.segments[index + 1];
    const from = index === 0 ? Number.NEGATIVE_INFINITY : segment.start;
    const until = next ? next.start : Number.POSITIVE_INFINITY;
    const words = looseWords.filter((word) => word.start >= from && word.start < until);
    return words.length ? { start: segment.start, end: segment.end, text, words } : { start: segment.start, end: segment.end, text };
  });
};
