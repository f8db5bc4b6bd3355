import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

const PROBE_TIMEOUT_MS = 15000;

interface ProbeStream {
  codec_type?: string;
  duration?: string;
}

interface ProbeFormat {
  duration?: string;
}

interface ProbePayload {
  streams?: ProbeStream[];
  format?: ProbeFormat;
}

export interface MediaDurations {
  durationSec: number;
  audioDurationSec: number | null;
  videoDurationSec: number | null;
}

const toSeconds = (raw: string | undefined): number | null => {
  const value = Number(raw);
  return raw !== undefined && Number.isFinite(value) && value > 0 ? value : null;
};

export const parseProbeOutput = (stdout: string): MediaDurations => {
  const parsed: ProbePayload = JSON.parse(stdout);
  const streamDuration = (kind: string): number | null =>
    toSeconds(parsed.streams?.find((stream) => stream.codec_type === kind)?.duration);

  const durationSec = toSeconds(parsed.format?.duration);
  if (durationSec === null) {
    throw new Error("Unable to read media duration");
  }

  return {
    durationSec,
    audioDurationSec: streamDuration("audio"),
    videoDurationSec: streamDuration("video"),
  };
};

/** Container and per-stream durations via ffprobe, which is killed after 15s. */
export const probeDurations = async (inputPath: string, ffprobePath = "ffprobe"): Promise<MediaDurations> => {
  const args = ["-v", "error", "-show_entries", "format=duration:stream=codec_type,duration", "-of", "json", inputPath];
  let stdout: string;
  try {
    ({ stdout } = await execFileAsync(ffprobePath, args, { timeout: PROBE_TIMEOUT_MS, encoding: "utf-8" }));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`ffprobe failed for ${inputPath}: ${reason}`);
  }
  return parseProbeOutput(stdout);
};
