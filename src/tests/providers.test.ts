import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { buildTranscriber } from "../providers";
import { MockTranscriber } from "../providers/mockProvider";
import { FileScriptSource } from "../providers/scriptSource";
import { parseProbeOutput, probeDurations } from "../utils/ffmpeg";

describe("MockTranscriber", () => {
  it("spreads the sample narration over the requested duration", async () => {
    const { segments, durationSec } = await new MockTranscriber().transcribe("/unused.wav", 8);

    expect(durationSec).toBe(8);
    expect(segments).toHaveLength(4);
    expect(segments[0].start).toBe(0);
    expect(segments[3].end).toBe(8);
    expect(segments[0].words?.[0]).toEqual({ text: "Welcome", start: 0, end: 0.222 });
  });
});

describe("FileScriptSource", () => {
  it("reads and trims a script file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "caption-script-"));
    const file = path.join(dir, "narration.txt");
    await fs.writeFile(file, "\n  Hello there.\n", "utf-8");

    await expect(new FileScriptSource().loadScript(file)).resolves.toBe("Hello there.");
  });

  it("rejects an empty script file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "caption-script-"));
    const file = path.join(dir, "blank.txt");
    await fs.writeFile(file, "  \n", "utf-8");

    await expect(new FileScriptSource().loadScript(file)).rejects.toThrow("Script file is empty");
  });
});

describe("buildTranscriber", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("selects providers by name", () => {
    expect(buildTranscriber("mock").name).toBe("mock");
    expect(buildTranscriber("openai").name).toBe("openai");
  });

  it("falls back to the mock provider", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(buildTranscriber("whisper-local").name).toBe("mock");
    expect(warn).toHaveBeenCalledWith('[service] unknown ASR_PROVIDER "whisper-local", falling back to mock');
  });
});

describe("parseProbeOutput", () => {
  it("reads container and stream durations", () => {
    const stdout = JSON.stringify({
      streams: [
        { codec_type: "video", duration: "12.500000" },
        { codec_type: "audio", duration: "12.384000" },
      ],
      format: { duration: "12.500000" },
    });
    expect(parseProbeOutput(stdout)).toEqual({ durationSec: 12.5, audioDurationSec: 12.384, videoDurationSec: 12.5 });
  });

  it("tolerates audio-only files", () => {
    const stdout = JSON.stringify({ streams: [{ codec_type: "audio" }], format: { duration: "3.2" } });
    expect(parseProbeOutput(stdout)).toEqual({ durationSec: 3.2, audioDurationSec: null, videoDurationSec: null });
  });

  it("rejects output without a duration", () => {
    expect(() => parseProbeOutput(JSON.stringify({ format: {} }))).toThrow("Unable to read media duration");
  });
});

describe("probeDurations", () => {
  it("names the input when ffprobe cannot run", async () => {
    await expect(probeDurations("/tmp/voice-over.wav", "/nonexistent/ffprobe")).rejects.toThrow(
      "ffprobe failed for /tmp/voice-over.wav",
    );
  });
});
