import { Segment } from "../types/models";
import { Transcriber, Transcription } from "./types";

const sampleNarration = [
  "Welcome back to the daily tech briefing.",
  "Two chip makers announced a joint research lab this morning.",
  "Analysts expect the first prototypes before the end of next year.",
  "That is all for today, see you tomorrow.",
];

const round = (value: number): number => Number(value.toFixed(3));

/** Evenly spaced word timings over the sample narration; no audio is read. */
export class MockTranscriber implements Transcriber {
  readonly name = "mock";

  async transcribe(_mediaPath: string, durationSec: number): Promise<Transcription> {
    const sentences = sampleNarration.map((sentence) => sentence.split(" "));
    const totalWords = sentences.reduce((sum, words) => sum + words.length, 0);
    const step = durationSec / totalWords;

    let cursor = 0;
    const segments: Segment[] = sentences.map((words) => {
      const timed = words.map((text, index) => ({
        text,
        start: round((cursor + index) * step),
        end: round((cursor + index + 1) * step),
      }));
      cursor += words.length;
      return {
        start: timed[0].start,
        end: timed[timed.length - 1].end,
        text: words.join(" "),
        words: timed,
      };
    });

    return { segments, durationSec };
  }
}
