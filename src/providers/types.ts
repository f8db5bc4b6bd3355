import { Segment } from "../types/models";

export interface Transcription {
  segments: Segment[];
  durationSec?: number;
}

/** Speech recognition over a media file; the engine only sees the resulting segments. */
export interface Transcriber {
  readonly name: string;
  transcribe(mediaPath: string, durationSec: number): Promise<Transcription>;
}

/** Where a run's narration script comes from when it was not sent inline. */
export interface ScriptSource {
  loadScript(location: string): Promise<string>;
}

// Narration synthesis and final video assembly happen upstream and downstream
// of this service. Callers that run those steps implement these contracts and
// hand the results to the caption routes.

export interface SpeechSynthesizer {
  synthesize(script: string, outputPath: string): Promise<{ audioPath: string; durationSec: number }>;
}

export interface VideoComposer {
  compose(params: { audioPath: string; subtitlePath: string; stylePath: string; outputPath: string }): Promise<string>;
}
