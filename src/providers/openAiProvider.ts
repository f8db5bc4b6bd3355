import fs from "node:fs/promises";
import path from "node:path";
import { env } from "../config/env";
import { transcriptPayloadSchema, transcriptToSegments } from "../utils/validators";
import { Transcriber, Transcription } from "./types";

export class OpenAiTranscriber implements Transcriber {
  readonly name = "openai";

  async transcribe(mediaPath: string, durationSec: number): Promise<Transcription> {
    if (!env.openAiApiKey) {
      throw new Error("OPENAI_API_KEY is required for ASR provider");
    }

    const bytes = await fs.readFile(mediaPath);
    const file = new File([bytes], path.basename(mediaPath));

    const formData = new FormData();
    formData.set("file", file);
    formData.set("model", env.openAiAsrModel);
    formData.set("response_format", "verbose_json");
    formData.append("timestamp_granularities[]", "segment");
    formData.append("timestamp_granularities[]", "word");

    const response = await fetch(`${env.openAiBaseUrl}/audio/transcriptions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${env.openAiApiKey}`,
      },
      body: formData,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`OpenAI ASR failed: ${response.status} ${body}`);
    }

    const parsed = transcriptPayloadSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`OpenAI ASR returned an unexpected payload: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }

    const segments = transcriptToSegments(parsed.data).filter((segment) => segment.text.length > 0);
    if (!segments.length) {
      throw new Error("ASR returned an empty transcript");
    }

    return {
      segments,
      durationSec: parsed.data.duration ?? durationSec,
    };
  }
}
