import { env } from "../config/env";
import { MockTranscriber } from "./mockProvider";
import { OpenAiTranscriber } from "./openAiProvider";
import { Transcriber } from "./types";

export const buildTranscriber = (provider: string = env.asrProvider): Transcriber => {
  if (provider === "openai") {
    return new OpenAiTranscriber();
  }
  if (provider !== "mock") {
    console.warn(`[service] unknown ASR_PROVIDER "${provider}", falling back to mock`);
  }
  return new MockTranscriber();
};
