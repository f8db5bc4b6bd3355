import "./config/loadEnv";
import { createApp } from "./api/createApp";
import { env } from "./config/env";
import { JobProcessor } from "./jobs/processor";
import { JobQueue } from "./jobs/queue";
import { buildTranscriber } from "./providers";
import { CaptionService } from "./services/captionService";
import { StoreService } from "./services/store";
import { ensureStorageDirs } from "./utils/storage";

const bootstrap = async (): Promise<void> => {
  await ensureStorageDirs();

  const store = new StoreService();
  await store.init();

  const captionService = new CaptionService(store);
  // Throws on invalid env defaults.
  const defaults = captionService.resolveConfig();
  const transcriber = buildTranscriber();
  const jobQueue = new JobQueue();
  const processor = new JobProcessor(captionService, transcriber);
  jobQueue.startWorker((job) => processor.handle(job));

  const app = createApp({
    captionService,
    jobQueue,
  });

  const server = app.listen(env.port, () => {
    console.log(`[service] listening at http://localhost:${env.port}`);
    console.log(`[service] asrProvider=${transcriber.name}, qcMode=${defaults.qcMode}, verbatimPolicy=${defaults.verbatimPolicy}`);
    console.log(
      `[service] maxLines=${defaults.maxLines}, maxCharsPerLine=${defaults.maxCharsPerLine}, cueDuration=${defaults.minCueDurationS}-${defaults.maxCueDurationS}s, strictLayout=${defaults.strictLayout}`,
    );
  });

  const shutdown = async (): Promise<void> => {
    await jobQueue.close();
    server.close();
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });
};

bootstrap().catch((error) => {
  console.error("Failed to start caption service", error);
  process.exit(1);
});
