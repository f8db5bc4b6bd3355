import { Job, Queue, Worker } from "bullmq";
import { env } from "../config/env";
import { BuildResult, JobView } from "../types/models";
import { BuildCaptionsJobData, JobData } from "./types";

const QUEUE_NAME = "captions";

const mapState = (state: string): JobView["status"] => {
  if (state === "completed") {
    return "succeeded";
  }
  if (state === "failed") {
    return "failed";
  }
  if (state === "active") {
    return "running";
  }
  return "queued";
};

const connection = {
  url: env.redisUrl,
};

export class JobQueue {
  private readonly queue: Queue<JobData, BuildResult>;
  private worker?: Worker<JobData, BuildResult>;

  constructor() {
    this.queue = new Queue<JobData, BuildResult>(QUEUE_NAME, {
      connection,
      defaultJobOptions: {
        removeOnComplete: 100,
        removeOnFail: 200,
      },
    });
  }

  async enqueueBuild(runId: string): Promise<string> {
    const job = await this.queue.add("buildCaptions", { runId } satisfies BuildCaptionsJobData);
    return String(job.id);
  }

  async getJob(jobId: string): Promise<JobView<BuildResult> | null> {
    const job = await this.queue.getJob(jobId);
    if (!job) {
      return null;
    }

    const state = await job.getState();
    const rawProgress = job.progress;
    const numericProgress = typeof rawProgress === "number" ? rawProgress : Number(rawProgress ?? 0);

    return {
      jobId,
      status: mapState(state),
      progress: Number.isFinite(numericProgress) ? numericProgress : 0,
      error: job.failedReason || undefined,
      result: job.returnvalue ?? undefined,
    };
  }

  startWorker(handler: (job: Job<JobData, BuildResult>) => Promise<BuildResult>): void {
    this.worker = new Worker<JobData, BuildResult>(QUEUE_NAME, async (job) => handler(job), {
      connection,
      concurrency: env.queueConcurrency,
    });

    this.worker.on("failed", (job, error) => {
      const id = job?.id ? String(job.id) : "unknown";
      console.error(`[worker] job failed: ${id}`, error.message);
    });

    this.worker.on("completed", (job, result) => {
      console.log(`[worker] job completed: ${String(job.id)} run=${result.runId} qc=${result.qcStatus}`);
    });
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
  }
}
