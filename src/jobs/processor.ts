import { Job } from "bullmq";
import { CaptionEngineError, LayoutExceedsSafeAreaError, VerbatimMismatchError } from "../captions/errors";
import { CaptionPipelineResult, runCaptionPipeline } from "../captions/pipeline";
import { FileScriptSource } from "../providers/scriptSource";
import { ScriptSource, Transcriber } from "../providers/types";
import { CaptionService } from "../services/captionService";
import { BuildResult, RunRecord, Segment } from "../types/models";
import { MediaDurations, probeDurations } from "../utils/ffmpeg";
import { JobData } from "./types";

export type DurationProbe = (mediaPath: string) => Promise<MediaDurations>;

export type BuildJob = Pick<Job<JobData, BuildResult>, "name" | "data" | "updateProgress">;

type RunAccess = Pick<CaptionService, "getRun" | "updateRun" | "resolveConfig" | "resolveProfile" | "completeRun" | "failRun">;

export class JobProcessor {
  constructor(
    private readonly captionService: RunAccess,
    private readonly transcriber: Transcriber,
    private readonly probe: DurationProbe = probeDurations,
    private readonly scriptSource: ScriptSource = new FileScriptSource(),
  ) {}

  async handle(job: BuildJob): Promise<BuildResult> {
    if (job.name === "buildCaptions") {
      return this.buildCaptions(job);
    }
    throw new Error(`Unknown job name: ${job.name}`);
  }

  private async buildCaptions(job: BuildJob): Promise<BuildResult> {
    const run = this.captionService.getRun(job.data.runId);
    if (!run) {
      throw new Error("Run not found");
    }

    try {
      await job.updateProgress(10);
      const { audioDuration, videoDuration } = await this.resolveDurations(run);
      const script = await this.resolveScript(run);

      await job.updateProgress(30);
      const segments = await this.resolveSegments(run, audioDuration);

      await job.updateProgress(60);
      const result = this.runPipeline(run, script, segments, audioDuration, videoDuration);

      const built = await this.captionService.completeRun(run.id, result);
      await job.updateProgress(100);
      return built;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const report =
        error instanceof VerbatimMismatchError || error instanceof LayoutExceedsSafeAreaError ? error.report : undefined;
      await this.captionService.failRun(run.id, message, report);
      throw error;
    }
  }

  private async resolveDurations(run: RunRecord): Promise<{ audioDuration: number; videoDuration?: number }> {
    let { audioDuration, videoDuration } = run;
    if (run.audioPath && (audioDuration === undefined || videoDuration === undefined)) {
      const probed = await this.probe(run.audioPath);
      audioDuration = audioDuration ?? probed.audioDurationSec ?? probed.durationSec;
      videoDuration = videoDuration ?? probed.videoDurationSec ?? undefined;
      await this.captionService.updateRun(run.id, { audioDuration, videoDuration });
    }
    if (audioDuration === undefined) {
      throw new Error("Audio duration is unknown for this run");
    }
    return { audioDuration, videoDuration };
  }

  private async resolveScript(run: RunRecord): Promise<string | undefined> {
    if (run.script?.trim() || !run.scriptPath) {
      return run.script;
    }
    const script = await this.scriptSource.loadScript(run.scriptPath);
    console.log(`[worker] run=${run.id} loaded script (${script.length} chars)`);
    await this.captionService.updateRun(run.id, { script });
    return script;
  }

  private async resolveSegments(run: RunRecord, audioDuration: number): Promise<Segment[] | undefined> {
    if (run.segments?.length || !run.audioPath) {
      return run.segments;
    }
    const transcription = await this.transcriber.transcribe(run.audioPath, audioDuration);
    console.log(`[worker] run=${run.id} transcribed ${transcription.segments.length} segments via ${this.transcriber.name}`);
    await this.captionService.updateRun(run.id, { segments: transcription.segments });
    return transcription.segments;
  }

  private runPipeline(
    run: RunRecord,
    script: string | undefined,
    segments: Segment[] | undefined,
    audioDuration: number,
    videoDuration: number | undefined,
  ): CaptionPipelineResult {
    try {
      return runCaptionPipeline(
        {
          script,
          segments,
          audioDuration,
          videoDuration,
          profile: this.captionService.resolveProfile(run.profile),
        },
        this.captionService.resolveConfig(run.overrides),
      );
    } catch (error) {
      if (error instanceof CaptionEngineError) {
        console.error(`[worker] run=${run.id} ${error.name}: ${error.message}`);
      }
      throw error;
    }
  }
}
