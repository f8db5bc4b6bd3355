import fs from "node:fs/promises";
import { v4 as uuidv4 } from "uuid";
import { CaptionConfig, definedEntries, resolveCaptionConfig } from "../config/captionConfig";
import { env } from "../config/env";
import { buildVerbatimReport } from "../captions/verbatimChecker";
import { cueText } from "../captions/cueBuilder";
import {
  CaptionPipelineResult,
  ProfileEvaluation,
  evaluateProfile,
  evaluateProfiles,
  runCaptionPipeline,
} from "../captions/pipeline";
import { getProfile, listProfiles } from "../renderers/profiles";
import { BuildResult, QcReport, RenderProfile, RunRecord } from "../types/models";
import { safeJoin, storagePaths, toPublicFileUrl } from "../utils/storage";
import { parseSrt } from "../utils/subtitles";
import { CaptionRequest, ProfilesRequest, RunRequest, SrtQcRequest } from "../utils/validators";
import { StoreService } from "./store";

export interface RunInputFiles {
  audioPath?: string;
  scriptPath?: string;
}

export interface PublicRunView
  extends Omit<RunRecord, "audioPath" | "scriptPath" | "srtPath" | "vttPath" | "assPath" | "reportPath"> {
  hasAudio: boolean;
}

const withBaseUrl = (url: string | undefined): string | undefined => (url ? `${env.apiBaseUrl}${url}` : undefined);

export class CaptionService {
  constructor(private readonly store: StoreService) {}

  /** Environment defaults overlaid with request overrides. Throws a ZodError when invalid. */
  resolveConfig(overrides: Record<string, unknown> = {}): CaptionConfig {
    return resolveCaptionConfig({ ...definedEntries(env.captionDefaults), ...overrides });
  }

  resolveProfile(name: string): RenderProfile {
    const profile = getProfile(name);
    if (!profile) {
      throw new Error(`Unknown render profile: ${name}`);
    }
    return profile;
  }

  buildCaptions(request: CaptionRequest): CaptionPipelineResult {
    const config = this.resolveConfig(request.config);
    return runCaptionPipeline(
      {
        script: request.script,
        segments: request.segments,
        audioDuration: request.audioDuration,
        videoDuration: request.videoDuration,
        profile: this.resolveProfile(request.profile),
      },
      config,
    );
  }

  evaluateProfiles(request: ProfilesRequest): ProfileEvaluation[] {
    const config = this.resolveConfig(request.config);
    const profiles = request.profiles ? request.profiles.map((name) => this.resolveProfile(name)) : listProfiles();
    return evaluateProfiles(
      {
        script: request.script,
        segments: request.segments,
        audioDuration: request.audioDuration,
        videoDuration: request.videoDuration,
      },
      profiles,
      config,
    );
  }

  /** QC for subtitles produced elsewhere. Cues are audited as parsed, never rebuilt. */
  auditSrt(request: SrtQcRequest): ProfileEvaluation {
    const config = this.resolveConfig(request.config);
    const profile = this.resolveProfile(request.profile);
    const cues = parseSrt(request.srt);
    const verbatim = buildVerbatimReport(
      config.verbatimPolicy,
      { script: request.script, captions: cues.map(cueText).join(" ") },
      config.asrConfusions,
    );
    return evaluateProfile(
      {
        source: { audioDuration: request.audioDuration, videoDuration: request.videoDuration, script: request.script },
        timing: [],
        cues,
        verbatim,
      },
      profile,
      config,
    );
  }

  getRun(runId: string): RunRecord | undefined {
    return this.store.getRun(runId);
  }

  async createRun(request: RunRequest, files: RunInputFiles = {}): Promise<RunRecord> {
    this.resolveProfile(request.profile);
    this.resolveConfig(request.config);

    const hasText = Boolean(request.script?.trim()) || Boolean(request.segments?.length) || Boolean(files.scriptPath);
    if (!hasText && !files.audioPath) {
      throw new Error("A script, transcript segments or an audio file is required");
    }
    if (request.audioDuration === undefined && !files.audioPath) {
      throw new Error("audioDuration is required when no audio file is uploaded");
    }

    const now = new Date().toISOString();
    return this.store.upsertRun({
      id: uuidv4(),
      profile: request.profile,
      script: request.script,
      scriptPath: files.scriptPath,
      segments: request.segments,
      audioPath: files.audioPath,
      audioDuration: request.audioDuration,
      videoDuration: request.videoDuration,
      overrides: request.config,
      status: "pending",
      createdAt: now,
      updatedAt: now,
    });
  }

  async updateRun(runId: string, patch: Partial<Omit<RunRecord, "id" | "createdAt">>): Promise<RunRecord> {
    const run = this.requireRun(runId);
    return this.store.upsertRun({ ...run, ...patch });
  }

  async completeRun(runId: string, result: CaptionPipelineResult): Promise<BuildResult> {
    const run = this.requireRun(runId);
    const srtPath = safeJoin(storagePaths.captions, `${run.id}.srt`);
    const vttPath = safeJoin(storagePaths.captions, `${run.id}.vtt`);
    const assPath = safeJoin(storagePaths.captions, `${run.id}.ass`);
    const reportPath = await this.writeReport(run.id, result.report);

    await Promise.all([
      fs.writeFile(srtPath, result.srt, "utf-8"),
      fs.writeFile(vttPath, result.vtt, "utf-8"),
      fs.writeFile(assPath, result.ass, "utf-8"),
    ]);

    this.logReport(run.id, result.report);

    const updated = await this.store.upsertRun({
      ...run,
      status: "completed",
      qcStatus: result.report.status,
      error: undefined,
      srtPath,
      srtUrl: toPublicFileUrl(srtPath),
      vttPath,
      vttUrl: toPublicFileUrl(vttPath),
      assPath,
      assUrl: toPublicFileUrl(assPath),
      reportPath,
      reportUrl: toPublicFileUrl(reportPath),
    });

    return {
      runId: updated.id,
      qcStatus: result.report.status,
      cueCount: result.cues.length,
      srtUrl: `${env.apiBaseUrl}${toPublicFileUrl(srtPath)}`,
      vttUrl: `${env.apiBaseUrl}${toPublicFileUrl(vttPath)}`,
      assUrl: `${env.apiBaseUrl}${toPublicFileUrl(assPath)}`,
      reportUrl: `${env.apiBaseUrl}${toPublicFileUrl(reportPath)}`,
    };
  }

  async failRun(runId: string, message: string, report?: QcReport): Promise<RunRecord> {
    const run = this.requireRun(runId);
    const patch: Partial<RunRecord> = { status: "failed", error: message };
    if (report) {
      this.logReport(run.id, report);
      const reportPath = await this.writeReport(run.id, report);
      patch.qcStatus = report.status;
      patch.reportPath = reportPath;
      patch.reportUrl = toPublicFileUrl(reportPath);
    }
    return this.store.upsertRun({ ...run, ...patch });
  }

  publicRunView(run: RunRecord): PublicRunView {
    const { audioPath, scriptPath, srtPath, vttPath, assPath, reportPath, ...rest } = run;
    return {
      ...rest,
      hasAudio: Boolean(audioPath),
      srtUrl: withBaseUrl(run.srtUrl),
      vttUrl: withBaseUrl(run.vttUrl),
      assUrl: withBaseUrl(run.assUrl),
      reportUrl: withBaseUrl(run.reportUrl),
    };
  }

  private requireRun(runId: string): RunRecord {
    const run = this.store.getRun(runId);
    if (!run) {
      throw new Error(`Run not found: ${runId}`);
    }
    return run;
  }

  private async writeReport(runId: string, report: QcReport): Promise<string> {
    const reportPath = safeJoin(storagePaths.reports, `${runId}.qc.json`);
    await fs.writeFile(reportPath, JSON.stringify(report, null, 2), "utf-8");
    return reportPath;
  }

  private logReport(runId: string, report: QcReport): void {
    const fails = report.violations.filter((violation) => violation.severity === "fail").length;
    console.log(
      `[qc] run=${runId} mode=${report.mode} policy=${report.policy} status=${report.status} cues=${report.metrics.cueCount} violations=${report.violations.length} fails=${fails}`,
    );
    report.warnings.forEach((warning) => {
      console.warn(`[qc] run=${runId} ${warning}`);
    });
  }
}
