import fs from "node:fs/promises";
import path from "node:path";
import express, { Request, Response } from "express";
import cors from "cors";
import multer from "multer";
import { v4 as uuidv4 } from "uuid";
import { ZodError } from "zod";
import { env } from "../config/env";
import {
  InvalidCaptionInputError,
  LayoutExceedsSafeAreaError,
  MalformedTimingError,
  VerbatimMismatchError,
} from "../captions/errors";
import { JobQueue } from "../jobs/queue";
import { listProfiles } from "../renderers/profiles";
import { CaptionService } from "../services/captionService";
import { QcReport, Segment } from "../types/models";
import { storagePaths } from "../utils/storage";
import {
  captionRequestSchema,
  isAllowedMediaFile,
  isAllowedScriptFile,
  isAllowedTranscriptFile,
  profilesRequestSchema,
  runRequestSchema,
  srtQcRequestSchema,
  transcriptPayloadSchema,
  transcriptToSegments,
} from "../utils/validators";

export interface AppDependencies {
  captionService: Pick<
    CaptionService,
    "buildCaptions" | "evaluateProfiles" | "auditSrt" | "createRun" | "getRun" | "publicRunView"
  >;
  jobQueue: Pick<JobQueue, "enqueueBuild" | "getJob">;
}

const upload = multer({
  storage: multer.diskStorage({
    destination: (_req, _file, cb) => cb(null, storagePaths.uploads),
    filename: (_req, file, cb) => {
      const extension = path.extname(file.originalname).toLowerCase();
      cb(null, `${uuidv4()}${extension}`);
    },
  }),
  limits: {
    fileSize: env.maxUploadSizeMb * 1024 * 1024,
  },
  fileFilter: (_req, file, cb) => {
    const allowed =
      file.fieldname === "transcript"
        ? isAllowedTranscriptFile(file.originalname, file.mimetype)
        : file.fieldname === "scriptFile"
          ? isAllowedScriptFile(file.originalname, file.mimetype)
          : isAllowedMediaFile(file.originalname, file.mimetype);
    if (!allowed) {
      cb(new Error(`Unsupported file format for ${file.fieldname}`));
      return;
    }
    cb(null, true);
  },
});

interface ClientError {
  statusCode: number;
  message: string;
  issues?: ZodError["issues"];
  report?: QcReport;
}

const BAD_REQUEST_MESSAGES = [
  "Unsupported file format",
  "Unknown render profile",
  "Invalid subtitle",
  "Invalid transcript",
  "is required",
];

export const toClientError = (error: unknown): ClientError => {
  if (error instanceof ZodError) {
    return { statusCode: 400, message: "Invalid caption config", issues: error.issues };
  }
  if (error instanceof VerbatimMismatchError || error instanceof LayoutExceedsSafeAreaError) {
    return { statusCode: 422, message: error.message, report: error.report };
  }
  if (error instanceof MalformedTimingError || error instanceof InvalidCaptionInputError) {
    return { statusCode: 422, message: error.message };
  }
  if (error instanceof Error && BAD_REQUEST_MESSAGES.some((fragment) => error.message.includes(fragment))) {
    return { statusCode: 400, message: error.message };
  }
  return {
    statusCode: 500,
    message: "Internal server error",
  };
};

const sendError = (res: Response, error: unknown): void => {
  const { statusCode, ...body } = toClientError(error);
  if (statusCode >= 500) {
    console.error("[service] request failed", error);
  }
  res.status(statusCode).json(body);
};

const optionalNumber = (value: unknown): number | undefined => {
  if (typeof value !== "string" || !value.trim()) {
    return undefined;
  }
  return Number(value);
};

const parseJsonField = (value: unknown, field: string): unknown => {
  if (typeof value !== "string" || !value.trim()) {
    return undefined;
  }
  try {
    return JSON.parse(value);
  } catch {
    throw new Error(`Invalid transcript request: ${field} must be JSON`);
  }
};

const readTranscript = async (filePath: string): Promise<unknown> => {
  const raw = await fs.readFile(filePath, "utf-8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error("Invalid transcript file: not JSON");
  }
};

export const createApp = ({ captionService, jobQueue }: AppDependencies): express.Express => {
  const app = express();

  app.use(cors({ origin: env.corsOrigin }));
  app.use(express.json({ limit: "5mb" }));
  app.use("/files", express.static(storagePaths.root));

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      asrProvider: env.asrProvider,
      profiles: listProfiles().map((profile) => profile.name),
      maxUploadSizeMb: env.maxUploadSizeMb,
    });
  });

  app.get("/api/profiles", (_req, res) => {
    res.json({ profiles: listProfiles() });
  });

  app.post("/api/captions/build", (req: Request, res: Response) => {
    const parsed = captionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid caption request", issues: parsed.error.issues });
      return;
    }

    try {
      const result = captionService.buildCaptions(parsed.data);
      res.json({
        profile: result.profile,
        cues: result.cues,
        srt: result.srt,
        vtt: result.vtt,
        ass: result.ass,
        report: result.report,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/api/captions/profiles", (req: Request, res: Response) => {
    const parsed = profilesRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid caption request", issues: parsed.error.issues });
      return;
    }

    try {
      res.json({ evaluations: captionService.evaluateProfiles(parsed.data) });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/api/qc/srt", (req: Request, res: Response) => {
    const parsed = srtQcRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid QC request", issues: parsed.error.issues });
      return;
    }

    try {
      res.json(captionService.auditSrt(parsed.data));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/api/runs", async (req: Request, res: Response) => {
    const parsed = runRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: "Invalid run request", issues: parsed.error.issues });
      return;
    }

    try {
      const run = await captionService.createRun(parsed.data);
      const jobId = await jobQueue.enqueueBuild(run.id);
      res.status(202).json({ runId: run.id, jobId });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post(
    "/api/runs/upload",
    upload.fields([
      { name: "audio", maxCount: 1 },
      { name: "transcript", maxCount: 1 },
      { name: "scriptFile", maxCount: 1 },
    ]),
    async (req: Request, res: Response) => {
      const files: Record<string, Express.Multer.File[]> = req.files && !Array.isArray(req.files) ? req.files : {};
      const audio = files.audio?.[0];
      const transcript = files.transcript?.[0];
      const scriptFile = files.scriptFile?.[0];

      try {
        let segments: Segment[] | undefined;
        if (transcript) {
          const payload = transcriptPayloadSchema.safeParse(await readTranscript(transcript.path));
          if (!payload.success) {
            res.status(400).json({ message: "Invalid transcript file", issues: payload.error.issues });
            return;
          }
          segments = transcriptToSegments(payload.data);
        }

        const parsed = runRequestSchema.safeParse({
          script: typeof req.body.script === "string" ? req.body.script : undefined,
          profile: typeof req.body.profile === "string" ? req.body.profile : undefined,
          audioDuration: optionalNumber(req.body.audioDuration),
          videoDuration: optionalNumber(req.body.videoDuration),
          config: parseJsonField(req.body.config, "config"),
          segments,
        });
        if (!parsed.success) {
          res.status(400).json({ message: "Invalid run request", issues: parsed.error.issues });
          return;
        }

        const run = await captionService.createRun(parsed.data, { audioPath: audio?.path, scriptPath: scriptFile?.path });
        const jobId = await jobQueue.enqueueBuild(run.id);
        res.status(202).json({ runId: run.id, jobId });
      } catch (error) {
        sendError(res, error);
      }
    },
  );

  app.get("/api/runs/:id", (req: Request, res: Response) => {
    const run = captionService.getRun(req.params.id);
    if (!run) {
      res.status(404).json({ message: "Run not found" });
      return;
    }
    res.json(captionService.publicRunView(run));
  });

  app.get("/api/jobs/:jobId", async (req: Request, res: Response) => {
    try {
      const job = await jobQueue.getJob(req.params.jobId);
      if (!job) {
        res.status(404).json({ message: "Job not found" });
        return;
      }
      res.json(job);
    } catch (error) {
      sendError(res, error);
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: express.NextFunction) => {
    if (error instanceof multer.MulterError && error.code === "LIMIT_FILE_SIZE") {
      res.status(400).json({
        message: `File too large. Max allowed is ${env.maxUploadSizeMb}MB`,
      });
      return;
    }

    sendError(res, error);
  });

  return app;
};
