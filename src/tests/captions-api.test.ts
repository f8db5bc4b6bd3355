import os from "node:os";
import path from "node:path";
import request from "supertest";
import { beforeAll, describe, expect, it, vi } from "vitest";
import { AppDependencies, createApp, toClientError } from "../api/createApp";
import { CaptionService } from "../services/captionService";
import { StoreService } from "../services/store";
import { ensureStorageDirs } from "../utils/storage";

const SENTENCE = "Today we're diving into some exciting developments in the world of tech";

const mockCaptionService = (): AppDependencies["captionService"] => ({
  buildCaptions: vi.fn(),
  evaluateProfiles: vi.fn(),
  auditSrt: vi.fn(),
  createRun: vi.fn(),
  getRun: vi.fn(),
  publicRunView: vi.fn(),
});

const mockJobQueue = (): AppDependencies["jobQueue"] => ({
  enqueueBuild: vi.fn().mockResolvedValue("job-1"),
  getJob: vi.fn().mockResolvedValue(null),
});

// Synchronous endpoints run the real engine; the store is never touched.
const engineApp = () =>
  createApp({
    captionService: new CaptionService(new StoreService(path.join(os.tmpdir(), "caption-api-unused.json"))),
    jobQueue: mockJobQueue(),
  });

beforeAll(async () => {
  await ensureStorageDirs();
});

describe("GET /health", () => {
  it("lists profiles and the ASR provider", async () => {
    const response = await request(engineApp()).get("/health");
    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      ok: true,
      asrProvider: "mock",
      profiles: ["tiktok", "reels", "youtube_shorts"],
      maxUploadSizeMb: 100,
    });
  });
});

describe("POST /api/captions/build", () => {
  it("returns cues, subtitle files and the QC report", async () => {
    const response = await request(engineApp())
      .post("/api/captions/build")
      .send({ script: SENTENCE, audioDuration: 5, config: { verbatimPolicy: "script", qcMode: "strict" } });

    expect(response.status).toBe(200);
    expect(response.body.profile).toBe("tiktok");
    expect(response.body.cues).toHaveLength(3);
    expect(response.body.report.status).toBe("warn");
    expect(response.body.srt.split("\n").slice(0, 3)).toEqual([
      "1",
      "00:00:00,000 --> 00:00:01,667",
      "Today we're diving into",
    ]);
  });

  it("rejects a request without audioDuration", async () => {
    const response = await request(engineApp()).post("/api/captions/build").send({ script: SENTENCE });
    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Invalid caption request");
  });

  it("rejects an invalid config override", async () => {
    const response = await request(engineApp())
      .post("/api/captions/build")
      .send({ script: SENTENCE, audioDuration: 5, config: { qcMode: "loud" } });
    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Invalid caption config");
    expect(response.body.issues[0].path).toEqual(["qcMode"]);
  });

  it("rejects an unknown profile", async () => {
    const response = await request(engineApp())
      .post("/api/captions/build")
      .send({ script: SENTENCE, audioDuration: 5, profile: "vimeo" });
    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Unknown render profile: vimeo");
  });

  it("returns 422 for malformed timing", async () => {
    const response = await request(engineApp())
      .post("/api/captions/build")
      .send({ audioDuration: 5, segments: [{ start: 2, end: 1, text: "Backwards." }] });
    expect(response.status).toBe(422);
    expect(response.body.message).toBe("Segment 0 ends before it starts");
  });

  it("returns 422 with the report when strict QC rejects the captions", async () => {
    const response = await request(engineApp())
      .post("/api/captions/build")
      .send({
        script: "Hello there.",
        audioDuration: 3,
        segments: [
          {
            start: 5,
            end: 6,
            text: "hello there",
            words: [
              { text: "hello", start: 5, end: 5.5 },
              { text: "there", start: 5.5, end: 6 },
            ],
          },
        ],
        config: { verbatimPolicy: "script", qcMode: "strict" },
      });
    expect(response.status).toBe(422);
    expect(response.body.message).toBe('Caption text diverges from script at token 0: expected "hello", got "<end>"');
    expect(response.body.report.status).toBe("fail");
  });
});

describe("POST /api/captions/profiles", () => {
  it("evaluates the requested profiles", async () => {
    const response = await request(engineApp())
      .post("/api/captions/profiles")
      .send({ script: SENTENCE, audioDuration: 5, profiles: ["reels", "youtube_shorts"] });
    expect(response.status).toBe(200);
    expect(response.body.evaluations.map((evaluation: { profile: string }) => evaluation.profile)).toEqual([
      "reels",
      "youtube_shorts",
    ]);
  });
});

describe("POST /api/qc/srt", () => {
  it("audits an existing SRT file", async () => {
    const response = await request(engineApp())
      .post("/api/qc/srt")
      .send({ srt: "1\n00:00:00,000 --> 00:00:01,500\nHello there.\n", audioDuration: 1.6 });
    expect(response.status).toBe(200);
    expect(response.body.profile).toBe("tiktok");
    expect(response.body.report.status).toBe("pass");
    expect(response.body.report.metrics.cueCount).toBe(1);
  });

  it("rejects a malformed SRT file", async () => {
    const response = await request(engineApp())
      .post("/api/qc/srt")
      .send({ srt: "1\n00:00:01 --> 00:00:02,000\nHello.", audioDuration: 3 });
    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Invalid subtitle timestamp: 00:00:01");
  });
});

describe("POST /api/runs", () => {
  it("queues a caption build", async () => {
    const captionService = mockCaptionService();
    vi.mocked(captionService.createRun).mockResolvedValue({
      id: "run-1",
      profile: "tiktok",
      status: "pending",
      createdAt: "2024-01-01T00:00:00.000Z",
      updatedAt: "2024-01-01T00:00:00.000Z",
    });
    const jobQueue = mockJobQueue();
    const app = createApp({ captionService, jobQueue });

    const response = await request(app).post("/api/runs").send({ script: "Hello.", audioDuration: 2 });

    expect(response.status).toBe(202);
    expect(response.body).toEqual({ runId: "run-1", jobId: "job-1" });
    expect(captionService.createRun).toHaveBeenCalledWith(
      expect.objectContaining({ script: "Hello.", audioDuration: 2, profile: "tiktok" }),
    );
    expect(jobQueue.enqueueBuild).toHaveBeenCalledWith("run-1");
  });

  it("returns 400 when the run cannot be created", async () => {
    const captionService = mockCaptionService();
    vi.mocked(captionService.createRun).mockRejectedValue(
      new Error("audioDuration is required when no audio file is uploaded"),
    );
    const response = await request(createApp({ captionService, jobQueue: mockJobQueue() }))
      .post("/api/runs")
      .send({ script: "Hello." });
    expect(response.status).toBe(400);
    expect(response.body.message).toBe("audioDuration is required when no audio file is uploaded");
  });
});

describe("POST /api/runs/upload", () => {
  it("rejects unsupported audio formats", async () => {
    const captionService = mockCaptionService();
    const response = await request(createApp({ captionService, jobQueue: mockJobQueue() }))
      .post("/api/runs/upload")
      .attach("audio", Buffer.from("fake"), { filename: "voice.avi", contentType: "video/x-msvideo" });

    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Unsupported file format for audio");
    expect(captionService.createRun).not.toHaveBeenCalled();
  });

  it("creates a run from an uploaded transcript", async () => {
    const captionService = mockCaptionService();
    vi.mocked(captionService.createRun).mockResolvedValue({
      id: "run-2",
      profile: "reels",
      status: "pending",
      createdAt: "2024-01-01T00:00:00.000Z",
      updatedAt: "2024-01-01T00:00:00.000Z",
    });
    const transcript = { segments: [{ start: 0, end: 1, text: "Hi." }] };

    const response = await request(createApp({ captionService, jobQueue: mockJobQueue() }))
      .post("/api/runs/upload")
      .field("profile", "reels")
      .field("audioDuration", "1.5")
      .attach("transcript", Buffer.from(JSON.stringify(transcript)), {
        filename: "words.json",
        contentType: "application/json",
      });

    expect(response.status).toBe(202);
    expect(response.body).toEqual({ runId: "run-2", jobId: "job-1" });
    expect(captionService.createRun).toHaveBeenCalledWith(
      expect.objectContaining({
        profile: "reels",
        audioDuration: 1.5,
        segments: [{ start: 0, end: 1, text: "Hi." }],
      }),
      { audioPath: undefined, scriptPath: undefined },
    );
  });

  it("passes an uploaded script file to the run", async () => {
    const captionService = mockCaptionService();
    vi.mocked(captionService.createRun).mockResolvedValue({
      id: "run-3",
      profile: "tiktok",
      status: "pending",
      createdAt: "2024-01-01T00:00:00.000Z",
      updatedAt: "2024-01-01T00:00:00.000Z",
    });

    const response = await request(createApp({ captionService, jobQueue: mockJobQueue() }))
      .post("/api/runs/upload")
      .field("audioDuration", "4")
      .attach("scriptFile", Buffer.from("Hello there."), { filename: "narration.txt", contentType: "text/plain" });

    expect(response.status).toBe(202);
    expect(response.body).toEqual({ runId: "run-3", jobId: "job-1" });
    expect(captionService.createRun).toHaveBeenCalledWith(expect.objectContaining({ audioDuration: 4 }), {
      audioPath: undefined,
      scriptPath: expect.stringMatching(/\.txt$/),
    });
  });

  it("rejects a script file that is not plain text", async () => {
    const captionService = mockCaptionService();
    const response = await request(createApp({ captionService, jobQueue: mockJobQueue() }))
      .post("/api/runs/upload")
      .attach("scriptFile", Buffer.from("{}"), { filename: "narration.json", contentType: "application/json" });

    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Unsupported file format for scriptFile");
    expect(captionService.createRun).not.toHaveBeenCalled();
  });

  it("rejects a transcript with the wrong shape", async () => {
    const response = await request(createApp({ captionService: mockCaptionService(), jobQueue: mockJobQueue() }))
      .post("/api/runs/upload")
      .field("audioDuration", "1.5")
      .attach("transcript", Buffer.from(JSON.stringify({ text: "no segments" })), {
        filename: "words.json",
        contentType: "application/json",
      });
    expect(response.status).toBe(400);
    expect(response.body.message).toBe("Invalid transcript file");
  });
});

describe("GET /api/runs/:id", () => {
  it("returns 404 for an unknown run", async () => {
    const captionService = mockCaptionService();
    vi.mocked(captionService.getRun).mockReturnValue(undefined);
    const response = await request(createApp({ captionService, jobQueue: mockJobQueue() })).get("/api/runs/missing");
    expect(response.status).toBe(404);
    expect(response.body.message).toBe("Run not found");
  });
});

describe("GET /api/jobs/:jobId", () => {
  it("returns the job status", async () => {
    const jobQueue = mockJobQueue();
    vi.mocked(jobQueue.getJob).mockResolvedValue({ jobId: "job-1", status: "running", progress: 60 });
    const response = await request(createApp({ captionService: mockCaptionService(), jobQueue })).get("/api/jobs/job-1");
    expect(response.status).toBe(200);
    expect(response.body).toEqual({ jobId: "job-1", status: "running", progress: 60 });
  });

  it("returns 404 when the job is unknown", async () => {
    const response = await request(createApp({ captionService: mockCaptionService(), jobQueue: mockJobQueue() })).get(
      "/api/jobs/missing",
    );
    expect(response.status).toBe(404);
    expect(response.body.message).toBe("Job not found");
  });
});

describe("toClientError", () => {
  it("hides unexpected errors", () => {
    expect(toClientError(new Error("socket hang up"))).toEqual({ statusCode: 500, message: "Internal server error" });
  });
});
