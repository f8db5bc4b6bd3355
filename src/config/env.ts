import path from "node:path";

const toNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toOptionalNumber = (value: string | undefined): number | undefined => {
  if (!value?.trim()) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const toBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
};

const rootDir = path.resolve(__dirname, "..", "..");

const resolveStorageDir = (): string => {
  const raw = process.env.STORAGE_DIR?.trim();
  if (!raw) {
    return path.join(rootDir, "storage");
  }
  return path.isAbsolute(raw) ? raw : path.resolve(rootDir, raw);
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  port: toNumber(process.env.PORT, 4000),
  apiBaseUrl: process.env.API_BASE_URL ?? "http://localhost:4000",
  corsOrigin: process.env.CORS_ORIGIN ?? "http://localhost:3000",
  redisUrl: process.env.REDIS_URL ?? "redis://localhost:6379",
  queueConcurrency: toNumber(process.env.QUEUE_CONCURRENCY, 2),
  maxUploadSizeMb: toNumber(process.env.MAX_UPLOAD_SIZE_MB, 100),
  asrProvider: process.env.ASR_PROVIDER ?? "mock",
  openAiApiKey: process.env.OPENAI_API_KEY,
  openAiBaseUrl: process.env.OPENAI_BASE_URL ?? "https://api.openai.com/v1",
  openAiAsrModel: process.env.OPENAI_ASR_MODEL ?? "whisper-1",
  rootDir,
  storageDir: resolveStorageDir(),
  // Process-wide caption defaults; requests may override them.
  captionDefaults: {
    qcMode: process.env.QC_MODE?.trim() || undefined,
    verbatimPolicy: process.env.VERBATIM_POLICY?.trim() || undefined,
    strictLayout: toBoolean(process.env.STRICT_LAYOUT, false),
    maxLines: toOptionalNumber(process.env.CAPTION_MAX_LINES),
    maxCharsPerLine: toOptionalNumber(process.env.CAPTION_MAX_CHARS_PER_LINE),
    maxCueDurationS: toOptionalNumber(process.env.CAPTION_MAX_CUE_DURATION_S),
    minCueDurationS: toOptionalNumber(process.env.CAPTION_MIN_CUE_DURATION_S),
  },
};
