import fs from "node:fs/promises";
import path from "node:path";
import { env } from "../config/env";

export const storagePaths = {
  root: env.storageDir,
  uploads: path.join(env.storageDir, "uploads"),
  captions: path.join(env.storageDir, "captions"),
  reports: path.join(env.storageDir, "reports"),
  data: path.join(env.storageDir, "data"),
};

export const ensureStorageDirs = async (): Promise<void> => {
  await Promise.all(
    Object.values(storagePaths).map(async (dirPath) => {
      await fs.mkdir(dirPath, { recursive: true });
    }),
  );
};

/** Joins a bare file name onto `baseDir`; path segments in `filename` are discarded. */
export const safeJoin = (baseDir: string, filename: string): string => {
  const cleaned = path.basename(filename);
  const outputPath = path.join(baseDir, cleaned);
  const relative = path.relative(baseDir, outputPath);
  if (!cleaned || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error("Invalid filename");
  }
  return outputPath;
};

export const toPublicFileUrl = (absolutePath: string): string => {
  const relativePath = path.relative(storagePaths.root, absolutePath).split(path.sep).join("/");
  return `/files/${relativePath}`;
};
