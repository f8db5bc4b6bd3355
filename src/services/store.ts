import fs from "node:fs/promises";
import path from "node:path";
import { RunRecord } from "../types/models";
import { storagePaths } from "../utils/storage";

interface Database {
  runs: Record<string, RunRecord>;
}

const defaultDbFilePath = path.join(storagePaths.data, "db.json");

const isDatabase = (value: unknown): value is Database =>
  typeof value === "object" && value !== null && "runs" in value && typeof value.runs === "object" && value.runs !== null;

/** JSON-file run store. Every write rewrites the whole file. */
export class StoreService {
  private db: Database = { runs: {} };

  constructor(private readonly dbFilePath: string = defaultDbFilePath) {}

  async init(): Promise<void> {
    let existing: string;
    try {
      existing = await fs.readFile(this.dbFilePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        await this.persist();
        return;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(existing);
    if (!isDatabase(parsed)) {
      throw new Error(`Run store at ${this.dbFilePath} is not a valid database file`);
    }
    this.db = parsed;
  }

  private async persist(): Promise<void> {
    await fs.mkdir(path.dirname(this.dbFilePath), { recursive: true });
    await fs.writeFile(this.dbFilePath, JSON.stringify(this.db, null, 2), "utf-8");
  }

  getRun(runId: string): RunRecord | undefined {
    return this.db.runs[runId];
  }

  listRuns(): RunRecord[] {
    return Object.values(this.db.runs).sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async upsertRun(record: RunRecord): Promise<RunRecord> {
    const stored = {
      ...record,
      updatedAt: new Date().toISOString(),
    };
    this.db.runs[record.id] = stored;
    await this.persist();
    return stored;
  }
}
