import { promises as fs } from "node:fs";
import path from "node:path";

import { errnoCode, errorMessage } from "./errors.js";
import { SerialQueue } from "./loop/serial-queue.js";
import { logger as rootLogger, type Logger } from "./observability/logger.js";
import type { CycleRecord } from "./types.js";

export interface AuditLog {
  append(record: CycleRecord): Promise<void>;
  /** Newest first. */
  list(limit?: number): Promise<CycleRecord[]>;
  get(id: string): Promise<CycleRecord | null>;
}

function isCycleRecord(value: unknown): value is CycleRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    "startedAt" in value &&
    typeof value.startedAt === "string" &&
    "outcome" in value &&
    typeof value.outcome === "object" &&
    value.outcome !== null &&
    "parsedIntent" in value &&
    typeof value.parsedIntent === "object" &&
    value.parsedIntent !== null
  );
}

function newestFirst(records: CycleRecord[], limit?: number): CycleRecord[] {
  const out = [...records].reverse();
  return limit === undefined ? out : out.slice(0, Math.max(0, limit));
}

export class MemoryAuditLog implements AuditLog {
  private readonly records: CycleRecord[] = [];

  async append(record: CycleRecord): Promise<void> {
    this.records.push(Object.freeze({ ...record }));
  }

  async list(limit?: number): Promise<CycleRecord[]> {
    return newestFirst(this.records, limit);
  }

  async get(id: string): Promise<CycleRecord | null> {
    return this.records.find((r) => r.id === id) ?? null;
  }
}

/** Append-only JSON Lines file, one cycle record per line. */
export class JsonlAuditLog implements AuditLog {
  private readonly queue = new SerialQueue();
  private readonly log: Logger;

  constructor(readonly file: string, logger?: Logger) {
    this.log = (logger ?? rootLogger).child({ component: "audit" });
  }

  append(record: CycleRecord): Promise<void> {
    return this.queue.run(async () => {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
      await fs.appendFile(this.file, `${JSON.stringify(record)}\n`, "utf8");
    });
  }

  async list(limit?: number): Promise<CycleRecord[]> {
    return newestFirst(await this.readAll(), limit);
  }

  async get(id: string): Promise<CycleRecord | null> {
    const records = await this.readAll();
    return records.find((r) => r.id === id) ?? null;
  }

  private async readAll(): Promise<CycleRecord[]> {
    let text: string;
    try {
      text = await fs.readFile(this.file, "utf8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return [];
      throw err;
    }
    const records: CycleRecord[] = [];
    text.split("\n").forEach((line, index) => {
      if (!line.trim()) return;
      try {
        const value: unknown = JSON.parse(line);
        if (isCycleRecord(value)) records.push(value);
        else this.log.warn({ line: index + 1 }, "skipping audit line without a cycle record");
      } catch (err) {
        this.log.warn({ line: index + 1, err: errorMessage(err) }, "skipping unreadable audit line");
      }
    });
    return records;
  }
}
