import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType } from "@pubkit/schemas";
import { validateJournalEventData } from "@pubkit/schemas";

export interface JournalOptions {
  fsync?: boolean;
  /** Acquire an advisory lockfile so two publish processes never share a journal. Default: true */
  lock?: boolean;
  /** "truncate" (default) drops events after a broken hash link on init; "strict" throws. */
  recovery?: "truncate" | "strict";
}

export type JournalListener = (event: JournalEvent) => void;

/**
 * Append-only JSONL record of publish runs. Each line carries the sha256 of
 * the previous line in `hash_prev`, so edits to history are detectable.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private runIndex = new Map<string, JournalEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private recovery: "truncate" | "strict";

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.lockEnabled = options?.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.recovery = options?.recovery ?? "truncate";
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (this.lockEnabled) {
      await this.acquireLock();
    }
    try {
      await this.load();
    } catch (err) {
      if (this.locked) await this.releaseLock();
      throw err;
    }
  }

  private async load(): Promise<void> {
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.split("\n").filter(Boolean);

    // A crash mid-append leaves a partial last line
    if (lines.length > 0 && parseLine(lines[lines.length - 1]!) === undefined) {
      lines.pop();
      await writeFile(this.filePath, joinLines(lines), "utf-8");
      console.error(`[journal] truncated incomplete last line in ${this.filePath}`);
    }

    let prevHash: string | undefined;
    let maxSeq = -1;
    const index = new Map<string, JournalEvent[]>();
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]!;
      const event = parseLine(line);
      if (event === undefined || (i > 0 && event.hash_prev !== prevHash)) {
        const reason = event === undefined ? "malformed line" : `seq=${event.seq ?? "?"}, hash chain broken`;
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at event ${i} (${reason})`);
        }
        console.error(`[journal] ${reason} at event ${i}, dropped ${lines.length - i} events`);
        await writeFile(this.filePath, joinLines(lines.slice(0, i)), "utf-8");
        break;
      }
      prevHash = this.hash(line);
      const bucket = index.get(event.run_id);
      if (bucket) bucket.push(event);
      else index.set(event.run_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    this.runIndex = index;
    this.lastHash = prevHash;
    this.nextSeq = maxSeq + 1;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(
    runId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;
      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        run_id: runId,
        type,
        payload,
        hash_prev: this.lastHash,
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only advance in-memory state once the line is on disk
      this.nextSeq = seq + 1;
      this.lastHash = this.hash(line);
      const bucket = this.runIndex.get(runId);
      if (bucket) bucket.push(event);
      else this.runIndex.set(runId, [event]);

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error(`[journal] listener failed on ${type}:`, err);
        }
      }

      return event;
    } finally {
      releaseLock();
    }
  }

  /** Like emit, but a failed write is reported on stderr instead of thrown. */
  async tryEmit(
    runId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(runId, type, payload);
    } catch (err) {
      console.error(`[journal] failed to record ${type}:`, err instanceof Error ? err.message : String(err));
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events = content.split("\n").filter(Boolean)
      .map((line) => JSON.parse(line) as JournalEvent);
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readRun(runId: string): JournalEvent[] {
    return [...(this.runIndex.get(runId) ?? [])];
  }

  listRuns(): string[] {
    return [...this.runIndex.keys()];
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    const events = await this.readAll();
    let prevHash: string | undefined;
    for (let i = 0; i < events.length; i++) {
      const event = events[i]!;
      if (i > 0 && event.hash_prev !== prevHash) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(JSON.stringify(event));
    }
    return { valid: true };
  }

  /** Waits for pending writes and releases the lockfile. */
  async close(): Promise<void> {
    await this.writeLock;
    if (this.locked) {
      await this.releaseLock();
    }
  }

  getFilePath(): string {
    return this.filePath;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }

  private async acquireLock(retried = false): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
      return;
    } catch (err: unknown) {
      if (!isErrno(err) || err.code !== "EEXIST" || retried) throw err;
    }

    const pid = parseInt(await readFile(this.lockPath, "utf-8").catch(() => ""), 10);
    if (!Number.isNaN(pid) && pid !== process.pid && isAlive(pid)) {
      throw new Error(`Journal is locked by process ${pid} (lockfile: ${this.lockPath})`);
    }
    // Stale lock: owner is gone, unreadable, or ourselves from an unclosed journal
    await unlink(this.lockPath).catch(() => undefined);
    return this.acquireLock(true);
  }

  private async releaseLock(): Promise<void> {
    await unlink(this.lockPath).catch(() => undefined);
    this.locked = false;
  }
}

/** The event on a journal line, or undefined when the line is not a JSON object. */
function parseLine(line: string): JournalEvent | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return undefined;
  }
  return typeof value === "object" && value !== null ? (value as JournalEvent) : undefined;
}

function joinLines(lines: string[]): string {
  return lines.length > 0 ? lines.join("\n") + "\n" : "";
}

function isErrno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    return !(isErrno(err) && err.code === "ESRCH");
  }
}
