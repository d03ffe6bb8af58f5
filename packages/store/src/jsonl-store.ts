/**
 * @tally/store — File-based JSONL LedgerStore implementation.
 *
 * Persists every committed transaction as one JSON line in a `.jsonl`
 * journal, so a transaction is replayed entirely or not at all.
 *
 * Crash safety:
 * - Each commit is a single write followed by fsync before it is applied
 * - Torn or corrupt lines are detected and skipped on load
 * - A failed append or fsync is truncated away before the error is reported
 * - After a torn write found on load, the next write starts on a fresh line
 * - Compaction writes a checkpoint to a temp file and renames it into place
 *
 * The journal is the source of truth; in-memory state is derived.
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  writeFileSync,
  readFileSync,
  renameSync,
  existsSync,
  fsyncSync,
  fstatSync,
  ftruncateSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import { InMemoryLedgerStore } from "./in-memory-store.js";
import type { InMemoryLedgerStoreOptions } from "./in-memory-store.js";
import { decodeRecord, encodeRecord } from "./journal.js";
import { LedgerState } from "./state.js";
import type { Commit } from "./types.js";
import { StoreError } from "./types.js";

/**
 * Options for creating a JsonlLedgerStore.
 */
export interface JsonlLedgerStoreOptions extends InMemoryLedgerStoreOptions {
  /** Path to the JSONL journal */
  readonly filePath: string;
}

/**
 * What happened while replaying the journal on open.
 */
export interface RecoveryReport {
  /** Commits replayed */
  readonly commits: number;
  /** Checkpoints loaded */
  readonly checkpoints: number;
  /** Lines skipped as torn, malformed or inconsistent */
  readonly skipped: number;
}

export class JsonlLedgerStore extends InMemoryLedgerStore {
  private readonly _filePath: string;
  private readonly _recovery: RecoveryReport;

  /** Set when the journal does not end with a newline */
  private _needsLineBreak = false;

  /**
   * Set when a failed write could not be truncated away. The journal
   * may then hold a commit that was reported as failed, so nothing
   * more is appended until compact() rewrites it from memory.
   */
  private _failed = false;

  /**
   * Open a journal.
   *
   * If the file exists, it is replayed. If not, it is created on the
   * first commit. The parent directory is created if missing.
   */
  constructor(options: JsonlLedgerStoreOptions) {
    super(options);
    this._filePath = options.filePath;

    mkdirSync(dirname(this._filePath), { recursive: true });
    this._recovery = this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  get recovery(): RecoveryReport {
    return this._recovery;
  }

  /**
   * Rewrite the journal as a single checkpoint of the current state.
   *
   * The old journal stays in place until the new one is fully on disk.
   */
  compact(): void {
    this.assertWritable();

    const record = encodeRecord({ type: "checkpoint", seq: this._seq, ...this._state.checkpoint() });
    const tempPath = `${this._filePath}.tmp`;

    try {
      const fd = openSync(tempPath, "w");
      try {
        writeFileSync(fd, record, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tempPath, this._filePath);
    } catch (err) {
      throw new StoreError(
        "STORAGE_FAILURE",
        `Failed to compact ledger journal "${this._filePath}": ${describe(err)}`,
        { cause: err },
      );
    }

    this._needsLineBreak = false;
    this._failed = false;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  protected override persist(commit: Commit): void {
    if (this._failed) {
      throw new StoreError(
        "STORAGE_FAILURE",
        `Ledger journal "${this._filePath}" holds an unconfirmed write; compact or reopen the store`,
      );
    }

    const line = encodeRecord({ type: "commit", ...commit });
    this._writeAndSync(this._needsLineBreak ? "\n" + line : line);
    this._needsLineBreak = false;
  }

  /**
   * Replay the journal into memory.
   *
   * A line is applied whole or skipped whole.
   */
  private _loadFromFile(): RecoveryReport {
    let commits = 0;
    let checkpoints = 0;
    let skipped = 0;

    if (!existsSync(this._filePath)) {
      return { commits, checkpoints, skipped };
    }

    const content = readFileSync(this._filePath, "utf-8");
    this._needsLineBreak = content.length > 0 && !content.endsWith("\n");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      const record = decodeRecord(trimmed);
      if (record === undefined) {
        skipped++;
        continue;
      }

      try {
        if (record.type === "checkpoint") {
          this._state = LedgerState.fromCheckpoint(record);
          checkpoints++;
        } else {
          this._state.apply(record.ops);
          commits++;
        }
      } catch (err) {
        if (err instanceof StoreError) {
          skipped++;
          continue;
        }
        throw err;
      }

      this._seq = Math.max(this._seq, record.seq);
    }

    return { commits, checkpoints, skipped };
  }

  /**
   * Append `data` and fsync it. On failure the file is truncated back to
   * its previous length, so a commit reported as failed is never replayed.
   */
  private _writeAndSync(data: string): void {
    let fd: number | undefined;
    let size: number | undefined;

    try {
      fd = openSync(this._filePath, "a");
      size = fstatSync(fd).size;
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } catch (err) {
      const restored = fd === undefined || size === undefined || this._truncate(fd, size);
      if (!restored) {
        this._failed = true;
      }
      throw new StoreError(
        "STORAGE_FAILURE",
        `Failed to write ledger journal "${this._filePath}": ${describe(err)}` +
          (restored ? "" : " (the partial write could not be removed)"),
        { cause: err },
      );
    } finally {
      if (fd !== undefined) {
        closeSync(fd);
      }
    }
  }

  /**
   * @returns false if the journal could not be restored to `size` bytes
   */
  private _truncate(fd: number, size: number): boolean {
    try {
      ftruncateSync(fd, size);
      fsyncSync(fd);
      return true;
    } catch {
      return false;
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
