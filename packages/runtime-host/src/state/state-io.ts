/**
 * Holdback Runtime Host — StateIO Interface
 *
 * A queue-scoped, injectable I/O abstraction for reading and writing JSON
 * state files and appending to JSONL log files.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a specific queue directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Everything that persists queue data takes a StateIO rather than a path, so
 * two queues can never read or write each other's files.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * File names are relative; the implementation decides where they live.
 *
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory of the queue
 * - appendLine and readLogRaw address the `logs/` subdirectory of the queue
 */
export interface StateIO {
  /**
   * Read and parse a JSON file.
   *
   * Returns undefined if the file does not exist or is not valid JSON. The
   * parsed value is not trusted: callers narrow it before use.
   */
  readJson(filename: string): unknown;

  /** Serialize `value` as JSON, replacing the file. Creates `state/` on demand. */
  writeJson(filename: string, value: unknown): void;

  /** Append `line` plus a newline to a log file. Creates `logs/` on demand. */
  appendLine(logfilename: string, line: string): void;

  /** Raw text of a log file; empty string if it does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable StateIO for one queue directory.
 *
 *   <queueDir>/state/<filename>
 *   <queueDir>/logs/<logfilename>
 *
 * Synchronous I/O matches the CLI's single-process design.
 * ENOENT and SyntaxError on read are recoverable; other errors are rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly queueDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.queueDir, 'state', filename);
    try {
      const raw = readFileSync(filePath, 'utf-8');
      return JSON.parse(raw) as unknown;
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.queueDir, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.queueDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.queueDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Instances are isolated from each other.
 *
 * writeJson round-trips through JSON so tests see exactly what FileStateIO
 * would persist (undefined dropped, no bigint, no Map).
 */
export class MemoryStateIO implements StateIO {
  private readonly files: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    const raw = this.files.get(filename);
    return raw === undefined ? undefined : (JSON.parse(raw) as unknown);
  }

  writeJson(filename: string, value: unknown): void {
    this.files.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Lines appended to a log file. Specific to MemoryStateIO, for asserting
   * on log output in tests.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Same shape as FileStateIO: every line ends with '\n'.
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
