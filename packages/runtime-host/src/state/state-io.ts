/**
 * Classguard Runtime Host: StateIO
 *
 * An injectable I/O abstraction for the append-only logs under a
 * classguard home directory.
 *
 *   FileStateIO: durable files under `<home>/logs/`
 *   MemoryStateIO: in-memory, for tests and embedded use
 *
 * Callers pass bare log filenames ('decisions.jsonl'); implementations
 * resolve them. Callers never build absolute paths.
 */

import { appendFileSync, mkdirSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';

export interface StateIO {
  /**
   * Append one line. A newline is added after it. Creates the logs
   * directory on demand.
   */
  appendLine(logfilename: string, line: string): void;

  /** Raw content of a log, or '' if it does not exist. */
  readLogRaw(logfilename: string): string;

  /** Remove a log. Removing a missing log is not an error. */
  clearLog(logfilename: string): void;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * File-backed StateIO rooted at a classguard home directory.
 *
 * ENOENT on read means an empty log. Every other I/O error is rethrown.
 * Writes are synchronous: an appended line is on disk when appendLine
 * returns, matching the engine's synchronous decision path.
 */
export class FileStateIO implements StateIO {
  private readonly logsDir: string;

  constructor(homeDir: string) {
    this.logsDir = join(homeDir, 'logs');
  }

  appendLine(logfilename: string, line: string): void {
    mkdirSync(this.logsDir, { recursive: true });
    appendFileSync(join(this.logsDir, logfilename), `${line}\n`, 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.logsDir, logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }

  clearLog(logfilename: string): void {
    rmSync(join(this.logsDir, logfilename), { force: true });
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Instances are isolated from each other.
 */
export class MemoryStateIO implements StateIO {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended so far. Not part of StateIO; for assertions. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    // Same shape as a file written by FileStateIO: every line ends in '\n'.
    return lines.map((l) => `${l}\n`).join('');
  }

  clearLog(logfilename: string): void {
    this.logs.delete(logfilename);
  }
}

function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
