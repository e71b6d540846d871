// ============================================================================
// Classification Logger
// ============================================================================
// Structured JSONL logger for the classification audit trail.
// Records every classified line with the selected intent, extracted
// parameters and timestamp. Errors during logging are written to stderr
// so logger issues never interrupt a session.

import { appendFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import type { Classification, IntentParams } from './types.js';

export const CLASSIFICATION_LOG_FILENAME = 'classification-log.jsonl';

/**
 * Structured log entry for a single classification event.
 */
export interface ClassificationLogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Raw user input */
  input: string;
  /** Whether an intent was accepted */
  matched: boolean;
  /** Accepted intent name, or null on no-match */
  intent: string | null;
  /** Extracted parameters (empty on no-match) */
  params: IntentParams;
}

/**
 * Append-only JSONL logger for classification results.
 *
 * @example
 * ```ts
 * const logger = new ClassificationLogger('.intent-router/logs');
 * await logger.log(classify(catalog, line), line);
 * const entries = await logger.readAll();
 * ```
 */
export class ClassificationLogger {
  private logDir: string;
  private logFile: string;

  constructor(logDir: string, private readonly now: () => Date = () => new Date()) {
    this.logDir = logDir;
    this.logFile = join(logDir, CLASSIFICATION_LOG_FILENAME);
  }

  /** Absolute or relative path of the JSONL file. */
  get filePath(): string {
    return this.logFile;
  }

  /**
   * Append a classification to the audit log.
   *
   * On error, writes to stderr and returns without throwing.
   */
  async log(result: Classification, input: string): Promise<void> {
    try {
      const entry: ClassificationLogEntry = result.type === 'match'
        ? {
          timestamp: this.now().toISOString(),
          input,
          matched: true,
          intent: result.intentName,
          params: result.params,
        }
        : {
          timestamp: this.now().toISOString(),
          input,
          matched: false,
          intent: null,
          params: {},
        };

      await mkdir(this.logDir, { recursive: true });
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(
        `[classification-logger] Failed to log: ${message}\n`,
      );
    }
  }

  /**
   * Read all entries, skipping malformed or empty lines.
   * Returns an empty array if the file does not exist.
   */
  async readAll(): Promise<ClassificationLogEntry[]> {
    let content: string;
    try {
      content = await readFile(this.logFile, 'utf-8');
    } catch {
      return [];
    }

    const entries: ClassificationLogEntry[] = [];
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      try {
        entries.push(JSON.parse(trimmed) as ClassificationLogEntry);
      } catch {
        // Skip malformed lines
      }
    }

    return entries;
  }
}
