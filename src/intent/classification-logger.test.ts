import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { ClassificationLogger, CLASSIFICATION_LOG_FILENAME } from './classification-logger.js';
import type { ClassificationLogEntry } from './classification-logger.js';
import { NO_MATCH } from './types.js';
import type { ClassificationResult } from './types.js';

// ============================================================================
// Classification Logger Tests
// ============================================================================

const FIXED_NOW = new Date('2026-03-01T09:30:00.000Z');

function makeResult(overrides: Partial<ClassificationResult> = {}): ClassificationResult {
  return {
    type: 'match',
    intentName: 'searchWeb',
    params: { query: 'cats' },
    ...overrides,
  };
}

describe('ClassificationLogger', () => {
  let tmpDir: string;
  let logger: ClassificationLogger;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'cls-log-'));
    logger = new ClassificationLogger(tmpDir, () => FIXED_NOW);
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe('log()', () => {
    it('writes one JSONL line for a match', async () => {
      await logger.log(makeResult(), 'search for cats');
      const content = await readFile(join(tmpDir, CLASSIFICATION_LOG_FILENAME), 'utf-8');
      expect(content).toBe(
        '{"timestamp":"2026-03-01T09:30:00.000Z","input":"search for cats","matched":true,"intent":"searchWeb","params":{"query":"cats"}}\n',
      );
    });

    it('records a no-match with null intent and empty params', async () => {
      await logger.log(NO_MATCH, 'tell me a joke');
      const [entry] = await logger.readAll();
      expect(entry).toEqual({
        timestamp: '2026-03-01T09:30:00.000Z',
        input: 'tell me a joke',
        matched: false,
        intent: null,
        params: {},
      });
    });

    it('keeps null parameter values', async () => {
      await logger.log(
        makeResult({ intentName: 'playMedia', params: { mediaTitle: 'jazz', mediaService: null } }),
        'play jazz',
      );
      const [entry] = await logger.readAll();
      expect(entry.params).toEqual({ mediaTitle: 'jazz', mediaService: null });
    });

    it('appends without overwriting', async () => {
      await logger.log(makeResult(), 'first');
      await logger.log(makeResult(), 'second');
      const entries = await logger.readAll();
      expect(entries.map((e) => e.input)).toEqual(['first', 'second']);
    });

    it('creates the log directory when missing', async () => {
      const nested = new ClassificationLogger(join(tmpDir, 'a', 'b'), () => FIXED_NOW);
      await nested.log(makeResult(), 'nested');
      expect(await nested.readAll()).toHaveLength(1);
    });

    it('reports write failures on stderr instead of throwing', async () => {
      const blocker = join(tmpDir, 'not-a-dir');
      await writeFile(blocker, 'x', 'utf-8');
      const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      const broken = new ClassificationLogger(join(blocker, 'logs'));
      await expect(broken.log(makeResult(), 'input')).resolves.toBeUndefined();
      expect(stderrSpy).toHaveBeenCalledWith(expect.stringContaining('[classification-logger] Failed to log:'));

      stderrSpy.mockRestore();
    });
  });

  describe('readAll()', () => {
    it('returns an empty array when the file does not exist', async () => {
      expect(await logger.readAll()).toEqual([]);
    });

    it('skips malformed and blank lines', async () => {
      const valid: ClassificationLogEntry = {
        timestamp: FIXED_NOW.toISOString(),
        input: 'open notes',
        matched: true,
        intent: 'openApp',
        params: { appName: 'notes' },
      };
      await writeFile(
        logger.filePath,
        `${JSON.stringify(valid)}\n\nnot json\n${JSON.stringify(valid)}\n`,
        'utf-8',
      );
      expect(await logger.readAll()).toEqual([valid, valid]);
    });
  });
});
