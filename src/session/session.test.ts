/**
 * Tests for the interactive session loop.
 *
 * @clack/prompts is mocked: queued text() results stand in for the
 * user's input, and any symbol counts as a cancel.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

vi.mock('@clack/prompts', () => ({
  text: vi.fn(),
  isCancel: vi.fn((value: unknown) => typeof value === 'symbol'),
  intro: vi.fn(),
  outro: vi.fn(),
  log: {
    message: vi.fn(),
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    success: vi.fn(),
  },
}));

import * as p from '@clack/prompts';
import { runSession, GOODBYE_REPLY, CANCEL_REPLY } from './session.js';
import { IntentCatalog } from '../intent/intent-catalog.js';
import { ClassificationLogger } from '../intent/classification-logger.js';
import { SkillDispatcher } from '../skills/dispatcher.js';
import type { Skill } from '../skills/types.js';
import type { Speaker } from '../speech/speaker.js';

const mockText = vi.mocked(p.text);
const mockMessage = vi.mocked(p.log.message);

function queueInput(...values: Array<string | symbol>): void {
  for (const value of values) {
    mockText.mockResolvedValueOnce(value);
  }
}

/** Reply text printed for each turn, without the colored prefix. */
function printedReplies(): string[] {
  return mockMessage.mock.calls.map(([line]) => {
    const text = String(line);
    return text.slice(text.indexOf(' ') + 1);
  });
}

function createCatalog(): IntentCatalog {
  return IntentCatalog.build([
    { intent_name: 'greet', regex_pattern: '(?:hello|hi)\\b', entity_keys: [], keywords: [] },
    { intent_name: 'echo', regex_pattern: 'say (.+)', entity_keys: ['words'] },
  ]);
}

describe('runSession', () => {
  let greet: Skill;
  let dispatcher: SkillDispatcher;

  beforeEach(() => {
    vi.clearAllMocks();
    greet = vi.fn<Skill>().mockResolvedValue('Hello there.');
    dispatcher = new SkillDispatcher(new Map([['greet', greet]]));
  });

  it('answers each line until quit', async () => {
    queueInput('hello', 'tell me a joke', 'QUIT');

    const summary = await runSession({ catalog: createCatalog(), dispatcher });

    expect(summary).toEqual({ turns: 2, endedBy: 'quit' });
    expect(printedReplies()).toEqual(['Hello there.', "Sorry, I didn't understand that.", GOODBYE_REPLY]);
  });

  it('stops with a farewell on cancel', async () => {
    queueInput(Symbol('cancel'));

    const summary = await runSession({ catalog: createCatalog(), dispatcher });

    expect(summary).toEqual({ turns: 0, endedBy: 'cancel' });
    expect(printedReplies()).toEqual([CANCEL_REPLY]);
  });

  it('skips empty lines', async () => {
    queueInput('', '   ', 'exit');

    const summary = await runSession({ catalog: createCatalog(), dispatcher });

    expect(summary.turns).toBe(0);
    expect(mockText).toHaveBeenCalledTimes(3);
    expect(printedReplies()).toEqual([GOODBYE_REPLY]);
  });

  it('speaks every reply when a speaker is given', async () => {
    const speak = vi.fn<Speaker['speak']>().mockResolvedValue(undefined);
    queueInput('hi', 'exit');

    await runSession({ catalog: createCatalog(), dispatcher, speaker: { speak } });

    expect(speak.mock.calls).toEqual([['Hello there.'], [GOODBYE_REPLY]]);
  });

  it('reports a failed turn and keeps going', async () => {
    vi.spyOn(dispatcher, 'dispatch').mockRejectedValueOnce(new Error('boom'));
    queueInput('hello', 'hello', 'exit');

    const summary = await runSession({ catalog: createCatalog(), dispatcher });

    expect(p.log.error).toHaveBeenCalledWith('An error occurred while handling that request: boom');
    expect(summary.turns).toBe(1);
  });

  describe('with a classification log', () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await mkdtemp(join(tmpdir(), 'session-'));
    });

    afterEach(async () => {
      await rm(tmpDir, { recursive: true, force: true });
    });

    it('records every classified line', async () => {
      const logger = new ClassificationLogger(tmpDir, () => new Date('2024-01-01T00:00:00.000Z'));
      queueInput('Say Good Night', 'nonsense', 'quit');

      await runSession({ catalog: createCatalog(), dispatcher, logger });

      expect(await logger.readAll()).toEqual([
        {
          timestamp: '2024-01-01T00:00:00.000Z',
          input: 'Say Good Night',
          matched: true,
          intent: 'echo',
          params: { words: 'good night' },
        },
        {
          timestamp: '2024-01-01T00:00:00.000Z',
          input: 'nonsense',
          matched: false,
          intent: null,
          params: {},
        },
      ]);
    });
  });
});
