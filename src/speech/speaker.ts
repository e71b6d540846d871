/**
 * Spoken replies through the platform speech command.
 *
 * The reply is written to the command's standard input, never passed
 * as an argument. After the first failure the speaker reports once on
 * stderr and stays silent; the session prints every reply anyway.
 *
 * @module speech/speaker
 */

import { spawn } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';

export interface Speaker {
  speak(text: string): Promise<void>;
}

/** The parts of a child process the speaker touches. */
export interface SpeechProcess {
  readonly stdin: {
    end(chunk: string): unknown;
    once(event: string, listener: (...args: unknown[]) => void): unknown;
  } | null;
  once(event: string, listener: (...args: unknown[]) => void): unknown;
}

export type SpawnSpeech = (command: string, args: string[], options: SpawnOptions) => SpeechProcess;

export interface SystemSpeakerOptions {
  voice?: string;
  platform?: NodeJS.Platform;
  spawnProcess?: SpawnSpeech;
}

/** Environment variable carrying the voice name into the PowerShell script. */
const VOICE_ENV = 'INTENT_ROUTER_VOICE';

const POWERSHELL_SCRIPT = [
  'Add-Type -AssemblyName System.Speech',
  '$s = New-Object System.Speech.Synthesis.SpeechSynthesizer',
  `if ($env:${VOICE_ENV}) { $s.SelectVoice($env:${VOICE_ENV}) }`,
  '$s.Speak([Console]::In.ReadToEnd())',
].join('; ');

/**
 * Command, arguments and extra environment for speaking on `platform`.
 */
export function speechCommand(
  platform: NodeJS.Platform,
  voice?: string,
): { command: string; args: string[]; env?: Record<string, string> } {
  switch (platform) {
    case 'darwin':
      return { command: 'say', args: voice ? ['-v', voice] : [] };
    case 'win32':
      return {
        command: 'powershell',
        args: ['-NoProfile', '-NonInteractive', '-Command', POWERSHELL_SCRIPT],
        env: voice ? { [VOICE_ENV]: voice } : undefined,
      };
    default:
      return { command: 'espeak', args: voice ? ['-v', voice, '--stdin'] : ['--stdin'] };
  }
}

/**
 * Speaks through `say`, PowerShell System.Speech or espeak.
 */
export class SystemSpeaker implements Speaker {
  private readonly platform: NodeJS.Platform;
  private readonly spawnProcess: SpawnSpeech;
  private available = true;

  constructor(private readonly options: SystemSpeakerOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.spawnProcess = options.spawnProcess ?? spawn;
  }

  /** False once the speech command has failed. */
  isAvailable(): boolean {
    return this.available;
  }

  async speak(text: string): Promise<void> {
    if (!this.available || text.trim().length === 0) {
      return;
    }

    const { command, args, env } = speechCommand(this.platform, this.options.voice);
    const error = await this.run(command, args, env, text);
    if (error) {
      this.available = false;
      process.stderr.write(`[speaker] Speech disabled, '${command}' failed: ${error}\n`);
    }
  }

  /** Resolves with an error description, or null on success. */
  private run(
    command: string,
    args: string[],
    env: Record<string, string> | undefined,
    text: string,
  ): Promise<string | null> {
    const child = this.spawnProcess(command, args, {
      stdio: ['pipe', 'ignore', 'ignore'],
      env: env ? { ...process.env, ...env } : process.env,
    });

    return new Promise<string | null>((resolve) => {
      let settled = false;
      const settle = (result: string | null) => {
        if (!settled) {
          settled = true;
          resolve(result);
        }
      };
      const describe = (err: unknown) => (err instanceof Error ? err.message : String(err));

      child.once('error', (err) => settle(describe(err)));
      child.once('close', (code) => settle(code === 0 ? null : `exited with code ${String(code)}`));

      if (child.stdin) {
        child.stdin.once('error', (err) => settle(describe(err)));
        child.stdin.end(text);
      }
    });
  }
}
