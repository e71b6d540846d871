/**
 * Opens URLs with the platform's default handler.
 *
 * The opener runs detached and without a shell, so the URL is passed as
 * a single argument and never interpreted.
 *
 * @module platform/browser
 */

import { spawn } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';

/** The parts of a child process the opener touches. */
export interface OpenerProcess {
  once(event: string, listener: (...args: unknown[]) => void): unknown;
  unref(): void;
}

export type SpawnOpener = (command: string, args: string[], options: SpawnOptions) => OpenerProcess;

export interface OpenUrlOptions {
  platform?: NodeJS.Platform;
  spawnProcess?: SpawnOpener;
}

/**
 * Command and arguments that open `url` on `platform`.
 */
export function openerCommand(url: string, platform: NodeJS.Platform): { command: string; args: string[] } {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      return { command: 'rundll32', args: ['url.dll,FileProtocolHandler', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

/**
 * Launch the platform opener for `url`.
 *
 * Resolves once the opener process has been spawned; rejects when it
 * cannot be started (e.g. xdg-open is not installed).
 */
export function openUrl(url: string, options: OpenUrlOptions = {}): Promise<void> {
  const platform = options.platform ?? process.platform;
  const spawnProcess: SpawnOpener = options.spawnProcess ?? spawn;
  const { command, args } = openerCommand(url, platform);

  const child = spawnProcess(command, args, { detached: true, stdio: 'ignore' });

  return new Promise<void>((resolve, reject) => {
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
    child.once('error', (err) => {
      reject(err instanceof Error ? err : new Error(String(err)));
    });
  });
}
