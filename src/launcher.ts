import { spawn, type SpawnOptions } from 'node:child_process';
import { constants } from 'node:os';
import { fileURLToPath } from 'node:url';
import type { Launcher, ServiceHandle } from './bootstrap.js';

export interface ChildLike {
  readonly pid?: number;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildLike;

/** The bundled Fastify service, run by the current Node binary. */
export function defaultServiceCommand(): string[] {
  return [process.execPath, fileURLToPath(new URL('./server.js', import.meta.url))];
}

export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal) return 128 + (constants.signals[signal] ?? 0);
  return 1;
}

/**
 * Starts the service as a child with inherited stdio and environment, plus BIND and
 * WEB_CONCURRENCY. Resolves once the process has spawned.
 */
export function createLauncher(opts: {
  command?: string[];
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnFn;
} = {}): Launcher {
  const spawnFn: SpawnFn = opts.spawn ?? spawn;

  return async ({ bind, workers }): Promise<ServiceHandle> => {
    const [command, ...args] = opts.command ?? defaultServiceCommand();
    if (!command) throw new Error('Service command is empty');

    const child = spawnFn(command, args, {
      stdio: 'inherit',
      env: { ...(opts.env ?? process.env), BIND: bind, WEB_CONCURRENCY: String(workers) },
    });

    await new Promise<void>((resolve, reject) => {
      child.once('spawn', resolve);
      child.once('error', reject);
    });

    const exited = new Promise<number>((resolve, reject) => {
      child.once('exit', (code, signal) => resolve(exitCodeOf(code, signal)));
      child.once('error', reject);
    });

    return {
      pid: child.pid,
      exited,
      kill: (signal) => {
        child.kill(signal);
      },
    };
  };
}
