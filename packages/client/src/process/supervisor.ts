/**
 * Launches the VPN client and waits for it
 *
 * Order of operations: signals acquired → spawn → pending signal delivered →
 * secret written to stdin → stdin closed → exit observed → signals released.
 */

import { spawn as nodeSpawn, type SpawnOptions } from 'child_process';
import type { Writable } from 'stream';
import { SpawnError, logger } from '@gp-okta/core';
import {
  SignalForwarder,
  exitStatus,
  withSignalForwarding,
  type SignalSource,
  type SignalTarget,
} from './signal-forwarder.js';

/**
 * The parts of ChildProcess the supervisor uses
 */
export interface ChildLike extends SignalTarget {
  readonly stdin: Writable | null;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildLike;

export interface SuperviseOptions {
  command: string;
  args: readonly string[];
  /** Writes the secret; stdin is ended by the supervisor afterwards */
  writeInput?: (stdin: Writable) => void | Promise<void>;
  /** Signals forwarded to the child (default SIGTERM) */
  signals?: readonly NodeJS.Signals[];
  signalSource?: SignalSource;
  spawn?: SpawnFn;
}

/**
 * Run the child to completion
 *
 * @returns the child's exit code, or 128 + signal number if it was killed
 * @throws SpawnError if the command cannot be started
 */
export async function supervise(options: SuperviseOptions): Promise<number> {
  const spawn = options.spawn ?? nodeSpawn;
  const forwarder = new SignalForwarder(options.signals, options.signalSource);

  return withSignalForwarding(forwarder, async () => {
    logger.info(`[supervisor] Launching ${options.command} ${options.args.join(' ')}`);

    const child = spawn(options.command, options.args, {
      stdio: [options.writeInput ? 'pipe' : 'inherit', 'inherit', 'inherit'],
    });

    const exited = new Promise<number>(resolve => {
      child.once('exit', (code, signal) => {
        forwarder.detach();
        logger.info(`[supervisor] ${options.command} exited: code=${code} signal=${signal}`);
        resolve(exitStatus(code, signal));
      });
    });

    await started(child, options.command);
    forwarder.attach(child);

    if (child.stdin) {
      await feedInput(child.stdin, options.writeInput);
    }

    return exited;
  });
}

function started(child: ChildLike, command: string): Promise<void> {
  return new Promise((resolve, reject) => {
    child.once('spawn', resolve);
    child.once('error', error => {
      reject(new SpawnError(command, error.message));
    });
  });
}

async function feedInput(
  stdin: Writable,
  writeInput: SuperviseOptions['writeInput']
): Promise<void> {
  // EPIPE shows up as an 'error' event when the child exits before reading
  stdin.on('error', error => {
    logger.warn(`[supervisor] Could not write to child stdin: ${error.message}`);
  });

  try {
    await writeInput?.(stdin);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`[supervisor] Writing child input failed: ${reason}`);
  }

  await new Promise<void>(resolve => {
    if (stdin.writableFinished || stdin.destroyed) {
      resolve();
      return;
    }
    stdin.once('close', resolve);
    stdin.once('finish', resolve);
    stdin.end();
  });
}
