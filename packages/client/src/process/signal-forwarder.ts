/**
 * Termination-signal forwarding to a supervised child
 *
 * Node has no signal mask, so "blocking" a signal means owning its listener:
 * from acquire() until release(), signals are caught here. Before a child is
 * attached they are held as pending; once it is attached they go to the child.
 */

import { constants } from 'os';
import { logger } from '@gp-okta/core';

export type SignalListener = (signal: NodeJS.Signals) => void;

/**
 * Where signals come from and where re-raised ones go. `process` fits.
 */
export interface SignalSource {
  readonly pid: number;
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  removeListener(event: NodeJS.Signals, listener: SignalListener): unknown;
  kill(pid: number, signal: NodeJS.Signals): unknown;
}

export interface SignalTarget {
  readonly pid?: number | undefined;
  kill(signal: NodeJS.Signals): boolean;
}

type ForwarderState = 'idle' | 'waiting' | 'attached' | 'exited' | 'released';

const SIGNAL_NUMBERS: Readonly<Record<string, number>> = { ...constants.signals };

export const DEFAULT_FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM'];

export class SignalForwarder {
  private state: ForwarderState = 'idle';
  private pending: NodeJS.Signals | undefined;
  private child: SignalTarget | undefined;
  private readonly listener: SignalListener = signal => this.handle(signal);

  constructor(
    private readonly signals: readonly NodeJS.Signals[] = DEFAULT_FORWARDED_SIGNALS,
    private readonly source: SignalSource = process
  ) {}

  get pendingSignal(): NodeJS.Signals | undefined {
    return this.pending;
  }

  /**
   * Take over the listed signals. Must run before the child is spawned.
   */
  acquire(): void {
    if (this.state !== 'idle') {
      throw new Error(`SignalForwarder.acquire() called in state ${this.state}`);
    }
    for (const signal of this.signals) {
      this.source.on(signal, this.listener);
    }
    this.state = 'waiting';
  }

  /**
   * Start forwarding to `child`, delivering a pending signal first
   */
  attach(child: SignalTarget): void {
    if (this.state !== 'waiting') {
      throw new Error(`SignalForwarder.attach() called in state ${this.state}`);
    }
    this.child = child;
    this.state = 'attached';

    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      logger.info(`[supervisor] Delivering ${pending} received before launch to pid ${child.pid}`);
      this.deliver(child, pending);
    }
  }

  /**
   * The child is gone; later signals have nowhere to go and are dropped
   */
  detach(): void {
    if (this.state === 'attached') {
      this.state = 'exited';
      this.child = undefined;
    }
  }

  /**
   * Give the signals back. A signal that never reached a child is raised
   * again on this process, now that its default disposition is restored.
   */
  release(): void {
    if (this.state === 'idle' || this.state === 'released') {
      return;
    }
    for (const signal of this.signals) {
      this.source.removeListener(signal, this.listener);
    }
    this.state = 'released';
    this.child = undefined;

    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      logger.info(`[supervisor] Re-raising ${pending} received before launch`);
      this.source.kill(this.source.pid, pending);
    }
  }

  private handle(signal: NodeJS.Signals): void {
    switch (this.state) {
      case 'waiting':
        if (this.pending) {
          logger.debug(`[supervisor] ${signal} coalesced with pending ${this.pending}`);
        } else {
          this.pending = signal;
        }
        return;
      case 'attached':
        if (this.child) {
          this.deliver(this.child, signal);
        }
        return;
      default:
        logger.debug(`[supervisor] Ignoring ${signal} after child exit`);
    }
  }

  private deliver(child: SignalTarget, signal: NodeJS.Signals): void {
    logger.debug(`[supervisor] Forwarding ${signal} to pid ${child.pid}`);
    if (!child.kill(signal)) {
      logger.warn(`[supervisor] Could not deliver ${signal} to pid ${child.pid}`);
    }
  }
}

/**
 * Run `body` with the signals acquired, releasing them on every path
 */
export async function withSignalForwarding<T>(
  forwarder: SignalForwarder,
  body: (forwarder: SignalForwarder) => Promise<T>
): Promise<T> {
  forwarder.acquire();
  try {
    return await body(forwarder);
  } finally {
    forwarder.release();
  }
}

/**
 * Exit status of a finished child: its code, or 128 + the signal number
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  const number = signal !== null ? SIGNAL_NUMBERS[signal] : undefined;
  if (number !== undefined) {
    return 128 + number;
  }
  return 1;
}
