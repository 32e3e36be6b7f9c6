// Expiry Sweeper - deactivates blocks whose time-to-live has elapsed
//
// Views already hide elapsed blocks, so the sweep only has to make the
// stored state catch up: it moves them into the unblock queues of agents
// that still hold them and frees the cidr for a fresh block.

import type { Id } from '@bhr/protocol';
import type { RepositoryContext } from '@bhr/repositories';
import { systemClock, type Clock } from '../clock.js';
import { errorMessage, silentLogger, type Logger } from '../logging.js';

export type SweepOptions = {
  /** Sweep as of this instant (default: now) */
  now?: Date;
  logger?: Logger;
};

/**
 * Deactivate every active block whose expiresAt is at or before `now`.
 * Running it twice in a row expires nothing the second time.
 *
 * @returns Ids of the blocks expired by this call
 */
export async function sweepExpired(
  repos: RepositoryContext,
  options: SweepOptions = {}
): Promise<Id[]> {
  const logger = options.logger ?? silentLogger;
  const asOf = (options.now ?? new Date()).toISOString();

  const expired = await repos.blocks.expireDue(asOf);
  for (const block of expired) {
    logger.info('Block expired', {
      blockId: block.id,
      cidr: block.cidr,
      expiresAt: block.expiresAt,
    });
  }
  return expired.map((b) => b.id);
}

export type ExpirySweeperOptions = {
  repos: RepositoryContext;
  /** Time between sweeps in milliseconds */
  intervalMs: number;
  logger?: Logger;
  clock?: Clock;
};

/**
 * Runs sweepExpired on a fixed interval.
 *
 * A sweep that is still running when the next tick fires is not
 * overlapped; the tick is skipped. The timer does not keep the process
 * alive on its own.
 */
export class ExpirySweeper {
  private readonly repos: RepositoryContext;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<Id[]> | null = null;

  constructor(options: ExpirySweeperOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error(`intervalMs must be a positive number, got ${options.intervalMs}`);
    }
    this.repos = options.repos;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
    this.logger.info('Started expiry sweeper', { intervalMs: this.intervalMs });
  }

  /**
   * Stop the timer and wait for a sweep in progress to finish.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Stopped expiry sweeper');
    }
    if (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
  }

  /**
   * Sweep once now. Joins the sweep in progress if there is one.
   */
  runOnce(): Promise<Id[]> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const sweep = sweepExpired(this.repos, {
      now: this.clock(),
      logger: this.logger,
    }).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = sweep;
    return sweep;
  }

  private async tick(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug('Previous expiry sweep still running; skipping tick');
      return;
    }
    try {
      const expired = await this.runOnce();
      if (expired.length > 0) {
        this.logger.info('Expiry sweep finished', { expired: expired.length });
      }
    } catch (error) {
      this.logger.error('Expiry sweep failed', { error: errorMessage(error) });
    }
  }
}

export function createExpirySweeper(options: ExpirySweeperOptions): ExpirySweeper {
  return new ExpirySweeper(options);
}
