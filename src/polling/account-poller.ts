/**
 * ACCOUNT POLLER
 * ==============
 * The main polling loop.
 *
 * What it does:
 * 1. Fetches the address's positions and recent fills every interval
 * 2. Compares the new snapshot with the one kept from the last cycle
 * 3. Hands each detected change to the notifier, in order
 *
 * States:
 *   cold-start → first successful fetch stores the baseline and sends a
 *                startup message instead of diffing
 *   steady     → every cycle diffs against the stored snapshot; a failed
 *                fetch leaves the stored snapshot untouched
 *   shutdown   → entered once the stop signal fires; terminal
 *
 * Cycles never overlap: the next one is scheduled only after the previous
 * one has finished fetching, diffing and notifying.
 *
 * @example
 * const controller = new AbortController();
 * const poller = new AccountPoller(config, { fetcher: api, notifier });
 * poller.on('change', (change) => console.log(ChangeDetector.formatChange(change)));
 * // Listeners run inside the cycle; an exception is logged and skipped
 * process.on('SIGINT', () => controller.abort('SIGINT'));
 * await poller.run(controller.signal);
 */

import { EventEmitter } from 'eventemitter3';
import { setTimeout as delay } from 'timers/promises';
import { ChangeDetector } from './change-detector';
import { createSnapshot, sortedPositions } from './snapshot';
import {
  ChangeEvent,
  CycleResult,
  MonitorEvent,
  Notifier,
  PollerConfig,
  PollerState,
  Snapshot,
  SnapshotFetcher,
} from '../types';
import { classifyError, errorMessage } from '../utils/errors';
import { Logger, logger as defaultLogger } from '../utils/logger';

/**
 * Events emitted by the AccountPoller
 */
export interface PollerEvents {
  /** A change was detected between two snapshots */
  change: (change: ChangeEvent) => void;

  /** Each cycle finished, whatever its outcome */
  cycle: (result: CycleResult) => void;

  /** Fetching the snapshot failed */
  error: (error: Error) => void;

  /** Loop started */
  start: () => void;

  /** Loop entered shutdown */
  stop: (reason: string) => void;

  /** Multiple consecutive errors - degraded state */
  degraded: (errorCount: number) => void;

  /** Recovered from degraded state */
  recovered: () => void;
}

/**
 * Waits `ms`, resolving early (not rejecting) when `signal` aborts
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
};

export interface PollerDependencies {
  fetcher: SnapshotFetcher;
  notifier: Notifier;
  detector?: ChangeDetector;
  logger?: Logger;
  timeProvider?: () => number;
  sleep?: Sleeper;
}

export class AccountPoller extends EventEmitter<PollerEvents> {
  // Dependencies
  private fetcher: SnapshotFetcher;
  private notifier: Notifier;
  private detector: ChangeDetector;
  private logger: Logger;
  private timeProvider: () => number;
  private sleep: Sleeper;

  // Configuration
  private config: PollerConfig;

  // State
  private state: PollerState = { phase: 'cold-start' };
  private isRunning = false;
  private consecutiveErrors = 0;
  private pollCount = 0;
  private changesDetected = 0;
  private failedCycles = 0;
  private deliveryFailures = 0;
  private lastPollTime: Date | null = null;

  constructor(config: PollerConfig, deps: PollerDependencies) {
    super();

    this.config = config;
    this.fetcher = deps.fetcher;
    this.notifier = deps.notifier;
    this.detector = deps.detector ?? new ChangeDetector();
    this.logger = deps.logger ?? defaultLogger;
    this.timeProvider = deps.timeProvider ?? Date.now;
    this.sleep = deps.sleep ?? sleep;
  }

  /**
   * Run cycles until `signal` aborts, then shut down.
   * Resolves once the shutdown notification was attempted and
   * network resources were released.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('[Poller] Already running');
      return;
    }
    if (this.state.phase === 'shutdown') {
      this.logger.warn('[Poller] Already shut down');
      return;
    }

    this.logger.info('='.repeat(50));
    this.logger.info('[Poller] 🚀 Starting Account Poller');
    this.logger.info(`  Address:  ${this.config.address}`);
    this.logger.info(`  Interval: ${this.config.intervalMs}ms`);
    this.logger.info(`  Fills:    last ${this.config.fillsLimit}`);
    this.logger.info('='.repeat(50));

    this.isRunning = true;
    this.emitSafely('start', () => this.emit('start'));

    const stopped = new Promise<void>(resolve => {
      if (signal.aborted) resolve();
      else signal.addEventListener('abort', () => resolve(), { once: true });
    });

    let abandoned = false;
    while (!signal.aborted) {
      const cycleStart = this.timeProvider();

      const finished = await this.awaitCycle(this.runCycle(), stopped);
      if (!finished) {
        abandoned = true;
        break;
      }
      if (signal.aborted) break;

      // Sleep only the remaining interval (subtract time the cycle took)
      const elapsed = this.timeProvider() - cycleStart;
      const wait = Math.max(0, this.config.intervalMs - elapsed);
      this.logger.debug(`[Poller] Next check in ${wait}ms`);
      await this.sleep(wait, signal);
    }

    // An abandoned cycle still holds open requests: cut them rather than wait
    await this.shutdown(describeReason(signal.reason), abandoned);
    this.isRunning = false;
  }

  /**
   * Perform a single fetch → diff → notify cycle.
   * Never rejects: failures are logged, reported and left for the next tick.
   */
  async runCycle(): Promise<CycleResult> {
    if (this.isShutdown()) {
      return { status: 'skipped', events: [] };
    }

    this.pollCount++;

    let current: Snapshot;
    try {
      current = await this.fetchSnapshot();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (this.isShutdown()) {
        return this.finishCycle({ status: 'skipped', events: [], error: err });
      }
      await this.handleFetchError(err);
      return this.finishCycle({ status: 'failed', events: [], error: err });
    }

    const state = this.state;

    // Stop signal arrived while the request was in flight
    if (state.phase === 'shutdown') {
      return this.finishCycle({ status: 'skipped', events: [] });
    }

    this.lastPollTime = current.capturedAt;
    this.markHealthy();

    if (state.phase === 'cold-start') {
      this.state = { phase: 'steady', previous: current };
      this.logInitialSnapshot(current);
      await this.deliver({
        kind: 'startup',
        address: this.config.address,
        positions: sortedPositions(current),
        fillCount: current.fills.length,
        at: current.capturedAt,
      });
      return this.finishCycle({ status: 'initialized', events: [] });
    }

    const events = this.detector.detectChanges(state.previous, current);
    this.state = { phase: 'steady', previous: current };

    for (const event of events) {
      if (this.isShutdown()) break;
      this.changesDetected++;
      this.logger.info(`[Poller] ${ChangeDetector.formatChange(event)}`);
      this.emitSafely('change', () => this.emit('change', event));
      await this.deliver(event);
    }

    if (events.length === 0) {
      this.logger.info(`[Poller] No changes (poll #${this.pollCount})`);
    }

    return this.finishCycle({ status: 'completed', events });
  }

  /**
   * Current state slot (the previous snapshot lives here while steady)
   */
  getState(): PollerState {
    return this.state;
  }

  /**
   * Get current stats
   */
  getStats() {
    return {
      phase: this.state.phase,
      isRunning: this.isRunning,
      pollCount: this.pollCount,
      changesDetected: this.changesDetected,
      failedCycles: this.failedCycles,
      deliveryFailures: this.deliveryFailures,
      consecutiveErrors: this.consecutiveErrors,
      lastPollTime: this.lastPollTime,
      address: this.config.address,
    };
  }

  private async fetchSnapshot(): Promise<Snapshot> {
    const [positions, fills] = await Promise.all([
      this.fetcher.fetchPositions(this.config.address),
      this.fetcher.fetchFills(this.config.address, this.config.fillsLimit),
    ]);
    return createSnapshot(positions, fills, new Date(this.timeProvider()));
  }

  /**
   * Wait for a cycle; once stopping, give it at most the grace period
   *
   * @returns false when the cycle was abandoned
   */
  private async awaitCycle(cycle: Promise<CycleResult>, stopped: Promise<void>): Promise<boolean> {
    const first = await Promise.race([
      cycle.then(() => 'done' as const),
      stopped.then(() => 'stopping' as const),
    ]);
    if (first === 'done') return true;

    const grace = new AbortController();
    const outcome = await Promise.race([
      cycle.then(() => 'done' as const),
      this.sleep(this.config.shutdownGraceMs, grace.signal).then(() => 'timeout' as const),
    ]);
    grace.abort();

    if (outcome === 'timeout') {
      this.logger.warn(`[Poller] Abandoning in-flight cycle after ${this.config.shutdownGraceMs}ms grace period`);
      return false;
    }
    return true;
  }

  /**
   * Handle a failed fetch: the stored snapshot stays as it was
   */
  private async handleFetchError(error: Error): Promise<void> {
    this.consecutiveErrors++;
    this.failedCycles++;

    const errorKind = classifyError(error);
    this.logger.error(`[Poller] ❌ Error #${this.consecutiveErrors} (${errorKind}): ${error.message}`);

    this.emitSafely('error', () => this.emit('error', error));

    // Check for degraded state
    if (this.consecutiveErrors === this.config.maxConsecutiveErrors) {
      this.logger.error(`[Poller] ⚠️ DEGRADED: ${this.consecutiveErrors} consecutive errors!`);
      this.emitSafely('degraded', () => this.emit('degraded', this.consecutiveErrors));
    }

    await this.deliver({
      kind: 'error',
      address: this.config.address,
      errorKind,
      message: error.message,
      consecutiveFailures: this.consecutiveErrors,
      at: new Date(this.timeProvider()),
    });
  }

  private markHealthy(): void {
    if (this.consecutiveErrors >= this.config.maxConsecutiveErrors) {
      // We were in degraded state, now recovered
      this.logger.info('[Poller] ✅ Recovered from errors');
      this.emitSafely('recovered', () => this.emit('recovered'));
    }
    this.consecutiveErrors = 0;
  }

  /**
   * Best-effort delivery: a failed notification is logged, never retried
   */
  private async deliver(event: MonitorEvent): Promise<void> {
    try {
      await this.notifier.notify(event);
    } catch (error) {
      this.deliveryFailures++;
      this.logger.warn(`[Poller] Failed to deliver ${event.kind} notification: ${errorMessage(error)}`);
    }
  }

  private async shutdown(reason: string, force: boolean): Promise<void> {
    this.state = { phase: 'shutdown' };
    this.emitSafely('stop', () => this.emit('stop', reason));

    this.logger.info(`[Poller] ⏹️ Stopping (${reason})`);
    this.logger.info(`  Total polls: ${this.pollCount}`);
    this.logger.info(`  Changes detected: ${this.changesDetected}`);

    await this.deliver({
      kind: 'shutdown',
      address: this.config.address,
      reason,
      at: new Date(this.timeProvider()),
    });

    await this.closeQuietly('fetcher', this.fetcher, force);
    await this.closeQuietly('notifier', this.notifier, force);
  }

  private async closeQuietly(
    name: string,
    resource: SnapshotFetcher | Notifier,
    force: boolean
  ): Promise<void> {
    if (!resource.close) return;
    try {
      await resource.close(force);
    } catch (error) {
      this.logger.warn(`[Poller] Failed to close ${name}: ${errorMessage(error)}`);
    }
  }

  private finishCycle(result: CycleResult): CycleResult {
    this.emitSafely('cycle', () => this.emit('cycle', result));
    return result;
  }

  /**
   * Listeners run synchronously inside the cycle; one that throws must not
   * abort the cycle or the deliveries still queued behind it
   */
  private emitSafely(event: keyof PollerEvents, fire: () => void): void {
    try {
      fire();
    } catch (error) {
      this.logger.warn(`[Poller] '${event}' listener threw: ${errorMessage(error)}`);
    }
  }

  private isShutdown(): boolean {
    return this.state.phase === 'shutdown';
  }

  /**
   * Log a summary of the baseline snapshot
   */
  private logInitialSnapshot(snapshot: Snapshot): void {
    this.logger.info(
      `[Poller] 📥 Initial snapshot: ${snapshot.positions.size} positions, ${snapshot.fills.length} recent fills`
    );

    for (const pos of sortedPositions(snapshot)) {
      this.logger.info(`  • ${pos.side} ${pos.size} ${pos.asset} @ ${pos.entryPrice} (${pos.leverage}x)`);
    }
  }
}

function describeReason(reason: unknown): string {
  if (typeof reason === 'string' && reason !== '') return reason;
  if (reason instanceof Error && reason.name !== 'AbortError') return reason.message;
  return 'stop signal received';
}
