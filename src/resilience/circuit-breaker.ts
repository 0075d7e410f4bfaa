/**
 * Circuit Breaker
 *
 * closed ──N failures──▶ open ──cooldown──▶ half_open ──success──▶ closed
 *                          ▲                    │
 *                          └──────failure───────┘
 *
 * All transitions are synchronous; allow() both decides and claims the
 * half-open trial slot, so concurrent callers in one process cannot both win it.
 */

import { BreakerConfig, BreakerState, BreakerStatus } from './types';
import { logger, Logger } from '../observability/logger';
import { breakerState } from '../observability/metrics';

const STATUS_GAUGE: Record<BreakerStatus, number> = { closed: 0, half_open: 1, open: 2 };

export class CircuitBreaker {
  private readonly state: BreakerState = {
    status: 'closed',
    consecutiveFailures: 0,
    trialInFlight: false,
  };
  private readonly log: Logger;

  constructor(
    private readonly config: BreakerConfig,
    private readonly now: () => number = Date.now,
  ) {
    if (!Number.isInteger(config.failureThreshold) || config.failureThreshold < 1) {
      throw new RangeError(`failureThreshold must be a positive integer (got ${config.failureThreshold})`);
    }
    this.log = logger.child({ component: 'circuit-breaker', target: config.target });
    breakerState.set({ target: config.target }, STATUS_GAUGE.closed);
  }

  /** May a call go upstream right now? */
  allow(): boolean {
    switch (this.state.status) {
      case 'closed':
        return true;
      case 'open': {
        const openedAt = this.state.openedAt ?? 0;
        if (this.now() - openedAt < this.config.cooldownMs) return false;
        this.transition('half_open');
        this.state.trialInFlight = true;
        return true;
      }
      case 'half_open':
        if (this.state.trialInFlight) return false;
        this.state.trialInFlight = true;
        return true;
    }
  }

  /**
   * Only the half-open trial closes the circuit. A call admitted while closed
   * that finishes after the circuit opened leaves it open.
   */
  recordSuccess(): void {
    this.state.consecutiveFailures = 0;
    this.state.lastError = undefined;
    if (this.state.status === 'half_open') {
      this.state.trialInFlight = false;
      this.state.openedAt = undefined;
      this.transition('closed');
    }
  }

  recordFailure(error?: string): void {
    this.state.consecutiveFailures++;
    this.state.lastError = error;

    if (this.state.status === 'half_open') {
      this.state.trialInFlight = false;
      this.open();
    } else if (this.state.status === 'closed' && this.state.consecutiveFailures >= this.config.failureThreshold) {
      this.open();
    }
  }

  /**
   * Hand back a trial slot claimed by allow() when the call was never made
   * (for example, the budget refused it).
   */
  releaseTrial(): void {
    if (this.state.status === 'half_open') {
      this.state.trialInFlight = false;
    }
  }

  getState(): Readonly<BreakerState> {
    return { ...this.state };
  }

  get status(): BreakerStatus {
    return this.state.status;
  }

  private open(): void {
    this.state.openedAt = this.now();
    this.transition('open');
    this.log.warn(
      { failures: this.state.consecutiveFailures, cooldownMs: this.config.cooldownMs, lastError: this.state.lastError },
      'Circuit opened',
    );
  }

  private transition(next: BreakerStatus): void {
    const previous = this.state.status;
    this.state.status = next;
    breakerState.set({ target: this.config.target }, STATUS_GAUGE[next]);
    if (previous !== next && next !== 'open') {
      this.log.info({ from: previous, to: next }, 'Circuit state changed');
    }
  }
}
