/**
 * Cost Meter
 *
 * Daily spend ceiling. Admission is decided on an estimate; accounting uses
 * the actual post-call cost. Methods are synchronous so each check-and-update
 * completes within one event-loop turn.
 */

import { BudgetState, BudgetSnapshot, BudgetReservation } from './types';
import { logger } from '../observability/logger';
import { costUsdTotal } from '../observability/metrics';

const DAY_MS = 86_400_000;

function startOfUtcDay(ts: number): number {
  return Math.floor(ts / DAY_MS) * DAY_MS;
}

function assertCost(cost: number, label: string): void {
  if (!Number.isFinite(cost) || cost < 0) {
    throw new RangeError(`${label} must be a finite, non-negative number (got ${cost})`);
  }
}

export class CostMeter {
  private readonly state: BudgetState;
  private readonly log = logger.child({ component: 'cost-meter' });

  constructor(
    limit: number,
    private readonly now: () => number = Date.now,
  ) {
    assertCost(limit, 'Budget limit');
    this.state = { windowStart: startOfUtcDay(this.now()), spent: 0, reserved: 0, limit };
  }

  /** Would a call with this estimate fit in the current window? */
  canAdmit(estimatedCost: number): boolean {
    assertCost(estimatedCost, 'Estimated cost');
    this.rollWindow();
    return this.state.spent + this.state.reserved + estimatedCost <= this.state.limit;
  }

  /** Add the actual cost of a completed upstream call */
  record(actualCost: number): void {
    assertCost(actualCost, 'Actual cost');
    this.rollWindow();
    this.state.spent += actualCost;
    costUsdTotal.inc(actualCost);
    if (this.state.spent > this.state.limit) {
      // Actual cost may exceed the estimate that admitted the call
      this.log.warn({ spent: this.state.spent, limit: this.state.limit }, 'Daily budget overrun by actual cost');
    }
  }

  /**
   * Check and hold the estimate in one step, so concurrent callers cannot
   * both be admitted past the limit. Returns null when over budget.
   */
  reserve(estimatedCost: number): BudgetReservation | null {
    if (!this.canAdmit(estimatedCost)) {
      this.log.info({ estimatedCost, ...this.snapshot() }, 'Budget exceeded; request not admitted');
      return null;
    }

    this.state.reserved += estimatedCost;
    const windowStart = this.state.windowStart;
    let settled = false;

    const releaseHold = (): void => {
      // A hold taken in a previous window was already cleared by the roll
      if (this.state.windowStart === windowStart) {
        this.state.reserved = Math.max(0, this.state.reserved - estimatedCost);
      }
    };

    return {
      estimatedCost,
      commit: (actualCost: number) => {
        if (settled) return;
        settled = true;
        this.rollWindow();
        releaseHold();
        this.record(actualCost);
      },
      release: () => {
        if (settled) return;
        settled = true;
        this.rollWindow();
        releaseHold();
      },
    };
  }

  snapshot(): BudgetSnapshot {
    this.rollWindow();
    return {
      ...this.state,
      remaining: Math.max(0, this.state.limit - this.state.spent - this.state.reserved),
    };
  }

  private rollWindow(): void {
    const current = startOfUtcDay(this.now());
    if (current > this.state.windowStart) {
      this.log.info(
        { previousWindow: new Date(this.state.windowStart).toISOString(), spent: this.state.spent },
        'Budget window reset',
      );
      this.state.windowStart = current;
      this.state.spent = 0;
      this.state.reserved = 0;
    }
  }
}
