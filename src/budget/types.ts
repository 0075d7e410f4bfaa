/**
 * Budget Types
 */

export interface BudgetState {
  /** Start of the current UTC day, epoch ms */
  windowStart: number;
  /** Actual spend recorded in this window (USD) */
  spent: number;
  /** Estimates held by admitted calls that have not completed */
  reserved: number;
  /** Ceiling for the window (USD) */
  limit: number;
}

export interface BudgetSnapshot extends BudgetState {
  remaining: number;
}

/** Hold on the budget for one admitted upstream call */
export interface BudgetReservation {
  readonly estimatedCost: number;
  /** Release the hold and record the actual cost */
  commit(actualCost: number): void;
  /** Release the hold without spending */
  release(): void;
}
