/**
 * Circuit Breaker Types
 */

export type BreakerStatus = 'closed' | 'open' | 'half_open';

export interface BreakerState {
  status: BreakerStatus;
  /** Failures since the last success */
  consecutiveFailures: number;
  /** When the breaker last opened, epoch ms */
  openedAt?: number;
  /** A half-open trial call is in progress */
  trialInFlight: boolean;
  lastError?: string;
}

export interface BreakerConfig {
  /** Upstream target label used in logs and metrics */
  target: string;
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** Wait before a trial call is allowed, ms */
  cooldownMs: number;
}
