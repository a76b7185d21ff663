/**
 * Circuit Breaker Service
 *
 * Guards one text-generation provider so a dead provider fails fast
 * and the fallback chain moves on instead of burning retries.
 *
 * States:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Failing fast, rejecting requests immediately
 * - HALF-OPEN: Testing if the provider recovered, limited requests allowed
 *
 * Breakers are owned by the ResilientTextGenerator that creates them;
 * there are no module-level instances.
 */

import { CircuitBreakerOpenError, errorMessage } from '../errors.js';
import { logInfo, logWarn, logError } from './logger.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerConfig {
  failureThreshold: number;    // Open after N consecutive failures
  resetTimeoutMs: number;      // Try half-open after this time
  halfOpenRequests: number;    // Successes needed in half-open before closing
}

export const DEFAULT_CIRCUIT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 4,
  resetTimeoutMs: 45000,
  halfOpenRequests: 2,
};

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private lastFailureTime = 0;
  private halfOpenSuccesses = 0;

  constructor(
    private readonly name: string,
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_CONFIG,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Execute a function with circuit breaker protection
   *
   * @throws CircuitBreakerOpenError if the circuit is OPEN
   */
  async execute<T>(fn: () => Promise<T>, context?: { request_id?: string }): Promise<T> {
    const logCtx = {
      service: this.name,
      circuit_state: this.state,
      ...context,
    };

    if (this.state === 'open') {
      const timeSinceFailure = this.now() - this.lastFailureTime;
      if (timeSinceFailure > this.config.resetTimeoutMs) {
        this.state = 'half-open';
        this.halfOpenSuccesses = 0;
        logInfo('Circuit breaker half-open', {
          ...logCtx,
          circuit_state: 'half-open',
          reason: 'reset_timeout_elapsed',
          timeout_ms: this.config.resetTimeoutMs,
        });
      } else {
        const remainingMs = this.config.resetTimeoutMs - timeSinceFailure;
        logWarn('Circuit breaker rejecting request', {
          ...logCtx,
          remaining_ms: remainingMs,
          consecutive_failures: this.consecutiveFailures,
        });
        throw new CircuitBreakerOpenError(this.name, remainingMs);
      }
    }

    try {
      const result = await fn();
      this.onSuccess(logCtx);
      return result;
    } catch (error) {
      this.onFailure(error, logCtx);
      throw error;
    }
  }

  private onSuccess(logCtx: Record<string, unknown>): void {
    if (this.state === 'half-open') {
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.config.halfOpenRequests) {
        this.state = 'closed';
        this.consecutiveFailures = 0;
        logInfo('Circuit breaker closed', {
          ...logCtx,
          circuit_state: 'closed',
          reason: 'service_recovered',
          test_successes: this.halfOpenSuccesses,
        });
      }
    } else {
      this.consecutiveFailures = 0;
    }
  }

  private onFailure(error: unknown, logCtx: Record<string, unknown>): void {
    this.consecutiveFailures++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      logWarn('Circuit breaker re-opened', {
        ...logCtx,
        circuit_state: 'open',
        reason: 'half_open_failure',
        error: errorMessage(error),
      });
    } else if (this.consecutiveFailures >= this.config.failureThreshold) {
      this.state = 'open';
      logError('Circuit breaker opened', {
        ...logCtx,
        circuit_state: 'open',
        reason: 'failure_threshold_breached',
        consecutive_failures: this.consecutiveFailures,
        threshold: this.config.failureThreshold,
        error: errorMessage(error),
      });
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): { state: CircuitState; consecutiveFailures: number; lastFailureTime: number } {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      lastFailureTime: this.lastFailureTime,
    };
  }

  reset(): void {
    this.state = 'closed';
    this.consecutiveFailures = 0;
    this.halfOpenSuccesses = 0;
  }
}
