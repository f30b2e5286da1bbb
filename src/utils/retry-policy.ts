/**
 * Generic retry policy for any async operation
 */

export interface RetryPolicyConfig {
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	backoffMultiplier: number;
	onRetry?: (attempt: number, error: unknown, remainingAttempts: number) => void;
	onFailure?: (error: unknown, totalAttempts: number) => void;
}

export interface RetryableError {
	isRetryable: (error: unknown) => boolean;
}

/**
 * Retries every error
 */
export const retryAll: RetryableError = { isRetryable: () => true };

export type RetryOutcome<T> =
	| { ok: true; value: T; attempts: number }
	| { ok: false; error: unknown; attempts: number };

export class RetryPolicy {
	constructor(
		private config: RetryPolicyConfig,
		private errorClassifier: RetryableError = retryAll
	) {}

	/**
	 * Execute function with retry logic
	 * @returns Result of successful execution
	 * @throws Last error if all retries exhausted
	 */
	async execute<T>(fn: (attempt: number) => Promise<T>): Promise<T> {
		const outcome = await this.run(fn);
		if (!outcome.ok) {
			throw outcome.error;
		}
		return outcome.value;
	}

	/**
	 * Like execute(), but settles with the result or last error and the
	 * number of attempts this call used
	 */
	async run<T>(fn: (attempt: number) => Promise<T>): Promise<RetryOutcome<T>> {
		const maxAttempts = Math.max(1, this.config.maxAttempts);

		for (let attempt = 1; ; attempt++) {
			try {
				return { ok: true, value: await fn(attempt), attempts: attempt };
			} catch (error) {
				// Non-retryable error or last attempt - fail without waiting
				if (!this.errorClassifier.isRetryable(error) || attempt >= maxAttempts) {
					this.config.onFailure?.(error, attempt);
					return { ok: false, error, attempts: attempt };
				}

				const delay = RetryPolicy.calculateBackoff(
					attempt,
					this.config.baseDelayMs,
					this.config.backoffMultiplier,
					this.config.maxDelayMs
				);
				this.config.onRetry?.(attempt, error, maxAttempts - attempt);

				await this.sleep(delay);
			}
		}
	}

	private sleep(ms: number): Promise<void> {
		return new Promise(resolve => setTimeout(resolve, ms));
	}

	/**
	 * Exponential backoff delay, capped
	 *
	 * @param attempt Current attempt number (1-based)
	 * @param baseDelayMs Initial delay in milliseconds
	 * @param multiplier Exponential backoff multiplier (typically 2)
	 * @param maxDelayMs Maximum delay cap
	 */
	static calculateBackoff(
		attempt: number,
		baseDelayMs: number,
		multiplier: number,
		maxDelayMs: number
	): number {
		const exponentialDelay = baseDelayMs * Math.pow(multiplier, Math.max(0, attempt - 1));
		return Math.min(exponentialDelay, maxDelayMs);
	}
}
