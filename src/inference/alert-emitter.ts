/**
 * ALERT EMITTER - DELIVERY WITH BOUNDED RETRIES
 * ===============================================
 *
 * Serializes positive verdicts into alert records and hands them to the
 * transport. Deliveries run beside the monitor's lane: a slow or failing
 * transport never holds up the next reading. Deliveries for one monitor
 * are chained, so a retried alert still lands before the monitor's next one.
 */

import type { Logger } from '../logging/logger';
import defaultLogger, { errorMeta } from '../logging/logger';
import { LogComponents } from '../logging/components';
import { KeyedSerialQueue } from '../utils/async';
import { RetryPolicy } from '../utils/retry-policy';
import { TransportError } from './errors';
import type { AlertPublisher, AlertRecord, AnomalyVerdict, DeliveryResult } from './types';

export interface AlertEmitterOptions {
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	historySize?: number;
}

export interface AlertHistoryEntry {
	record: AlertRecord;
	delivered: boolean;
	attempts: number;
	error?: string;
}

export function toAlertRecord(verdict: AnomalyVerdict): AlertRecord {
	return {
		monitorId: verdict.monitorId,
		timestamp: verdict.timestamp,
		score: verdict.score,
		isAnomaly: true,
		degraded: verdict.degraded,
		threshold: verdict.threshold,
		consecutiveBreaches: verdict.consecutiveBreaches,
		modelVersion: verdict.modelVersion,
		topFeatures: [...verdict.topFeatures],
		features: { ...verdict.summary.stats },
	};
}

export class AlertEmitter {
	private readonly publisher: AlertPublisher;
	private readonly options: AlertEmitterOptions;
	private readonly logger: Logger;
	private readonly pending = new Set<Promise<DeliveryResult>>();
	private readonly deliveries = new KeyedSerialQueue();
	private history: AlertHistoryEntry[] = [];
	private published = 0;
	private failed = 0;

	constructor(publisher: AlertPublisher, options: AlertEmitterOptions, logger?: Logger) {
		this.publisher = publisher;
		this.options = options;
		this.logger = logger ?? defaultLogger;
	}

	/**
	 * Publish a verdict, retrying transport failures. Never rejects.
	 * Negative verdicts are not published.
	 */
	async publish(verdict: AnomalyVerdict): Promise<DeliveryResult> {
		if (!verdict.isAnomaly) {
			return { ok: true, attempts: 0 };
		}

		const record = toAlertRecord(verdict);
		const retry = new RetryPolicy({
			maxAttempts: this.options.maxAttempts,
			baseDelayMs: this.options.baseDelayMs,
			maxDelayMs: this.options.maxDelayMs,
			backoffMultiplier: 2,
			onRetry: (attempt, error, remaining) => {
				this.logger.warn('Alert publish failed, retrying', {
					component: LogComponents.ALERT_EMITTER,
					monitorId: record.monitorId,
					attempt,
					remaining,
					...errorMeta(error),
				});
			},
		});

		const outcome = await retry.run(async () => {
			try {
				await this.publisher.publish(record);
			} catch (error) {
				throw error instanceof TransportError
					? error
					: new TransportError(`Alert publish failed: ${String(error)}`, record.monitorId, { cause: error });
			}
		});
		const attempts = outcome.attempts;

		if (outcome.ok) {
			this.published++;
			this.remember({ record, delivered: true, attempts });
			this.logger.info('Anomaly alert published', {
				component: LogComponents.ALERT_EMITTER,
				monitorId: record.monitorId,
				timestamp: record.timestamp,
				score: record.score,
				degraded: record.degraded,
				attempts,
			});
			return { ok: true, attempts };
		}

		const failure = outcome.error instanceof Error
			? outcome.error
			: new TransportError(String(outcome.error), record.monitorId);
		this.failed++;
		this.remember({ record, delivered: false, attempts, error: failure.message });
		this.logger.error('Alert delivery failed, giving up on this alert', {
			component: LogComponents.ALERT_EMITTER,
			monitorId: record.monitorId,
			timestamp: record.timestamp,
			attempts,
			...errorMeta(failure),
		});
		return { ok: false, attempts, error: failure };
	}

	/**
	 * Queue delivery behind the monitor's earlier alerts without waiting
	 * for it; flush() awaits it
	 */
	dispatch(verdict: AnomalyVerdict): Promise<DeliveryResult> {
		const delivery = this.deliveries.run(verdict.monitorId, () => this.publish(verdict));
		this.pending.add(delivery);
		void delivery.finally(() => this.pending.delete(delivery));
		return delivery;
	}

	/**
	 * Wait for all dispatched deliveries to finish
	 */
	async flush(): Promise<void> {
		while (this.pending.size > 0) {
			await Promise.all(Array.from(this.pending));
		}
	}

	/**
	 * Most recent alerts first, optionally only those at or after `since`
	 */
	getRecent(since?: number): AlertHistoryEntry[] {
		const entries = [...this.history].reverse();
		return since === undefined ? entries : entries.filter(e => e.record.timestamp >= since);
	}

	getStats() {
		return {
			published: this.published,
			failed: this.failed,
			pending: this.pending.size,
		};
	}

	private remember(entry: AlertHistoryEntry): void {
		this.history.push(entry);
		const limit = this.options.historySize ?? 100;
		if (this.history.length > limit) {
			this.history = this.history.slice(-limit);
		}
	}
}
