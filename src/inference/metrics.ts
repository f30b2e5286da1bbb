/**
 * Pipeline counters
 */

export const METRIC_NAMES = [
	'received',
	'rejected',
	'lateDrops',
	'summaries',
	'scored',
	'degraded',
	'unavailable',
	'schemaMismatches',
	'predictionErrors',
	'alertsDispatched',
] as const;

export type MetricName = typeof METRIC_NAMES[number];

export type MetricsSnapshot = Record<MetricName, number>;

export class EngineMetrics {
	private counters = new Map<MetricName, number>();

	increment(name: MetricName, by = 1): void {
		this.counters.set(name, (this.counters.get(name) ?? 0) + by);
	}

	get(name: MetricName): number {
		return this.counters.get(name) ?? 0;
	}

	snapshot(): MetricsSnapshot {
		return {
			received: this.get('received'),
			rejected: this.get('rejected'),
			lateDrops: this.get('lateDrops'),
			summaries: this.get('summaries'),
			scored: this.get('scored'),
			degraded: this.get('degraded'),
			unavailable: this.get('unavailable'),
			schemaMismatches: this.get('schemaMismatches'),
			predictionErrors: this.get('predictionErrors'),
			alertsDispatched: this.get('alertsDispatched'),
		};
	}
}
