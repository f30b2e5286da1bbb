/**
 * ROLLING STATISTICS
 * ===================
 *
 * Plain array statistics used by window summaries and scaler fitting.
 */

import { SUMMARY_STATISTICS } from './types';
import type { Reading, SensorStats, WindowSummary } from './types';

export function mean(values: readonly number[]): number {
	if (values.length === 0) return 0;
	let sum = 0;
	for (const v of values) sum += v;
	return sum / values.length;
}

/**
 * Sample standard deviation (n - 1), 0 for fewer than two values
 */
export function stdDev(values: readonly number[]): number {
	if (values.length < 2) return 0;

	const m = mean(values);
	let sumSquares = 0;
	for (const v of values) {
		sumSquares += (v - m) * (v - m);
	}
	return Math.sqrt(sumSquares / (values.length - 1));
}

/**
 * Percentile with linear interpolation between closest ranks (p in [0, 1])
 */
export function percentile(values: readonly number[], p: number): number {
	if (values.length === 0) return 0;

	const sorted = [...values].sort((a, b) => a - b);
	const rank = (sorted.length - 1) * p;
	const lower = Math.floor(rank);
	const upper = Math.ceil(rank);
	if (lower === upper) return sorted[lower];

	return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

export function median(values: readonly number[]): number {
	return percentile(values, 0.5);
}

/**
 * Interquartile range (Q3 - Q1)
 */
export function iqr(values: readonly number[]): number {
	return percentile(values, 0.75) - percentile(values, 0.25);
}

export function featureName(sensor: string, statistic: string): string {
	return `${sensor}.${statistic}`;
}

/**
 * Summarize a non-empty window (oldest first, last reading is the position)
 */
export function summarize(monitorId: string, readings: readonly Reading[]): WindowSummary {
	const series = new Map<string, number[]>();

	for (const reading of readings) {
		for (const [sensor, value] of Object.entries(reading.values)) {
			let values = series.get(sensor);
			if (!values) {
				values = [];
				series.set(sensor, values);
			}
			values.push(value);
		}
	}

	const sensors = Array.from(series.keys()).sort();
	const stats: Record<string, SensorStats> = {};
	const featureNames: string[] = [];
	const features: number[] = [];

	for (const sensor of sensors) {
		const values = series.get(sensor) ?? [];
		const sensorStats: SensorStats = {
			count: values.length,
			mean: mean(values),
			std: stdDev(values),
			min: Math.min(...values),
			max: Math.max(...values),
			last: values[values.length - 1],
		};
		stats[sensor] = sensorStats;

		for (const statistic of SUMMARY_STATISTICS) {
			featureNames.push(featureName(sensor, statistic));
			features.push(sensorStats[statistic]);
		}
	}

	return {
		monitorId,
		timestamp: readings[readings.length - 1].timestamp,
		windowStart: readings[0].timestamp,
		size: readings.length,
		sensors,
		stats,
		featureNames,
		features,
	};
}
