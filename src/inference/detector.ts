/**
 * ANOMALY DETECTOR - THRESHOLD & HYSTERESIS
 * ===========================================
 *
 * A score at or above the monitor's threshold is a breach. A verdict is
 * flagged once `breachCount` consecutive breaches have been seen since the
 * last score below the threshold.
 */

import type { AnomalyVerdict, DecisionPolicy, ThresholdConfig, WindowSummary } from './types';

export interface DecisionInput {
	monitorId: string;
	score: number;
	degraded: boolean;
	modelVersion: string;
	topFeatures: readonly string[];
	summary: WindowSummary;
}

export interface Decision {
	verdict: AnomalyVerdict;
	/** Breach counter to carry into the next decision for this monitor */
	breaches: number;
}

/**
 * Threshold and breach count for a monitor (default unless overridden)
 */
export function policyFor(monitorId: string, config: ThresholdConfig): DecisionPolicy {
	const threshold = Object.hasOwn(config.overrides, monitorId)
		? config.overrides[monitorId]
		: config.defaultThreshold;
	return {
		threshold,
		breachCount: config.breachCount,
	};
}

export function decide(input: DecisionInput, policy: DecisionPolicy, previousBreaches: number): Decision {
	const breached = input.score >= policy.threshold;
	const breaches = breached ? previousBreaches + 1 : 0;
	const isAnomaly = breached && breaches >= Math.max(1, policy.breachCount);

	return {
		verdict: {
			monitorId: input.monitorId,
			timestamp: input.summary.timestamp,
			score: input.score,
			isAnomaly,
			degraded: input.degraded,
			threshold: policy.threshold,
			consecutiveBreaches: breaches,
			modelVersion: input.modelVersion,
			topFeatures: input.topFeatures,
			summary: input.summary,
		},
		breaches,
	};
}
