/**
 * MODEL BUILDER - ISOLATION FOREST TRAINING
 * ===========================================
 *
 * Trains a monitor's artifact from its trend history:
 *   1. replay history through a sliding window with the live bounds
 *   2. keep the summaries sharing the most common sensor set
 *   3. fit a robust scaler, then a seeded isolation forest on scaled rows
 *   4. serialize to the JSON artifact format
 */

import type { Logger } from '../logging/logger';
import defaultLogger from '../logging/logger';
import { LogComponents } from '../logging/components';
import { ARTIFACT_FORMAT, encodeArtifact } from '../inference/artifact-codec';
import { BuildError } from '../inference/errors';
import { IsolationForest } from '../inference/isolation-forest';
import { RobustScaler } from '../inference/scaler';
import { SlidingWindow } from '../inference/sliding-window';
import type { ModelBuilder, Reading, WindowConfig, WindowSummary } from '../inference/types';

export interface ModelBuilderOptions {
	window: WindowConfig;
	minSamples: number;
	trees: number;
	sampleSize: number;
	seed: number;
	historyMonths?: number;
}

export class IsolationForestModelBuilder implements ModelBuilder {
	private readonly options: ModelBuilderOptions;
	private readonly logger: Logger;
	private readonly clock: () => number;

	constructor(options: ModelBuilderOptions, logger?: Logger, clock?: () => number) {
		this.options = options;
		this.logger = logger ?? defaultLogger;
		this.clock = clock ?? Date.now;
	}

	async build(monitorId: string, history: readonly Reading[], signal?: AbortSignal): Promise<Buffer> {
		this.checkAborted(monitorId, signal);

		const summaries = this.trainingSummaries(monitorId, history);
		const rows = majoritySchema(summaries);
		if (rows.length < this.options.minSamples) {
			throw new BuildError(
				monitorId,
				`not enough training data: ${rows.length} window summaries from ${history.length} readings, need ${this.options.minSamples}`
			);
		}

		const featureNames = [...rows[0].featureNames];
		const raw = rows.map(summary => [...summary.features]);

		const scaler = RobustScaler.fit(raw);
		const scaled = raw.map(row => scaler.transform(row));

		this.checkAborted(monitorId, signal);
		const forest = IsolationForest.fit(scaled, {
			trees: this.options.trees,
			sampleSize: this.options.sampleSize,
			seed: this.options.seed,
		});
		this.checkAborted(monitorId, signal);

		const builtAt = this.clock();
		const version = `v${builtAt}`;

		this.logger.info('Model trained', {
			component: LogComponents.MODEL_BUILDER,
			monitorId,
			version,
			trainingSamples: rows.length,
			features: featureNames.length,
			trees: forest.trees.length,
		});

		return encodeArtifact({
			format: ARTIFACT_FORMAT,
			metadata: {
				monitorId,
				version,
				builtAt,
				valid: true,
				featureNames,
				trainingSamples: rows.length,
				historyMonths: this.options.historyMonths,
			},
			scaler: scaler.toJSON(),
			model: { kind: 'isolation_forest', ...forest.toJSON() },
		});
	}

	/**
	 * One summary per history reading that has enough samples behind it
	 */
	private trainingSummaries(monitorId: string, history: readonly Reading[]): WindowSummary[] {
		const window = new SlidingWindow(monitorId, {
			spanMs: this.options.window.spanMs,
			maxCount: this.options.window.maxCount,
			minSamples: this.options.window.minSamples,
			lateToleranceMs: 0,
			emit: { mode: 'every' },
		});

		const ordered = history
			.filter(reading => reading.monitorId === monitorId)
			.sort((a, b) => a.timestamp - b.timestamp);

		const summaries: WindowSummary[] = [];
		for (const reading of ordered) {
			summaries.push(...window.ingest(reading).summaries);
		}
		return summaries;
	}

	private checkAborted(monitorId: string, signal?: AbortSignal): void {
		if (signal?.aborted) {
			throw new BuildError(monitorId, 'build aborted');
		}
	}
}

/**
 * Summaries whose sensor set is the most common one (ties: first in sort order)
 */
export function majoritySchema(summaries: readonly WindowSummary[]): WindowSummary[] {
	const groups = new Map<string, WindowSummary[]>();
	for (const summary of summaries) {
		const key = summary.sensors.join('\u0000');
		const group = groups.get(key);
		if (group) {
			group.push(summary);
		} else {
			groups.set(key, [summary]);
		}
	}

	let best: WindowSummary[] = [];
	let bestKey = '';
	for (const [key, group] of groups) {
		if (group.length > best.length || (group.length === best.length && key < bestKey)) {
			best = group;
			bestKey = key;
		}
	}
	return best;
}
