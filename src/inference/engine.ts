/**
 * INFERENCE ENGINE - MAIN ORCHESTRATOR
 * ======================================
 *
 * Routes readings to one lane per monitor and runs, in order:
 *   window ingest -> model resolve -> transform -> score -> decide -> dispatch
 *
 * A lane finishes one reading before it starts the next. Lanes for
 * different monitors share nothing but the model cache.
 */

import { EventEmitter } from 'events';
import type { Logger } from '../logging/logger';
import defaultLogger, { errorMeta } from '../logging/logger';
import { LogComponents } from '../logging/components';
import { KeyedSerialQueue } from '../utils/async';
import { AlertEmitter } from './alert-emitter';
import { decide, policyFor } from './detector';
import { PredictionError, SchemaMismatchError, ValidationError, describeError } from './errors';
import { EngineMetrics, type MetricsSnapshot } from './metrics';
import { ModelCache, type ModelCacheStats } from './model-cache';
import { score, topFeatures } from './predictor';
import { ReadingParser } from './reading';
import { transform } from './scaler';
import { SlidingWindow } from './sliding-window';
import type { AnomalyVerdict, Reading, ThresholdConfig, WindowConfig, WindowSummary } from './types';

export interface InferenceEngineOptions {
	window: WindowConfig;
	thresholds: ThresholdConfig;
	/** Contributing features reported per verdict */
	topFeatureCount?: number;
}

export interface InferenceEngineDeps {
	cache: ModelCache;
	emitter: AlertEmitter;
	parser?: ReadingParser;
	logger?: Logger;
}

/**
 * What happened to one window summary
 */
export type SummaryOutcome =
	| { status: 'scored'; verdict: AnomalyVerdict }
	| { status: 'unavailable'; timestamp: number; reason: string }
	| { status: 'schema_mismatch'; timestamp: number; error: SchemaMismatchError }
	| { status: 'prediction_error'; timestamp: number; error: PredictionError };

/**
 * What happened to one inbound reading
 */
export type IngestReport =
	| { status: 'rejected'; error: ValidationError }
	| { status: 'late'; monitorId: string; timestamp: number }
	| { status: 'accepted'; monitorId: string; outcomes: SummaryOutcome[] }
	| { status: 'closed' };

export interface UnscoredEvent {
	monitorId: string;
	timestamp: number;
	reason: string;
}

interface InferenceEngineEvents {
	verdict: (verdict: AnomalyVerdict) => void;
	unscored: (event: UnscoredEvent) => void;
}

/**
 * Per-monitor lane state
 */
interface MonitorState {
	window: SlidingWindow;
	breaches: number;
}

export interface InferenceEngineStats {
	monitors: number;
	activeLanes: number;
	metrics: MetricsSnapshot;
	cache: ModelCacheStats;
	alerts: ReturnType<AlertEmitter['getStats']>;
}

export class InferenceEngine extends EventEmitter {
	private readonly options: InferenceEngineOptions;
	private readonly cache: ModelCache;
	private readonly emitter: AlertEmitter;
	private readonly parser: ReadingParser;
	private readonly logger: Logger;
	private readonly lanes = new KeyedSerialQueue();
	private readonly monitors = new Map<string, MonitorState>();
	private readonly metrics = new EngineMetrics();
	private accepting = true;

	constructor(options: InferenceEngineOptions, deps: InferenceEngineDeps) {
		super();
		this.options = options;
		this.cache = deps.cache;
		this.emitter = deps.emitter;
		this.parser = deps.parser ?? new ReadingParser();
		this.logger = deps.logger ?? defaultLogger;
	}

	/**
	 * Parse a transport payload and process it. Never rejects.
	 */
	async handleMessage(payload: Buffer | string | unknown): Promise<IngestReport> {
		let reading: Reading;
		try {
			reading = this.parser.parse(payload);
		} catch (error) {
			const validation = error instanceof ValidationError
				? error
				: new ValidationError([describeError(error)]);
			this.metrics.increment('received');
			this.metrics.increment('rejected');
			this.logger.warn('Rejected malformed reading', {
				component: LogComponents.ENGINE,
				monitorId: validation.monitorId,
				issues: validation.issues,
			});
			return { status: 'rejected', error: validation };
		}

		return this.ingest(reading);
	}

	/**
	 * Process a parsed reading in its monitor's lane. Never rejects.
	 */
	async ingest(reading: Reading): Promise<IngestReport> {
		if (!this.accepting) {
			return { status: 'closed' };
		}
		this.metrics.increment('received');

		try {
			return await this.lanes.run(reading.monitorId, () => this.process(reading));
		} catch (error) {
			// Lane bug, not a per-summary failure: report and keep the lane alive
			this.logger.error('Unexpected failure processing reading', {
				component: LogComponents.ENGINE,
				monitorId: reading.monitorId,
				timestamp: reading.timestamp,
				...errorMeta(error),
			});
			return { status: 'accepted', monitorId: reading.monitorId, outcomes: [] };
		}
	}

	/**
	 * Window contents for a monitor, oldest first
	 */
	getWindow(monitorId: string): Reading[] {
		return this.monitors.get(monitorId)?.window.getWindow() ?? [];
	}

	getStats(): InferenceEngineStats {
		return {
			monitors: this.monitors.size,
			activeLanes: this.lanes.activeKeys(),
			metrics: this.metrics.snapshot(),
			cache: this.cache.getStats(),
			alerts: this.emitter.getStats(),
		};
	}

	/**
	 * Stop admitting readings, abandon model refreshes, let lanes finish
	 * and wait for alert deliveries
	 */
	async shutdown(): Promise<void> {
		if (!this.accepting) return;
		this.accepting = false;

		this.logger.info('Inference engine shutting down', {
			component: LogComponents.ENGINE,
			activeLanes: this.lanes.activeKeys(),
		});

		await this.cache.close();
		await this.lanes.drain();
		await this.emitter.flush();

		this.logger.info('Inference engine stopped', {
			component: LogComponents.ENGINE,
			...this.metrics.snapshot(),
		});
	}

	public on<K extends keyof InferenceEngineEvents>(event: K, listener: InferenceEngineEvents[K]): this {
		return super.on(event, listener);
	}

	public emit<K extends keyof InferenceEngineEvents>(
		event: K,
		...args: Parameters<InferenceEngineEvents[K]>
	): boolean {
		return super.emit(event, ...args);
	}

	private async process(reading: Reading): Promise<IngestReport> {
		const state = this.stateFor(reading.monitorId);
		const result = state.window.ingest(reading);

		if (result.status === 'late') {
			this.metrics.increment('lateDrops');
			this.logger.debug('Dropped late reading', {
				component: LogComponents.SLIDING_WINDOW,
				monitorId: reading.monitorId,
				timestamp: reading.timestamp,
			});
			return { status: 'late', monitorId: reading.monitorId, timestamp: reading.timestamp };
		}

		const outcomes: SummaryOutcome[] = [];
		for (const summary of result.summaries) {
			this.metrics.increment('summaries');
			outcomes.push(await this.evaluate(state, summary));
		}

		return { status: 'accepted', monitorId: reading.monitorId, outcomes };
	}

	private async evaluate(state: MonitorState, summary: WindowSummary): Promise<SummaryOutcome> {
		const { monitorId, timestamp } = summary;
		const resolution = await this.cache.resolve(monitorId);

		if (resolution.status === 'unavailable') {
			this.metrics.increment('unavailable');
			this.logger.warn('No usable model, reading left unscored', {
				component: LogComponents.ENGINE,
				monitorId,
				timestamp,
				reason: resolution.reason,
			});
			this.emit('unscored', { monitorId, timestamp, reason: resolution.reason });
			return { status: 'unavailable', timestamp, reason: resolution.reason };
		}

		const degraded = resolution.status === 'degraded';
		if (degraded) {
			this.metrics.increment('degraded');
		}
		const artifact = resolution.artifact;

		let anomalyScore: number;
		let contributors: string[];
		try {
			const vector = transform(artifact, summary);
			anomalyScore = score(artifact, vector);
			contributors = topFeatures(artifact, vector, this.options.topFeatureCount ?? 2);
		} catch (error) {
			if (error instanceof SchemaMismatchError) {
				this.metrics.increment('schemaMismatches');
				this.logger.error('Window features do not match model', {
					component: LogComponents.ENGINE,
					monitorId,
					modelVersion: artifact.version,
					expected: error.expected,
					actual: error.actual,
				});
				this.emit('unscored', { monitorId, timestamp, reason: error.message });
				return { status: 'schema_mismatch', timestamp, error };
			}
			if (error instanceof PredictionError) {
				this.metrics.increment('predictionErrors');
				this.logger.error('Scoring failed', {
					component: LogComponents.ENGINE,
					monitorId,
					modelVersion: artifact.version,
					...errorMeta(error),
				});
				this.emit('unscored', { monitorId, timestamp, reason: error.message });
				return { status: 'prediction_error', timestamp, error };
			}
			throw error;
		}

		const { verdict, breaches } = decide(
			{
				monitorId,
				score: anomalyScore,
				degraded,
				modelVersion: artifact.version,
				topFeatures: contributors,
				summary,
			},
			policyFor(monitorId, this.options.thresholds),
			state.breaches
		);
		state.breaches = breaches;
		this.metrics.increment('scored');

		this.logger.debug('Window scored', {
			component: LogComponents.ENGINE,
			monitorId,
			timestamp,
			score: verdict.score,
			isAnomaly: verdict.isAnomaly,
			consecutiveBreaches: verdict.consecutiveBreaches,
			degraded,
		});

		this.emit('verdict', verdict);
		if (verdict.isAnomaly) {
			this.metrics.increment('alertsDispatched');
			void this.emitter.dispatch(verdict);
		}

		return { status: 'scored', verdict };
	}

	private stateFor(monitorId: string): MonitorState {
		let state = this.monitors.get(monitorId);
		if (!state) {
			state = { window: new SlidingWindow(monitorId, this.options.window), breaches: 0 };
			this.monitors.set(monitorId, state);
		}
		return state;
	}
}
