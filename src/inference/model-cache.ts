/**
 * MODEL CACHE - PER-MONITOR LOAD / BUILD / EVICT
 * ================================================
 *
 * Resolution order for a monitor:
 *   1. cached, valid and younger than the freshness threshold -> fresh (no I/O)
 *   2. load from the model store                                 -> fresh
 *   3. fetch trend history and build, persist best-effort        -> fresh
 *   4. keep serving the stale artifact                           -> degraded
 *   5. nothing usable                                            -> unavailable
 *
 * Concurrent resolves for one monitor share a single in-flight refresh.
 * After a failed refresh the next store/build attempt waits out an
 * exponential backoff, so a broken monitor cannot trigger a build per
 * reading. Backoff state lives outside the artifact LRU, so evicting a
 * broken monitor does not reset it. There is no lock across monitors.
 */

import type { Logger } from '../logging/logger';
import defaultLogger, { errorMeta } from '../logging/logger';
import { LogComponents } from '../logging/components';
import { RetryPolicy } from '../utils/retry-policy';
import { withTimeout } from '../utils/async';
import { BuildError, StorageError, describeError } from './errors';
import type {
	ArtifactCodec,
	ModelArtifact,
	ModelBuilder,
	ModelStore,
	Resolution,
	TrendSource,
} from './types';

export interface ModelCacheOptions {
	capacity: number;
	freshnessMs: number;
	storeTimeoutMs: number;
	storeRetries: number;
	buildTimeoutMs: number;
	backoffBaseMs: number;
	backoffMaxMs: number;
	backoffMultiplier?: number;
	trainingHistoryMonths: number;
	trainingMaxReadings: number;
	/** Monitors whose failure backoff is remembered; oldest failure dropped first */
	backoffTrackingLimit?: number;
}

export interface ModelCacheDeps {
	store: ModelStore;
	builder: ModelBuilder;
	trendSource: TrendSource;
	codec: ArtifactCodec;
	logger?: Logger;
	clock?: () => number;
}

interface CacheEntry {
	artifact?: ModelArtifact;
	loadedAt?: number;
	lastBuildAttemptAt?: number;
}

interface Backoff {
	consecutiveFailures: number;
	nextAttemptAt: number;
}

const DEFAULT_BACKOFF_TRACKING_LIMIT = 10000;

export interface CacheEntrySnapshot {
	monitorId: string;
	version?: string;
	loadedAt?: number;
	lastBuildAttemptAt?: number;
	consecutiveFailures: number;
	nextAttemptAt: number;
}

export interface ModelCacheStats {
	size: number;
	inFlight: number;
	hits: number;
	loads: number;
	builds: number;
	failures: number;
	evictions: number;
}

type Refreshed = { artifact: ModelArtifact; source: 'store' | 'build' };

export class ModelCache {
	private readonly options: ModelCacheOptions;
	private readonly store: ModelStore;
	private readonly builder: ModelBuilder;
	private readonly trendSource: TrendSource;
	private readonly codec: ArtifactCodec;
	private readonly logger: Logger;
	private readonly clock: () => number;
	private readonly storeRetry: RetryPolicy;

	// Insertion order is recency order: oldest resolved first
	private entries = new Map<string, CacheEntry>();
	// Insertion order is failure order: oldest failure first
	private backoffs = new Map<string, Backoff>();
	private inFlight = new Map<string, Promise<Resolution>>();
	private readonly shutdown = new AbortController();
	private closed = false;

	private stats = { hits: 0, loads: 0, builds: 0, failures: 0, evictions: 0 };

	constructor(options: ModelCacheOptions, deps: ModelCacheDeps) {
		this.options = options;
		this.store = deps.store;
		this.builder = deps.builder;
		this.trendSource = deps.trendSource;
		this.codec = deps.codec;
		this.logger = deps.logger ?? defaultLogger;
		this.clock = deps.clock ?? Date.now;

		this.storeRetry = new RetryPolicy(
			{
				maxAttempts: options.storeRetries,
				baseDelayMs: Math.min(100, options.backoffBaseMs),
				maxDelayMs: options.backoffMaxMs,
				backoffMultiplier: 2,
				onRetry: (attempt, error, remaining) => {
					this.logger.warn('Model store read failed, retrying', {
						component: LogComponents.MODEL_CACHE,
						attempt,
						remaining,
						...errorMeta(error),
					});
				},
			},
			{ isRetryable: error => error instanceof StorageError && error.transient }
		);
	}

	/**
	 * Resolve the artifact to score a monitor's readings with
	 */
	resolve(monitorId: string): Promise<Resolution> {
		const entry = this.entries.get(monitorId);
		this.touch(monitorId, entry);

		if (entry?.artifact && this.isFresh(entry)) {
			this.stats.hits++;
			return Promise.resolve({ status: 'fresh', artifact: entry.artifact });
		}

		const pending = this.inFlight.get(monitorId);
		if (pending) {
			return pending;
		}

		if (this.closed) {
			return Promise.resolve(this.fallback(monitorId, 'model cache is closed'));
		}

		const backoff = this.backoffs.get(monitorId);
		if (backoff && this.clock() < backoff.nextAttemptAt) {
			return Promise.resolve(this.fallback(
				monitorId,
				`backing off after ${backoff.consecutiveFailures} failed refresh(es)`
			));
		}

		const resolution = this.refresh(monitorId).finally(() => {
			this.inFlight.delete(monitorId);
			this.enforceCapacity();
		});
		this.inFlight.set(monitorId, resolution);
		return resolution;
	}

	/**
	 * Abort in-flight refreshes and wait for them to settle
	 */
	async close(): Promise<void> {
		this.closed = true;
		this.shutdown.abort();
		await Promise.allSettled(Array.from(this.inFlight.values()));
	}

	invalidate(monitorId: string): void {
		const entry = this.entries.get(monitorId);
		if (entry) {
			entry.loadedAt = undefined;
		}
		const backoff = this.backoffs.get(monitorId);
		if (backoff) {
			backoff.nextAttemptAt = 0;
		}
	}

	getEntry(monitorId: string): CacheEntrySnapshot | undefined {
		const entry = this.entries.get(monitorId);
		const backoff = this.backoffs.get(monitorId);
		if (!entry && !backoff) return undefined;
		return {
			monitorId,
			version: entry?.artifact?.version,
			loadedAt: entry?.loadedAt,
			lastBuildAttemptAt: entry?.lastBuildAttemptAt,
			consecutiveFailures: backoff?.consecutiveFailures ?? 0,
			nextAttemptAt: backoff?.nextAttemptAt ?? 0,
		};
	}

	has(monitorId: string): boolean {
		return this.entries.has(monitorId);
	}

	getStats(): ModelCacheStats {
		return { size: this.entries.size, inFlight: this.inFlight.size, ...this.stats };
	}

	private async refresh(monitorId: string): Promise<Resolution> {
		const startedAt = this.clock();
		let loadFailure: string;

		try {
			const loaded = await this.loadFromStore(monitorId);
			if (loaded) {
				return this.admit(monitorId, { artifact: loaded, source: 'store' });
			}
			loadFailure = 'no artifact in store';
		} catch (error) {
			loadFailure = describeError(error);
			this.logger.warn('Model load failed', {
				component: LogComponents.MODEL_CACHE,
				monitorId,
				...errorMeta(error),
			});
		}

		if (this.closed) {
			return this.fallback(monitorId, 'model cache closed during refresh');
		}

		this.logger.info('Building model', {
			component: LogComponents.MODEL_CACHE,
			monitorId,
			reason: loadFailure,
		});

		try {
			const built = await this.buildAndPersist(monitorId, startedAt);
			return this.admit(monitorId, { artifact: built, source: 'build' });
		} catch (error) {
			if (this.closed) {
				return this.fallback(monitorId, 'model cache closed during refresh');
			}
			return this.recordFailure(monitorId, `load: ${loadFailure}; build: ${describeError(error)}`);
		}
	}

	private async loadFromStore(monitorId: string): Promise<ModelArtifact | undefined> {
		const bytes = await this.storeRetry.execute(() =>
			withTimeout(
				`Model store read for ${monitorId}`,
				this.options.storeTimeoutMs,
				() => this.store.get(monitorId),
				this.shutdown.signal
			)
		);
		if (!bytes) {
			return undefined;
		}

		const artifact = this.codec.decode(bytes);
		this.checkUsable(monitorId, artifact);
		return artifact;
	}

	private async buildAndPersist(monitorId: string, startedAt: number): Promise<ModelArtifact> {
		const entry = this.ensureEntry(monitorId);
		entry.lastBuildAttemptAt = startedAt;

		const bytes = await withTimeout(
			`Model build for ${monitorId}`,
			this.options.buildTimeoutMs,
			async signal => {
				const history = await this.trendSource.fetchHistory(
					monitorId,
					{ months: this.options.trainingHistoryMonths, limit: this.options.trainingMaxReadings },
					signal
				);
				const recent = history.slice(-this.options.trainingMaxReadings);
				return this.builder.build(monitorId, recent, signal);
			},
			this.shutdown.signal
		);

		const artifact = this.codec.decode(bytes);
		this.checkUsable(monitorId, artifact);

		try {
			await withTimeout(
				`Model store write for ${monitorId}`,
				this.options.storeTimeoutMs,
				() => this.store.put(monitorId, bytes),
				this.shutdown.signal
			);
		} catch (error) {
			this.logger.warn('Persisting built model failed, using it anyway', {
				component: LogComponents.MODEL_CACHE,
				monitorId,
				version: artifact.version,
				...errorMeta(error),
			});
		}

		return artifact;
	}

	private checkUsable(monitorId: string, artifact: ModelArtifact): void {
		if (artifact.monitorId !== monitorId) {
			throw new BuildError(monitorId, `artifact belongs to monitor ${artifact.monitorId}`);
		}
		if (!artifact.valid) {
			throw new BuildError(monitorId, `artifact ${artifact.version} is marked invalid`);
		}
	}

	private admit(monitorId: string, refreshed: Refreshed): Resolution {
		if (this.closed) {
			return this.fallback(monitorId, 'model cache closed during refresh');
		}

		const entry = this.ensureEntry(monitorId);
		entry.artifact = refreshed.artifact;
		entry.loadedAt = this.clock();
		this.backoffs.delete(monitorId);

		if (refreshed.source === 'store') {
			this.stats.loads++;
		} else {
			this.stats.builds++;
		}

		this.logger.info('Model admitted', {
			component: LogComponents.MODEL_CACHE,
			monitorId,
			version: refreshed.artifact.version,
			source: refreshed.source,
		});

		return { status: 'fresh', artifact: refreshed.artifact };
	}

	private recordFailure(monitorId: string, reason: string): Resolution {
		const consecutiveFailures = (this.backoffs.get(monitorId)?.consecutiveFailures ?? 0) + 1;
		this.stats.failures++;

		const delay = RetryPolicy.calculateBackoff(
			consecutiveFailures,
			this.options.backoffBaseMs,
			this.options.backoffMultiplier ?? 2,
			this.options.backoffMaxMs
		);
		this.backoffs.delete(monitorId);
		this.backoffs.set(monitorId, { consecutiveFailures, nextAttemptAt: this.clock() + delay });

		const limit = this.options.backoffTrackingLimit ?? DEFAULT_BACKOFF_TRACKING_LIMIT;
		for (const oldest of this.backoffs.keys()) {
			if (this.backoffs.size <= limit) break;
			this.backoffs.delete(oldest);
		}

		this.logger.error('Model refresh failed', {
			component: LogComponents.MODEL_CACHE,
			monitorId,
			reason,
			consecutiveFailures,
			retryInMs: delay,
			hasStaleArtifact: this.entries.get(monitorId)?.artifact !== undefined,
		});

		return this.fallback(monitorId, reason);
	}

	/**
	 * Stale artifact if one exists, otherwise unavailable
	 */
	private fallback(monitorId: string, reason: string): Resolution {
		const artifact = this.entries.get(monitorId)?.artifact;
		if (artifact) {
			return { status: 'degraded', artifact, reason };
		}
		return { status: 'unavailable', reason };
	}

	private isFresh(entry: CacheEntry): boolean {
		return (
			entry.artifact !== undefined &&
			entry.artifact.valid &&
			entry.loadedAt !== undefined &&
			this.clock() - entry.loadedAt < this.options.freshnessMs
		);
	}

	private ensureEntry(monitorId: string): CacheEntry {
		let entry = this.entries.get(monitorId);
		if (!entry) {
			entry = {};
			this.entries.set(monitorId, entry);
		}
		return entry;
	}

	/**
	 * Move an entry to the most-recently-resolved end, creating it if needed
	 */
	private touch(monitorId: string, entry: CacheEntry | undefined): void {
		const current = entry ?? {};
		this.entries.delete(monitorId);
		this.entries.set(monitorId, current);
		this.enforceCapacity();
	}

	/**
	 * Evict least recently resolved entries. Entries mid-resolution are
	 * skipped and reconsidered when their resolution settles; the most
	 * recently resolved entry is never evicted.
	 */
	private enforceCapacity(): void {
		if (this.entries.size <= this.options.capacity) return;

		const keys = Array.from(this.entries.keys());
		const newest = keys[keys.length - 1];
		for (const monitorId of keys) {
			if (this.entries.size <= this.options.capacity) break;
			if (monitorId === newest || this.inFlight.has(monitorId)) continue;

			this.entries.delete(monitorId);
			this.stats.evictions++;
			this.logger.info('Model evicted', {
				component: LogComponents.MODEL_CACHE,
				monitorId,
				size: this.entries.size,
			});
		}
	}
}
