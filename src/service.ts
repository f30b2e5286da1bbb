/**
 * Component wiring
 *
 * Builds the inference engine and its collaborators from configuration.
 * Collaborators can be replaced, which is how tests run the whole
 * pipeline in process.
 */

import type { ServiceConfig } from './config';
import { loadSensorAliases } from './config';
import type { Logger } from './logging/logger';
import defaultLogger from './logging/logger';
import { LogComponents } from './logging/components';
import { FetchHttpClient, type HttpClient } from './lib/http-client';
import { AlertEmitter } from './inference/alert-emitter';
import { JsonArtifactCodec } from './inference/artifact-codec';
import { InferenceEngine } from './inference/engine';
import { StorageError } from './inference/errors';
import { ModelCache } from './inference/model-cache';
import { ReadingParser } from './inference/reading';
import type { AlertPublisher, ArtifactCodec, ModelBuilder, ModelStore, TrendSource } from './inference/types';
import { InMemoryModelStore } from './models/memory-store';
import { IsolationForestModelBuilder } from './models/model-builder';
import { S3ModelStore, createS3Client } from './models/s3-store';
import { TokenManager } from './models/token-manager';
import { TrendApiClient } from './models/trend-api-client';
import type { MqttReadingFeed } from './transport/mqtt-reading-feed';

export interface ServiceDeps {
	publisher: AlertPublisher;
	store?: ModelStore;
	trendSource?: TrendSource;
	builder?: ModelBuilder;
	codec?: ArtifactCodec;
	http?: HttpClient;
	logger?: Logger;
	clock?: () => number;
}

export interface ServiceComponents {
	engine: InferenceEngine;
	cache: ModelCache;
	emitter: AlertEmitter;
	parser: ReadingParser;
}

/**
 * Model store named by the configuration. Throws StorageError when it
 * cannot be constructed.
 */
export function createModelStore(config: ServiceConfig, logger: Logger = defaultLogger): ModelStore {
	const store = config.store;
	if (store.kind === 'memory') {
		logger.warn('Using in-memory model store, trained models are lost on restart', {
			component: LogComponents.SERVICE,
		});
		return new InMemoryModelStore();
	}

	try {
		return new S3ModelStore(createS3Client(store), store, logger);
	} catch (error) {
		if (error instanceof StorageError) throw error;
		throw new StorageError('Cannot construct S3 model store client', undefined, { cause: error, transient: false });
	}
}

export function createReadingParser(config: ServiceConfig, clock?: () => number): ReadingParser {
	return new ReadingParser({
		aliases: config.sensors.aliasesPath ? loadSensorAliases(config.sensors.aliasesPath) : {},
		allowedSensors: config.sensors.fields,
		clock,
	});
}

/**
 * Stop intake, close the model cache so pending loads and builds abort,
 * then wait for messages already accepted
 */
export async function stopPipeline(
	feed: Pick<MqttReadingFeed, 'pause' | 'drain'>,
	engine: Pick<InferenceEngine, 'shutdown'>
): Promise<void> {
	feed.pause();
	await engine.shutdown();
	await feed.drain();
}

export function createComponents(config: ServiceConfig, deps: ServiceDeps): ServiceComponents {
	const logger = deps.logger ?? defaultLogger;
	const parser = createReadingParser(config, deps.clock);

	let trendSource = deps.trendSource;
	if (!trendSource) {
		const http = deps.http ?? new FetchHttpClient({ defaultTimeout: config.trendApi.timeoutMs });
		const tokens = config.auth
			? new TokenManager(http, config.auth, logger, deps.clock)
			: undefined;
		trendSource = new TrendApiClient(
			http,
			{ baseUrl: config.trendApi.baseUrl, timeoutMs: config.trendApi.timeoutMs },
			{ parser, tokens, logger }
		);
	}

	const builder = deps.builder ?? new IsolationForestModelBuilder(
		{
			window: config.window,
			minSamples: config.training.minSamples,
			trees: config.training.trees,
			sampleSize: config.training.sampleSize,
			seed: config.training.seed,
			historyMonths: config.cache.trainingHistoryMonths,
		},
		logger,
		deps.clock
	);

	const cache = new ModelCache(config.cache, {
		store: deps.store ?? createModelStore(config, logger),
		builder,
		trendSource,
		codec: deps.codec ?? new JsonArtifactCodec(),
		logger,
		clock: deps.clock,
	});

	const emitter = new AlertEmitter(
		deps.publisher,
		{
			maxAttempts: config.alerts.publishRetries,
			baseDelayMs: config.alerts.retryBaseDelayMs,
			maxDelayMs: config.alerts.retryMaxDelayMs,
		},
		logger
	);

	const engine = new InferenceEngine(
		{ window: config.window, thresholds: config.thresholds },
		{ cache, emitter, parser, logger }
	);

	return { engine, cache, emitter, parser };
}
