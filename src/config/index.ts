/**
 * SERVICE CONFIGURATION
 * ======================
 *
 * Typed configuration loaded from environment variables (.env is loaded
 * by the entry point through dotenv).
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { ModelCacheOptions } from '../inference/model-cache';
import type { EmitPolicy, ThresholdConfig, WindowConfig } from '../inference/types';

export interface AlertConfig {
	publishRetries: number;
	retryBaseDelayMs: number;
	retryMaxDelayMs: number;
}

export interface TrainingConfig {
	minSamples: number;
	trees: number;
	sampleSize: number;
	seed: number;
}

export interface MqttConfig {
	brokerUrl: string;
	clientId: string;
	username?: string;
	password?: string;
	inputTopic: string;
	alertTopic: string;
	queueAlertsWhenOffline: boolean;
}

export type StoreConfig =
	| { kind: 'memory' }
	| {
		kind: 's3';
		bucket: string;
		prefix: string;
		region: string;
		endpoint?: string;
		accessKeyId?: string;
		secretAccessKey?: string;
		forcePathStyle: boolean;
	};

export interface TrendApiConfig {
	baseUrl: string;
	timeoutMs: number;
}

export interface AuthConfig {
	tokenUrl: string;
	username: string;
	password: string;
	refreshMarginMs: number;
}

export interface SensorConfig {
	aliasesPath?: string;
	fields: string[];
}

export interface ServiceConfig {
	window: WindowConfig;
	thresholds: ThresholdConfig;
	cache: ModelCacheOptions;
	alerts: AlertConfig;
	training: TrainingConfig;
	mqtt: MqttConfig;
	store: StoreConfig;
	trendApi: TrendApiConfig;
	auth?: AuthConfig;
	sensors: SensorConfig;
}

type Env = Record<string, string | undefined>;

function envString(env: Env, key: string, fallback: string): string {
	const value = env[key];
	return value === undefined || value.trim() === '' ? fallback : value.trim();
}

function envOptional(env: Env, key: string): string | undefined {
	const value = env[key];
	return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function envInt(env: Env, key: string, fallback: number): number {
	const value = envOptional(env, key);
	if (value === undefined) return fallback;
	if (!/^-?\d+$/.test(value)) {
		throw new Error(`Environment variable ${key} must be an integer (got: '${value}')`);
	}
	return parseInt(value, 10);
}

function envFloat(env: Env, key: string, fallback: number): number {
	const value = envOptional(env, key);
	if (value === undefined) return fallback;
	const parsed = Number(value);
	if (!Number.isFinite(parsed)) {
		throw new Error(`Environment variable ${key} must be a number (got: '${value}')`);
	}
	return parsed;
}

function envBool(env: Env, key: string, fallback: boolean): boolean {
	const value = envOptional(env, key);
	if (value === undefined) return fallback;
	return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function envList(env: Env, key: string): string[] {
	const value = envOptional(env, key);
	if (value === undefined) return [];
	return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Parse `m1=0.8,m2=0.9`
 */
export function parseThresholdOverrides(raw: string | undefined): Record<string, number> {
	const overrides: Array<[string, number]> = [];
	if (!raw) return {};

	for (const pair of raw.split(',')) {
		const trimmed = pair.trim();
		if (trimmed === '') continue;

		const separator = trimmed.lastIndexOf('=');
		const monitorId = trimmed.slice(0, separator).trim();
		const threshold = Number(trimmed.slice(separator + 1).trim());
		if (separator <= 0 || monitorId === '' || !Number.isFinite(threshold)) {
			throw new Error(`ANOMALY_THRESHOLD_OVERRIDES entry '${trimmed}' must look like <monitorId>=<threshold>`);
		}
		overrides.push([monitorId, threshold]);
	}
	return Object.fromEntries(overrides);
}

function emitPolicyFromEnv(env: Env): EmitPolicy {
	const mode = envString(env, 'WINDOW_EMIT_MODE', 'count');
	switch (mode) {
		case 'every':
			return { mode: 'every' };
		case 'count':
			return { mode: 'count', every: envInt(env, 'WINDOW_EMIT_EVERY', 3) };
		case 'tick':
			return { mode: 'tick', intervalMs: envInt(env, 'WINDOW_TICK_MS', 60000) };
		default:
			throw new Error(`WINDOW_EMIT_MODE must be one of every, count, tick (got: '${mode}')`);
	}
}

function storeFromEnv(env: Env): StoreConfig {
	const bucket = envOptional(env, 'S3_BUCKET_NAME');
	const kind = envString(env, 'MODEL_STORE', bucket ? 's3' : 'memory');
	if (kind === 'memory') {
		return { kind: 'memory' };
	}
	if (kind !== 's3') {
		throw new Error(`MODEL_STORE must be s3 or memory (got: '${kind}')`);
	}
	return {
		kind: 's3',
		bucket: bucket ?? '',
		prefix: envString(env, 'S3_PREFIX', 'models'),
		region: envString(env, 'S3_REGION', 'us-east-1'),
		endpoint: envOptional(env, 'S3_ENDPOINT'),
		accessKeyId: envOptional(env, 'S3_ACCESS_KEY_ID'),
		secretAccessKey: envOptional(env, 'S3_SECRET_ACCESS_KEY'),
		forcePathStyle: envBool(env, 'S3_FORCE_PATH_STYLE', true),
	};
}

/**
 * Load configuration from environment variables
 */
export function loadConfigFromEnv(env: Env = process.env): ServiceConfig {
	const spanMs = envInt(env, 'WINDOW_SPAN_MS', 300000);
	const maxCount = envInt(env, 'WINDOW_MAX_COUNT', 10);

	const tokenUrl = envOptional(env, 'TOKEN_URL');

	return {
		window: {
			// 0 disables a bound
			spanMs: spanMs > 0 ? spanMs : undefined,
			maxCount: maxCount > 0 ? maxCount : undefined,
			minSamples: envInt(env, 'WINDOW_MIN_SAMPLES', 3),
			lateToleranceMs: envInt(env, 'WINDOW_LATE_TOLERANCE_MS', 0),
			emit: emitPolicyFromEnv(env),
		},
		thresholds: {
			defaultThreshold: envFloat(env, 'ANOMALY_THRESHOLD', 0.65),
			overrides: parseThresholdOverrides(envOptional(env, 'ANOMALY_THRESHOLD_OVERRIDES')),
			breachCount: envInt(env, 'HYSTERESIS_BREACH_COUNT', 1),
		},
		cache: {
			capacity: envInt(env, 'MODEL_CACHE_SIZE', 32),
			freshnessMs: envInt(env, 'MODEL_FRESHNESS_MS', 3600000),
			storeTimeoutMs: envInt(env, 'STORE_TIMEOUT_MS', 10000),
			storeRetries: envInt(env, 'MODEL_STORE_RETRIES', 3),
			buildTimeoutMs: envInt(env, 'BUILD_TIMEOUT_MS', 300000),
			backoffBaseMs: envInt(env, 'RESOLVE_BACKOFF_BASE_MS', 30000),
			backoffMaxMs: envInt(env, 'RESOLVE_BACKOFF_MAX_MS', 900000),
			trainingHistoryMonths: envInt(env, 'TRAINING_HISTORY_MONTHS', 6),
			trainingMaxReadings: envInt(env, 'TRAINING_MAX_READINGS', 5000),
		},
		alerts: {
			publishRetries: envInt(env, 'PUBLISH_RETRIES', 3),
			retryBaseDelayMs: envInt(env, 'PUBLISH_RETRY_BASE_MS', 500),
			retryMaxDelayMs: envInt(env, 'PUBLISH_RETRY_MAX_MS', 10000),
		},
		training: {
			minSamples: envInt(env, 'TRAINING_MIN_SAMPLES', 20),
			trees: envInt(env, 'MODEL_TREES', 200),
			sampleSize: envInt(env, 'MODEL_SAMPLE_SIZE', 256),
			seed: envInt(env, 'MODEL_SEED', 42),
		},
		mqtt: {
			brokerUrl: envString(env, 'MQTT_BROKER_URL', 'mqtt://localhost:1883'),
			clientId: envString(env, 'MQTT_CLIENT_ID', `telemetry-inference-${process.pid}`),
			username: envOptional(env, 'MQTT_USERNAME'),
			password: envOptional(env, 'MQTT_PASSWORD'),
			inputTopic: envString(env, 'INPUT_TOPIC', 'telemetry/readings/+'),
			alertTopic: envString(env, 'ALERT_TOPIC', 'telemetry/anomaly-alerts'),
			queueAlertsWhenOffline: envBool(env, 'ALERT_QUEUE_OFFLINE', false),
		},
		store: storeFromEnv(env),
		trendApi: {
			baseUrl: envString(env, 'TREND_API_BASE_URL', 'http://localhost:5000/api/v1/trend'),
			timeoutMs: envInt(env, 'TREND_API_TIMEOUT_MS', 30000),
		},
		auth: tokenUrl
			? {
				tokenUrl,
				username: envString(env, 'TOKEN_USERNAME', ''),
				password: envString(env, 'TOKEN_PASSWORD', ''),
				refreshMarginMs: envInt(env, 'TOKEN_REFRESH_MARGIN_MS', 30000),
			}
			: undefined,
		sensors: {
			aliasesPath: envOptional(env, 'SENSOR_ALIASES_PATH'),
			fields: envList(env, 'SENSOR_FIELDS'),
		},
	};
}

/**
 * Validate configuration; an empty list means valid
 */
export function validateConfig(config: ServiceConfig): string[] {
	const errors: string[] = [];
	const { window, thresholds, cache, alerts, training, store, auth } = config;

	if (window.spanMs === undefined && window.maxCount === undefined) {
		errors.push('Window needs a time span or a count bound');
	}
	if (window.minSamples < 1) {
		errors.push('WINDOW_MIN_SAMPLES must be at least 1');
	}
	if (window.maxCount !== undefined && window.minSamples > window.maxCount) {
		errors.push('WINDOW_MIN_SAMPLES cannot exceed WINDOW_MAX_COUNT');
	}
	if (window.lateToleranceMs < 0) {
		errors.push('WINDOW_LATE_TOLERANCE_MS must be non-negative');
	}
	if (window.emit.mode === 'count' && window.emit.every < 1) {
		errors.push('WINDOW_EMIT_EVERY must be at least 1');
	}
	if (window.emit.mode === 'tick' && window.emit.intervalMs < 1) {
		errors.push('WINDOW_TICK_MS must be positive');
	}

	if (thresholds.breachCount < 1) {
		errors.push('HYSTERESIS_BREACH_COUNT must be at least 1');
	}

	if (cache.capacity < 1) {
		errors.push('MODEL_CACHE_SIZE must be at least 1');
	}
	if (cache.freshnessMs < 0) {
		errors.push('MODEL_FRESHNESS_MS must be non-negative');
	}
	if (cache.storeRetries < 1) {
		errors.push('MODEL_STORE_RETRIES must be at least 1');
	}
	if (cache.storeTimeoutMs < 1 || cache.buildTimeoutMs < 1) {
		errors.push('STORE_TIMEOUT_MS and BUILD_TIMEOUT_MS must be positive');
	}
	if (cache.backoffBaseMs < 0 || cache.backoffMaxMs < cache.backoffBaseMs) {
		errors.push('RESOLVE_BACKOFF_MAX_MS must be at least RESOLVE_BACKOFF_BASE_MS');
	}
	if (cache.trainingHistoryMonths < 1 || cache.trainingMaxReadings < 1) {
		errors.push('TRAINING_HISTORY_MONTHS and TRAINING_MAX_READINGS must be positive');
	}

	if (alerts.publishRetries < 1) {
		errors.push('PUBLISH_RETRIES must be at least 1');
	}

	if (training.minSamples < 2) {
		errors.push('TRAINING_MIN_SAMPLES must be at least 2');
	}
	if (training.trees < 1 || training.sampleSize < 2) {
		errors.push('MODEL_TREES must be positive and MODEL_SAMPLE_SIZE at least 2');
	}

	if (store.kind === 's3' && store.bucket === '') {
		errors.push('S3_BUCKET_NAME is required when MODEL_STORE=s3');
	}
	if (auth && (auth.username === '' || auth.password === '')) {
		errors.push('TOKEN_USERNAME and TOKEN_PASSWORD are required when TOKEN_URL is set');
	}

	return errors;
}

const SensorAliasesSchema = z.record(z.string().min(1));

/**
 * Read a `{ "<code>": "<sensor name>" }` JSON file
 */
export function loadSensorAliases(path: string): Record<string, string> {
	const parsed = SensorAliasesSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
	if (!parsed.success) {
		throw new Error(`Sensor alias file ${path} must map codes to names: ${parsed.error.message}`);
	}
	return parsed.data;
}

function describeEmit(emit: EmitPolicy): string {
	switch (emit.mode) {
		case 'every':
			return 'every reading';
		case 'count':
			return `every ${emit.every} readings`;
		case 'tick':
			return `every ${emit.intervalMs / 1000}s of event time`;
	}
}

/**
 * Get human-readable configuration summary
 */
export function getConfigSummary(config: ServiceConfig): string {
	const { window, thresholds, cache, store } = config;
	const overrides = Object.keys(thresholds.overrides).length;

	return `
Inference Engine Configuration:
  Window: ${window.spanMs !== undefined ? `${window.spanMs / 1000}s` : 'unbounded'} span, ${window.maxCount ?? 'unbounded'} readings max, ${window.minSamples} min samples
  Late Tolerance: ${window.lateToleranceMs}ms
  Summaries: ${describeEmit(window.emit)}
  Threshold: ${thresholds.defaultThreshold} (${overrides} override${overrides === 1 ? '' : 's'}), ${thresholds.breachCount} consecutive breach(es)
  Model Cache: ${cache.capacity} models, fresh for ${cache.freshnessMs / 1000}s
  Backoff: ${cache.backoffBaseMs / 1000}s - ${cache.backoffMaxMs / 1000}s
  Model Store: ${store.kind === 's3' ? `s3://${store.bucket}/${store.prefix}` : 'in-memory'}
  Input Topic: ${config.mqtt.inputTopic}
  Alert Topic: ${config.mqtt.alertTopic}
	`.trim();
}
