/**
 * Test Fixtures
 * ==============
 *
 * Readings, window configs and stub artifacts for inference tests
 */

import { z } from 'zod';
import type { ModelCacheOptions } from '../../src/inference/model-cache';
import { featureName } from '../../src/inference/statistics';
import { SUMMARY_STATISTICS } from '../../src/inference/types';
import type { ArtifactCodec, ModelArtifact, Reading, WindowConfig } from '../../src/inference/types';

export function createReading(monitorId: string, timestamp: number, values: Record<string, number>): Reading {
	return { monitorId, timestamp, values };
}

/**
 * `count` readings starting at `start`, `intervalMs` apart
 */
export function createReadingSeries(
	monitorId: string,
	count: number,
	options: { start?: number; intervalMs?: number; values?: (index: number) => Record<string, number> } = {}
): Reading[] {
	const start = options.start ?? 0;
	const interval = options.intervalMs ?? 1000;
	const values = options.values ?? ((i: number) => ({ temperature: 20 + (i % 5), vibration: 1 + (i % 3) / 10 }));
	return Array.from({ length: count }, (_, i) => createReading(monitorId, start + i * interval, values(i)));
}

export function createWindowConfig(overrides: Partial<WindowConfig> = {}): WindowConfig {
	return {
		spanMs: 300000,
		maxCount: 100,
		minSamples: 1,
		lateToleranceMs: 0,
		emit: { mode: 'every' },
		...overrides,
	};
}

/**
 * Cache options with a long backoff and short I/O deadlines
 */
export function createCacheOptions(overrides: Partial<ModelCacheOptions> = {}): ModelCacheOptions {
	return {
		capacity: 8,
		freshnessMs: 60000,
		storeTimeoutMs: 1000,
		storeRetries: 1,
		buildTimeoutMs: 1000,
		backoffBaseMs: 60000,
		backoffMaxMs: 600000,
		trainingHistoryMonths: 6,
		trainingMaxReadings: 100,
		...overrides,
	};
}

export const DEFAULT_SENSORS = ['temperature', 'vibration'];

export interface StubArtifactOptions {
	monitorId: string;
	version?: string;
	builtAt?: number;
	valid?: boolean;
	sensors?: string[];
	/** Fixed score the model returns */
	score?: number;
}

const StubArtifactSchema = z.object({
	monitorId: z.string(),
	version: z.string().optional(),
	builtAt: z.number().optional(),
	valid: z.boolean().optional(),
	sensors: z.array(z.string()).optional(),
	score: z.number().optional(),
});

export function stubFeatureNames(sensors: readonly string[]): string[] {
	return [...sensors].sort().flatMap(sensor => SUMMARY_STATISTICS.map(stat => featureName(sensor, stat)));
}

/**
 * Artifact with an identity scaler and a model returning a fixed score
 */
export function createStubArtifact(options: StubArtifactOptions): ModelArtifact {
	const sensors = [...(options.sensors ?? DEFAULT_SENSORS)].sort();
	const fixedScore = options.score ?? 0.3;
	return {
		monitorId: options.monitorId,
		version: options.version ?? 'v1',
		builtAt: options.builtAt ?? 0,
		valid: options.valid ?? true,
		featureNames: stubFeatureNames(sensors),
		sensors,
		scaler: { transform: vector => [...vector] },
		model: { kind: 'fixed', score: () => fixedScore },
	};
}

export function encodeStubArtifact(options: StubArtifactOptions): Buffer {
	return Buffer.from(JSON.stringify(options), 'utf-8');
}

/**
 * Decodes bytes written by encodeStubArtifact
 */
export class StubArtifactCodec implements ArtifactCodec {
	decode(bytes: Buffer): ModelArtifact {
		return createStubArtifact(StubArtifactSchema.parse(JSON.parse(bytes.toString('utf-8'))));
	}
}

/**
 * Unsigned JWT carrying only an `exp` claim (seconds)
 */
export function createJwt(exp: number): string {
	const encode = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');
	return `${encode({ alg: 'HS256', typ: 'JWT' })}.${encode({ exp })}.test-signature`;
}
