/**
 * Unit Tests: inference engine pipeline
 *
 * Runs the whole reading -> verdict -> alert path in process with stub
 * store, builder and publisher.
 */

import { AlertEmitter } from '../../../src/inference/alert-emitter';
import { InferenceEngine, type UnscoredEvent } from '../../../src/inference/engine';
import { StorageError } from '../../../src/inference/errors';
import { ModelCache } from '../../../src/inference/model-cache';
import { ReadingParser } from '../../../src/inference/reading';
import type { AnomalyVerdict, ArtifactCodec, ThresholdConfig, WindowConfig } from '../../../src/inference/types';
import {
	createCacheOptions,
	createReading,
	createReadingSeries,
	createStubArtifact,
	createWindowConfig,
	encodeStubArtifact,
	StubArtifactCodec,
} from '../../helpers/fixtures';
import {
	createGate,
	FakeClock,
	RecordingPublisher,
	StubModelBuilder,
	StubModelStore,
	StubTrendSource,
} from '../../helpers/stubs';

interface EngineSetup {
	window?: Partial<WindowConfig>;
	thresholds?: Partial<ThresholdConfig>;
	codec?: ArtifactCodec;
	publisherFailures?: number;
}

function createEngine(setup: EngineSetup = {}) {
	const store = new StubModelStore();
	const builder = new StubModelBuilder();
	const clock = new FakeClock();
	const publisher = new RecordingPublisher(setup.publisherFailures);

	const cache = new ModelCache(createCacheOptions(), {
		store,
		builder,
		trendSource: new StubTrendSource(),
		codec: setup.codec ?? new StubArtifactCodec(),
		clock: clock.now,
	});
	const emitter = new AlertEmitter(publisher, { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5 });
	const engine = new InferenceEngine(
		{
			window: createWindowConfig(setup.window),
			thresholds: { defaultThreshold: 0.65, overrides: {}, breachCount: 1, ...setup.thresholds },
		},
		{ cache, emitter, parser: new ReadingParser({ clock: clock.now }) }
	);

	const verdicts: AnomalyVerdict[] = [];
	const unscored: UnscoredEvent[] = [];
	engine.on('verdict', verdict => verdicts.push(verdict));
	engine.on('unscored', event => unscored.push(event));

	return { engine, cache, emitter, store, builder, clock, publisher, verdicts, unscored };
}

const sample = { temperature: 20, vibration: 1 };

describe('InferenceEngine', () => {
	describe('scoring', () => {
		it('should flag and publish a reading scored above the monitor threshold', async () => {
			const { engine, emitter, store, publisher, verdicts } = createEngine({ thresholds: { overrides: { m1: 0.8 } } });
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', score: 0.95 }));

			const report = await engine.ingest(createReading('m1', 1000, sample));
			await emitter.flush();

			expect(report.status).toBe('accepted');
			expect(verdicts).toHaveLength(1);
			expect(verdicts[0]).toMatchObject({
				monitorId: 'm1',
				timestamp: 1000,
				score: 0.95,
				isAnomaly: true,
				degraded: false,
				threshold: 0.8,
				consecutiveBreaches: 1,
				modelVersion: 'v1',
			});
			expect(verdicts[0].topFeatures).toEqual(['temperature.last', 'temperature.max']);
			expect(publisher.records).toHaveLength(1);
			expect(publisher.records[0]).toMatchObject({ monitorId: 'm1', score: 0.95, degraded: false });
			expect(engine.getStats().metrics).toMatchObject({ received: 1, summaries: 1, scored: 1, alertsDispatched: 1 });
		});

		it('should not publish scores below the threshold', async () => {
			const { engine, emitter, store, publisher, verdicts } = createEngine();
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', score: 0.3 }));

			await engine.ingest(createReading('m1', 1000, sample));
			await emitter.flush();

			expect(verdicts[0].isAnomaly).toBe(false);
			expect(publisher.attempts).toBe(0);
		});

		it('should leave readings unscored while no model can be resolved', async () => {
			const { engine, builder, publisher, unscored } = createEngine();

			const first = await engine.ingest(createReading('m2', 1000, sample));
			await engine.ingest(createReading('m2', 2000, sample));

			expect(first).toEqual({
				status: 'accepted',
				monitorId: 'm2',
				outcomes: [{
					status: 'unavailable',
					timestamp: 1000,
					reason: 'load: no artifact in store; build: Error: no builder configured',
				}],
			});
			expect(unscored.map(event => event.timestamp)).toEqual([1000, 2000]);
			expect(builder.buildStub.callCount).toBe(1);
			expect(publisher.attempts).toBe(0);
			expect(engine.getStats().metrics.unavailable).toBe(2);
		});

		it('should mark verdicts scored with a stale model as degraded', async () => {
			const { engine, emitter, store, clock, publisher, verdicts } = createEngine();
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', score: 0.95 }));
			await engine.ingest(createReading('m1', 1000, sample));

			clock.advance(60001);
			store.getStub.rejects(new StorageError('access denied', 'm1', { transient: false }));
			await engine.ingest(createReading('m1', 2000, sample));
			await emitter.flush();

			expect(verdicts.map(verdict => verdict.degraded)).toEqual([false, true]);
			expect(publisher.records.map(record => record.degraded)).toEqual([false, true]);
			expect(engine.getStats().metrics.degraded).toBe(1);
		});

		it('should require consecutive breaches before flagging', async () => {
			const { engine, store, verdicts } = createEngine({ thresholds: { breachCount: 2 } });
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', score: 0.95 }));

			for (const reading of createReadingSeries('m1', 3, { start: 1000 })) {
				await engine.ingest(reading);
			}

			expect(verdicts.map(verdict => verdict.isAnomaly)).toEqual([false, true, true]);
			expect(verdicts.map(verdict => verdict.consecutiveBreaches)).toEqual([1, 2, 3]);
			expect(engine.getStats().metrics.alertsDispatched).toBe(2);
		});

		it('should emit one summary per configured count of readings', async () => {
			const { engine, store, verdicts } = createEngine({ window: { emit: { mode: 'count', every: 3 } } });
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1' }));

			for (const reading of createReadingSeries('m1', 9)) {
				await engine.ingest(reading);
			}

			expect(verdicts.map(verdict => verdict.timestamp)).toEqual([2000, 5000, 8000]);
			expect(verdicts.map(verdict => verdict.summary.size)).toEqual([3, 6, 9]);
			expect(engine.getWindow('m1')).toHaveLength(9);
			expect(engine.getStats().metrics).toMatchObject({ received: 9, summaries: 3, scored: 3 });
		});
	});

	describe('failures', () => {
		it('should count a schema mismatch without rebuilding the model', async () => {
			const { engine, cache, store, builder, unscored } = createEngine();
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', sensors: ['pressure', 'temperature'] }));

			const report = await engine.ingest(createReading('m1', 1000, sample));

			expect(report.status === 'accepted' && report.outcomes[0].status).toBe('schema_mismatch');
			expect(unscored[0].reason).toBe(
				'Feature schema mismatch for monitor m1: expected sensors [pressure, temperature], got [temperature, vibration]'
			);
			expect(builder.buildStub.called).toBe(false);
			expect(cache.getStats().builds).toBe(0);
			expect(engine.getStats().metrics.schemaMismatches).toBe(1);
		});

		it('should count a model that returns a non-finite score', async () => {
			const codec: ArtifactCodec = {
				decode: () => ({
					...createStubArtifact({ monitorId: 'm1' }),
					model: { kind: 'fixed', score: () => Number.NaN },
				}),
			};
			const { engine, store } = createEngine({ codec });
			store.getStub.resolves(Buffer.from('{}'));

			const report = await engine.ingest(createReading('m1', 1000, sample));

			expect(report.status === 'accepted' && report.outcomes[0].status).toBe('prediction_error');
			expect(engine.getStats().metrics.predictionErrors).toBe(1);
		});

		it('should drop a reading behind the watermark', async () => {
			const { engine, store } = createEngine();
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1' }));

			await engine.ingest(createReading('m1', 5000, sample));
			const report = await engine.ingest(createReading('m1', 1000, sample));

			expect(report).toEqual({ status: 'late', monitorId: 'm1', timestamp: 1000 });
			expect(engine.getStats().metrics.lateDrops).toBe(1);
		});

		it('should reject a malformed payload', async () => {
			const { engine } = createEngine();

			const report = await engine.handleMessage(Buffer.from('{oops'));

			expect(report.status).toBe('rejected');
			expect(engine.getStats().metrics).toMatchObject({ received: 1, rejected: 1, summaries: 0 });
		});
	});

	describe('handleMessage', () => {
		it('should score a device payload', async () => {
			const { engine, store, verdicts } = createEngine();
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1' }));

			await engine.handleMessage(JSON.stringify({
				MONITORID: 'm1',
				TIMESTAMP: 1000,
				PROCESS_PARAMETER: { temperature: '20', vibration: '1' },
			}));

			expect(verdicts).toHaveLength(1);
			expect(verdicts[0].summary.stats.temperature.last).toBe(20);
		});
	});

	describe('lanes', () => {
		it('should process one monitor\'s readings in arrival order', async () => {
			const { engine, store, verdicts } = createEngine();
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1' }));

			await Promise.all(createReadingSeries('m1', 3, { start: 1000 }).map(reading => engine.ingest(reading)));

			expect(verdicts.map(verdict => verdict.timestamp)).toEqual([1000, 2000, 3000]);
		});

		it('should not hold one monitor behind another', async () => {
			const { engine, store, verdicts } = createEngine();
			const gate = createGate();
			store.getStub.callsFake(async (monitorId: string) => {
				if (monitorId === 'm1') {
					await gate.promise;
				}
				return encodeStubArtifact({ monitorId });
			});

			const blocked = engine.ingest(createReading('m1', 1000, sample));
			const report = await engine.ingest(createReading('m2', 1000, sample));

			expect(report.status === 'accepted' && report.outcomes[0].status).toBe('scored');
			expect(verdicts.map(verdict => verdict.monitorId)).toEqual(['m2']);

			gate.open();
			await blocked;

			expect(verdicts.map(verdict => verdict.monitorId)).toEqual(['m2', 'm1']);
			expect(engine.getStats().monitors).toBe(2);
		});
	});

	describe('shutdown', () => {
		it('should deliver pending alerts and refuse new readings', async () => {
			const { engine, store, publisher } = createEngine({ publisherFailures: 1 });
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', score: 0.95 }));
			await engine.ingest(createReading('m1', 1000, sample));

			await engine.shutdown();

			expect(publisher.records).toHaveLength(1);
			expect(await engine.ingest(createReading('m1', 2000, sample))).toEqual({ status: 'closed' });
			expect(engine.getStats().metrics.received).toBe(1);
		});
	});
});
