import { StorageError } from '../../../src/inference/errors';
import { ModelCache, type ModelCacheOptions } from '../../../src/inference/model-cache';
import { createCacheOptions, createReadingSeries, encodeStubArtifact, StubArtifactCodec } from '../../helpers/fixtures';
import { createGate, FakeClock, StubModelBuilder, StubModelStore, StubTrendSource } from '../../helpers/stubs';

function createCache(overrides: Partial<ModelCacheOptions> = {}) {
	const store = new StubModelStore();
	const builder = new StubModelBuilder();
	const trendSource = new StubTrendSource();
	const clock = new FakeClock();
	const cache = new ModelCache(createCacheOptions(overrides), {
		store,
		builder,
		trendSource,
		codec: new StubArtifactCodec(),
		clock: clock.now,
	});
	return { cache, store, builder, trendSource, clock };
}

function versionOf(resolution: Awaited<ReturnType<ModelCache['resolve']>>): string | undefined {
	return resolution.status === 'unavailable' ? undefined : resolution.artifact.version;
}

describe('ModelCache', () => {
	describe('resolve', () => {
		it('should load from the store and then serve from memory', async () => {
			const { cache, store } = createCache();
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', version: 'v7' }));

			const first = await cache.resolve('m1');
			const second = await cache.resolve('m1');

			expect(first.status).toBe('fresh');
			expect(versionOf(first)).toBe('v7');
			expect(versionOf(second)).toBe('v7');
			expect(store.getStub.callCount).toBe(1);
			expect(cache.getStats()).toMatchObject({ size: 1, hits: 1, loads: 1, builds: 0 });
		});

		it('should build from history when the store has nothing and persist the result', async () => {
			const { cache, store, builder, trendSource } = createCache();
			const history = createReadingSeries('m1', 5);
			const bytes = encodeStubArtifact({ monitorId: 'm1', version: 'v2' });
			trendSource.fetchStub.resolves(history);
			builder.buildStub.resolves(bytes);

			const resolution = await cache.resolve('m1');

			expect(resolution.status).toBe('fresh');
			expect(versionOf(resolution)).toBe('v2');
			expect(trendSource.fetchStub.firstCall.args[0]).toBe('m1');
			expect(trendSource.fetchStub.firstCall.args[1]).toEqual({ months: 6, limit: 100 });
			expect(builder.buildStub.firstCall.args[1]).toEqual(history);
			expect(store.putStub.calledOnceWithExactly('m1', bytes)).toBe(true);
			expect(cache.getStats().builds).toBe(1);
		});

		it('should train on the most recent readings only', async () => {
			const { cache, builder, trendSource } = createCache({ trainingMaxReadings: 3 });
			trendSource.fetchStub.resolves(createReadingSeries('m1', 5));
			builder.buildStub.resolves(encodeStubArtifact({ monitorId: 'm1' }));

			await cache.resolve('m1');

			const trained: unknown[] = builder.buildStub.firstCall.args[1];
			expect(trained).toEqual(createReadingSeries('m1', 5).slice(2));
		});

		it('should still use a built model when persisting it fails', async () => {
			const { cache, store, builder } = createCache();
			builder.buildStub.resolves(encodeStubArtifact({ monitorId: 'm1', version: 'v3' }));
			store.putStub.rejects(new StorageError('bucket unavailable'));

			const resolution = await cache.resolve('m1');

			expect(resolution.status).toBe('fresh');
			expect(versionOf(resolution)).toBe('v3');
		});

		it('should report unavailable when nothing can be loaded or built', async () => {
			const { cache } = createCache();

			const resolution = await cache.resolve('m2');

			expect(resolution).toEqual({
				status: 'unavailable',
				reason: 'load: no artifact in store; build: Error: no builder configured',
			});
			expect(cache.getEntry('m2')?.consecutiveFailures).toBe(1);
		});

		it('should back off before retrying a failed monitor', async () => {
			const { cache, builder, clock } = createCache({ backoffBaseMs: 60000 });

			await cache.resolve('m2');
			const backingOff = await cache.resolve('m2');

			expect(backingOff).toEqual({ status: 'unavailable', reason: 'backing off after 1 failed refresh(es)' });
			expect(builder.buildStub.callCount).toBe(1);

			clock.advance(60000);
			await cache.resolve('m2');

			expect(builder.buildStub.callCount).toBe(2);
			expect(cache.getEntry('m2')?.nextAttemptAt).toBe(clock.now() + 120000);
		});

		it('should serve a stale model as degraded when the refresh fails', async () => {
			const { cache, store, clock } = createCache({ freshnessMs: 60000 });
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', version: 'v1' }));
			await cache.resolve('m1');

			clock.advance(60001);
			store.getStub.rejects(new StorageError('access denied', 'm1', { transient: false }));
			const resolution = await cache.resolve('m1');

			expect(resolution.status).toBe('degraded');
			expect(versionOf(resolution)).toBe('v1');
			if (resolution.status === 'degraded') {
				expect(resolution.reason).toBe(
					'load: StorageError: access denied; build: Error: no builder configured'
				);
			}
		});

		it('should retry transient store failures', async () => {
			const { cache, store } = createCache({ storeRetries: 3, backoffBaseMs: 1 });
			store.getStub.onFirstCall().rejects(new StorageError('connection reset'));
			store.getStub.onSecondCall().resolves(encodeStubArtifact({ monitorId: 'm1' }));

			const resolution = await cache.resolve('m1');

			expect(resolution.status).toBe('fresh');
			expect(store.getStub.callCount).toBe(2);
		});

		it('should time out a hanging store read', async () => {
			const { cache, store } = createCache({ storeTimeoutMs: 20, storeRetries: 3 });
			store.getStub.returns(new Promise(() => undefined));

			const resolution = await cache.resolve('m1');

			expect(resolution.status).toBe('unavailable');
			if (resolution.status === 'unavailable') {
				expect(resolution.reason).toContain('Model store read for m1 timed out after 20ms');
			}
			expect(store.getStub.callCount).toBe(1);
		});

		it('should reject an artifact marked invalid', async () => {
			const { cache, store } = createCache();
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', valid: false }));

			const resolution = await cache.resolve('m1');

			expect(resolution.status).toBe('unavailable');
			if (resolution.status === 'unavailable') {
				expect(resolution.reason).toContain('artifact v1 is marked invalid');
			}
		});

		it('should reject an artifact built for another monitor', async () => {
			const { cache, store } = createCache();
			store.getStub.resolves(encodeStubArtifact({ monitorId: 'other' }));

			const resolution = await cache.resolve('m1');

			expect(resolution.status).toBe('unavailable');
			if (resolution.status === 'unavailable') {
				expect(resolution.reason).toContain('artifact belongs to monitor other');
			}
		});
	});

	describe('coalescing', () => {
		it('should share one refresh between concurrent resolves', async () => {
			const { cache, store, builder } = createCache();
			const gate = createGate();
			builder.buildStub.callsFake(async () => {
				await gate.promise;
				return encodeStubArtifact({ monitorId: 'm1', version: 'v9' });
			});

			const pending = [cache.resolve('m1'), cache.resolve('m1'), cache.resolve('m1')];
			expect(cache.getStats().inFlight).toBe(1);

			gate.open();
			const resolutions = await Promise.all(pending);

			expect(resolutions.map(versionOf)).toEqual(['v9', 'v9', 'v9']);
			expect(store.getStub.callCount).toBe(1);
			expect(builder.buildStub.callCount).toBe(1);
			expect(cache.getStats().inFlight).toBe(0);
		});
	});

	describe('eviction', () => {
		it('should evict the least recently resolved monitor', async () => {
			const { cache, store } = createCache({ capacity: 2 });
			store.getStub.callsFake(async (monitorId: string) => encodeStubArtifact({ monitorId }));

			await cache.resolve('a');
			await cache.resolve('b');
			await cache.resolve('a');
			await cache.resolve('c');

			expect(cache.has('a')).toBe(true);
			expect(cache.has('b')).toBe(false);
			expect(cache.has('c')).toBe(true);
			expect(cache.getStats().evictions).toBe(1);
		});

		it('should defer evicting a monitor until its resolution settles', async () => {
			const { cache, store } = createCache({ capacity: 1 });
			const gate = createGate();
			store.getStub.callsFake(async (monitorId: string) => {
				if (monitorId === 'a') {
					await gate.promise;
				}
				return encodeStubArtifact({ monitorId });
			});

			const first = cache.resolve('a');
			const second = await cache.resolve('b');

			expect(second.status).toBe('fresh');
			expect(cache.has('a')).toBe(true);
			expect(cache.has('b')).toBe(true);

			gate.open();
			const resolved = await first;

			expect(resolved.status).toBe('fresh');
			expect(cache.has('a')).toBe(false);
			expect(cache.has('b')).toBe(true);
		});

		it('should keep backing off broken monitors that were evicted', async () => {
			const { cache, builder } = createCache({ capacity: 2 });

			for (let round = 0; round < 5; round++) {
				for (const monitorId of ['a', 'b', 'c']) {
					await cache.resolve(monitorId);
				}
			}

			expect(builder.buildStub.callCount).toBe(3);
			expect(cache.getStats().size).toBe(2);
			expect(cache.getEntry('a')?.consecutiveFailures).toBe(1);
		});

		it('should forget the oldest backoff beyond the tracking limit', async () => {
			const { cache, builder } = createCache({ backoffTrackingLimit: 1 });

			await cache.resolve('a');
			await cache.resolve('b');
			await cache.resolve('a');

			expect(builder.buildStub.callCount).toBe(3);
			expect(cache.getEntry('b')?.consecutiveFailures).toBe(0);
			expect(cache.getEntry('a')?.consecutiveFailures).toBe(1);
		});
	});

	describe('close', () => {
		it('should abandon an in-flight refresh', async () => {
			const { cache, builder } = createCache();

			const pending = cache.resolve('m1');
			await cache.close();

			expect(await pending).toEqual({ status: 'unavailable', reason: 'model cache closed during refresh' });
			expect(builder.buildStub.called).toBe(false);
		});

		it('should not start refreshes once closed', async () => {
			const { cache, store } = createCache();
			await cache.close();

			expect(await cache.resolve('m1')).toEqual({ status: 'unavailable', reason: 'model cache is closed' });
			expect(store.getStub.called).toBe(false);
		});
	});

	it('should refresh an invalidated monitor on the next resolve', async () => {
		const { cache, store } = createCache();
		store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', version: 'v1' }));
		await cache.resolve('m1');

		store.getStub.resolves(encodeStubArtifact({ monitorId: 'm1', version: 'v2' }));
		cache.invalidate('m1');

		expect(versionOf(await cache.resolve('m1'))).toBe('v2');
	});
});
