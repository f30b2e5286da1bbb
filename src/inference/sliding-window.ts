/**
 * SLIDING WINDOW - PER-MONITOR EVENT-TIME WINDOW
 * ================================================
 *
 * Keeps one monitor's recent readings ordered by timestamp and turns them
 * into window summaries.
 *
 * Readings may arrive out of order by up to `lateToleranceMs` behind the
 * newest timestamp seen. A reading only produces a summary once the
 * watermark (newest - tolerance) has passed it, so no later arrival can
 * change its window. Anything behind the watermark is a late drop.
 */

import type { EmitPolicy, Reading, WindowConfig, WindowSummary } from './types';
import { summarize } from './statistics';

export type IngestStatus = 'accepted' | 'late' | 'rejected';

export interface IngestResult {
	status: IngestStatus;
	/** Summaries for positions sealed by this ingest, oldest first */
	summaries: WindowSummary[];
}

export interface WindowStats {
	retained: number;
	pending: number;
	lateDrops: number;
	sealed: number;
	watermark: number;
}

export class SlidingWindow {
	private readonly monitorId: string;
	private readonly config: WindowConfig;
	private readonly spanMs: number;
	private readonly maxCount: number;

	// Sorted by timestamp, then by valueKey() so equal timestamps do not
	// depend on arrival order
	private readings: Reading[] = [];
	// readings[pendingIndex..] are not sealed yet
	private pendingIndex = 0;
	private newest = Number.NEGATIVE_INFINITY;
	private sealedTotal = 0;
	private lastTickBucket = Number.NEGATIVE_INFINITY;
	private lateDrops = 0;

	constructor(monitorId: string, config: WindowConfig) {
		this.monitorId = monitorId;
		this.config = config;
		this.spanMs = config.spanMs ?? Number.POSITIVE_INFINITY;
		this.maxCount = config.maxCount ?? Number.POSITIVE_INFINITY;
	}

	/**
	 * Add a reading and return any summaries it makes final
	 */
	ingest(reading: Reading): IngestResult {
		if (reading.monitorId !== this.monitorId) {
			return { status: 'rejected', summaries: [] };
		}

		if (reading.timestamp < this.watermark()) {
			this.lateDrops++;
			return { status: 'late', summaries: [] };
		}

		this.readings.splice(this.upperBound(reading), 0, reading);
		this.newest = Math.max(this.newest, reading.timestamp);

		const summaries = this.seal();
		this.evict();

		return { status: 'accepted', summaries };
	}

	/**
	 * Readings of the window ending at the watermark
	 */
	getWindow(): Reading[] {
		const watermark = this.watermark();
		let end = this.readings.length;
		while (end > 0 && this.readings[end - 1].timestamp > watermark) {
			end--;
		}
		return this.windowEndingAt(end - 1);
	}

	getStats(): WindowStats {
		return {
			retained: this.readings.length,
			pending: this.readings.length - this.pendingIndex,
			lateDrops: this.lateDrops,
			sealed: this.sealedTotal,
			watermark: this.watermark(),
		};
	}

	private watermark(): number {
		return this.newest - this.config.lateToleranceMs;
	}

	private seal(): WindowSummary[] {
		const watermark = this.watermark();
		const summaries: WindowSummary[] = [];

		while (
			this.pendingIndex < this.readings.length &&
			this.readings[this.pendingIndex].timestamp <= watermark
		) {
			const position = this.pendingIndex;
			this.pendingIndex++;
			this.sealedTotal++;

			if (!this.shouldEmit(this.readings[position].timestamp, this.config.emit)) {
				continue;
			}

			const window = this.windowEndingAt(position);
			if (window.length < this.config.minSamples) {
				continue;
			}

			summaries.push(summarize(this.monitorId, window));
		}

		return summaries;
	}

	private shouldEmit(timestamp: number, policy: EmitPolicy): boolean {
		switch (policy.mode) {
			case 'every':
				return true;
			case 'count':
				return this.sealedTotal % policy.every === 0;
			case 'tick': {
				const bucket = Math.floor(timestamp / policy.intervalMs);
				if (bucket > this.lastTickBucket) {
					this.lastTickBucket = bucket;
					return true;
				}
				return false;
			}
		}
	}

	/**
	 * Window for the reading at `position`: newest `maxCount` readings up to
	 * and including it, no older than its timestamp minus the span
	 */
	private windowEndingAt(position: number): Reading[] {
		if (position < 0) return [];

		const end = this.readings[position].timestamp;
		let start = position;
		while (
			start > 0 &&
			position - start + 1 < this.maxCount &&
			this.readings[start - 1].timestamp >= end - this.spanMs
		) {
			start--;
		}
		return this.readings.slice(start, position + 1);
	}

	/**
	 * Drop readings no future window can contain
	 */
	private evict(): void {
		const horizon = this.watermark() - this.spanMs;
		let drop = 0;
		while (drop < this.pendingIndex && this.readings[drop].timestamp < horizon) {
			drop++;
		}

		const sealedKept = this.pendingIndex - drop;
		if (sealedKept > this.maxCount) {
			drop += sealedKept - this.maxCount;
		}

		if (drop > 0) {
			this.readings.splice(0, drop);
			this.pendingIndex -= drop;
		}
	}

	/**
	 * First pending index that sorts after `reading`
	 */
	private upperBound(reading: Reading): number {
		const key = valueKey(reading);
		let lo = this.pendingIndex;
		let hi = this.readings.length;
		while (lo < hi) {
			const mid = (lo + hi) >>> 1;
			const other = this.readings[mid];
			if (
				other.timestamp < reading.timestamp ||
				(other.timestamp === reading.timestamp && valueKey(other) <= key)
			) {
				lo = mid + 1;
			} else {
				hi = mid;
			}
		}
		return lo;
	}
}

/**
 * Sensor values serialized with sorted names
 */
function valueKey(reading: Reading): string {
	const names = Object.keys(reading.values).sort();
	return JSON.stringify(names.map(name => [name, reading.values[name]]));
}
