import { iqr, mean, median, percentile, stdDev, summarize } from '../../../src/inference/statistics';
import { createReading } from '../../helpers/fixtures';

describe('statistics', () => {
	it('should compute basic moments', () => {
		expect(mean([1, 2, 3, 4])).toBe(2.5);
		expect(mean([])).toBe(0);
		expect(stdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.13809, 5);
		expect(stdDev([7])).toBe(0);
	});

	it('should interpolate percentiles between ranks', () => {
		expect(percentile([4, 1, 3, 2], 0.25)).toBe(1.75);
		expect(percentile([1, 2, 3, 4], 0.75)).toBe(3.25);
		expect(median([1, 2, 3, 4])).toBe(2.5);
		expect(median([5, 1, 3])).toBe(3);
		expect(iqr([1, 2, 3, 4])).toBe(1.5);
	});

	describe('summarize', () => {
		it('should build per-sensor features in sensor then statistic order', () => {
			const summary = summarize('m1', [
				createReading('m1', 0, { vibration: 1, temperature: 10 }),
				createReading('m1', 1000, { temperature: 14 }),
			]);

			expect(summary.sensors).toEqual(['temperature', 'vibration']);
			expect(summary.featureNames).toEqual([
				'temperature.mean', 'temperature.std', 'temperature.min', 'temperature.max', 'temperature.last',
				'vibration.mean', 'vibration.std', 'vibration.min', 'vibration.max', 'vibration.last',
			]);
			expect(summary.features[0]).toBe(12);
			expect(summary.features[1]).toBeCloseTo(Math.sqrt(8), 10);
			expect(summary.features.slice(2)).toEqual([10, 14, 14, 1, 0, 1, 1, 1]);
			expect(summary.stats.temperature.count).toBe(2);
			expect(summary.stats.vibration.count).toBe(1);
			expect(summary.windowStart).toBe(0);
			expect(summary.timestamp).toBe(1000);
			expect(summary.size).toBe(2);
		});
	});
});
