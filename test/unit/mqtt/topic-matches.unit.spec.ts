import { topicMatches } from '../../../src/mqtt/manager';

describe('topicMatches', () => {
	it('should match exact topics', () => {
		expect(topicMatches('telemetry/readings', 'telemetry/readings')).toBe(true);
		expect(topicMatches('telemetry/readings', 'telemetry/alerts')).toBe(false);
	});

	it('should match one level with +', () => {
		expect(topicMatches('telemetry/readings/+', 'telemetry/readings/m1')).toBe(true);
		expect(topicMatches('telemetry/readings/+', 'telemetry/readings/m1/raw')).toBe(false);
		expect(topicMatches('telemetry/readings/+', 'telemetry/readings')).toBe(false);
	});

	it('should match any remaining levels with #', () => {
		expect(topicMatches('telemetry/#', 'telemetry/readings/m1/raw')).toBe(true);
		expect(topicMatches('telemetry/#', 'other/readings')).toBe(false);
	});

	it('should strip the shared subscription prefix', () => {
		expect(topicMatches('$share/inference/telemetry/readings/+', 'telemetry/readings/m1')).toBe(true);
	});
});
