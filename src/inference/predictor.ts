/**
 * PREDICTOR
 * ==========
 *
 * Stateless scoring of a scaled feature vector with a resolved artifact.
 * Artifacts are read-only here, so one artifact may be scored from any
 * number of lanes at once.
 */

import { PredictionError, SchemaMismatchError } from './errors';
import type { FeatureVector, ModelArtifact } from './types';

export function score(artifact: ModelArtifact, vector: FeatureVector): number {
	if (vector.length !== artifact.featureNames.length) {
		throw new SchemaMismatchError(
			artifact.monitorId,
			[...artifact.sensors],
			[],
			`expected ${artifact.featureNames.length} features, got ${vector.length}`
		);
	}

	const value = artifact.model.score(vector);
	if (!Number.isFinite(value)) {
		throw new PredictionError(artifact.monitorId, `model ${artifact.version} returned ${value}`);
	}
	return value;
}

/**
 * Names of the features furthest from the training center
 */
export function topFeatures(artifact: ModelArtifact, vector: FeatureVector, count = 2): string[] {
	return vector
		.map((value, index) => ({ name: artifact.featureNames[index], deviation: Math.abs(value) }))
		.sort((a, b) => b.deviation - a.deviation || a.name.localeCompare(b.name))
		.slice(0, count)
		.map(entry => entry.name);
}
