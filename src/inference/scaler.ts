/**
 * PREPROCESSOR / SCALER
 * ======================
 *
 * Robust scaling (median / IQR) fitted jointly with a model and shipped
 * inside its artifact, so inference always scales with the parameters the
 * model was trained on.
 */

import { iqr, median } from './statistics';
import { SchemaMismatchError } from './errors';
import type { FeatureVector, ModelArtifact, Scaler, WindowSummary } from './types';

export interface RobustScalerParams {
	center: number[];
	scale: number[];
}

export class RobustScaler implements Scaler {
	readonly center: readonly number[];
	readonly scale: readonly number[];

	constructor(params: RobustScalerParams) {
		if (params.center.length !== params.scale.length) {
			throw new Error(`Scaler center/scale length differ (${params.center.length} vs ${params.scale.length})`);
		}
		this.center = params.center;
		// Constant features keep their unit scale
		this.scale = params.scale.map(s => (s === 0 || !Number.isFinite(s) ? 1 : s));
	}

	/**
	 * Fit on row vectors (all of equal length)
	 */
	static fit(rows: readonly (readonly number[])[]): RobustScaler {
		if (rows.length === 0) {
			throw new Error('Cannot fit scaler on zero rows');
		}

		const width = rows[0].length;
		const center: number[] = [];
		const scale: number[] = [];
		for (let col = 0; col < width; col++) {
			const column = rows.map(row => row[col]);
			center.push(median(column));
			scale.push(iqr(column));
		}
		return new RobustScaler({ center, scale });
	}

	transform(vector: readonly number[]): number[] {
		if (vector.length !== this.center.length) {
			throw new Error(`Scaler expects ${this.center.length} features, got ${vector.length}`);
		}
		return vector.map((value, i) => (value - this.center[i]) / this.scale[i]);
	}

	toJSON(): RobustScalerParams {
		return { center: [...this.center], scale: [...this.scale] };
	}
}

/**
 * Align a window summary to the artifact's feature order and scale it.
 * Throws SchemaMismatchError when the sensor sets differ.
 */
export function transform(artifact: ModelArtifact, summary: WindowSummary): FeatureVector {
	const expected = [...artifact.sensors].sort();
	const actual = [...summary.sensors].sort();

	const sameSensors =
		expected.length === actual.length &&
		expected.every((sensor, i) => sensor === actual[i]);
	if (!sameSensors) {
		throw new SchemaMismatchError(artifact.monitorId, expected, actual);
	}

	const byName = new Map<string, number>();
	summary.featureNames.forEach((name, i) => byName.set(name, summary.features[i]));

	const raw: number[] = [];
	for (const name of artifact.featureNames) {
		const value = byName.get(name);
		if (value === undefined) {
			throw new SchemaMismatchError(
				artifact.monitorId,
				expected,
				actual,
				`feature '${name}' is not produced by the window summary`
			);
		}
		raw.push(value);
	}

	return artifact.scaler.transform(raw);
}
