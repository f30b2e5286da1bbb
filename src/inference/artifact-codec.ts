/**
 * MODEL ARTIFACT CODEC
 * =====================
 *
 * JSON artifact layout written by the model builder and read back by the
 * model cache:
 *
 *   { format, metadata, scaler: { center, scale }, model: { kind, sampleSize, trees } }
 */

import { z } from 'zod';
import { ArtifactDecodeError } from './errors';
import { IsolationForest } from './isolation-forest';
import type { IsolationNode } from './isolation-forest';
import { RobustScaler } from './scaler';
import type { ArtifactCodec, ModelArtifact } from './types';

export const ARTIFACT_FORMAT = 'telemetry-model/v1';

const IsolationNodeSchema: z.ZodType<IsolationNode> = z.lazy(() =>
	z.union([
		z.object({ leaf: z.literal(true), size: z.number().int().nonnegative() }),
		z.object({
			leaf: z.literal(false),
			feature: z.number().int().nonnegative(),
			threshold: z.number(),
			left: IsolationNodeSchema,
			right: IsolationNodeSchema,
		}),
	])
);

export const ArtifactMetadataSchema = z.object({
	monitorId: z.string().min(1),
	version: z.string().min(1),
	builtAt: z.number(),
	valid: z.boolean(),
	featureNames: z.array(z.string().min(1)).min(1),
	trainingSamples: z.number().int().nonnegative().optional(),
	historyMonths: z.number().nonnegative().optional(),
});

export type ArtifactMetadata = z.infer<typeof ArtifactMetadataSchema>;

const ArtifactDocumentSchema = z.object({
	format: z.literal(ARTIFACT_FORMAT),
	metadata: ArtifactMetadataSchema,
	scaler: z.object({
		center: z.array(z.number()),
		scale: z.array(z.number()),
	}),
	model: z.object({
		kind: z.literal('isolation_forest'),
		sampleSize: z.number().int().positive(),
		trees: z.array(IsolationNodeSchema).min(1),
	}),
});

export type ArtifactDocument = z.infer<typeof ArtifactDocumentSchema>;

/**
 * Sensor names referenced by `${sensor}.${statistic}` feature names
 */
export function sensorsOf(featureNames: readonly string[]): string[] {
	const sensors = new Set<string>();
	for (const name of featureNames) {
		const dot = name.lastIndexOf('.');
		sensors.add(dot > 0 ? name.slice(0, dot) : name);
	}
	return Array.from(sensors).sort();
}

export function encodeArtifact(document: ArtifactDocument): Buffer {
	return Buffer.from(JSON.stringify(document), 'utf-8');
}

export class JsonArtifactCodec implements ArtifactCodec {
	decode(bytes: Buffer): ModelArtifact {
		let raw: unknown;
		try {
			raw = JSON.parse(bytes.toString('utf-8'));
		} catch (error) {
			throw new ArtifactDecodeError('not valid JSON', undefined, { cause: error });
		}

		const parsed = ArtifactDocumentSchema.safeParse(raw);
		if (!parsed.success) {
			const issues = parsed.error.issues
				.slice(0, 3)
				.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
			throw new ArtifactDecodeError(issues.join('; '));
		}

		const { metadata, scaler, model } = parsed.data;
		const width = metadata.featureNames.length;
		if (scaler.center.length !== width || scaler.scale.length !== width) {
			throw new ArtifactDecodeError(
				`scaler has ${scaler.center.length} features, metadata lists ${width}`,
				metadata.monitorId
			);
		}

		return {
			monitorId: metadata.monitorId,
			version: metadata.version,
			builtAt: metadata.builtAt,
			valid: metadata.valid,
			featureNames: metadata.featureNames,
			sensors: sensorsOf(metadata.featureNames),
			scaler: new RobustScaler(scaler),
			model: new IsolationForest({ sampleSize: model.sampleSize, trees: model.trees }),
		};
	}
}
