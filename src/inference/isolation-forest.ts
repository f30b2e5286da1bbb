/**
 * ISOLATION FOREST
 * =================
 *
 * Seeded isolation forest. Trees are plain data so a trained forest can be
 * serialized into an artifact and scored after deserialization with
 * identical results.
 */

import type { FeatureVector, ScoringModel } from './types';

export type IsolationNode =
	| { leaf: true; size: number }
	| { leaf: false; feature: number; threshold: number; left: IsolationNode; right: IsolationNode };

export interface IsolationForestParams {
	sampleSize: number;
	trees: IsolationNode[];
}

export interface IsolationForestOptions {
	trees: number;
	sampleSize: number;
	seed: number;
}

const EULER_MASCHERONI = 0.5772156649;

/**
 * Average path length of an unsuccessful BST search over n points
 */
export function averagePathLength(n: number): number {
	if (n <= 1) return 0;
	if (n === 2) return 1;
	return 2 * (Math.log(n - 1) + EULER_MASCHERONI) - (2 * (n - 1)) / n;
}

/**
 * mulberry32: small deterministic PRNG returning [0, 1)
 */
export function createRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

export class IsolationForest implements ScoringModel {
	readonly kind = 'isolation_forest';
	readonly sampleSize: number;
	readonly trees: readonly IsolationNode[];

	constructor(params: IsolationForestParams) {
		if (params.trees.length === 0) {
			throw new Error('Isolation forest needs at least one tree');
		}
		this.sampleSize = params.sampleSize;
		this.trees = params.trees;
	}

	static fit(rows: readonly FeatureVector[], options: IsolationForestOptions): IsolationForest {
		if (rows.length < 2) {
			throw new Error(`Isolation forest needs at least 2 rows, got ${rows.length}`);
		}

		const random = createRandom(options.seed);
		const sampleSize = Math.min(options.sampleSize, rows.length);
		const heightLimit = Math.ceil(Math.log2(sampleSize));
		const trees: IsolationNode[] = [];

		for (let t = 0; t < options.trees; t++) {
			const sample = sampleWithoutReplacement(rows, sampleSize, random);
			trees.push(growTree(sample, 0, heightLimit, random));
		}

		return new IsolationForest({ sampleSize, trees });
	}

	/**
	 * Anomaly score in (0, 1]: ~0.5 normal, close to 1 isolated
	 */
	score(vector: FeatureVector): number {
		let total = 0;
		for (const tree of this.trees) {
			total += pathLength(vector, tree, 0);
		}
		const expected = total / this.trees.length;
		const normalizer = averagePathLength(this.sampleSize);
		if (normalizer === 0) return 0.5;
		return Math.pow(2, -expected / normalizer);
	}

	toJSON(): IsolationForestParams {
		return { sampleSize: this.sampleSize, trees: [...this.trees] };
	}
}

function pathLength(vector: FeatureVector, node: IsolationNode, depth: number): number {
	if (node.leaf) {
		return depth + averagePathLength(node.size);
	}
	const value = vector[node.feature] ?? 0;
	return pathLength(vector, value < node.threshold ? node.left : node.right, depth + 1);
}

function growTree(
	rows: readonly FeatureVector[],
	depth: number,
	heightLimit: number,
	random: () => number
): IsolationNode {
	if (depth >= heightLimit || rows.length <= 1) {
		return { leaf: true, size: rows.length };
	}

	// Only features that still vary can split
	const width = rows[0].length;
	const candidates: Array<{ feature: number; min: number; max: number }> = [];
	for (let feature = 0; feature < width; feature++) {
		let min = Number.POSITIVE_INFINITY;
		let max = Number.NEGATIVE_INFINITY;
		for (const row of rows) {
			min = Math.min(min, row[feature]);
			max = Math.max(max, row[feature]);
		}
		if (max > min) {
			candidates.push({ feature, min, max });
		}
	}

	if (candidates.length === 0) {
		return { leaf: true, size: rows.length };
	}

	const pick = candidates[Math.floor(random() * candidates.length)];
	const threshold = pick.min + random() * (pick.max - pick.min);
	const left = rows.filter(row => row[pick.feature] < threshold);
	const right = rows.filter(row => row[pick.feature] >= threshold);

	return {
		leaf: false,
		feature: pick.feature,
		threshold,
		left: growTree(left, depth + 1, heightLimit, random),
		right: growTree(right, depth + 1, heightLimit, random),
	};
}

function sampleWithoutReplacement<T>(items: readonly T[], size: number, random: () => number): T[] {
	const pool = [...items];
	for (let i = 0; i < size; i++) {
		const j = i + Math.floor(random() * (pool.length - i));
		[pool[i], pool[j]] = [pool[j], pool[i]];
	}
	return pool.slice(0, size);
}
