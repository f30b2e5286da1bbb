/**
 * STREAMING INFERENCE - TYPE DEFINITIONS
 * ========================================
 *
 * Per-monitor windowing, model resolution and anomaly verdicts
 */

/**
 * One multi-sensor reading from a monitor
 */
export interface Reading {
	readonly monitorId: string;
	readonly timestamp: number;                       // Unix timestamp (ms), source-assigned
	readonly values: Readonly<Record<string, number>>; // sensor name -> value
}

/**
 * Rolling statistics computed per sensor
 */
export const SUMMARY_STATISTICS = ['mean', 'std', 'min', 'max', 'last'] as const;

export type SummaryStatistic = typeof SUMMARY_STATISTICS[number];

export type SensorStats = Record<SummaryStatistic, number> & { count: number };

/**
 * Feature vector derived from one window position
 */
export interface WindowSummary {
	readonly monitorId: string;
	readonly timestamp: number;          // Position the window ends at
	readonly windowStart: number;        // Oldest reading in the window
	readonly size: number;               // Readings in the window
	readonly sensors: readonly string[]; // Sorted sensor names present in the window
	readonly stats: Readonly<Record<string, SensorStats>>;
	readonly featureNames: readonly string[]; // `${sensor}.${statistic}`
	readonly features: readonly number[];
}

/**
 * How a window chooses which sealed positions produce a summary
 */
export type EmitPolicy =
	| { mode: 'every' }
	| { mode: 'count'; every: number }    // Every N-th sealed reading
	| { mode: 'tick'; intervalMs: number }; // First sealed reading of each event-time bucket

export interface WindowConfig {
	spanMs?: number;          // Time bound (omit for count-only windows)
	maxCount?: number;        // Count bound (omit for time-only windows)
	minSamples: number;       // Fewer readings than this -> no summary
	lateToleranceMs: number;  // Out-of-order tolerance behind the newest timestamp
	emit: EmitPolicy;
}

/**
 * Feature vector after scaling
 */
export type FeatureVector = readonly number[];

export interface Scaler {
	transform(vector: readonly number[]): number[];
}

export interface ScoringModel {
	readonly kind: string;
	/** Anomaly score, higher is more anomalous */
	score(vector: FeatureVector): number;
}

/**
 * Loaded, ready-to-use model bundled with its scaler
 */
export interface ModelArtifact {
	readonly monitorId: string;
	readonly version: string;
	readonly builtAt: number;
	readonly valid: boolean;
	readonly featureNames: readonly string[];
	readonly sensors: readonly string[];
	readonly scaler: Scaler;
	readonly model: ScoringModel;
}

/**
 * Outcome of resolving the model for a monitor
 */
export type Resolution =
	| { status: 'fresh'; artifact: ModelArtifact }
	| { status: 'degraded'; artifact: ModelArtifact; reason: string }
	| { status: 'unavailable'; reason: string };

/**
 * Per-monitor decision parameters
 */
export interface DecisionPolicy {
	threshold: number;    // Score at or above this is a breach
	breachCount: number;  // Consecutive breaches needed to flag
}

export interface ThresholdConfig {
	defaultThreshold: number;
	overrides: Record<string, number>;
	breachCount: number;
}

/**
 * Anomaly decision for one window position
 */
export interface AnomalyVerdict {
	readonly monitorId: string;
	readonly timestamp: number;
	readonly score: number;
	readonly isAnomaly: boolean;
	readonly degraded: boolean;
	readonly threshold: number;
	readonly consecutiveBreaches: number;
	readonly modelVersion: string;
	readonly topFeatures: readonly string[];
	readonly summary: WindowSummary;
}

/**
 * Serialized alert handed to the transport
 */
export interface AlertRecord {
	monitorId: string;
	timestamp: number;
	score: number;
	isAnomaly: true;
	degraded: boolean;
	threshold: number;
	consecutiveBreaches: number;
	modelVersion: string;
	topFeatures: string[];
	features: Record<string, SensorStats>;
}

/**
 * Alert transport boundary
 */
export interface AlertPublisher {
	/** Rejects with TransportError on failure */
	publish(record: AlertRecord): Promise<void>;
}

export type DeliveryResult =
	| { ok: true; attempts: number }
	| { ok: false; attempts: number; error: Error };

/**
 * Durable artifact storage boundary
 */
export interface ModelStore {
	/** Resolves undefined when no artifact exists for the monitor */
	get(monitorId: string): Promise<Buffer | undefined>;
	put(monitorId: string, bytes: Buffer): Promise<void>;
}

export interface HistoryQuery {
	months: number;
	limit: number;
}

/**
 * Historical trend data boundary
 */
export interface TrendSource {
	fetchHistory(monitorId: string, query: HistoryQuery, signal?: AbortSignal): Promise<Reading[]>;
}

/**
 * Trains a fresh artifact from history
 */
export interface ModelBuilder {
	build(monitorId: string, history: readonly Reading[], signal?: AbortSignal): Promise<Buffer>;
}

/**
 * Turns stored bytes into a usable artifact
 */
export interface ArtifactCodec {
	decode(bytes: Buffer): ModelArtifact;
}
