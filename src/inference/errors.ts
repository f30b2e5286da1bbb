/**
 * Inference pipeline errors
 *
 * Every runtime failure is isolated to one reading or one monitor. None of
 * these is allowed to escape a monitor's lane.
 */

export class EngineError extends Error {
	readonly monitorId?: string;

	constructor(message: string, monitorId?: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'EngineError';
		this.monitorId = monitorId;
	}
}

/**
 * Malformed inbound reading. Dropped and counted.
 */
export class ValidationError extends EngineError {
	readonly issues: string[];

	constructor(issues: string[], monitorId?: string) {
		super(`Invalid reading: ${issues.join('; ')}`, monitorId);
		this.name = 'ValidationError';
		this.issues = issues;
	}
}

/**
 * Window feature set does not match what the artifact was trained on.
 * A configuration problem: never triggers a rebuild.
 */
export class SchemaMismatchError extends EngineError {
	readonly expected: string[];
	readonly actual: string[];

	constructor(monitorId: string, expected: string[], actual: string[], detail?: string) {
		super(
			`Feature schema mismatch for monitor ${monitorId}: ` +
			(detail ?? `expected sensors [${expected.join(', ')}], got [${actual.join(', ')}]`),
			monitorId
		);
		this.name = 'SchemaMismatchError';
		this.expected = expected;
		this.actual = actual;
	}
}

export class StorageError extends EngineError {
	readonly transient: boolean;

	constructor(message: string, monitorId?: string, options?: { cause?: unknown; transient?: boolean }) {
		super(message, monitorId, options);
		this.name = 'StorageError';
		this.transient = options?.transient ?? true;
	}
}

export class BuildError extends EngineError {
	constructor(monitorId: string, reason: string, options?: { cause?: unknown }) {
		super(`Model build failed for monitor ${monitorId}: ${reason}`, monitorId, options);
		this.name = 'BuildError';
	}
}

export class ArtifactDecodeError extends EngineError {
	constructor(reason: string, monitorId?: string, options?: { cause?: unknown }) {
		super(`Invalid model artifact: ${reason}`, monitorId, options);
		this.name = 'ArtifactDecodeError';
	}
}

export class PredictionError extends EngineError {
	constructor(monitorId: string, reason: string) {
		super(`Prediction failed for monitor ${monitorId}: ${reason}`, monitorId);
		this.name = 'PredictionError';
	}
}

export class TransportError extends EngineError {
	constructor(message: string, monitorId?: string, options?: { cause?: unknown }) {
		super(message, monitorId, options);
		this.name = 'TransportError';
	}
}

export class TimeoutError extends EngineError {
	readonly timeoutMs: number;

	constructor(operation: string, timeoutMs: number, monitorId?: string) {
		super(`${operation} timed out after ${timeoutMs}ms`, monitorId);
		this.name = 'TimeoutError';
		this.timeoutMs = timeoutMs;
	}
}

export class ApiCallError extends EngineError {
	readonly url: string;
	readonly status: number;

	constructor(url: string, status: number, message = '') {
		super(`API call failed: ${url} (status: ${status})${message ? ` | ${message}` : ''}`);
		this.name = 'ApiCallError';
		this.url = url;
		this.status = status;
	}
}

/**
 * Short, log-friendly description of any thrown value
 */
export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return `${error.name}: ${error.message}`;
	}
	return String(error);
}
