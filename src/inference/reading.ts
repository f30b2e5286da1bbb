/**
 * INBOUND READING PARSER
 * =======================
 *
 * Accepts two payload shapes:
 *
 *   canonical  { "monitorId": "m1", "timestamp": 1700000000000, "values": { "temperature": 71.2 } }
 *   device     { "MONITORID": "m1", "TIMESTAMP": "2024-01-01T00:00:00Z", "PROCESS_PARAMETER": { "001_A": "71.2" } }
 *
 * Device payloads may also carry sensor codes at the top level instead of
 * under PROCESS_PARAMETER, and may omit TIMESTAMP (arrival time is used).
 */

import { z } from 'zod';
import { ValidationError } from './errors';
import type { Reading } from './types';

export interface ReadingParserOptions {
	/** Raw sensor code -> sensor name */
	aliases?: Record<string, string>;
	/** Keep only these sensors (raw code or aliased name) */
	allowedSensors?: readonly string[];
	clock?: () => number;
}

const IdSchema = z
	.union([z.string().trim().min(1), z.number().finite()], {
		errorMap: (_issue, ctx) => ({ message: ctx.data === undefined ? 'Required' : ctx.defaultError }),
	})
	.transform(String);
const TimestampSchema = z.union([z.number(), z.string().trim().min(1)]);
const ValuesSchema = z.record(z.unknown());

const CanonicalSchema = z.object({
	monitorId: IdSchema,
	timestamp: TimestampSchema,
	values: ValuesSchema,
});

const DeviceSchema = z
	.object({
		MONITORID: IdSchema,
		TIMESTAMP: TimestampSchema.optional(),
		PROCESS_PARAMETER: ValuesSchema.optional(),
	})
	.passthrough();

const DEVICE_METADATA_KEYS = new Set(['MONITORID', 'TIMESTAMP', 'DEVICEID', 'PROCESS_PARAMETER', 'monitorId', 'timestamp']);

/**
 * Number from a raw sensor value; undefined for empty values
 */
export function cleanNumeric(value: unknown): number | undefined | 'invalid' {
	if (value === null || value === undefined) return undefined;
	if (typeof value === 'number') return Number.isFinite(value) ? value : 'invalid';
	if (typeof value === 'string') {
		const trimmed = value.trim();
		if (trimmed === '' || trimmed.toLowerCase() === 'null') return undefined;
		const parsed = Number(trimmed);
		return Number.isFinite(parsed) ? parsed : 'invalid';
	}
	return 'invalid';
}

function parseTimestamp(value: string | number): number | undefined {
	if (typeof value === 'number') {
		return Number.isFinite(value) && value >= 0 ? value : undefined;
	}
	if (/^\d+(\.\d+)?$/.test(value)) {
		return Number(value);
	}
	const parsed = Date.parse(value);
	return Number.isNaN(parsed) ? undefined : parsed;
}

export class ReadingParser {
	private readonly aliases: Record<string, string>;
	private readonly allowed?: Set<string>;
	private readonly clock: () => number;

	constructor(options: ReadingParserOptions = {}) {
		this.aliases = options.aliases ?? {};
		this.allowed = options.allowedSensors && options.allowedSensors.length > 0
			? new Set(options.allowedSensors)
			: undefined;
		this.clock = options.clock ?? Date.now;
	}

	/**
	 * Parse a transport payload. Throws ValidationError.
	 */
	parse(payload: Buffer | string | unknown): Reading {
		let raw: unknown = payload;
		if (Buffer.isBuffer(payload) || typeof payload === 'string') {
			const text = Buffer.isBuffer(payload) ? payload.toString('utf-8') : payload;
			try {
				raw = JSON.parse(text);
			} catch {
				throw new ValidationError([`payload is not valid JSON (${text.slice(0, 80)})`]);
			}
		}

		const canonical = CanonicalSchema.safeParse(raw);
		if (canonical.success) {
			const { monitorId, timestamp, values } = canonical.data;
			return this.build(monitorId, parseTimestamp(timestamp), values);
		}

		const device = DeviceSchema.safeParse(raw);
		if (device.success) {
			const { MONITORID, TIMESTAMP, PROCESS_PARAMETER } = device.data;
			const values = PROCESS_PARAMETER ?? Object.fromEntries(
				Object.entries(device.data).filter(([key]) => !DEVICE_METADATA_KEYS.has(key))
			);
			const timestamp = TIMESTAMP === undefined ? this.clock() : parseTimestamp(TIMESTAMP);
			return this.build(MONITORID, timestamp, values);
		}

		const issues = canonical.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
		throw new ValidationError(issues.length > 0 ? issues : ['unrecognized payload']);
	}

	private build(monitorId: string, timestamp: number | undefined, rawValues: Record<string, unknown>): Reading {
		const issues: string[] = [];
		if (timestamp === undefined) {
			issues.push('timestamp is not a valid time');
		}

		const entries: Array<[string, number]> = [];
		for (const [code, rawValue] of Object.entries(rawValues)) {
			const name = Object.hasOwn(this.aliases, code) ? this.aliases[code] : code;
			if (this.allowed && !this.allowed.has(code) && !this.allowed.has(name)) {
				continue;
			}

			const value = cleanNumeric(rawValue);
			if (value === 'invalid') {
				issues.push(`sensor '${code}' has unparsable value ${JSON.stringify(rawValue)}`);
			} else if (value !== undefined) {
				entries.push([name, value]);
			}
		}

		if (issues.length === 0 && entries.length === 0) {
			issues.push('reading carries no sensor values');
		}
		if (issues.length > 0 || timestamp === undefined) {
			throw new ValidationError(issues, monitorId);
		}

		const values: Record<string, number> = Object.fromEntries(entries);
		return Object.freeze({ monitorId, timestamp, values: Object.freeze(values) });
	}
}
