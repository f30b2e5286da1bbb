/**
 * TREND API CLIENT
 * =================
 *
 * Fetches a monitor's historical readings for model training:
 *
 *   GET {baseUrl}/history?monitorId=<id>&months=<n>
 *   -> { "records": [ { "TIMESTAMP": ..., "001_A": "71.2", ... }, ... ] }
 *
 * Records go through the same parser as live readings. Records without a
 * timestamp keep their response order on a synthetic one-second grid.
 * Records that fail to parse are skipped.
 */

import { z } from 'zod';
import type { Logger } from '../logging/logger';
import defaultLogger from '../logging/logger';
import { LogComponents } from '../logging/components';
import type { HttpClient } from '../lib/http-client';
import { ApiCallError, ValidationError } from '../inference/errors';
import { ReadingParser } from '../inference/reading';
import type { HistoryQuery, Reading, TrendSource } from '../inference/types';
import type { TokenManager } from './token-manager';

export interface TrendApiClientOptions {
	baseUrl: string;
	timeoutMs?: number;
}

const HistoryResponseSchema = z.object({
	records: z.array(z.record(z.unknown())),
});

export class TrendApiClient implements TrendSource {
	private readonly http: HttpClient;
	private readonly options: TrendApiClientOptions;
	private readonly parser: ReadingParser;
	private readonly tokens?: TokenManager;
	private readonly logger: Logger;

	constructor(
		http: HttpClient,
		options: TrendApiClientOptions,
		deps: { parser?: ReadingParser; tokens?: TokenManager; logger?: Logger } = {}
	) {
		this.http = http;
		this.options = options;
		this.parser = deps.parser ?? new ReadingParser();
		this.tokens = deps.tokens;
		this.logger = deps.logger ?? defaultLogger;
	}

	async fetchHistory(monitorId: string, query: HistoryQuery, signal?: AbortSignal): Promise<Reading[]> {
		const params = new URLSearchParams({ monitorId, months: String(query.months) });
		const url = `${this.options.baseUrl.replace(/\/+$/, '')}/history?${params.toString()}`;

		this.logger.info('Requesting trend history', {
			component: LogComponents.TREND_API,
			monitorId,
			months: query.months,
		});

		const headers: Record<string, string> = {};
		if (this.tokens) {
			headers.Authorization = `Bearer ${await this.tokens.getToken()}`;
		}

		const response = await this.http.get(url, { headers, timeout: this.options.timeoutMs, signal });
		if (response.status === 401) {
			this.tokens?.invalidate();
		}
		if (!response.ok) {
			throw new ApiCallError(url, response.status, 'Non-200 response from trend API');
		}

		let body: unknown;
		try {
			body = await response.json();
		} catch (error) {
			throw new ApiCallError(url, response.status, `Invalid JSON: ${String(error)}`);
		}

		const parsed = HistoryResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new ApiCallError(url, response.status, "Response must be an object with a 'records' list");
		}

		const readings: Reading[] = [];
		let skipped = 0;
		parsed.data.records.forEach((record, index) => {
			const timestamp = record.TIMESTAMP ?? record.timestamp ?? index * 1000;
			try {
				readings.push(this.parser.parse({ ...record, MONITORID: monitorId, TIMESTAMP: timestamp }));
			} catch (error) {
				if (!(error instanceof ValidationError)) throw error;
				skipped++;
			}
		});

		readings.sort((a, b) => a.timestamp - b.timestamp);
		const recent = readings.slice(-query.limit);

		this.logger.info('Trend history received', {
			component: LogComponents.TREND_API,
			monitorId,
			records: parsed.data.records.length,
			readings: recent.length,
			skipped,
		});

		return recent;
	}
}
