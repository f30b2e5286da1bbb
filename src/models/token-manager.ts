/**
 * Access token manager for the trend API
 *
 * Posts credentials to the token endpoint, caches the access token in
 * memory and fetches a new one shortly before its JWT `exp` claim.
 */

import { z } from 'zod';
import type { Logger } from '../logging/logger';
import defaultLogger from '../logging/logger';
import { LogComponents } from '../logging/components';
import type { HttpClient } from '../lib/http-client';
import { ApiCallError } from '../inference/errors';

export interface TokenManagerOptions {
	tokenUrl: string;
	username: string;
	password: string;
	/** Refresh this long before expiry */
	refreshMarginMs?: number;
	timeoutMs?: number;
}

const TokenResponseSchema = z.object({
	data: z.object({
		accessToken: z.string().min(1),
	}),
});

const JwtClaimsSchema = z.object({
	exp: z.number(),
});

/**
 * Expiry (ms since epoch) from a JWT, without verifying its signature
 */
export function decodeJwtExpiry(token: string): number {
	const parts = token.split('.');
	if (parts.length !== 3) {
		throw new Error('Access token is not a JWT');
	}
	const claims = JwtClaimsSchema.parse(JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf-8')));
	return claims.exp * 1000;
}

export class TokenManager {
	private readonly http: HttpClient;
	private readonly options: TokenManagerOptions;
	private readonly logger: Logger;
	private readonly clock: () => number;
	private token?: string;
	private expiresAt = 0;
	private pending?: Promise<string>;

	constructor(http: HttpClient, options: TokenManagerOptions, logger?: Logger, clock?: () => number) {
		this.http = http;
		this.options = options;
		this.logger = logger ?? defaultLogger;
		this.clock = clock ?? Date.now;
	}

	/**
	 * Current token, fetching a new one when missing or about to expire
	 */
	async getToken(): Promise<string> {
		const margin = this.options.refreshMarginMs ?? 30000;
		if (this.token && this.clock() < this.expiresAt - margin) {
			return this.token;
		}

		// One request for concurrent callers
		if (!this.pending) {
			this.pending = this.generateToken().finally(() => {
				this.pending = undefined;
			});
		}
		return this.pending;
	}

	invalidate(): void {
		this.token = undefined;
		this.expiresAt = 0;
	}

	private async generateToken(): Promise<string> {
		this.logger.info('Generating access token', {
			component: LogComponents.TOKEN_MANAGER,
			tokenUrl: this.options.tokenUrl,
		});

		const response = await this.http.post(
			this.options.tokenUrl,
			{ username: this.options.username, password: this.options.password },
			{ timeout: this.options.timeoutMs ?? 20000 }
		);
		if (!response.ok) {
			throw new ApiCallError(this.options.tokenUrl, response.status, response.statusText);
		}

		const parsed = TokenResponseSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new ApiCallError(this.options.tokenUrl, response.status, 'Missing data.accessToken in token response');
		}

		const token = parsed.data.data.accessToken;
		this.expiresAt = decodeJwtExpiry(token);
		this.token = token;

		this.logger.info('Access token generated', {
			component: LogComponents.TOKEN_MANAGER,
			expiresAt: new Date(this.expiresAt).toISOString(),
		});
		return token;
	}
}
