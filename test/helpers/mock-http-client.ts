/**
 * Mock HTTP Client for Testing
 * =============================
 *
 * Provides a controllable HTTP client for the trend API and token
 * clients without hitting real network endpoints.
 */

import { stub, SinonStub } from 'sinon';
import type { HttpClient, HttpRequestOptions, HttpResponse } from '../../src/lib/http-client';

function response(ok: boolean, status: number, statusText: string, body: unknown): HttpResponse {
	return {
		ok,
		status,
		statusText,
		headers: {
			get: () => null
		},
		json: async () => body
	};
}

export class MockHttpClient implements HttpClient {
	public getStub: SinonStub;
	public postStub: SinonStub;

	constructor() {
		this.getStub = stub();
		this.postStub = stub();
	}

	async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
		return this.getStub(url, options);
	}

	async post(url: string, body: unknown, options?: HttpRequestOptions): Promise<HttpResponse> {
		return this.postStub(url, body, options);
	}

	/**
	 * Helper: Configure successful GET response
	 */
	mockGetSuccess(body: unknown): void {
		this.getStub.resolves(response(true, 200, 'OK', body));
	}

	/**
	 * Helper: Configure successful POST response
	 */
	mockPostSuccess(body: unknown): void {
		this.postStub.resolves(response(true, 200, 'OK', body));
	}

	/**
	 * Helper: Configure GET error response
	 */
	mockGetError(status: number, statusText: string): void {
		this.getStub.resolves(response(false, status, statusText, { error: statusText }));
	}

	/**
	 * Helper: Configure POST error response
	 */
	mockPostError(status: number, statusText: string): void {
		this.postStub.resolves(response(false, status, statusText, { error: statusText }));
	}

	/**
	 * Helper: Configure network error
	 */
	mockNetworkError(message: string = 'Network request failed'): void {
		this.getStub.rejects(new Error(message));
	}

	/**
	 * Reset all stubs
	 */
	reset(): void {
		this.getStub.reset();
		this.postStub.reset();
	}
}
