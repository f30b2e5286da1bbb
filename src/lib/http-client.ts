/**
 * HTTP Client Interface
 * ======================
 *
 * Abstraction layer over fetch() so the trend API and token clients are
 * testable without stubbing global fetch. Response bodies are returned
 * as unknown and validated by the caller.
 */

export interface HttpResponse {
	ok: boolean;
	status: number;
	statusText: string;
	headers: {
		get(name: string): string | null;
	};
	json(): Promise<unknown>;
}

export interface HttpRequestOptions {
	headers?: Record<string, string>;
	timeout?: number;
	signal?: AbortSignal;
}

export interface HttpClientOptions {
	/** Default headers to include in all requests */
	defaultHeaders?: Record<string, string>;
	/** Default timeout for all requests in milliseconds */
	defaultTimeout?: number;
}

export interface HttpClient {
	get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
	post(url: string, body: unknown, options?: HttpRequestOptions): Promise<HttpResponse>;
}

/**
 * Default implementation using native fetch
 */
export class FetchHttpClient implements HttpClient {
	private defaultHeaders: Record<string, string>;
	private defaultTimeout?: number;

	constructor(options?: HttpClientOptions) {
		this.defaultHeaders = options?.defaultHeaders || {};
		this.defaultTimeout = options?.defaultTimeout;
	}

	async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
		const response = await fetch(url, {
			method: 'GET',
			headers: { Accept: 'application/json', ...this.defaultHeaders, ...options?.headers },
			signal: this.signalFor(options),
		});
		return this.wrap(response);
	}

	async post(url: string, body: unknown, options?: HttpRequestOptions): Promise<HttpResponse> {
		const response = await fetch(url, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json', ...this.defaultHeaders, ...options?.headers },
			body: typeof body === 'string' ? body : JSON.stringify(body),
			signal: this.signalFor(options),
		});
		return this.wrap(response);
	}

	private signalFor(options?: HttpRequestOptions): AbortSignal | undefined {
		const timeout = options?.timeout ?? this.defaultTimeout;
		const signals: AbortSignal[] = [];
		if (timeout) signals.push(AbortSignal.timeout(timeout));
		if (options?.signal) signals.push(options.signal);

		if (signals.length === 0) return undefined;
		return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
	}

	private wrap(response: Response): HttpResponse {
		return {
			ok: response.ok,
			status: response.status,
			statusText: response.statusText,
			headers: {
				get: (name: string) => response.headers.get(name)
			},
			json: () => response.json()
		};
	}
}
