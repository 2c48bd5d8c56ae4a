import { log } from '../log.js';
import type { JsonValue } from '../types/json.js';
import {
	ApiError,
	AtlassianError,
	RateLimitError,
	TimeoutError,
	createApiError,
	errorMessage,
	extractErrorDetails,
} from './errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';
export type QueryValue = string | number | boolean | null | undefined | readonly string[];
export type QueryParams = Record<string, QueryValue>;
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const TIMEOUT_DEFAULT_MS = 30_000;
const RETRIES_DEFAULT = 3;
const RATE_WINDOW_MS = 1000;

export interface RestClientOptions {
	/** Label used in errors and logs, e.g. `jira`. */
	service: string;
	baseUrl: string;
	username: string;
	apiToken: string;
	fetch?: FetchLike;
	timeoutMs?: number;
	retries?: number;
	baseDelayMs?: number;
	maxDelayMs?: number;
	jitterMs?: number;
	/** Requests per second; 0 or unset disables throttling. */
	rateLimit?: number;
	sleep?: (ms: number) => Promise<void>;
}

type TunableOption = 'timeoutMs' | 'retries' | 'baseDelayMs' | 'maxDelayMs' | 'jitterMs' | 'rateLimit';

export type TransportOptions = Omit<RestClientOptions, 'service' | 'baseUrl' | 'username' | 'apiToken'>;

export interface RequestOptions {
	params?: QueryParams;
	body?: unknown;
}

export class RestClient {
	readonly service: string;
	readonly baseUrl: string;
	private readonly fetchFn: FetchLike;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly authHeader: string;
	private readonly opts: Required<Pick<RestClientOptions, TunableOption>>;
	private window = { start: 0, count: 0 };

	constructor(options: RestClientOptions) {
		this.service = options.service;
		this.baseUrl = options.baseUrl.replace(/\/+$/, '');
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
		this.sleep = options.sleep ?? (ms => new Promise<void>(r => setTimeout(r, ms)));
		this.authHeader =
			'Basic ' + Buffer.from(`${options.username}:${options.apiToken}`).toString('base64');
		this.opts = {
			timeoutMs: options.timeoutMs ?? TIMEOUT_DEFAULT_MS,
			retries: options.retries ?? RETRIES_DEFAULT,
			baseDelayMs: options.baseDelayMs ?? 500,
			maxDelayMs: options.maxDelayMs ?? 15_000,
			jitterMs: options.jitterMs ?? 250,
			rateLimit: options.rateLimit ?? 0,
		};
	}

	get<T>(path: string, params?: QueryParams): Promise<T> {
		return this.request<T>('GET', path, { params });
	}

	post<T>(path: string, body?: unknown, params?: QueryParams): Promise<T> {
		return this.request<T>('POST', path, { body, params });
	}

	put<T>(path: string, body?: unknown, params?: QueryParams): Promise<T> {
		return this.request<T>('PUT', path, { body, params });
	}

	delete<T>(path: string, params?: QueryParams): Promise<T> {
		return this.request<T>('DELETE', path, { params });
	}

	buildUrl(path: string, params?: QueryParams): string {
		const rel = path.startsWith('/') ? path : `/${path}`;
		const url = new URL(`${this.baseUrl}${rel}`);
		for (const [k, v] of Object.entries(params ?? {})) {
			if (v === undefined || v === null) continue;
			url.searchParams.set(k, typeof v === 'object' ? v.join(',') : String(v));
		}
		return url.toString();
	}

	async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
		const url = this.buildUrl(path, options.params);
		const headers: Record<string, string> = {
			Accept: 'application/json',
			Authorization: this.authHeader,
		};
		const init: RequestInit = { method, headers };
		if (options.body !== undefined) {
			headers['Content-Type'] = 'application/json';
			init.body = JSON.stringify(options.body);
		}
		for (let attempt = 0; ; attempt++) {
			try {
				await this.throttle();
				return await this.send<T>(method, url, init);
			} catch (e) {
				if (attempt >= this.opts.retries || !isRetryable(e, method)) throw e;
				const retryAfter = e instanceof RateLimitError ? e.retryAfterSeconds : undefined;
				const delay = this.backoff(attempt, retryAfter);
				log({
					evt: 'http_retry',
					msg: 'retrying request',
					lvl: 'warn',
					client: this.service,
					method,
					url,
					attempt: attempt + 1,
					delayMs: delay,
					reason: errorMessage(e),
				});
				await this.sleep(delay);
			}
		}
	}

	private async send<T>(method: HttpMethod, url: string, init: RequestInit): Promise<T> {
		const startTs = Date.now();
		const ac = new AbortController();
		const timer = setTimeout(() => ac.abort(), this.opts.timeoutMs);
		let res: Response;
		let text: string;
		try {
			res = await this.fetchFn(url, { ...init, signal: ac.signal });
			text = await res.text();
		} catch (e) {
			if (e instanceof Error && e.name === 'AbortError')
				throw new TimeoutError(this.service, url, this.opts.timeoutMs);
			throw e;
		} finally {
			clearTimeout(timer);
		}
		log({
			evt: 'http_response',
			msg: `${method} ${res.status}`,
			lvl: 'debug',
			client: this.service,
			method,
			url,
			status: res.status,
			durationMs: Date.now() - startTs,
		});
		const looksJson =
			(res.headers.get('content-type') || '').includes('json') || /^\s*[[{]/.test(text);
		if (!res.ok) {
			const body = looksJson ? parseJsonSafe(text) : text;
			const retryAfter = Number.parseInt(res.headers.get('retry-after') || '', 10);
			throw createApiError(
				{
					service: this.service,
					method,
					url,
					status: res.status,
					statusText: res.statusText,
					details: extractErrorDetails(body),
					body,
				},
				Number.isFinite(retryAfter) ? retryAfter : undefined,
			);
		}
		const payload: T = !text.trim() ? undefined : looksJson ? JSON.parse(text) : text;
		return payload;
	}

	/** Takes a slot in the current window, sleeping until the next one while it is full. */
	private async throttle(): Promise<void> {
		const limit = this.opts.rateLimit;
		if (!limit) return;
		for (;;) {
			const now = Date.now();
			if (now - this.window.start >= RATE_WINDOW_MS) this.window = { start: now, count: 0 };
			if (this.window.count < limit) {
				this.window.count++;
				return;
			}
			const wait = this.window.start + RATE_WINDOW_MS - now;
			log({
				evt: 'http_throttle',
				msg: 'rate limit window full',
				lvl: 'debug',
				client: this.service,
				delayMs: wait,
			});
			await this.sleep(wait);
		}
	}

	private backoff(attempt: number, retryAfterSeconds?: number): number {
		if (retryAfterSeconds !== undefined) return Math.max(0, retryAfterSeconds * 1000);
		const { baseDelayMs, maxDelayMs, jitterMs } = this.opts;
		const delay = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
		return delay + Math.floor(Math.random() * jitterMs);
	}
}

// a POST may already have been applied, so only an explicit 429 is retried
function isRetryable(e: unknown, method: HttpMethod): boolean {
	if (method === 'POST') return e instanceof RateLimitError;
	if (e instanceof ApiError) return e.retryable;
	if (e instanceof AtlassianError) return false;
	// fetch() rejects with a TypeError on network failure
	return e instanceof TypeError;
}

function parseJsonSafe(text: string): JsonValue | string {
	try {
		return JSON.parse(text) as JsonValue;
	} catch {
		return text;
	}
}
