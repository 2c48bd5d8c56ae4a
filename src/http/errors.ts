import type { JsonValue } from '../types/json.js';

export class AtlassianError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'AtlassianError';
	}
}

export interface ApiErrorInit {
	service: string;
	method: string;
	url: string;
	status: number;
	statusText: string;
	details?: string[];
	body?: JsonValue | string;
}

/** Non-2xx response from Jira or Confluence. */
export class ApiError extends AtlassianError {
	readonly service: string;
	readonly method: string;
	readonly url: string;
	readonly status: number;
	readonly statusText: string;
	readonly details: string[];
	readonly body?: JsonValue | string;

	constructor(init: ApiErrorInit, message?: string) {
		const details = init.details ?? [];
		super(message ?? defaultMessage(init, details));
		this.name = 'ApiError';
		this.service = init.service;
		this.method = init.method;
		this.url = init.url;
		this.status = init.status;
		this.statusText = init.statusText;
		this.details = details;
		this.body = init.body;
	}

	get retryable(): boolean {
		return isRetryableStatus(this.status);
	}
}

export class AuthenticationError extends ApiError {
	constructor(init: ApiErrorInit) {
		super(
			init,
			`${init.service} authentication failed (401 ${init.statusText || 'Unauthorized'}): ` +
				'check the username and API token' +
				suffix(init.details),
		);
		this.name = 'AuthenticationError';
	}
}

export class PermissionError extends ApiError {
	constructor(init: ApiErrorInit) {
		super(
			init,
			`${init.service} permission denied (403) for ${init.method} ${pathOf(init.url)}` +
				suffix(init.details),
		);
		this.name = 'PermissionError';
	}
}

export class NotFoundError extends ApiError {
	constructor(init: ApiErrorInit, message?: string) {
		super(
			init,
			message ??
				`${init.service} resource not found (404): ${init.method} ${pathOf(init.url)}` +
					suffix(init.details),
		);
		this.name = 'NotFoundError';
	}
}

export class RateLimitError extends ApiError {
	readonly retryAfterSeconds?: number;

	constructor(init: ApiErrorInit, retryAfterSeconds?: number) {
		super(
			init,
			`${init.service} rate limit exceeded (429)` +
				(retryAfterSeconds !== undefined ? `, retry after ${retryAfterSeconds}s` : ''),
		);
		this.name = 'RateLimitError';
		this.retryAfterSeconds = retryAfterSeconds;
	}
}

export class TimeoutError extends AtlassianError {
	readonly timeoutMs: number;
	readonly url: string;

	constructor(service: string, url: string, timeoutMs: number) {
		super(`${service} request to ${pathOf(url)} timed out after ${timeoutMs}ms`);
		this.name = 'TimeoutError';
		this.timeoutMs = timeoutMs;
		this.url = url;
	}
}

export class ConfigError extends AtlassianError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`invalid configuration: ${issues.join('; ')}`);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

export function createApiError(init: ApiErrorInit, retryAfterSeconds?: number): ApiError {
	switch (init.status) {
		case 401:
			return new AuthenticationError(init);
		case 403:
			return new PermissionError(init);
		case 404:
			return new NotFoundError(init);
		case 429:
			return new RateLimitError(init, retryAfterSeconds);
		default:
			return new ApiError(init);
	}
}

/**
 * Pulls human-readable messages out of an error body.
 * Jira: `{ errorMessages: [], errors: { field: msg } }`; Confluence: `{ message }`.
 */
export function extractErrorDetails(body: JsonValue | string | undefined): string[] {
	if (body === undefined || body === null) return [];
	if (typeof body === 'string') {
		const s = body.replace(/\s+/g, ' ').trim();
		return s ? [s.length > 200 ? s.slice(0, 197) + '...' : s] : [];
	}
	if (typeof body !== 'object' || Array.isArray(body)) return [];
	const out: string[] = [];
	const messages = body['errorMessages'];
	if (Array.isArray(messages))
		for (const m of messages) if (typeof m === 'string' && m) out.push(m);
	const fieldErrors = body['errors'];
	if (fieldErrors && typeof fieldErrors === 'object' && !Array.isArray(fieldErrors))
		for (const [field, m] of Object.entries(fieldErrors))
			if (typeof m === 'string') out.push(`${field}: ${m}`);
	const message = body['message'];
	if (typeof message === 'string' && message) out.push(message);
	return out;
}

export function isRetryableStatus(status: number): boolean {
	return status === 429 || status === 502 || status === 503 || status === 504;
}

export function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

function suffix(details: string[] | undefined): string {
	return details && details.length ? `: ${details.join('; ')}` : '';
}

function defaultMessage(init: ApiErrorInit, details: string[]): string {
	const status = `${init.status}${init.statusText ? ' ' + init.statusText : ''}`;
	return `${init.service} request failed: ${init.method} ${pathOf(init.url)} -> ${status}${suffix(details)}`;
}

function pathOf(url: string): string {
	try {
		const u = new URL(url);
		return u.pathname + u.search;
	} catch {
		return url;
	}
}
