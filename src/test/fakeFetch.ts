import { vi } from 'vitest';
import type { FetchLike } from '../http/restClient.js';

export interface Reply {
	status: number;
	/** Strings are sent as text, anything else as JSON. */
	body?: unknown;
	headers?: Record<string, string>;
}

export function reply(body?: unknown, status = 200, headers: Record<string, string> = {}): Reply {
	return { status, body, headers };
}

/** A fixed reply, a sequence (the last entry repeats), or a function of the request URL. */
export type Route = Reply | Reply[] | ((url: URL, init: RequestInit) => Reply);

function toResponse(r: Reply): Response {
	if (r.body === undefined || r.status === 204)
		return new Response(null, { status: r.status, headers: r.headers });
	if (typeof r.body === 'string')
		return new Response(r.body, {
			status: r.status,
			headers: { 'content-type': 'text/plain', ...r.headers },
		});
	return new Response(JSON.stringify(r.body), {
		status: r.status,
		headers: { 'content-type': 'application/json', ...r.headers },
	});
}

/** Routes are keyed `METHOD /path`; anything unrouted answers 404. */
export function fakeFetch(routes: Record<string, Route>) {
	const seen = new Map<string, number>();
	return vi.fn<FetchLike>(async (input, init) => {
		const url = new URL(input);
		const key = `${init.method ?? 'GET'} ${url.pathname}`;
		const route = routes[key];
		if (route === undefined) return toResponse(reply({ errorMessages: [`no route for ${key}`] }, 404));
		if (typeof route === 'function') return toResponse(route(url, init));
		if (!Array.isArray(route)) return toResponse(route);
		const n = seen.get(key) ?? 0;
		seen.set(key, n + 1);
		return toResponse(route[Math.min(n, route.length - 1)]);
	});
}

export interface RecordedRequest {
	method: string;
	url: URL;
	headers: Headers;
	body: unknown;
}

export function requests(mock: ReturnType<typeof fakeFetch>): RecordedRequest[] {
	return mock.mock.calls.map(([input, init]) => {
		const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
		return {
			method: init.method ?? 'GET',
			url: new URL(input),
			headers: new Headers(init.headers),
			body,
		};
	});
}

/** Transport options that make retries instant and deterministic. */
export function instantRetries() {
	return { sleep: vi.fn(async (_ms: number) => {}), jitterMs: 0 };
}
