import type { Request } from 'express';

export interface ResolvedPrefix {
	prefix: string;
	reason: 'static' | 'x-forwarded' | 'empty';
}

/**
 * Path prefix the SSE client must use for `/messages`. A configured prefix wins, then an
 * `X-Forwarded-Prefix` header set by a reverse proxy.
 */
export function resolvePrefix(req: Request, staticPrefix?: string): ResolvedPrefix {
	const configured = normalizePrefix(staticPrefix || '');
	if (configured) return { prefix: configured, reason: 'static' };
	const xfwd = (req.headers['x-forwarded-prefix'] || '').toString().split(',')[0].trim();
	if (xfwd) return { prefix: normalizePrefix(xfwd), reason: 'x-forwarded' };
	return { prefix: '', reason: 'empty' };
}

export function normalizePrefix(p: string): string {
	const trimmed = p.trim().replace(/\/+$/, '');
	if (!trimmed) return '';
	return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}
