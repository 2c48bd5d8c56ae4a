import type { Request, Response } from 'express';

export function getClientIp(req: Request): string {
	return (req.headers['x-forwarded-for'] || req.ip || req.socket.remoteAddress || '')
		.toString()
		.split(',')[0]
		.trim();
}

export interface KeepAliveHandle {
	stop: () => void;
}

/** Writes an SSE comment line every `intervalMs` so idle proxies keep the stream open. */
export function startKeepAlive(res: Response, intervalMs: number): KeepAliveHandle {
	const timer = setInterval(() => {
		if (res.writableEnded || res.destroyed) {
			clearInterval(timer);
			return;
		}
		res.write(`:ka ${Date.now()}\n\n`);
	}, intervalMs);
	timer.unref();
	return { stop: () => clearInterval(timer) };
}
