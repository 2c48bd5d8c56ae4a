import type { Server } from 'node:http';
import { log } from '../log.js';
import type { ProductServerConfig, ToolServerOptions } from '../types/server.js';
import { VERSION } from '../version.js';
import { createHttpApp } from './httpServer.js';

export interface ToolServerHandle {
	productKey: ProductServerConfig['productKey'];
	server: Server;
	close(): Promise<void>;
}

/** Resolves once the HTTP server is listening. */
export function startToolServer(
	opts: ToolServerOptions,
	cfg: ProductServerConfig,
): Promise<ToolServerHandle> {
	const initTs = Date.now();
	log({ evt: 'server_init', msg: 'init', client: cfg.productKey, port: opts.port });
	const { app, sessions } = createHttpApp(cfg, opts);

	return new Promise((resolve, reject) => {
		const server = app.listen(opts.port, opts.host ?? '0.0.0.0', () => {
			log({
				evt: 'server_listen',
				msg: 'listen',
				client: cfg.productKey,
				port: opts.port,
				durationMs: Date.now() - initTs,
				version: VERSION,
			});
			log({
				evt: 'server_endpoints',
				msg: `http://localhost:${opts.port}/mcp (streamable), http://localhost:${opts.port}/sse (sse)`,
				client: cfg.productKey,
				port: opts.port,
			});
			resolve({ productKey: cfg.productKey, server, close });
		});
		server.once('error', reject);

		async function close() {
			log({ evt: 'server_shutdown', msg: 'shutdown', client: cfg.productKey });
			for (const [sid, t] of Object.entries(sessions)) {
				delete sessions[sid];
				await t.close();
			}
			await new Promise<void>((done, fail) => server.close(err => (err ? fail(err) : done())));
		}
	});
}
