import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import cors from 'cors';
import express, { type Request, type Response } from 'express';
import { errorMessage } from '../http/errors.js';
import { log } from '../log.js';
import type { ProductServerConfig, ToolServerOptions } from '../types/server.js';
import { getClientIp, startKeepAlive } from '../utils/net.js';
import { resolvePrefix } from '../utils/prefix.js';
import { VERSION } from '../version.js';
import { buildMcpServer } from './mcpServerFactory.js';

const KEEP_ALIVE_MS = 25_000;

export function createHttpApp(cfg: ProductServerConfig, opts: Pick<ToolServerOptions, 'publicPrefix'> = {}) {
	const app = express();
	app.disable('x-powered-by');
	app.set('trust proxy', true);
	app.use(cors());
	app.use(express.json({ limit: '4mb' }));
	app.get('/healthz', (_req, res) => {
		res.status(200).json({ ok: true, product: cfg.productKey, version: VERSION });
	});

	const sessions: Record<string, SSEServerTransport> = {};

	async function handleSSE(req: Request, res: Response) {
		const resolved = resolvePrefix(req, opts.publicPrefix);
		const transport = new SSEServerTransport(`${resolved.prefix}/messages`, res);
		const sessionId = transport.sessionId;
		sessions[sessionId] = transport;
		const ip = getClientIp(req);
		log({
			evt: 'session_open',
			msg: 'open',
			client: cfg.productKey,
			sessionId,
			ip,
			prefix: resolved.prefix,
			prefixReason: resolved.reason,
			version: VERSION,
		});
		const keepAlive = startKeepAlive(res, KEEP_ALIVE_MS);
		res.on('close', () => {
			keepAlive.stop();
			delete sessions[sessionId];
			log({ evt: 'session_close', msg: 'close', client: cfg.productKey, sessionId, ip });
		});
		await buildMcpServer(cfg).connect(transport);
	}

	// stateless: a fresh server and transport per request
	async function handleStreamableHTTP(req: Request, res: Response) {
		const server = buildMcpServer(cfg);
		const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
		res.on('close', () => {
			Promise.all([transport.close(), server.close()]).catch(e =>
				log({
					evt: 'mcp_close_error',
					msg: 'close failed',
					lvl: 'warn',
					client: cfg.productKey,
					reason: errorMessage(e),
				}),
			);
		});
		await server.connect(transport);
		await transport.handleRequest(req, res, req.body);
	}

	app.get('/sse', async (req: Request, res: Response) => {
		try {
			await handleSSE(req, res);
		} catch (e) {
			log({
				evt: 'session_error',
				msg: 'sse setup failed',
				lvl: 'error',
				client: cfg.productKey,
				reason: errorMessage(e),
			});
			if (!res.headersSent) res.status(500).send('SSE setup failed');
		}
	});

	app.post('/messages', async (req: Request, res: Response) => {
		const sid = String(req.query.sessionId ?? req.query.session_id ?? '');
		const t = sessions[sid];
		if (!t) {
			res.status(400).send('No transport found for sessionId');
			return;
		}
		try {
			await t.handlePostMessage(req, res, req.body);
		} catch (e) {
			log({
				evt: 'session_error',
				msg: 'error',
				client: cfg.productKey,
				sessionId: sid,
				lvl: 'error',
				reason: errorMessage(e),
			});
			if (!res.headersSent) res.status(500).send('Message handling failed');
		}
	});

	app.post('/mcp', async (req: Request, res: Response) => {
		try {
			await handleStreamableHTTP(req, res);
		} catch (e) {
			log({
				evt: 'mcp_error',
				msg: 'request failed',
				lvl: 'error',
				client: cfg.productKey,
				reason: errorMessage(e),
			});
			if (!res.headersSent)
				res.status(500).json({
					jsonrpc: '2.0',
					error: { code: -32603, message: 'Internal server error' },
					id: null,
				});
		}
	});

	app.all('/mcp', (_req: Request, res: Response) => {
		res.status(405).json({
			jsonrpc: '2.0',
			error: { code: -32000, message: 'Method not allowed.' },
			id: null,
		});
	});

	return { app, sessions };
}
