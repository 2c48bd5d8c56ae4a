import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { errorMessage } from '../http/errors.js';
import { log } from '../log.js';
import type { ProductServerConfig } from '../types/server.js';
import { VERSION } from '../version.js';

export function buildMcpServer(cfg: ProductServerConfig) {
	const mcp = new McpServer({ name: cfg.serverName, version: VERSION });

	mcp.registerTool(
		'search',
		{
			title: 'Search',
			description: cfg.searchDescription,
			inputSchema: { query: z.string().min(1) },
		},
		async ({ query }) => {
			try {
				const mapped = await cfg.searchDelegate.search(query);
				log({
					evt: 'tool_search',
					msg: 'mapped',
					client: cfg.productKey,
					query,
					count: mapped.results.length,
				});
				return { content: [{ type: 'text', text: JSON.stringify(mapped) }] };
			} catch (e) {
				return toolError(cfg, 'search', e);
			}
		},
	);

	mcp.registerTool(
		'fetch',
		{
			title: 'Fetch',
			description: cfg.fetchDescription,
			inputSchema: { id: z.string().min(1) },
		},
		async ({ id }) => {
			try {
				const doc = await cfg.fetchDelegate.fetch(id);
				log({ evt: 'tool_fetch', msg: 'mapped', client: cfg.productKey, key: doc.id });
				return { content: [{ type: 'text', text: JSON.stringify(doc) }] };
			} catch (e) {
				return toolError(cfg, 'fetch', e);
			}
		},
	);

	return mcp;
}

function toolError(cfg: ProductServerConfig, tool: string, e: unknown) {
	const reason = errorMessage(e);
	log({
		evt: `tool_${tool}_error`,
		msg: 'tool failed',
		lvl: 'error',
		client: cfg.productKey,
		reason,
	});
	return { content: [{ type: 'text' as const, text: reason }], isError: true };
}
