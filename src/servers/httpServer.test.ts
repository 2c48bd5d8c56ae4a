import type { Server } from 'node:http';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { JiraClient } from '../atlassian/jira.js';
import { fakeFetch, instantRetries, reply } from '../test/fakeFetch.js';
import type { ProductServerConfig } from '../types/server.js';
import { VERSION } from '../version.js';
import { createHttpApp } from './httpServer.js';
import { jiraServerConfig } from './jiraServer.js';
import { startToolServer } from './toolServer.js';

const JIRA = 'https://example.atlassian.net';

function jiraConfig(): ProductServerConfig {
	const jiraFetch = fakeFetch({
		'GET /rest/api/2/search': reply({
			startAt: 0,
			maxResults: 20,
			total: 1,
			issues: [{ id: '1', key: 'ABC-1', fields: { summary: 'Login fails' } }],
		}),
	});
	const jira = new JiraClient({
		baseUrl: JIRA,
		username: 'me@example.com',
		apiToken: 'test-secret',
		fetch: jiraFetch,
		...instantRetries(),
	});
	return jiraServerConfig(jira);
}

const cleanup: Array<() => Promise<void>> = [];

afterEach(async () => {
	for (const fn of cleanup.splice(0).reverse()) await fn();
});

async function listen(cfg: ProductServerConfig) {
	const { app, sessions } = createHttpApp(cfg);
	const server = await new Promise<Server>((resolve, reject) => {
		const s = app.listen(0, '127.0.0.1', () => resolve(s));
		s.once('error', reject);
	});
	cleanup.push(
		() =>
			new Promise<void>((done, fail) => {
				server.closeAllConnections();
				server.close(err => (err ? fail(err) : done()));
			}),
	);
	const address = server.address();
	if (!address || typeof address === 'string') throw new Error('server has no port');
	return { base: `http://127.0.0.1:${address.port}`, sessions };
}

async function connected(transport: StreamableHTTPClientTransport): Promise<Client> {
	const client = new Client({ name: 'test-client', version: '0.0.0' });
	await client.connect(transport);
	cleanup.push(() => client.close());
	return client;
}

describe('http app', () => {
	it('reports health', async () => {
		const { base } = await listen(jiraConfig());
		const res = await fetch(`${base}/healthz`);
		expect(res.status).toBe(200);
		await expect(res.json()).resolves.toEqual({ ok: true, product: 'jira', version: VERSION });
	});

	it('rejects messages for an unknown session', async () => {
		const { base } = await listen(jiraConfig());
		const res = await fetch(`${base}/messages?sessionId=nope`, {
			method: 'POST',
			headers: { 'content-type': 'application/json' },
			body: JSON.stringify({ jsonrpc: '2.0', method: 'ping', id: 1 }),
		});
		expect(res.status).toBe(400);
		await expect(res.text()).resolves.toBe('No transport found for sessionId');
	});

	it('only accepts POST on /mcp', async () => {
		const { base } = await listen(jiraConfig());
		const res = await fetch(`${base}/mcp`, { method: 'DELETE' });
		expect(res.status).toBe(405);
		await expect(res.json()).resolves.toEqual({
			jsonrpc: '2.0',
			error: { code: -32000, message: 'Method not allowed.' },
			id: null,
		});
	});

	it('serves tools over stateless streamable HTTP', async () => {
		const { base } = await listen(jiraConfig());
		const client = await connected(new StreamableHTTPClientTransport(new URL(`${base}/mcp`)));
		const { tools } = await client.listTools();
		expect(tools.map(t => t.name).sort()).toEqual(['fetch', 'search']);

		const res = CallToolResultSchema.parse(
			await client.callTool({ name: 'search', arguments: { query: 'login' } }),
		);
		const first = res.content[0];
		expect(first?.type === 'text' && JSON.parse(first.text)).toEqual({
			results: [{ id: 'ABC-1', title: 'Login fails', url: `${JIRA}/browse/ABC-1` }],
		});
	});

	it('tracks SSE sessions until the client goes away', async () => {
		const { base, sessions } = await listen(jiraConfig());
		const client = new Client({ name: 'test-client', version: '0.0.0' });
		try {
			await client.connect(new SSEClientTransport(new URL(`${base}/sse`)));
			expect(Object.keys(sessions)).toHaveLength(1);
			const { tools } = await client.listTools();
			expect(tools).toHaveLength(2);
		} finally {
			await client.close();
		}
		await vi.waitFor(() => expect(Object.keys(sessions)).toHaveLength(0));
	});
});

describe('startToolServer', () => {
	it('listens and closes', async () => {
		const handle = await startToolServer({ port: 0, host: '127.0.0.1' }, jiraConfig());
		const address = handle.server.address();
		if (!address || typeof address === 'string') throw new Error('server has no port');
		const res = await fetch(`http://127.0.0.1:${address.port}/healthz`);
		expect(res.status).toBe(200);
		await res.arrayBuffer();
		await handle.close();
		expect(handle.server.listening).toBe(false);
	});
});
