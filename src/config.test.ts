import { describe, expect, it } from 'vitest';
import { createConfluenceClient, createJiraClient } from './atlassian/index.js';
import { loadConfig, missingVariables } from './config.js';
import { ConfigError } from './http/errors.js';
import { fakeFetch, reply, requests } from './test/fakeFetch.js';

const ENV = {
	JIRA_BASE_URL: 'https://example.atlassian.net/',
	JIRA_USERNAME: 'me@example.com',
	JIRA_API_TOKEN: 'test-secret',
	CONFLUENCE_BASE_URL: 'https://example.atlassian.net/wiki',
	CONFLUENCE_DEFAULT_SPACE: 'DEV',
};

describe('loadConfig', () => {
	it('maps the environment with defaults', () => {
		expect(loadConfig(ENV)).toEqual({
			jira: {
				baseUrl: 'https://example.atlassian.net',
				username: 'me@example.com',
				apiToken: 'test-secret',
			},
			confluence: {
				baseUrl: 'https://example.atlassian.net/wiki',
				username: 'me@example.com',
				apiToken: 'test-secret',
				defaultSpace: 'DEV',
			},
			google: { credentialsFile: 'credentials.json', tokenFile: 'token.json' },
			outputDir: 'output',
			logLevel: 'info',
			apiRateLimit: 10,
			debug: false,
			servers: { jiraPort: 7100, confluencePort: 7200 },
		});
	});

	it('prefers Confluence credentials over the Jira ones', () => {
		const cfg = loadConfig({
			...ENV,
			CONFLUENCE_USERNAME: 'wiki@example.com',
			CONFLUENCE_API_TOKEN: 'other-secret',
		});
		expect(cfg.confluence?.username).toBe('wiki@example.com');
		expect(cfg.confluence?.apiToken).toBe('other-secret');
	});

	it('treats blank values as unset', () => {
		const cfg = loadConfig({ JIRA_BASE_URL: '  ', JIRA_USERNAME: 'me@example.com', OUTPUT_DIR: '' });
		expect(cfg.jira).toBeUndefined();
		expect(cfg.confluence).toBeUndefined();
		expect(cfg.outputDir).toBe('output');
	});

	it('derives the log level from DEBUG unless LOG_LEVEL is set', () => {
		expect(loadConfig({ DEBUG: 'true' })).toMatchObject({ debug: true, logLevel: 'debug' });
		expect(loadConfig({ DEBUG: 'true', LOG_LEVEL: 'WARN' })).toMatchObject({ debug: true, logLevel: 'warn' });
	});

	it('reads numeric settings', () => {
		const cfg = loadConfig({ API_RATE_LIMIT: '0', JIRA_TOOLS_PORT: '8100', CONFLUENCE_TOOLS_PORT: '8200' });
		expect(cfg.apiRateLimit).toBe(0);
		expect(cfg.servers).toEqual({ jiraPort: 8100, confluencePort: 8200 });
	});

	it('reports every invalid value at once', () => {
		let err: unknown;
		try {
			loadConfig({
				JIRA_BASE_URL: 'not a url',
				LOG_LEVEL: 'loud',
				API_RATE_LIMIT: '-1',
				JIRA_TOOLS_PORT: 'abc',
			});
		} catch (e) {
			err = e;
		}
		expect(err).toBeInstanceOf(ConfigError);
		const issues = err instanceof ConfigError ? err.issues : [];
		expect(issues.map(i => i.split(':')[0])).toEqual([
			'JIRA_BASE_URL',
			'LOG_LEVEL',
			'API_RATE_LIMIT',
			'JIRA_TOOLS_PORT',
		]);
	});
});

describe('missingVariables', () => {
	it('names what a product still needs', () => {
		expect(missingVariables('jira', { JIRA_BASE_URL: 'https://example.atlassian.net' })).toEqual([
			'JIRA_USERNAME',
			'JIRA_API_TOKEN',
		]);
		expect(missingVariables('confluence', { JIRA_USERNAME: 'me@example.com' })).toEqual([
			'CONFLUENCE_BASE_URL',
			'CONFLUENCE_API_TOKEN',
		]);
	});
});

describe('client factories', () => {
	it('builds a Jira client from config', async () => {
		const fetch = fakeFetch({ 'GET /rest/api/2/myself': reply({ displayName: 'Me' }) });
		const jira = createJiraClient(loadConfig(ENV), { fetch });
		expect(jira.baseUrl).toBe('https://example.atlassian.net');
		await expect(jira.testConnection()).resolves.toBe(true);
		const [req] = requests(fetch);
		expect(req.url.href).toBe('https://example.atlassian.net/rest/api/2/myself');
		expect(req.headers.get('authorization')).toBe(
			'Basic ' + Buffer.from('me@example.com:test-secret').toString('base64'),
		);
	});

	it('builds a Confluence client with the default space', () => {
		const confluence = createConfluenceClient(loadConfig(ENV));
		expect(confluence.baseUrl).toBe('https://example.atlassian.net/wiki');
		expect(confluence.defaultSpace).toBe('DEV');
		expect(confluence.username).toBe('me@example.com');
	});

	it('rejects an unconfigured product', () => {
		const cfg = loadConfig({});
		expect(() => createJiraClient(cfg)).toThrow(ConfigError);
		expect(() => createConfluenceClient(cfg)).toThrow(/confluence is not configured/);
	});
});
