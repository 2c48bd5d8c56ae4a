import type { AppConfig } from '../config.js';
import { ConfigError } from '../http/errors.js';
import type { TransportOptions } from '../http/restClient.js';
import { ConfluenceClient } from './confluence.js';
import { JiraClient } from './jira.js';

export { ConfluenceClient, DEFAULT_EXPAND, type ConfluenceClientOptions } from './confluence.js';
export { JiraClient, type IterateIssuesOptions, type JiraClientOptions } from './jira.js';

/** `transport` overrides the configured rate limit and carries test hooks such as `fetch`. */
export function createJiraClient(config: AppConfig, transport: TransportOptions = {}): JiraClient {
	if (!config.jira)
		throw new ConfigError(['jira is not configured: set JIRA_BASE_URL, JIRA_USERNAME and JIRA_API_TOKEN']);
	return new JiraClient({ rateLimit: config.apiRateLimit, ...transport, ...config.jira });
}

export function createConfluenceClient(
	config: AppConfig,
	transport: TransportOptions = {},
): ConfluenceClient {
	if (!config.confluence)
		throw new ConfigError([
			'confluence is not configured: set CONFLUENCE_BASE_URL and CONFLUENCE_USERNAME/CONFLUENCE_API_TOKEN (or the JIRA_ ones)',
		]);
	return new ConfluenceClient({ rateLimit: config.apiRateLimit, ...transport, ...config.confluence });
}
