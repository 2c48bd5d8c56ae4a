import type { JsonObject } from './json.js';

/** Result of the `search` tool. */
export interface SearchResults {
	results: Array<{ id: string; title: string; url: string }>;
}

/** Result of the `fetch` tool: one issue or page flattened to text. */
export interface FetchedDocument {
	id: string;
	title: string;
	text: string;
	url: string;
	metadata: JsonObject;
}

export interface ToolServerOptions {
	port: number;
	host?: string;
	/** Path prefix a reverse proxy mounts the server under, e.g. `/jira`. */
	publicPrefix?: string;
}

export interface SearchDelegate {
	search(query: string): Promise<SearchResults>;
}

export interface FetchDelegate {
	fetch(id: string): Promise<FetchedDocument>;
}

export interface ProductServerConfig {
	productKey: 'jira' | 'confluence';
	serverName: string;
	searchDescription: string;
	fetchDescription: string;
	searchDelegate: SearchDelegate;
	fetchDelegate: FetchDelegate;
}
