import type { ConfluenceClient } from '../atlassian/confluence.js';
import type { ConfluencePage, FormattedContent } from '../types/confluence.js';
import type {
	FetchDelegate,
	FetchedDocument,
	SearchDelegate,
	SearchResults,
	ToolServerOptions,
} from '../types/server.js';
import { CONFLUENCE_FETCH_DESCRIPTION, CONFLUENCE_SEARCH_DESCRIPTION } from './descriptions.js';
import { startToolServer } from './toolServer.js';

const SEARCH_LIMIT = 20;

export function mapContentResults(items: FormattedContent[]): SearchResults {
	return {
		results: items.map(c => ({ id: c.id, title: c.title || 'Untitled', url: c.url ?? '' })),
	};
}

export function mapPageDocument(page: ConfluencePage): FetchedDocument {
	return {
		id: page.id,
		title: page.title || 'Untitled',
		text: page.text || page.excerpt || '',
		url: page.url ?? '',
		metadata: {
			source: 'confluence',
			type: page.type,
			status: page.status,
			space: page.space,
			created: page.created,
			updated: page.updated,
			creator: page.creator,
			labels: page.labels,
			version: page.version,
		},
	};
}

export function confluenceDelegates(client: ConfluenceClient): {
	searchDelegate: SearchDelegate;
	fetchDelegate: FetchDelegate;
} {
	return {
		searchDelegate: {
			async search(query) {
				const { results } = await client.searchContent(query, {
					contentType: 'page',
					limit: SEARCH_LIMIT,
				});
				return mapContentResults(results);
			},
		},
		fetchDelegate: {
			async fetch(id) {
				return mapPageDocument(await client.getPage(id.trim()));
			},
		},
	};
}

export function confluenceServerConfig(client: ConfluenceClient) {
	return {
		productKey: 'confluence' as const,
		serverName: 'flowkit-confluence',
		searchDescription: CONFLUENCE_SEARCH_DESCRIPTION,
		fetchDescription: CONFLUENCE_FETCH_DESCRIPTION,
		...confluenceDelegates(client),
	};
}

export function startConfluenceToolServer(client: ConfluenceClient, opts: ToolServerOptions) {
	return startToolServer(opts, confluenceServerConfig(client));
}
