import type { JiraClient } from '../atlassian/jira.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import type { JiraIssue } from '../types/jira.js';
import type {
	FetchDelegate,
	FetchedDocument,
	SearchDelegate,
	SearchResults,
	ToolServerOptions,
} from '../types/server.js';
import { looksLikeJql, textJql } from '../utils/query.js';
import { JIRA_FETCH_DESCRIPTION, JIRA_SEARCH_DESCRIPTION } from './descriptions.js';
import { startToolServer } from './toolServer.js';

const SEARCH_LIMIT = 20;
const COMMENTS_SHOWN = 5;

const rec = (v: JsonValue | undefined): JsonObject =>
	v && typeof v === 'object' && !Array.isArray(v) ? v : {};
const arr = (v: JsonValue | undefined): JsonValue[] => (Array.isArray(v) ? v : []);
const str = (v: JsonValue | undefined): string | undefined =>
	typeof v === 'string' && v ? v : undefined;
/** `name` of a nested object such as `fields.status`, or `displayName` for users. */
const nameOf = (v: JsonValue | undefined, prop = 'name'): JsonValue => str(rec(v)[prop]) ?? null;

export function toJql(query: string): string {
	return looksLikeJql(query) ? query : textJql(query);
}

export function mapIssueResults(issues: JiraIssue[], issueUrl: (key: string) => string): SearchResults {
	return {
		results: issues.map(issue => ({
			id: issue.key,
			title: str(issue.fields['summary']) ?? `Issue ${issue.key}`,
			url: issueUrl(issue.key),
		})),
	};
}

export function mapIssueDocument(issue: JiraIssue, url: string): FetchedDocument {
	const fields = issue.fields;
	const summary = str(fields['summary']);
	const description = str(fields['description']);
	const status = nameOf(fields['status']);
	const comments = arr(rec(fields['comment'])['comments']).map(rec);

	const parts: string[] = [];
	if (summary) parts.push(`Summary: ${summary}`);
	if (description) parts.push(`Description:\n${description}`);
	if (typeof status === 'string') parts.push(`Status: ${status}`);
	if (comments.length) {
		parts.push(`Comments (${comments.length}):`);
		for (const c of comments.slice(0, COMMENTS_SHOWN)) {
			const author = nameOf(c['author'], 'displayName') ?? 'user';
			parts.push(`- ${author}: ${str(c['body']) ?? ''}`.trim());
		}
	}

	const metadata: JsonObject = {
		source: 'jira',
		status,
		issueType: nameOf(fields['issuetype']),
		priority: nameOf(fields['priority']),
		assignee: nameOf(fields['assignee'], 'displayName'),
		reporter: nameOf(fields['reporter'], 'displayName'),
		labels: arr(fields['labels']),
		created: fields['created'] ?? null,
		updated: fields['updated'] ?? null,
	};
	if (comments.length)
		metadata['commentsExcerpt'] = comments.slice(0, COMMENTS_SHOWN).map(c => ({
			author: nameOf(c['author'], 'displayName'),
			created: c['created'] ?? null,
			body: c['body'] ?? null,
		}));

	return {
		id: issue.key,
		title: summary ?? `Issue ${issue.key}`,
		text: parts.length ? parts.join('\n\n') : JSON.stringify(fields, null, 2),
		url,
		metadata,
	};
}

export function jiraDelegates(client: JiraClient): {
	searchDelegate: SearchDelegate;
	fetchDelegate: FetchDelegate;
} {
	return {
		searchDelegate: {
			async search(query) {
				const issues = await client.searchIssues(toJql(query), {
					maxResults: SEARCH_LIMIT,
					fields: ['summary'],
				});
				return mapIssueResults(issues, key => client.issueUrl(key));
			},
		},
		fetchDelegate: {
			async fetch(id) {
				const issue = await client.getIssue(id.trim());
				return mapIssueDocument(issue, client.issueUrl(issue.key));
			},
		},
	};
}

export function jiraServerConfig(client: JiraClient) {
	return {
		productKey: 'jira' as const,
		serverName: 'flowkit-jira',
		searchDescription: JIRA_SEARCH_DESCRIPTION,
		fetchDescription: JIRA_FETCH_DESCRIPTION,
		...jiraDelegates(client),
	};
}

export function startJiraToolServer(client: JiraClient, opts: ToolServerOptions) {
	return startToolServer(opts, jiraServerConfig(client));
}
