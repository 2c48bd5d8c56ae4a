import { errorMessage } from '../http/errors.js';
import { RestClient, type TransportOptions } from '../http/restClient.js';
import { log } from '../log.js';
import type {
	ConfluenceContent,
	ConfluenceCurrentUser,
	ConfluencePage,
	ConfluencePaged,
	ConfluenceSpace,
	ContentSearchResult,
	FormattedContent,
	SearchContentOptions,
} from '../types/confluence.js';
import { extractExcerpt, htmlToPlainText } from '../utils/content.js';
import { composeQuery, looksLikeCql, quote, textCql } from '../utils/query.js';

const API = '/rest/api';
const LIMIT_MAX = 200;
const SPACE_PAGE_SIZE = 100;
export const DEFAULT_EXPAND = 'space,history,body.view,metadata.labels';
const PAGE_EXPAND = 'space,history,body.view,body.storage,metadata.labels,version';

export interface ConfluenceClientOptions extends TransportOptions {
	/** Wiki URL, e.g. `https://your-site.atlassian.net/wiki`. */
	baseUrl: string;
	username: string;
	apiToken: string;
	/** Space searched when a call names none. */
	defaultSpace?: string;
}

export class ConfluenceClient {
	readonly baseUrl: string;
	readonly username: string;
	readonly defaultSpace: string | undefined;
	private readonly http: RestClient;

	constructor(options: ConfluenceClientOptions) {
		const { baseUrl, username, apiToken, defaultSpace, ...transport } = options;
		this.baseUrl = baseUrl.replace(/\/+$/, '');
		this.username = username;
		this.defaultSpace = defaultSpace || undefined;
		this.http = new RestClient({
			...transport,
			service: 'confluence',
			baseUrl: this.baseUrl,
			username,
			apiToken,
		});
	}

	async testConnection(): Promise<boolean> {
		try {
			const me = await this.http.get<ConfluenceCurrentUser>(`${API}/user/current`);
			log({
				evt: 'confluence_connected',
				msg: `connected as ${me.displayName || 'Unknown'}`,
				client: 'confluence',
				url: this.baseUrl,
			});
			return true;
		} catch (e) {
			log({
				evt: 'confluence_connect_failed',
				msg: 'connection failed',
				lvl: 'error',
				client: 'confluence',
				url: this.baseUrl,
				reason: errorMessage(e),
			});
			return false;
		}
	}

	async getSpaces(): Promise<ConfluenceSpace[]> {
		const spaces: ConfluenceSpace[] = [];
		let start = 0;
		for (;;) {
			const page = await this.http.get<ConfluencePaged<ConfluenceSpace>>(`${API}/space`, {
				start,
				limit: SPACE_PAGE_SIZE,
			});
			const results = page.results ?? [];
			spaces.push(...results);
			start += results.length;
			if (!results.length || !page._links?.next) break;
		}
		log({ evt: 'confluence_spaces', msg: `found ${spaces.length} spaces`, client: 'confluence', count: spaces.length });
		return spaces;
	}

	/**
	 * CQL search. Plain text is wrapped as a `text ~` clause; the effective space and the
	 * content type are ANDed on.
	 */
	async searchContent(query: string, options: SearchContentOptions = {}): Promise<ContentSearchResult> {
		const { contentType, start = 0, expand = DEFAULT_EXPAND, useDefaultSpace = true } = options;
		const limit = Math.min(options.limit ?? 25, LIMIT_MAX);
		let space = options.spaceKey;
		if (!space && useDefaultSpace && this.defaultSpace) {
			space = this.defaultSpace;
			log({
				evt: 'confluence_default_space',
				msg: `using default space ${space}`,
				lvl: 'debug',
				client: 'confluence',
				space,
			});
		}
		const filters: string[] = [];
		if (space) filters.push(`space = ${quote(space)}`);
		if (contentType) filters.push(`type = ${quote(contentType)}`);
		const base = looksLikeCql(query) ? query : textCql(query.trim());
		const cql = composeQuery(base, filters);

		const data = await this.http.get<ConfluencePaged<ConfluenceContent>>(`${API}/content/search`, {
			cql,
			limit,
			start,
			expand,
		});
		const results = (data.results ?? []).map(c => this.formatContent(c));
		log({
			evt: 'confluence_search',
			msg: `found ${results.length} results`,
			client: 'confluence',
			query: cql,
			count: results.length,
		});
		return {
			results,
			size: data.size ?? 0,
			limit: data.limit ?? limit,
			start: data.start ?? start,
			totalResults: results.length,
			query: cql,
		};
	}

	async searchInSpace(
		spaceKey: string,
		query: string,
		contentType?: string,
		limit = 25,
	): Promise<FormattedContent[]> {
		const { results } = await this.searchContent(query, { spaceKey, contentType, limit });
		return results;
	}

	async getSpaceContent(
		spaceKey: string,
		contentType = 'page',
		limit = 25,
		start = 0,
	): Promise<FormattedContent[]> {
		const page = await this.spaceContentPage(spaceKey, contentType, Math.min(limit, LIMIT_MAX), start);
		const items = (page.results ?? []).map(c => this.formatContent(c));
		log({
			evt: 'confluence_space_content',
			msg: `found ${items.length} ${contentType} items in space ${spaceKey}`,
			client: 'confluence',
			space: spaceKey,
			count: items.length,
		});
		return items;
	}

	async *iterateSpaceContent(
		spaceKey: string,
		contentType = 'page',
		pageSize = 100,
	): AsyncGenerator<FormattedContent> {
		const limit = Math.min(Math.max(pageSize, 1), LIMIT_MAX);
		let start = 0;
		for (;;) {
			const page = await this.spaceContentPage(spaceKey, contentType, limit, start);
			const results = page.results ?? [];
			for (const c of results) yield this.formatContent(c);
			start += results.length;
			if (!results.length || !page._links?.next) return;
		}
	}

	async getPage(pageId: string): Promise<ConfluencePage> {
		const c = await this.http.get<ConfluenceContent>(`${API}/content/${encodeURIComponent(pageId)}`, {
			expand: PAGE_EXPAND,
		});
		const html = c.body?.view?.value ?? c.body?.storage?.value ?? '';
		log({ evt: 'confluence_page_get', msg: `retrieved ${c.title ?? c.id}`, client: 'confluence', key: c.id });
		return {
			...this.formatContent(c),
			text: htmlToPlainText(html),
			version: c.version?.number ?? null,
		};
	}

	formatContent(c: ConfluenceContent): FormattedContent {
		const webui = c._links?.webui;
		const createdBy = c.history?.createdBy;
		const view = c.body?.view;
		return {
			id: c.id,
			title: c.title ?? '',
			type: c.type ?? '',
			status: c.status ?? '',
			space: c.space ? { key: c.space.key ?? '', name: c.space.name ?? '' } : null,
			url: webui ? `${this.baseUrl}${webui}` : null,
			created: c.history?.createdDate ?? null,
			updated: c.history?.lastUpdated?.when ?? null,
			creator: createdBy
				? { name: createdBy.displayName ?? '', username: createdBy.username ?? createdBy.accountId ?? '' }
				: null,
			excerpt: view ? extractExcerpt(view.value ?? '') : null,
			labels: (c.metadata?.labels?.results ?? []).flatMap(l => (l.name ? [l.name] : [])),
		};
	}

	private spaceContentPage(
		spaceKey: string,
		type: string,
		limit: number,
		start: number,
	): Promise<ConfluencePaged<ConfluenceContent>> {
		return this.http.get<ConfluencePaged<ConfluenceContent>>(`${API}/content`, {
			spaceKey,
			type,
			limit,
			start,
			expand: DEFAULT_EXPAND,
		});
	}
}
