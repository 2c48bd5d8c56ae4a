export interface ConfluenceSpace {
	id?: number;
	key: string;
	name: string;
	type?: string;
	status?: string;
	_links?: { webui?: string; self?: string };
}

interface ConfluenceUserRef {
	displayName?: string;
	username?: string;
	accountId?: string;
}

/** Content item as returned with `space,history,body.view,metadata.labels` expanded. */
export interface ConfluenceContent {
	id: string;
	type?: string;
	status?: string;
	title?: string;
	space?: { key?: string; name?: string };
	history?: {
		createdDate?: string;
		createdBy?: ConfluenceUserRef;
		lastUpdated?: { when?: string; by?: ConfluenceUserRef };
	};
	body?: {
		view?: { value?: string };
		storage?: { value?: string };
	};
	metadata?: { labels?: { results?: Array<{ name?: string; prefix?: string }> } };
	version?: { number?: number; when?: string };
	_links?: { webui?: string; self?: string; tinyui?: string };
}

export interface ConfluencePaged<T> {
	results: T[];
	start?: number;
	limit?: number;
	size?: number;
	totalSize?: number;
	_links?: { next?: string; base?: string };
}

export interface FormattedContent {
	id: string;
	title: string;
	type: string;
	status: string;
	space: { key: string; name: string } | null;
	url: string | null;
	created: string | null;
	updated: string | null;
	creator: { name: string; username: string } | null;
	excerpt: string | null;
	labels: string[];
}

export interface ContentSearchResult {
	results: FormattedContent[];
	size: number;
	limit: number;
	start: number;
	totalResults: number;
	/** Final CQL sent to the server. */
	query: string;
}

export interface ConfluencePage extends FormattedContent {
	text: string;
	version: number | null;
}

export interface SearchContentOptions {
	spaceKey?: string;
	contentType?: string;
	limit?: number;
	start?: number;
	expand?: string;
	useDefaultSpace?: boolean;
}

export interface ConfluenceCurrentUser {
	displayName?: string;
	username?: string;
	accountId?: string;
}
