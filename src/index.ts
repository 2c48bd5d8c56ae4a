export * from './atlassian/index.js';
export * from './config.js';
export * from './google/index.js';
export * from './http/errors.js';
export {
	RestClient,
	type FetchLike,
	type HttpMethod,
	type QueryParams,
	type QueryValue,
	type RestClientOptions,
	type TransportOptions,
} from './http/restClient.js';
export { currentLogLevel, log, setLogLevel, type LogEntry, type LogLevel, type Logger } from './log.js';
export * from './servers/index.js';
export type * from './types/confluence.js';
export type * from './types/google.js';
export type * from './types/jira.js';
export type { JsonObject, JsonValue } from './types/json.js';
export type * from './types/server.js';
export { extractExcerpt, htmlToPlainText } from './utils/content.js';
export * from './utils/fileUtils.js';
export { composeQuery, looksLikeCql, looksLikeJql, quote, textCql, textJql } from './utils/query.js';
export { VERSION } from './version.js';
