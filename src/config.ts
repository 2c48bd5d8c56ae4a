import { z } from 'zod';
import { ConfigError } from './http/errors.js';
import { LOG_LEVELS, isTruthy, type LogLevel } from './log.js';

export interface ProductConfig {
	baseUrl: string;
	username: string;
	apiToken: string;
}

export interface ConfluenceConfig extends ProductConfig {
	defaultSpace?: string;
}

export interface AppConfig {
	jira?: ProductConfig;
	confluence?: ConfluenceConfig;
	google: { credentialsFile: string; tokenFile: string };
	outputDir: string;
	logLevel: LogLevel;
	/** Requests per second per client; 0 disables throttling. */
	apiRateLimit: number;
	debug: boolean;
	servers: { jiraPort: number; confluencePort: number };
}

// blank strings count as unset
const optional = z.preprocess(
	v => (typeof v === 'string' && v.trim() === '' ? undefined : typeof v === 'string' ? v.trim() : v),
	z.string().optional(),
);

const url = z.preprocess(
	v => (typeof v === 'string' && v.trim() === '' ? undefined : v),
	z
		.string()
		.trim()
		.url()
		.transform(s => s.replace(/\/+$/, ''))
		.optional(),
);

const nonNegativeInt = (fallback: number) =>
	z.preprocess(
		v => (typeof v === 'string' && v.trim() === '' ? undefined : v),
		z.coerce.number().int().nonnegative().default(fallback),
	);

const port = (fallback: number) =>
	z.preprocess(
		v => (typeof v === 'string' && v.trim() === '' ? undefined : v),
		z.coerce.number().int().min(1).max(65535).default(fallback),
	);

const EnvSchema = z.object({
	JIRA_BASE_URL: url,
	JIRA_USERNAME: optional,
	JIRA_API_TOKEN: optional,
	CONFLUENCE_BASE_URL: url,
	CONFLUENCE_USERNAME: optional,
	CONFLUENCE_API_TOKEN: optional,
	CONFLUENCE_DEFAULT_SPACE: optional,
	GOOGLE_CREDENTIALS_FILE: optional,
	GOOGLE_TOKEN_FILE: optional,
	OUTPUT_DIR: optional,
	LOG_LEVEL: z.preprocess(
		v => (typeof v === 'string' ? v.trim().toLowerCase() || undefined : v),
		z.enum(LOG_LEVELS).optional(),
	),
	API_RATE_LIMIT: nonNegativeInt(10),
	DEBUG: optional,
	JIRA_TOOLS_PORT: port(7100),
	CONFLUENCE_TOOLS_PORT: port(7200),
});

export type Env = Record<string, string | undefined>;

/** Validates the environment. Every problem found is reported in one `ConfigError`. */
export function loadConfig(env: Env = process.env): AppConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(
			parsed.error.issues.map(i => `${i.path.join('.') || 'env'}: ${i.message}`),
		);
	}
	const e = parsed.data;
	const debug = isTruthy(e.DEBUG);
	const jira = section(e.JIRA_BASE_URL, e.JIRA_USERNAME, e.JIRA_API_TOKEN);
	const confluence = section(
		e.CONFLUENCE_BASE_URL,
		e.CONFLUENCE_USERNAME ?? e.JIRA_USERNAME,
		e.CONFLUENCE_API_TOKEN ?? e.JIRA_API_TOKEN,
	);
	return {
		jira,
		confluence: confluence && { ...confluence, defaultSpace: e.CONFLUENCE_DEFAULT_SPACE },
		google: {
			credentialsFile: e.GOOGLE_CREDENTIALS_FILE ?? 'credentials.json',
			tokenFile: e.GOOGLE_TOKEN_FILE ?? 'token.json',
		},
		outputDir: e.OUTPUT_DIR ?? 'output',
		logLevel: e.LOG_LEVEL ?? (debug ? 'debug' : 'info'),
		apiRateLimit: e.API_RATE_LIMIT,
		debug,
		servers: { jiraPort: e.JIRA_TOOLS_PORT, confluencePort: e.CONFLUENCE_TOOLS_PORT },
	};
}

function section(
	baseUrl: string | undefined,
	username: string | undefined,
	apiToken: string | undefined,
): ProductConfig | undefined {
	if (!baseUrl || !username || !apiToken) return undefined;
	return { baseUrl, username, apiToken };
}

/** Variables still needed before a product section can be built. */
export function missingVariables(product: 'jira' | 'confluence', env: Env = process.env): string[] {
	const has = (k: string) => Boolean(env[k]?.trim());
	if (product === 'jira')
		return ['JIRA_BASE_URL', 'JIRA_USERNAME', 'JIRA_API_TOKEN'].filter(k => !has(k));
	const missing: string[] = [];
	if (!has('CONFLUENCE_BASE_URL')) missing.push('CONFLUENCE_BASE_URL');
	if (!has('CONFLUENCE_USERNAME') && !has('JIRA_USERNAME')) missing.push('CONFLUENCE_USERNAME');
	if (!has('CONFLUENCE_API_TOKEN') && !has('JIRA_API_TOKEN')) missing.push('CONFLUENCE_API_TOKEN');
	return missing;
}
