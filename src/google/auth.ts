import { readFile } from 'node:fs/promises';
import { JWT, OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import { ConfigError } from '../http/errors.js';
import { log } from '../log.js';

export const GOOGLE_SCOPES = [
	'https://www.googleapis.com/auth/spreadsheets',
	'https://www.googleapis.com/auth/drive',
];

const ClientSecret = z.object({
	client_id: z.string().min(1),
	client_secret: z.string().min(1),
	redirect_uris: z.array(z.string()).optional(),
});

const CredentialsSchema = z.union([
	z.object({
		type: z.literal('service_account'),
		client_email: z.string().min(1),
		private_key: z.string().min(1),
	}),
	z.object({ installed: ClientSecret }),
	z.object({ web: ClientSecret }),
]);

// Accepts both the Node client's token shape and the `token`/`expiry` shape other tools write.
const TokenSchema = z
	.object({
		access_token: z.string().optional(),
		token: z.string().optional(),
		refresh_token: z.string().optional(),
		expiry_date: z.number().optional(),
		expiry: z.string().optional(),
		token_type: z.string().optional(),
		scope: z.string().optional(),
	})
	.refine(t => t.access_token || t.token || t.refresh_token, {
		message: 'needs an access_token or a refresh_token',
	});

export interface GoogleAuthOptions {
	credentialsFile: string;
	tokenFile: string;
	scopes?: string[];
}

async function readJson(file: string, label: string): Promise<unknown> {
	let text: string;
	try {
		text = await readFile(file, 'utf8');
	} catch (e) {
		if (e instanceof Error && 'code' in e && e.code === 'ENOENT')
			throw new ConfigError([`${label} file '${file}' not found`]);
		throw e;
	}
	try {
		return JSON.parse(text);
	} catch {
		throw new ConfigError([`${label} file '${file}' is not valid JSON`]);
	}
}

function parseFile<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string, file: string): T {
	const parsed = schema.safeParse(value);
	if (parsed.success) return parsed.data;
	throw new ConfigError(parsed.error.issues.map(i => `${label} file '${file}': ${i.message}`));
}

function expiryOf(token: z.infer<typeof TokenSchema>): number | undefined {
	if (token.expiry_date !== undefined) return token.expiry_date;
	const ts = token.expiry ? Date.parse(token.expiry) : Number.NaN;
	return Number.isNaN(ts) ? undefined : ts;
}

/**
 * Builds an authorised client from the credentials file. Service-account keys sign their own
 * tokens; OAuth client secrets need a token file obtained beforehand. Refreshed tokens are kept
 * in memory only.
 */
export async function loadGoogleAuth(options: GoogleAuthOptions): Promise<OAuth2Client> {
	const scopes = options.scopes ?? GOOGLE_SCOPES;
	const creds = parseFile(
		CredentialsSchema,
		await readJson(options.credentialsFile, 'google credentials'),
		'google credentials',
		options.credentialsFile,
	);

	if ('type' in creds) {
		log({ evt: 'google_auth', msg: 'service account', client: 'google', account: creds.client_email });
		return new JWT({ email: creds.client_email, key: creds.private_key, scopes });
	}

	const secret = 'installed' in creds ? creds.installed : creds.web;
	const token = parseFile(
		TokenSchema,
		await readJson(options.tokenFile, 'google token'),
		'google token',
		options.tokenFile,
	);
	const client = new OAuth2Client({
		clientId: secret.client_id,
		clientSecret: secret.client_secret,
		redirectUri: secret.redirect_uris?.[0],
	});
	client.setCredentials({
		access_token: token.access_token ?? token.token,
		refresh_token: token.refresh_token,
		expiry_date: expiryOf(token),
		token_type: token.token_type,
		scope: token.scope,
	});
	log({ evt: 'google_auth', msg: 'oauth token loaded', client: 'google', file: options.tokenFile });
	return client;
}
