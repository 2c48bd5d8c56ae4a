import { log } from '../log.js';
import type { DriveApi, DriveFile } from '../types/google.js';

export const GOOGLE_MIME_TYPES = {
	spreadsheet: 'application/vnd.google-apps.spreadsheet',
	document: 'application/vnd.google-apps.document',
	presentation: 'application/vnd.google-apps.presentation',
	form: 'application/vnd.google-apps.form',
	folder: 'application/vnd.google-apps.folder',
} as const;

export type DriveFileType = keyof typeof GOOGLE_MIME_TYPES;

// most specific first: `/d/` alone also matches the editor URLs
const ID_PATTERNS = [
	/\/(?:spreadsheets|document|presentation|forms)\/d\/([\w-]+)/,
	/\/file\/d\/([\w-]+)/,
	/[?&#]id=([\w-]+)/,
	/\/d\/([\w-]+)/,
];

export class DriveError extends Error {
	readonly matches: DriveFile[];

	constructor(message: string, matches: DriveFile[] = []) {
		super(message);
		this.name = 'DriveError';
		this.matches = matches;
	}
}

/** File id from a Docs/Sheets/Slides/Forms/Drive URL. Anything else is taken to be an id already. */
export function extractId(urlOrId: string): string {
	const s = urlOrId.trim();
	if (!s.includes('google.com')) return s;
	for (const pattern of ID_PATTERNS) {
		const m = pattern.exec(s);
		if (m) return m[1];
	}
	throw new DriveError(`could not extract a file id from ${s}`);
}

/** Drive query string literal. */
export function driveLiteral(value: string): string {
	return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export class DriveClient {
	private readonly api: DriveApi;

	constructor(api: DriveApi) {
		this.api = api;
	}

	/** Non-trashed files with exactly this name. */
	async listByName(name: string, fileType?: DriveFileType): Promise<DriveFile[]> {
		let q = `name=${driveLiteral(name)} and trashed=false`;
		if (fileType) q += ` and mimeType='${GOOGLE_MIME_TYPES[fileType]}'`;
		const { data } = await this.api.files.list({ q, fields: 'files(id, name, mimeType, webViewLink)' });
		return (data.files ?? []).flatMap(f =>
			f.id
				? [{ id: f.id, name: f.name ?? name, mimeType: f.mimeType ?? null, webViewLink: f.webViewLink ?? null }]
				: [],
		);
	}

	/**
	 * Id of the single file with this name, or undefined when there is none. Several matches
	 * raise a `DriveError` carrying them.
	 */
	async findByName(name: string, fileType?: DriveFileType): Promise<string | undefined> {
		const files = await this.listByName(name, fileType);
		const kind = fileType ?? 'file';
		if (files.length > 1)
			throw new DriveError(
				`${files.length} ${kind}s named '${name}': ${files.map(f => f.id).join(', ')}`,
				files,
			);
		const [file] = files;
		log({
			evt: 'drive_find',
			msg: file ? `found ${kind} '${name}'` : `no ${kind} named '${name}'`,
			client: 'google',
			id: file?.id,
		});
		return file?.id;
	}

	/** Deletes a file outright, skipping the trash. Resolves to its name. */
	async deleteFile(fileId: string): Promise<string> {
		const { data } = await this.api.files.get({ fileId, fields: 'name' });
		const name = data.name ?? 'Unknown';
		await this.api.files.delete({ fileId });
		log({ evt: 'drive_delete', msg: `deleted '${name}'`, client: 'google', id: fileId });
		return name;
	}
}
