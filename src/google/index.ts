import { google } from 'googleapis';
import type { AppConfig } from '../config.js';
import type { DriveApi, SheetsApi } from '../types/google.js';
import { loadGoogleAuth } from './auth.js';
import { DriveClient, DriveError, extractId } from './drive.js';
import { SheetsClient, createSpreadsheet } from './sheets.js';

export * from './auth.js';
export * from './drive.js';
export * from './sheets.js';

export type SpreadsheetRef = { id: string } | { name: string };

/** Sheets and Drive behind one set of credentials. */
export class GoogleWorkspace {
	readonly drive: DriveClient;
	private readonly sheetsApi: SheetsApi;

	constructor(apis: { sheets: SheetsApi; drive: DriveApi }) {
		this.sheetsApi = apis.sheets;
		this.drive = new DriveClient(apis.drive);
	}

	static async connect(config: AppConfig['google']): Promise<GoogleWorkspace> {
		const auth = await loadGoogleAuth(config);
		return new GoogleWorkspace({
			sheets: google.sheets({ version: 'v4', auth }),
			drive: google.drive({ version: 'v3', auth }),
		});
	}

	openSpreadsheet(idOrUrl: string): SheetsClient {
		return new SheetsClient(this.sheetsApi, idOrUrl);
	}

	async createSpreadsheet(title: string): Promise<SheetsClient> {
		const { spreadsheetId } = await createSpreadsheet(this.sheetsApi, title);
		return this.openSpreadsheet(spreadsheetId);
	}

	findSpreadsheet(name: string): Promise<string | undefined> {
		return this.drive.findByName(name, 'spreadsheet');
	}

	/** Trashes a spreadsheet by id or unique name and resolves to its title. */
	async deleteSpreadsheet(ref: SpreadsheetRef): Promise<string> {
		if ('id' in ref) return this.drive.deleteFile(extractId(ref.id));
		const id = await this.findSpreadsheet(ref.name);
		if (!id) throw new DriveError(`no spreadsheet named '${ref.name}'`);
		return this.drive.deleteFile(id);
	}
}
