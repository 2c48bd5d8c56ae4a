import type { drive_v3, sheets_v4 } from 'googleapis';

export type CellValue = string | number | boolean | null;

export interface SheetInfo {
	name: string;
	id: number;
	rows: number;
	columns: number;
	index: number;
}

export interface WriteResult {
	updatedRange: string | null;
	updatedCells: number;
}

export interface CreatedSpreadsheet {
	spreadsheetId: string;
	spreadsheetUrl: string | null;
}

export interface DriveFile {
	id: string;
	name: string;
	mimeType: string | null;
	webViewLink: string | null;
}

/** The parts of `google.sheets({ version: 'v4' })` the sheets client calls. */
export interface SheetsApi {
	spreadsheets: {
		create(params: sheets_v4.Params$Resource$Spreadsheets$Create): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
		get(params: sheets_v4.Params$Resource$Spreadsheets$Get): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
		values: {
			get(
				params: sheets_v4.Params$Resource$Spreadsheets$Values$Get,
			): Promise<{ data: sheets_v4.Schema$ValueRange }>;
			update(
				params: sheets_v4.Params$Resource$Spreadsheets$Values$Update,
			): Promise<{ data: sheets_v4.Schema$UpdateValuesResponse }>;
			append(
				params: sheets_v4.Params$Resource$Spreadsheets$Values$Append,
			): Promise<{ data: sheets_v4.Schema$AppendValuesResponse }>;
		};
	};
}

/** The parts of `google.drive({ version: 'v3' })` the drive client calls. */
export interface DriveApi {
	files: {
		list(params: drive_v3.Params$Resource$Files$List): Promise<{ data: drive_v3.Schema$FileList }>;
		get(params: drive_v3.Params$Resource$Files$Get): Promise<{ data: drive_v3.Schema$File }>;
		delete(params: drive_v3.Params$Resource$Files$Delete): Promise<unknown>;
	};
}
