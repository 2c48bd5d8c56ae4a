import { log } from '../log.js';
import type { CellValue, CreatedSpreadsheet, SheetInfo, SheetsApi, WriteResult } from '../types/google.js';
import { extractId } from './drive.js';

const VALUE_INPUT = 'USER_ENTERED';

/** 1 → A, 26 → Z, 27 → AA. */
export function columnLetter(n: number): string {
	let s = '';
	for (let i = n; i > 0; i = Math.floor((i - 1) / 26)) s = String.fromCharCode(65 + ((i - 1) % 26)) + s;
	return s;
}

/** A1 notation with the sheet name quoted, e.g. `'Class Data'!A1:D10`. */
export function a1Range(sheetName: string, range?: string): string {
	const sheet = `'${sheetName.replace(/'/g, "''")}'`;
	return range ? `${sheet}!${range}` : sheet;
}

export async function createSpreadsheet(api: SheetsApi, title: string): Promise<CreatedSpreadsheet> {
	const { data } = await api.spreadsheets.create({
		requestBody: { properties: { title } },
		fields: 'spreadsheetId,spreadsheetUrl',
	});
	if (!data.spreadsheetId) throw new Error(`spreadsheet '${title}' was created without an id`);
	log({ evt: 'sheets_create', msg: `created '${title}'`, client: 'google', id: data.spreadsheetId });
	return { spreadsheetId: data.spreadsheetId, spreadsheetUrl: data.spreadsheetUrl ?? null };
}

/** One spreadsheet, addressed by id or by any of its URLs. */
export class SheetsClient {
	readonly spreadsheetId: string;
	private readonly api: SheetsApi;

	constructor(api: SheetsApi, spreadsheet: string) {
		this.api = api;
		this.spreadsheetId = extractId(spreadsheet);
	}

	async getSpreadsheetInfo() {
		const { data } = await this.api.spreadsheets.get({ spreadsheetId: this.spreadsheetId });
		return data;
	}

	async getSheetList(): Promise<SheetInfo[]> {
		const { data } = await this.api.spreadsheets.get({
			spreadsheetId: this.spreadsheetId,
			fields: 'sheets.properties',
		});
		return (data.sheets ?? []).map(({ properties: p }) => ({
			name: p?.title ?? 'Unknown',
			id: p?.sheetId ?? 0,
			rows: p?.gridProperties?.rowCount ?? 0,
			columns: p?.gridProperties?.columnCount ?? 0,
			index: p?.index ?? 0,
		}));
	}

	readAll(sheetName: string): Promise<CellValue[][]> {
		return this.read(a1Range(sheetName));
	}

	readRange(sheetName: string, range: string): Promise<CellValue[][]> {
		return this.read(a1Range(sheetName, range));
	}

	/** Appends after the last row, or overwrites row `rowNumber` (1-based) from column A. */
	async writeRow(sheetName: string, row: CellValue[], rowNumber?: number): Promise<WriteResult> {
		if (rowNumber === undefined) {
			const { data } = await this.api.spreadsheets.values.append({
				spreadsheetId: this.spreadsheetId,
				range: a1Range(sheetName, 'A:A'),
				valueInputOption: VALUE_INPUT,
				requestBody: { values: [row] },
			});
			const result = {
				updatedRange: data.updates?.updatedRange ?? null,
				updatedCells: data.updates?.updatedCells ?? 0,
			};
			log({ evt: 'sheets_write', msg: 'row appended', client: 'google', range: result.updatedRange ?? undefined });
			return result;
		}
		const last = columnLetter(Math.max(row.length, 1));
		return this.update(a1Range(sheetName, `A${rowNumber}:${last}${rowNumber}`), [row]);
	}

	writeCell(sheetName: string, cell: string, value: CellValue): Promise<WriteResult> {
		return this.update(a1Range(sheetName, cell), [[value]]);
	}

	writeRange(sheetName: string, range: string, values: CellValue[][]): Promise<WriteResult> {
		return this.update(a1Range(sheetName, range), values);
	}

	private async read(range: string): Promise<CellValue[][]> {
		const { data } = await this.api.spreadsheets.values.get({ spreadsheetId: this.spreadsheetId, range });
		const values: CellValue[][] = data.values ?? [];
		log({ evt: 'sheets_read', msg: `read ${values.length} rows`, client: 'google', range, count: values.length });
		return values;
	}

	private async update(range: string, values: CellValue[][]): Promise<WriteResult> {
		const { data } = await this.api.spreadsheets.values.update({
			spreadsheetId: this.spreadsheetId,
			range,
			valueInputOption: VALUE_INPUT,
			requestBody: { values },
		});
		const result = { updatedRange: data.updatedRange ?? range, updatedCells: data.updatedCells ?? 0 };
		log({
			evt: 'sheets_write',
			msg: `${result.updatedCells} cells updated`,
			client: 'google',
			range: result.updatedRange,
			count: result.updatedCells,
		});
		return result;
	}
}
