import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import { log } from '../log.js';

export type Cell = string | number | boolean | null | undefined;
export type Row = Cell[];

/** Key path such as `fields.status.name`, or an accessor. */
export type Column<T> = string | { header: string; value: (record: T) => Cell };

const CELL_WIDTH = 15;
const RULE = '-'.repeat(80);

function readPath(record: unknown, keyPath: string): Cell {
	let cur: unknown = record;
	for (const key of keyPath.split('.')) {
		if (cur === null || typeof cur !== 'object') return undefined;
		cur = Reflect.get(cur, key);
	}
	if (cur === null || cur === undefined) return '';
	if (typeof cur === 'string' || typeof cur === 'number' || typeof cur === 'boolean') return cur;
	return JSON.stringify(cur);
}

/** Header row plus one row per record. Missing values become `''`. */
export function toRows<T>(records: readonly T[], columns: readonly Column<T>[]): Row[] {
	const header = columns.map(c => (typeof c === 'string' ? c : c.header));
	const body = records.map(r =>
		columns.map(c => {
			const v = typeof c === 'string' ? readPath(r, c) : c.value(r);
			return v ?? '';
		}),
	);
	return [header, ...body];
}

/**
 * Writes rows as CSV (first row is the header) under `outputDir`, creating it if needed.
 * Absolute filenames ignore `outputDir`. Resolves to the absolute path written.
 */
export async function saveToCsv(rows: readonly Row[], filename: string, outputDir = 'output'): Promise<string> {
	const target = path.resolve(outputDir, filename);
	await mkdir(path.dirname(target), { recursive: true });
	const [header = [], ...data] = rows;
	const csv = Papa.unparse(
		{ fields: header.map(cellText), data: data.map(r => r.map(c => c ?? '')) },
		{ newline: '\n' },
	);
	await writeFile(target, csv ? `${csv}\n` : '', 'utf8');
	log({ evt: 'csv_saved', msg: `data saved to ${target}`, count: data.length });
	return target;
}

function cellText(c: Cell): string {
	return c === null || c === undefined ? '' : String(c);
}

function fit(c: Cell): string {
	return cellText(c).slice(0, CELL_WIDTH).padEnd(CELL_WIDTH);
}

export interface FormatTableOptions {
	maxRows?: number;
	maxCols?: number;
}

/**
 * Plain-text rendering of rows for terminals. `maxRows` counts the header row, so at most
 * `maxRows - 1` data rows are shown.
 */
export function formatTable(rows: readonly Row[], options: FormatTableOptions = {}): string {
	const { maxRows = 50, maxCols = 10 } = options;
	if (!rows.length) return 'No data to display.';
	const headers = rows[0].slice(0, maxCols);
	const lines = [
		`Displaying data (${rows.length} rows, ${rows[0].length} columns):`,
		RULE,
		headers.map(fit).join(' | '),
		RULE,
	];
	for (const row of rows.slice(1, maxRows)) {
		const cells = row.slice(0, maxCols);
		while (cells.length < headers.length) cells.push('');
		lines.push(cells.map(fit).join(' | '));
	}
	if (rows.length > maxRows) lines.push(`... and ${rows.length - maxRows} more rows`);
	return lines.join('\n');
}
