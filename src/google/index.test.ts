import type { drive_v3, sheets_v4 } from 'googleapis';
import { describe, expect, it, vi } from 'vitest';
import type { DriveApi, SheetsApi } from '../types/google.js';
import { DriveError, GoogleWorkspace } from './index.js';

function workspace(files: drive_v3.Schema$File[]) {
	const sheets = {
		spreadsheets: {
			create: vi.fn(async (_params: sheets_v4.Params$Resource$Spreadsheets$Create) => ({
				data: { spreadsheetId: 'new-id' },
			})),
			get: vi.fn(async (_params: sheets_v4.Params$Resource$Spreadsheets$Get) => ({ data: {} })),
			values: {
				get: vi.fn(async (_params: sheets_v4.Params$Resource$Spreadsheets$Values$Get) => ({ data: {} })),
				update: vi.fn(async (_params: sheets_v4.Params$Resource$Spreadsheets$Values$Update) => ({ data: {} })),
				append: vi.fn(async (_params: sheets_v4.Params$Resource$Spreadsheets$Values$Append) => ({ data: {} })),
			},
		},
	} satisfies SheetsApi;
	const drive = {
		files: {
			list: vi.fn(async (_params: drive_v3.Params$Resource$Files$List) => ({ data: { files } })),
			get: vi.fn(async (params: drive_v3.Params$Resource$Files$Get) => ({ data: { name: `title of ${params.fileId}` } })),
			delete: vi.fn(async (_params: drive_v3.Params$Resource$Files$Delete) => ({ data: undefined })),
		},
	} satisfies DriveApi;
	return { sheets, drive, google: new GoogleWorkspace({ sheets, drive }) };
}

describe('GoogleWorkspace', () => {
	it('opens a newly created spreadsheet', async () => {
		const { google } = workspace([]);
		const created = await google.createSpreadsheet('Report');
		expect(created.spreadsheetId).toBe('new-id');
	});

	it('finds spreadsheets by name', async () => {
		const { google, drive } = workspace([{ id: 's1', name: 'Budget' }]);
		await expect(google.findSpreadsheet('Budget')).resolves.toBe('s1');
		expect(drive.files.list.mock.calls[0][0].q).toBe(
			"name='Budget' and trashed=false and mimeType='application/vnd.google-apps.spreadsheet'",
		);
	});

	it('deletes a spreadsheet by name', async () => {
		const { google, drive } = workspace([{ id: 's1', name: 'Budget' }]);
		await expect(google.deleteSpreadsheet({ name: 'Budget' })).resolves.toBe('title of s1');
		expect(drive.files.delete.mock.calls[0][0]).toEqual({ fileId: 's1' });
	});

	it('deletes a spreadsheet by URL', async () => {
		const { google, drive } = workspace([]);
		await google.deleteSpreadsheet({ id: 'https://docs.google.com/spreadsheets/d/s9/edit' });
		expect(drive.files.list).not.toHaveBeenCalled();
		expect(drive.files.delete.mock.calls[0][0]).toEqual({ fileId: 's9' });
	});

	it('refuses to delete a spreadsheet it cannot find', async () => {
		const { google, drive } = workspace([]);
		const err = await google.deleteSpreadsheet({ name: 'Ghost' }).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(DriveError);
		expect(err instanceof DriveError && err.message).toBe("no spreadsheet named 'Ghost'");
		expect(drive.files.delete).not.toHaveBeenCalled();
	});
});
