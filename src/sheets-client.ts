/**
 * Google Sheets 추가 기록
 * 레코드를 A..O 행으로 바꿔, 대상 시트의 첫 빈 행부터 이어 쓴다.
 * 시트가 없으면 새로 만든다.
 */

import { google } from 'googleapis';
import { formatSheetDate, recordToSheetRow, sheetRange, type SheetCell } from '../lib/sheet-row.js';
import type { LimitRecord } from '../lib/types.js';

export const SHEETS_SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive.readonly',
  'https://www.googleapis.com/auth/drive.file',
];

const NEW_SHEET_ROWS = 2000;
const NEW_SHEET_COLUMNS = 30;

export type AppendResult = {
  appended: number;
  range?: string;
};

export interface RecordSink {
  appendRecords(records: readonly LimitRecord[]): Promise<AppendResult>;
}

/**
 * 스프레드시트 API 중 실제로 쓰는 부분만
 */
export interface SpreadsheetApi {
  listSheetTitles(spreadsheetId: string): Promise<string[]>;
  addSheet(spreadsheetId: string, title: string, rowCount: number, columnCount: number): Promise<void>;
  countUsedRows(spreadsheetId: string, title: string): Promise<number>;
  updateValues(spreadsheetId: string, range: string, values: SheetCell[][]): Promise<void>;
}

export class SheetsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SheetsError';
  }
}

export function createGoogleSpreadsheetApi(credentialsFile?: string): SpreadsheetApi {
  const auth = new google.auth.GoogleAuth({ keyFile: credentialsFile, scopes: SHEETS_SCOPES });
  const sheets = google.sheets({ version: 'v4', auth });

  return {
    async listSheetTitles(spreadsheetId) {
      const res = await sheets.spreadsheets.get({ spreadsheetId, fields: 'sheets.properties.title' });
      return (res.data.sheets ?? [])
        .map(sheet => sheet.properties?.title)
        .filter((title): title is string => typeof title === 'string');
    },
    async addSheet(spreadsheetId, title, rowCount, columnCount) {
      await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [{ addSheet: { properties: { title, gridProperties: { rowCount, columnCount } } } }],
        },
      });
    },
    async countUsedRows(spreadsheetId, title) {
      const res = await sheets.spreadsheets.values.get({
        spreadsheetId,
        range: `'${title.replace(/'/g, "''")}'`,
      });
      return res.data.values?.length ?? 0;
    },
    async updateValues(spreadsheetId, range, values) {
      await sheets.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: 'USER_ENTERED',
        requestBody: { values },
      });
    },
  };
}

export class GoogleSheetsSink implements RecordSink {
  constructor(
    private api: SpreadsheetApi,
    private spreadsheetId: string | undefined,
    private sheetTitle: string,
    private now: () => Date = () => new Date()
  ) {}

  private async ensureSheet(spreadsheetId: string): Promise<void> {
    const titles = await this.api.listSheetTitles(spreadsheetId);
    if (!titles.includes(this.sheetTitle)) {
      console.log(`[Sheets] Creating worksheet "${this.sheetTitle}"`);
      await this.api.addSheet(spreadsheetId, this.sheetTitle, NEW_SHEET_ROWS, NEW_SHEET_COLUMNS);
    }
  }

  async appendRecords(records: readonly LimitRecord[]): Promise<AppendResult> {
    if (records.length === 0) {
      console.log('[Sheets] Nothing to append.');
      return { appended: 0 };
    }
    if (!this.spreadsheetId) {
      throw new SheetsError('SPREADSHEET_ID is not configured');
    }

    await this.ensureSheet(this.spreadsheetId);

    const today = formatSheetDate(this.now());
    const rows = records.map(record => recordToSheetRow(record, today));
    const start = (await this.api.countUsedRows(this.spreadsheetId, this.sheetTitle)) + 1;
    const range = sheetRange(this.sheetTitle, start, rows.length);

    await this.api.updateValues(this.spreadsheetId, range, rows);
    console.log(`[Sheets] Appended ${rows.length} rows to ${range}`);

    return { appended: rows.length, range };
  }
}
