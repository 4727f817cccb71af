import { google, sheets_v4 } from 'googleapis';
import { CellValue, SheetsGateway } from '../../types/report.types';

const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

export interface GoogleSheetsOptions {
  spreadsheetId: string;
  /** Service-account key file; Application Default Credentials when omitted */
  keyFile?: string;
}

/**
 * Google Sheets v4 behind the exporter's gateway interface
 */
export class GoogleSheetsGateway implements SheetsGateway {
  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly spreadsheetId: string
  ) {}

  static create(options: GoogleSheetsOptions): GoogleSheetsGateway {
    const auth = new google.auth.GoogleAuth({
      keyFile: options.keyFile || undefined,
      scopes: SHEETS_SCOPES,
    });
    return new GoogleSheetsGateway(google.sheets({ version: 'v4', auth }), options.spreadsheetId);
  }

  async listTabs(): Promise<string[]> {
    const response = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties.title',
    });
    return (response.data.sheets ?? []).flatMap((sheet) => {
      const title = sheet.properties?.title;
      return title ? [title] : [];
    });
  }

  async addTab(title: string): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [{ addSheet: { properties: { title } } }],
      },
    });
    console.log(`✓ Created tab '${title}'`);
  }

  async clearRange(range: string): Promise<void> {
    await this.sheets.spreadsheets.values.clear({
      spreadsheetId: this.spreadsheetId,
      range,
    });
  }

  async writeValues(range: string, values: CellValue[][]): Promise<number> {
    const response = await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: 'RAW',
      requestBody: { values },
    });
    return response.data.updatedCells ?? 0;
  }
}
