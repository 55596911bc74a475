/**
 * Google Sheets log transport
 *
 * Appends one row per alert to a worksheet. On first use the worksheet is created
 * if missing and the header row is written when absent or different.
 */

import { google, type sheets_v4 } from "googleapis";
import { DeliveryError, getErrorMessage } from "../../pipeline/errors";
import { serviceLoggers, type Logger } from "../../utils/logger";
import type { LogCell, LogTransport } from "../core/types";
import { LOG_HEADERS } from "./row";

export const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets";

/**
 * The subset of the Sheets v4 API the transport relies on
 */
export interface SheetsApi {
  getSheetTitles(spreadsheetId: string): Promise<string[]>;
  addSheet(spreadsheetId: string, title: string): Promise<void>;
  getValues(spreadsheetId: string, range: string): Promise<string[][]>;
  updateValues(spreadsheetId: string, range: string, values: LogCell[][]): Promise<void>;
  appendValues(spreadsheetId: string, range: string, values: LogCell[][]): Promise<void>;
}

/**
 * SheetsApi backed by googleapis
 */
export class GoogleSheetsApi implements SheetsApi {
  constructor(private readonly sheets: sheets_v4.Sheets) {}

  async getSheetTitles(spreadsheetId: string): Promise<string[]> {
    const res = await this.sheets.spreadsheets.get({
      spreadsheetId,
      fields: "sheets.properties.title",
    });
    return (res.data.sheets ?? [])
      .map((sheet) => sheet.properties?.title)
      .filter((title): title is string => typeof title === "string");
  }

  async addSheet(spreadsheetId: string, title: string): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: { requests: [{ addSheet: { properties: { title } } }] },
    });
  }

  async getValues(spreadsheetId: string, range: string): Promise<string[][]> {
    const res = await this.sheets.spreadsheets.values.get({ spreadsheetId, range });
    const rows: unknown[][] = res.data.values ?? [];
    return rows.map((row) => row.map((cell) => String(cell)));
  }

  async updateValues(spreadsheetId: string, range: string, values: LogCell[][]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId,
      range,
      valueInputOption: "RAW",
      requestBody: { values },
    });
  }

  async appendValues(spreadsheetId: string, range: string, values: LogCell[][]): Promise<void> {
    await this.sheets.spreadsheets.values.append({
      spreadsheetId,
      range,
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values },
    });
  }
}

/**
 * Build a SheetsApi authenticated with a service account key file
 */
export function createGoogleSheetsApi(keyFile: string): SheetsApi {
  const auth = new google.auth.GoogleAuth({ keyFile, scopes: [SHEETS_SCOPE] });
  return new GoogleSheetsApi(google.sheets({ version: "v4", auth }));
}

/**
 * A1 reference for a tab, quoted so names with spaces work
 */
export function tabRange(tabName: string, cells: string): string {
  return `'${tabName.replace(/'/g, "''")}'!${cells}`;
}

/**
 * Column letter for a 1-based column number (1 -> A, 27 -> AA)
 */
export function columnLetter(column: number): string {
  let letters = "";
  let n = column;
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export interface GoogleSheetsTransportConfig {
  api: SheetsApi;
  spreadsheetId: string;
  tabName?: string;
  logger?: Logger;
}

export class GoogleSheetsTransport implements LogTransport {
  public readonly name = "google-sheets";

  private readonly api: SheetsApi;
  private readonly spreadsheetId: string;
  private readonly tabName: string;
  private readonly logger: Logger;
  private provisioned = false;

  constructor(config: GoogleSheetsTransportConfig) {
    this.api = config.api;
    this.spreadsheetId = config.spreadsheetId;
    this.tabName = config.tabName ?? "Alerts";
    this.logger = config.logger ?? serviceLoggers.sheets;
  }

  isProvisioned(): boolean {
    return this.provisioned;
  }

  async appendRow(columns: LogCell[]): Promise<void> {
    try {
      if (!this.provisioned) {
        await this.provision();
      }
      await this.api.appendValues(this.spreadsheetId, tabRange(this.tabName, "A1"), [columns]);
    } catch (error) {
      if (error instanceof DeliveryError) throw error;
      throw new DeliveryError(this.name, `Sheets append failed: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Create the tab if missing and write the header row if absent or different
   */
  private async provision(): Promise<void> {
    const titles = await this.api.getSheetTitles(this.spreadsheetId);
    if (!titles.includes(this.tabName)) {
      await this.api.addSheet(this.spreadsheetId, this.tabName);
      this.logger.info("Created worksheet", { tab: this.tabName });
    }

    const headerRange = tabRange(this.tabName, `A1:${columnLetter(LOG_HEADERS.length)}1`);
    const existing = (await this.api.getValues(this.spreadsheetId, headerRange))[0] ?? [];
    const matches =
      existing.length === LOG_HEADERS.length && LOG_HEADERS.every((header, i) => existing[i] === header);

    if (!matches) {
      await this.api.updateValues(this.spreadsheetId, headerRange, [[...LOG_HEADERS]]);
      this.logger.info("Wrote header row", { tab: this.tabName });
    }

    this.provisioned = true;
  }
}

export function createGoogleSheetsTransport(config: GoogleSheetsTransportConfig): GoogleSheetsTransport {
  return new GoogleSheetsTransport(config);
}
