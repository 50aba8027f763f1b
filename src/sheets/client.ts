import { google, type sheets_v4 } from "googleapis";

import {
  ConfigValidationError,
  errorMessage,
  JobFailedError,
} from "../errors.js";
import { sheetsLogger } from "../logger.js";
import {
  a1Range,
  parseColumnRange,
  quoteTab,
  type ColumnRange,
} from "../utils/columns.js";
import { withRetry, type RetryOptions } from "../utils/middleware.js";
import {
  buildPresentationRequests,
  type PresentationTarget,
} from "./presentation.js";

import type { Destination, WriteRequest } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

/**
 * The part of the Sheets v4 client the destination calls
 */
export interface SheetsApi {
  spreadsheets: {
    get(
      params: sheets_v4.Params$Resource$Spreadsheets$Get
    ): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    batchUpdate(
      params: sheets_v4.Params$Resource$Spreadsheets$Batchupdate
    ): Promise<unknown>;
    values: {
      update(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Update
      ): Promise<unknown>;
      batchClear(
        params: sheets_v4.Params$Resource$Spreadsheets$Values$Batchclear
      ): Promise<unknown>;
    };
  };
}

export interface GoogleSheetsDestinationOptions {
  spreadsheetUrl: string;
  serviceAccountFile: string;
  /** Pre-built API client (for testing) */
  api?: SheetsApi;
  /** Overrides merged into every retry policy */
  retry?: RetryOptions;
}

interface SheetProperties {
  sheetId: number;
  rowCount: number;
}

const SCOPES = [
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/drive",
];

const SPREADSHEET_ID_PATTERN = /\/d\/([a-zA-Z0-9-_]+)/;

const WRITE_ATTEMPTS = 5;
const STATUS_ATTEMPTS = 3;
const CONNECT_ATTEMPTS = 3;

// ============================================================================
// Helpers
// ============================================================================

export function extractSpreadsheetId(url: string): string {
  const match = SPREADSHEET_ID_PATTERN.exec(url);
  if (!match?.[1]) {
    throw new ConfigValidationError(
      `Cannot extract spreadsheet id from URL '${url}'`
    );
  }
  return match[1];
}

// ============================================================================
// Destination
// ============================================================================

/**
 * Google Sheets destination authenticated with a service account.
 *
 * One instance is shared by all jobs; every call is an independent HTTP
 * request, so concurrent writes to different tabs are safe.
 */
export class GoogleSheetsDestination implements Destination {
  private readonly spreadsheetId: string;
  private api: SheetsApi | null;

  constructor(private readonly options: GoogleSheetsDestinationOptions) {
    this.spreadsheetId = extractSpreadsheetId(options.spreadsheetUrl);
    this.api = options.api ?? null;
  }

  async connect(): Promise<void> {
    const api = this.api ?? this.createApi();
    this.api = api;

    const response = await withRetry(
      () =>
        api.spreadsheets.get({
          spreadsheetId: this.spreadsheetId,
          fields: "spreadsheetId,properties.title",
        }),
      this.retryOptions("sheets-connect", CONNECT_ATTEMPTS)
    );

    sheetsLogger.info(
      {
        spreadsheetId: this.spreadsheetId,
        title: response.data.properties?.title ?? "",
      },
      "Connected to spreadsheet"
    );
  }

  async write(request: WriteRequest): Promise<void> {
    const range = parseColumnRange(request.columnRange);
    await withRetry(
      () => this.writeOnce(request, range),
      this.retryOptions(`sheets-write:${request.tab}`, WRITE_ATTEMPTS)
    );
  }

  async writeStatus(tab: string, text: string): Promise<void> {
    const api = this.requireApi();
    await withRetry(
      () =>
        api.spreadsheets.values.update({
          spreadsheetId: this.spreadsheetId,
          range: `${quoteTab(tab)}!A1`,
          valueInputOption: "RAW",
          requestBody: { values: [[text]] },
        }),
      this.retryOptions(`sheets-status:${tab}`, STATUS_ATTEMPTS)
    );
    sheetsLogger.debug({ tab, status: text }, "Status written");
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async writeOnce(
    request: WriteRequest,
    range: ColumnRange
  ): Promise<void> {
    const api = this.requireApi();
    const { tab, values, startRow, clearTail } = request;
    const sheet = await this.sheetProperties(tab);

    if (values.length <= 1) {
      sheetsLogger.warn({ tab }, "No data rows to write");
      if (clearTail) {
        await this.clearRanges([a1Range(tab, range, startRow)]);
        sheetsLogger.info({ tab, fromRow: startRow }, "Cleared range");
      }
      return;
    }

    const headers = values[0] ?? [];
    await Promise.all([
      api.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: a1Range(tab, range, startRow),
        valueInputOption: "USER_ENTERED",
        requestBody: { values },
      }),
      this.applyPresentation(tab, {
        sheetId: sheet.sheetId,
        headers,
        range,
        startRow,
        rowCount: values.length,
      }),
    ]);

    sheetsLogger.info(
      { tab, rowCount: values.length - 1, startRow },
      "Data written"
    );

    if (clearTail) {
      const tailStart = startRow + values.length;
      if (sheet.rowCount >= tailStart) {
        await this.clearRanges([a1Range(tab, range, tailStart, sheet.rowCount)]);
        sheetsLogger.debug(
          { tab, fromRow: tailStart, toRow: sheet.rowCount },
          "Cleared tail rows"
        );
      }
    }
  }

  /**
   * Formatting failures leave the data in place and are only reported
   */
  private async applyPresentation(
    tab: string,
    target: PresentationTarget
  ): Promise<void> {
    try {
      await this.requireApi().spreadsheets.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: { requests: buildPresentationRequests(target) },
      });
    } catch (error) {
      sheetsLogger.warn(
        { tab, error: errorMessage(error) },
        "Failed to apply column formatting"
      );
    }
  }

  private async sheetProperties(tab: string): Promise<SheetProperties> {
    const response = await this.requireApi().spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: "sheets.properties(sheetId,title,gridProperties.rowCount)",
    });

    const sheet = response.data.sheets?.find(
      (candidate) => candidate.properties?.title === tab
    );
    const sheetId = sheet?.properties?.sheetId;
    if (sheetId === undefined || sheetId === null) {
      throw new JobFailedError(`Worksheet '${tab}' not found`);
    }

    return {
      sheetId,
      rowCount: sheet?.properties?.gridProperties?.rowCount ?? 0,
    };
  }

  private async clearRanges(ranges: string[]): Promise<void> {
    await this.requireApi().spreadsheets.values.batchClear({
      spreadsheetId: this.spreadsheetId,
      requestBody: { ranges },
    });
  }

  private requireApi(): SheetsApi {
    if (this.api === null) {
      throw new JobFailedError("Spreadsheet is not connected");
    }
    return this.api;
  }

  private createApi(): SheetsApi {
    const auth = new google.auth.GoogleAuth({
      keyFile: this.options.serviceAccountFile,
      scopes: SCOPES,
    });
    return google.sheets({ version: "v4", auth });
  }

  private retryOptions(name: string, maxAttempts: number): RetryOptions {
    return {
      name,
      maxAttempts,
      logger: sheetsLogger,
      ...this.options.retry,
    };
  }
}
