/**
 * Google Sheets ledger over the Sheets v4 REST API.
 *
 * Reads use `values.get`; writes go through one `batchUpdate` per batch, with
 * `appendCells` for new rows and `updateCells` rewriting an existing row's
 * values and background colour.
 */

import { z } from 'zod';
import type { LedgerRow } from '../types';
import { createLogger } from '../utils/logger';
import { errorFromResponse } from '../utils/http';
import { getRetryPolicy, withRetry, RateLimitError } from '../infra/retry';
import { LEDGER_COLUMN_COUNT, ROW_COLORS, cellsToValues, parseLedgerRow } from './columns';
import type { LedgerMutation, LedgerStore } from './types';
import type { AccessTokenProvider } from './sheets-auth';

const logger = createLogger('ledger-sheets');

const SHEETS_API = 'https://sheets.googleapis.com/v4/spreadsheets';

export interface SheetsLedgerOptions {
  spreadsheetId: string;
  sheetName?: string;
  /** Numeric grid id of the tab (0 for the first sheet) */
  sheetId?: number;
  getAccessToken: AccessTokenProvider;
}

const valuesResponseSchema = z.object({
  values: z.array(z.array(z.unknown())).optional(),
});

// =============================================================================
// REQUEST BUILDERS
// =============================================================================

interface CellData {
  userEnteredValue: { numberValue: number } | { stringValue: string };
  userEnteredFormat: { backgroundColor: { red: number; green: number; blue: number } };
}

export type SheetsRequest =
  | { appendCells: { sheetId: number; rows: Array<{ values: CellData[] }>; fields: string } }
  | {
      updateCells: {
        range: {
          sheetId: number;
          startRowIndex: number;
          endRowIndex: number;
          startColumnIndex: number;
          endColumnIndex: number;
        };
        rows: Array<{ values: CellData[] }>;
        fields: string;
      };
    };

function rowData(mutation: LedgerMutation): { values: CellData[] } {
  const backgroundColor = ROW_COLORS[mutation.color];
  return {
    values: cellsToValues(mutation.cells).map((value) => ({
      userEnteredValue: typeof value === 'number' ? { numberValue: value } : { stringValue: value },
      userEnteredFormat: { backgroundColor },
    })),
  };
}

export function buildSheetsRequests(mutations: LedgerMutation[], sheetId: number): SheetsRequest[] {
  return mutations.map((mutation) => {
    if (mutation.kind === 'append') {
      return { appendCells: { sheetId, rows: [rowData(mutation)], fields: '*' } };
    }
    return {
      updateCells: {
        range: {
          sheetId,
          startRowIndex: mutation.rowIndex - 1,
          endRowIndex: mutation.rowIndex,
          startColumnIndex: 0,
          endColumnIndex: LEDGER_COLUMN_COUNT,
        },
        rows: [rowData(mutation)],
        fields: 'userEnteredValue,userEnteredFormat.backgroundColor',
      },
    };
  });
}

export function a1Range(sheetName: string, range: string): string {
  const quoted = /^[A-Za-z0-9_]+$/.test(sheetName) ? sheetName : `'${sheetName.replace(/'/g, "''")}'`;
  return `${quoted}!${range}`;
}

// =============================================================================
// STORE
// =============================================================================

export function createSheetsLedgerStore(options: SheetsLedgerOptions): LedgerStore {
  const sheetName = options.sheetName ?? 'Sheet1';
  const sheetId = options.sheetId ?? 0;
  const base = `${SHEETS_API}/${encodeURIComponent(options.spreadsheetId)}`;

  async function authHeaders(): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${await options.getAccessToken()}`, 'Content-Type': 'application/json' };
  }

  let tail: Promise<void> = Promise.resolve();

  async function batchUpdate(mutations: LedgerMutation[]): Promise<void> {
    if (mutations.length === 0) return;
    const body = JSON.stringify({ requests: buildSheetsRequests(mutations, sheetId) });

    // Only 429s are retried: a rate-limited batch was not applied
    await withRetry(
      async () => {
        const response = await fetch(`${base}:batchUpdate`, { method: 'POST', headers: await authHeaders(), body });
        if (!response.ok) {
          throw await errorFromResponse(response, 'Sheets batchUpdate');
        }
        await response.body?.cancel();
      },
      { ...getRetryPolicy('sheets'), retryPredicate: (err) => err instanceof RateLimitError },
    );
    logger.info({ count: mutations.length, spreadsheetId: options.spreadsheetId }, 'Applied ledger batch');
  }

  return {
    name: `sheets:${options.spreadsheetId}`,

    async readRows(): Promise<LedgerRow[]> {
      const range = encodeURIComponent(a1Range(sheetName, 'A2:L'));
      const data = await withRetry(async () => {
        const response = await fetch(`${base}/values/${range}`, { headers: await authHeaders() });
        if (!response.ok) {
          throw await errorFromResponse(response, 'Sheets values.get');
        }
        return valuesResponseSchema.parse(await response.json());
      }, getRetryPolicy('sheets'));

      const rows: LedgerRow[] = [];
      (data.values ?? []).forEach((values, i) => {
        const row = parseLedgerRow(values, i + 2);
        if (row) rows.push(row);
      });
      return rows;
    },

    applyMutations(mutations: LedgerMutation[]): Promise<void> {
      const run = tail.then(() => batchUpdate(mutations));
      tail = run.catch((err: unknown) => {
        logger.debug({ err }, 'Ledger batch failed; continuing with next batch');
      });
      return run;
    },
  };
}
