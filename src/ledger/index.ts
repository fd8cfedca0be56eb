import type { Config } from '../utils/config';
import { resolveStateDir } from '../utils/config';
import { join } from 'path';
import type { LedgerStore } from './types';
import { createSheetsLedgerStore } from './sheets-store';
import { createServiceAccountTokenProvider, loadServiceAccount } from './sheets-auth';
import { createSqliteLedgerStore } from './sqlite-store';

export type { LedgerCells, LedgerMutation, AppendMutation, UpdateMutation, LedgerStore } from './types';
export {
  LEDGER_HEADERS,
  ROW_COLORS,
  buildRowCells,
  cellsToValues,
  contactPhone,
  parseLedgerRow,
  isRowColor,
  type RgbColor,
} from './columns';
export { createSqliteLedgerStore, type SqliteLedgerStore, type StoredLedgerRow } from './sqlite-store';
export { createSheetsLedgerStore, buildSheetsRequests, a1Range, type SheetsRequest } from './sheets-store';
export {
  createServiceAccountTokenProvider,
  loadServiceAccount,
  signServiceAccountAssertion,
  SHEETS_SCOPE,
  type AccessTokenProvider,
  type ServiceAccountCredentials,
} from './sheets-auth';

/** Build the configured ledger backend. */
export async function createLedgerStore(config: Config): Promise<LedgerStore> {
  const ledger = config.ledger;
  if (ledger.backend === 'sqlite') {
    return createSqliteLedgerStore({ path: ledger.sqlitePath || join(resolveStateDir(), 'ledger.db') });
  }
  const credentials = loadServiceAccount(ledger.credentialsPath);
  return createSheetsLedgerStore({
    spreadsheetId: ledger.spreadsheetId,
    sheetName: ledger.sheetName,
    sheetId: ledger.sheetId,
    getAccessToken: createServiceAccountTokenProvider(credentials),
  });
}
