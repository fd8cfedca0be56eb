/**
 * Local ledger backed by sql.js, for offline runs and tests.
 *
 * Row indexes mirror a spreadsheet: row 1 would be the header, so the first
 * data row is 2. With a file path the database is loaded from and saved back
 * to disk after every batch.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js';
import type { LedgerRow, RowColor } from '../types';
import { createLogger } from '../utils/logger';
import { isRowColor, parseLedgerRow } from './columns';
import type { LedgerCells, LedgerMutation, LedgerStore } from './types';

const logger = createLogger('ledger-sqlite');

const FIRST_DATA_ROW = 2;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS ledger_rows (
    row_index INTEGER PRIMARY KEY,
    order_id INTEGER NOT NULL UNIQUE,
    stage TEXT NOT NULL DEFAULT '',
    contact_status TEXT NOT NULL DEFAULT '',
    delivery_status TEXT NOT NULL DEFAULT '',
    alert TEXT NOT NULL DEFAULT '',
    order_name TEXT NOT NULL DEFAULT '',
    customer TEXT NOT NULL DEFAULT '',
    phone TEXT NOT NULL DEFAULT '',
    city TEXT NOT NULL DEFAULT '',
    payment TEXT NOT NULL DEFAULT '',
    tracking_url TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL DEFAULT '',
    color TEXT NOT NULL DEFAULT 'White',
    updated_at INTEGER NOT NULL
  );
`;

const CELL_COLUMNS = `order_id, stage, contact_status, delivery_status, alert, order_name, customer, phone, city,
  payment, tracking_url, created_at`;

export interface StoredLedgerRow {
  rowIndex: number;
  cells: LedgerCells;
  color: RowColor;
}

export interface SqliteLedgerStore extends LedgerStore {
  /** Every stored row with all columns and its colour, in row order */
  snapshot(): StoredLedgerRow[];
  close(): void;
}

export interface SqliteLedgerOptions {
  /** Database file; omitted for an in-memory ledger */
  path?: string;
}

function text(value: SqlValue | undefined): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function integer(value: SqlValue | undefined): number {
  return typeof value === 'number' ? value : Number(text(value));
}

function cellParams(cells: LedgerCells): SqlValue[] {
  return [
    cells.orderId,
    cells.stage,
    cells.contactStatus,
    cells.deliveryStatus,
    cells.alert,
    cells.orderName,
    cells.customer,
    cells.phone,
    cells.city,
    cells.payment,
    cells.trackingUrl,
    cells.createdAt,
  ];
}

export async function createSqliteLedgerStore(options: SqliteLedgerOptions = {}): Promise<SqliteLedgerStore> {
  const SQL = await initSqlJs();
  const path = options.path;

  let db: SqlJsDatabase;
  if (path && existsSync(path)) {
    db = new SQL.Database(readFileSync(path));
  } else {
    db = new SQL.Database();
  }
  db.run(SCHEMA_SQL);

  function save(): void {
    if (!path) return;
    const dir = dirname(path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const tmpPath = path + '.tmp';
    writeFileSync(tmpPath, Buffer.from(db.export()));
    renameSync(tmpPath, path);
  }

  function selectRows(sql: string): SqlValue[][] {
    const result = db.exec(sql);
    return result.length > 0 ? result[0].values : [];
  }

  function nextRowIndex(): number {
    const [row] = selectRows('SELECT MAX(row_index) FROM ledger_rows');
    const max = row?.[0];
    return typeof max === 'number' ? max + 1 : FIRST_DATA_ROW;
  }

  function applyOne(mutation: LedgerMutation, now: number): void {
    if (mutation.kind === 'append') {
      db.run(
        `INSERT INTO ledger_rows (row_index, ${CELL_COLUMNS}, color, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [nextRowIndex(), ...cellParams(mutation.cells), mutation.color, now],
      );
      return;
    }

    db.run(
      `UPDATE ledger_rows SET order_id = ?, stage = ?, contact_status = ?, delivery_status = ?, alert = ?,
         order_name = ?, customer = ?, phone = ?, city = ?, payment = ?, tracking_url = ?, created_at = ?,
         color = ?, updated_at = ?
       WHERE row_index = ?`,
      [...cellParams(mutation.cells), mutation.color, now, mutation.rowIndex],
    );
    if (db.getRowsModified() === 0) {
      throw new Error(`Ledger row ${mutation.rowIndex} does not exist (order ${mutation.orderId})`);
    }
  }

  // Batches run one at a time, in submission order
  let tail: Promise<void> = Promise.resolve();

  return {
    name: path ? `sqlite:${path}` : 'sqlite:memory',

    async readRows(): Promise<LedgerRow[]> {
      const rows: LedgerRow[] = [];
      for (const values of selectRows(
        'SELECT row_index, order_id, stage, contact_status, delivery_status, alert FROM ledger_rows ORDER BY row_index',
      )) {
        const row = parseLedgerRow(values.slice(1), integer(values[0]));
        if (row) rows.push(row);
      }
      return rows;
    },

    applyMutations(mutations: LedgerMutation[]): Promise<void> {
      const run = tail.then(() => {
        if (mutations.length === 0) return;
        const now = Date.now();
        db.run('BEGIN');
        try {
          for (const mutation of mutations) applyOne(mutation, now);
          db.run('COMMIT');
        } catch (err) {
          db.run('ROLLBACK');
          throw err;
        }
        save();
        logger.debug({ count: mutations.length }, 'Applied ledger mutations');
      });
      tail = run.catch((err: unknown) => {
        logger.debug({ err }, 'Ledger batch failed; continuing with next batch');
      });
      return run;
    },

    snapshot(): StoredLedgerRow[] {
      return selectRows(`SELECT row_index, ${CELL_COLUMNS}, color FROM ledger_rows ORDER BY row_index`).map((v) => {
        const color = v[13];
        return {
          rowIndex: integer(v[0]),
          cells: {
            orderId: integer(v[1]),
            stage: text(v[2]),
            contactStatus: text(v[3]),
            deliveryStatus: text(v[4]),
            alert: text(v[5]),
            orderName: text(v[6]),
            customer: text(v[7]),
            phone: text(v[8]),
            city: text(v[9]),
            payment: text(v[10]),
            trackingUrl: text(v[11]),
            createdAt: text(v[12]),
          },
          color: isRowColor(color) ? color : 'White',
        };
      });
    },

    close(): void {
      db.close();
    },
  };
}
