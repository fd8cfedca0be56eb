import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { generateKeyPairSync } from 'crypto';
import jwt from 'jsonwebtoken';
import type { Order } from '../types';
import { buildRowCells, contactPhone, parseLedgerRow, cellsToValues } from './columns';
import { createSqliteLedgerStore, type SqliteLedgerStore } from './sqlite-store';
import { a1Range, buildSheetsRequests, createSheetsLedgerStore } from './sheets-store';
import { createServiceAccountTokenProvider, signServiceAccountAssertion } from './sheets-auth';
import type { LedgerCells, LedgerMutation } from './types';

// =============================================================================
// Fixtures
// =============================================================================

function makeOrder(overrides: Partial<Order> = {}): Order {
  return {
    id: 1001,
    name: '#1001',
    createdAt: new Date('2025-01-08T10:00:00.000Z'),
    tags: '',
    fulfillmentStatus: 'unfulfilled',
    fulfillments: [{ trackingUrl: 'https://courier.test/t/AB123456' }],
    financialStatus: 'paid',
    customerName: 'Test Buyer',
    shippingCity: 'Springfield',
    noteAttributes: [],
    ...overrides,
  };
}

const LABELS = {
  stage: 'New Order',
  contactStatus: 'Pending',
  deliveryStatus: 'Not Shipped',
  alert: '',
  color: 'White' as const,
};

function cellsFor(orderId: number, stage = 'New Order'): LedgerCells {
  return buildRowCells(makeOrder({ id: orderId, name: `#${orderId}` }), { ...LABELS, stage });
}

// =============================================================================
// Columns
// =============================================================================

describe('columns', () => {
  it('builds a full row from the order and labels', () => {
    const cells = buildRowCells(makeOrder({ customerPhone: '+10000000001' }), LABELS);
    expect(cellsToValues(cells)).toEqual([
      1001,
      'New Order',
      'Pending',
      'Not Shipped',
      '',
      '#1001',
      'Test Buyer',
      '+10000000001',
      'Springfield',
      'paid',
      'https://courier.test/t/AB123456',
      '2025-01-08T10:00:00.000Z',
    ]);
  });

  it('picks the contact phone from customer, billing, then note attributes', () => {
    expect(contactPhone(makeOrder({ customerPhone: '+1', billingPhone: '+2' }))).toBe('+1');
    expect(contactPhone(makeOrder({ billingPhone: '+2' }))).toBe('+2');
    expect(contactPhone(makeOrder({ noteAttributes: [{ name: 'WhatsApp Number', value: ' +3 ' }] }))).toBe('+3');
    expect(contactPhone(makeOrder())).toBe('');
  });

  it('parses rows with an integer order id only', () => {
    expect(parseLedgerRow(['1001', 'Stage', 'Contact', 'Delivered', 'Alert'], 5)).toEqual({
      rowIndex: 5,
      orderId: 1001,
      stage: 'Stage',
      contactStatus: 'Contact',
      deliveryStatus: 'Delivered',
      alert: 'Alert',
    });
    expect(parseLedgerRow([1002], 6)).toEqual({
      rowIndex: 6,
      orderId: 1002,
      stage: '',
      contactStatus: '',
      deliveryStatus: '',
      alert: '',
    });
    expect(parseLedgerRow(['Order ID', 'Stage'], 1)).toBeNull();
    expect(parseLedgerRow(['12.5'], 7)).toBeNull();
    expect(parseLedgerRow([], 8)).toBeNull();
  });
});

// =============================================================================
// SQLite store
// =============================================================================

describe('sqlite ledger store', () => {
  let store: SqliteLedgerStore;

  beforeEach(async () => {
    store = await createSqliteLedgerStore();
  });

  afterEach(() => {
    store.close();
  });

  it('appends rows starting at row 2 in order', async () => {
    await store.applyMutations([
      { kind: 'append', orderId: 1, cells: cellsFor(1), color: 'White' },
      { kind: 'append', orderId: 2, cells: cellsFor(2), color: 'Yellow' },
    ]);

    const rows = await store.readRows();
    expect(rows.map((row) => [row.rowIndex, row.orderId])).toEqual([
      [2, 1],
      [3, 2],
    ]);
    expect(store.snapshot()[1].color).toBe('Yellow');
  });

  it('rewrites the whole row and colour on update', async () => {
    await store.applyMutations([{ kind: 'append', orderId: 1, cells: cellsFor(1), color: 'White' }]);
    await store.applyMutations([
      { kind: 'update', rowIndex: 2, orderId: 1, cells: { ...cellsFor(1, 'Cancelled'), alert: 'x' }, color: 'Grey' },
    ]);

    const [stored] = store.snapshot();
    expect(stored.rowIndex).toBe(2);
    expect(stored.cells.stage).toBe('Cancelled');
    expect(stored.cells.alert).toBe('x');
    expect(stored.color).toBe('Grey');
  });

  it('rolls back a batch that updates a missing row', async () => {
    await expect(
      store.applyMutations([
        { kind: 'append', orderId: 1, cells: cellsFor(1), color: 'White' },
        { kind: 'update', rowIndex: 9, orderId: 7, cells: cellsFor(7), color: 'Red' },
      ]),
    ).rejects.toThrow('Ledger row 9 does not exist (order 7)');
    expect(await store.readRows()).toEqual([]);
  });

  it('serialises concurrent batches', async () => {
    const first = store.applyMutations([{ kind: 'append', orderId: 1, cells: cellsFor(1), color: 'White' }]);
    const second = store.applyMutations([{ kind: 'append', orderId: 2, cells: cellsFor(2), color: 'White' }]);
    await Promise.all([first, second]);
    expect((await store.readRows()).map((row) => row.orderId)).toEqual([1, 2]);
  });
});

// =============================================================================
// Sheets store
// =============================================================================

describe('sheets ledger store', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('quotes sheet names that need it', () => {
    expect(a1Range('Sheet1', 'A2:L')).toBe('Sheet1!A2:L');
    expect(a1Range("Bob's Orders", 'A2:L')).toBe("'Bob''s Orders'!A2:L");
  });

  it('builds appendCells and full-row updateCells requests', () => {
    const mutations: LedgerMutation[] = [
      { kind: 'append', orderId: 1, cells: cellsFor(1), color: 'White' },
      { kind: 'update', rowIndex: 4, orderId: 2, cells: cellsFor(2), color: 'Orange' },
    ];
    const [append, update] = buildSheetsRequests(mutations, 7);

    if (!('appendCells' in append)) throw new Error('expected appendCells');
    expect(append.appendCells.fields).toBe('*');
    expect(append.appendCells.sheetId).toBe(7);
    expect(append.appendCells.rows[0].values[0].userEnteredValue).toEqual({ numberValue: 1 });
    expect(append.appendCells.rows[0].values).toHaveLength(12);

    if (!('updateCells' in update)) throw new Error('expected updateCells');
    expect(update.updateCells.range).toEqual({
      sheetId: 7,
      startRowIndex: 3,
      endRowIndex: 4,
      startColumnIndex: 0,
      endColumnIndex: 12,
    });
    expect(update.updateCells.fields).toBe('userEnteredValue,userEnteredFormat.backgroundColor');
    expect(update.updateCells.rows[0].values[1].userEnteredFormat.backgroundColor).toEqual({
      red: 1,
      green: 0.85,
      blue: 0.6,
    });
  });

  it('reads rows from values.get, skipping non-numeric ids', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ values: [['1001', 'New Order', 'Pending', 'Not Shipped', ''], ['notes'], ['1002']] }), {
        status: 200,
      }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const store = createSheetsLedgerStore({ spreadsheetId: 'sheet-123', getAccessToken: async () => 'test-token' });
    const rows = await store.readRows();

    expect(rows.map((row) => [row.rowIndex, row.orderId])).toEqual([
      [2, 1001],
      [4, 1002],
    ]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://sheets.googleapis.com/v4/spreadsheets/sheet-123/values/Sheet1%21A2%3AL');
    expect(init.headers.Authorization).toBe('Bearer test-token');
  });

  it('posts one batchUpdate per batch', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const store = createSheetsLedgerStore({ spreadsheetId: 'sheet-123', getAccessToken: async () => 'test-token' });
    await store.applyMutations([{ kind: 'append', orderId: 1, cells: cellsFor(1), color: 'Green' }]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://sheets.googleapis.com/v4/spreadsheets/sheet-123:batchUpdate');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body).requests).toHaveLength(1);
  });

  it('does not retry a rejected batch', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('bad', { status: 500 }));
    vi.stubGlobal('fetch', fetchMock);

    const store = createSheetsLedgerStore({ spreadsheetId: 'sheet-123', getAccessToken: async () => 'test-token' });
    await expect(
      store.applyMutations([{ kind: 'append', orderId: 1, cells: cellsFor(1), color: 'Green' }]),
    ).rejects.toThrow('Sheets batchUpdate failed (500): bad');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

// =============================================================================
// Service-account auth
// =============================================================================

describe('service account auth', () => {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    publicKeyEncoding: { type: 'spki', format: 'pem' },
  });
  const credentials = {
    client_email: 'ledger@test-project.iam.gserviceaccount.com',
    private_key: privateKey,
    token_uri: 'https://oauth2.test/token',
  };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('signs an RS256 assertion for the token endpoint', () => {
    const assertion = signServiceAccountAssertion(credentials, 'scope-a', 1_700_000_000_000);
    const claims = jwt.verify(assertion, publicKey, { algorithms: ['RS256'], ignoreExpiration: true });
    expect(claims).toMatchObject({
      iss: credentials.client_email,
      scope: 'scope-a',
      aud: 'https://oauth2.test/token',
      iat: 1_700_000_000,
      exp: 1_700_003_600,
    });
  });

  it('caches the access token until it nears expiry', async () => {
    const fetchMock = vi
      .fn()
      .mockImplementation(async () =>
        new Response(JSON.stringify({ access_token: 'test-token', expires_in: 3600 }), { status: 200 }),
      );
    vi.stubGlobal('fetch', fetchMock);

    const getToken = createServiceAccountTokenProvider(credentials);
    expect(await getToken()).toBe('test-token');
    expect(await getToken()).toBe('test-token');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://oauth2.test/token');
    expect(new URLSearchParams(init.body).get('grant_type')).toBe('urn:ietf:params:oauth:grant-type:jwt-bearer');
  });
});
