#!/usr/bin/env node
/**
 * parcel-ledger CLI
 *
 * Commands:
 * - parcel-ledger sync        - Run one reconciliation pass
 * - parcel-ledger watch       - Repeat passes on an interval
 * - parcel-ledger normalize   - Condense a saved tracking payload
 * - parcel-ledger resolve     - Show the scenario and row labels for an order
 * - parcel-ledger status      - Show configuration readiness
 */

import { readFileSync } from 'fs';
import { resolve as resolvePath } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import type { ContentType, LedgerRow } from '../types';
import { checkSyncReadiness, loadConfig, resolveConfigPath, type Config } from '../utils/config';
import { logger } from '../utils/logger';
import { installHttpClient, configureHttpClient } from '../utils/http';
import { mergeVocabulary, resolveScenario, rowLabelsFor } from '../lifecycle';
import { normalizeContentDetailed } from '../content';
import { createClaudeClassifier } from '../classifier';
import { createShopifyOrderSource, mapShopifyOrder, rawOrderSchema } from '../shopify';
import { createLedgerStore } from '../ledger';
import { createOrderSyncService, type OrderResult, type OrderSyncService, type SyncReport } from '../sync';

const program = new Command();
installHttpClient();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});
process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception');
  process.exit(1);
});

program
  .name('parcel-ledger')
  .description('Keep an order ledger in step with the order lifecycle')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default ~/.parcel-ledger/config.json)');

// ============================================================================
// Helpers
// ============================================================================

function fail(message: string): never {
  console.error(`\n  \x1b[31mError:\x1b[0m ${message}\n`);
  process.exit(1);
}

function parseDateOption(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Not a date: ${value}`);
  }
  return date;
}

function parsePositive(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError(`Not a positive number: ${value}`);
  }
  return n;
}

function readJsonFile(file: string): unknown {
  const path = resolvePath(file);
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    return fail(`Cannot read JSON from ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function loadCliConfig(): Config {
  const opts = program.opts<{ config?: string }>();
  const config = loadConfig(opts.config);
  configureHttpClient(config.http);
  return config;
}

async function buildSyncService(config: Config): Promise<OrderSyncService> {
  const missing = checkSyncReadiness(config);
  if (missing.length > 0) {
    fail(`Missing configuration:\n    ${missing.join('\n    ')}`);
  }

  const store = await createLedgerStore(config);
  return createOrderSyncService({
    source: createShopifyOrderSource(config.shopify),
    store,
    classifier: createClaudeClassifier({
      apiKey: config.classifier.apiKey,
      model: config.classifier.model,
      maxTokens: config.classifier.maxTokens,
    }),
    settings: {
      batchSize: config.sync.batchSize,
      staleAfterHours: config.sync.staleAfterHours,
      transitFollowUpDays: config.sync.transitFollowUpDays,
      lookbackDays: config.sync.lookbackDays,
      vocabulary: mergeVocabulary(config.tags),
      couriers: config.couriers,
      classifierTimeoutMs: config.classifier.timeoutMs,
      classifierMaxAttempts: config.classifier.maxAttempts,
    },
  });
}

const ACTION_COLORS: Record<OrderResult['action'], string> = {
  append: '\x1b[32m',
  update: '\x1b[36m',
  none: '\x1b[90m',
  failed: '\x1b[31m',
};

function printOrderResult(result: OrderResult): void {
  const detail = result.error ?? result.trackingStatus ?? '';
  console.log(
    `  ${ACTION_COLORS[result.action]}${result.action.padEnd(6)}\x1b[0m ${result.orderName.padEnd(10)} ` +
      `${result.scenario ?? '-'}${detail ? ` \x1b[90m(${detail})\x1b[0m` : ''}`,
  );
}

function printReport(report: SyncReport): void {
  console.log(
    `\n  ${report.ordersSeen} order(s): ${report.appended} appended, ${report.updated} updated, ` +
      `${report.unchanged} unchanged, ${report.failed} failed` +
      (report.aborted ? `, \x1b[33maborted\x1b[0m (${report.discarded} discarded)` : '') +
      ` \x1b[90m[${report.durationMs}ms]\x1b[0m\n`,
  );
}

// ============================================================================
// sync - One pass
// ============================================================================
program
  .command('sync')
  .description('Reconcile orders in a date window with the ledger')
  .option('--from <date>', 'Earliest order creation date', parseDateOption)
  .option('--to <date>', 'Latest order creation date', parseDateOption)
  .option('--dry-run', 'Print mutations instead of writing them', false)
  .action(async (options: { from?: Date; to?: Date; dryRun: boolean }) => {
    const config = loadCliConfig();
    const service = await buildSyncService(config);

    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('Interrupted; discarding unwritten changes');
      controller.abort();
    });

    console.log(`\n\x1b[1mparcel-ledger sync\x1b[0m${options.dryRun ? ' \x1b[33m(dry run)\x1b[0m' : ''}\n`);
    const report = await service.runPass({
      from: options.from,
      to: options.to,
      dryRun: options.dryRun,
      signal: controller.signal,
      onOrder: printOrderResult,
    });

    if (options.dryRun && report.mutations.length > 0) {
      console.log('\n  Mutations:');
      console.log(JSON.stringify(report.mutations, null, 2));
    }
    printReport(report);
    if (report.aborted) process.exitCode = 130;
  });

// ============================================================================
// watch - Repeated passes
// ============================================================================
program
  .command('watch')
  .description('Run a sync pass now and then every interval')
  .option('-i, --interval <minutes>', 'Minutes between passes', parsePositive)
  .action(async (options: { interval?: number }) => {
    const config = loadCliConfig();
    const service = await buildSyncService(config);
    const intervalMinutes = options.interval ?? config.sync.watchIntervalMinutes;

    const watcher = service.watch({ intervalMinutes, onReport: printReport });

    let shuttingDown = false;
    const shutdown = async () => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info('Stopping after the current pass...');
      try {
        await watcher.stop();
      } catch (e) {
        logger.error({ err: e }, 'Shutdown error');
      }
      process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });

// ============================================================================
// normalize - Condense a tracking payload
// ============================================================================
const CONTENT_TYPES: readonly ContentType[] = ['JSON', 'XML', 'HTML', 'PlainText', 'Unknown'];

function parseContentType(value: string): ContentType {
  const match = CONTENT_TYPES.find((type) => type.toLowerCase() === value.toLowerCase());
  if (!match) {
    throw new InvalidArgumentError(`Expected one of ${CONTENT_TYPES.join(', ')}`);
  }
  return match;
}

program
  .command('normalize')
  .argument('<file>', 'Saved tracking response (JSON, XML, HTML or text)')
  .description('Print the detected content type and the condensed text sent for classification')
  .option('-t, --type <type>', 'Skip detection and treat the file as this type', parseContentType)
  .action((file: string, options: { type?: ContentType }) => {
    const path = resolvePath(file);
    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (err) {
      return fail(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const result = normalizeContentDetailed(raw, options.type);
    console.log(`\n  Type:     ${result.type}`);
    console.log(`  Strategy: ${result.strategy ?? '-'}`);
    console.log(`  Length:   ${result.text.length}\n`);
    console.log(result.text);
    console.log('');
  });

// ============================================================================
// resolve - Scenario for one order
// ============================================================================
const rowFileSchema = z.object({
  rowIndex: z.number().int().positive().default(2),
  orderId: z.number().int(),
  stage: z.string().default(''),
  contactStatus: z.string().default(''),
  deliveryStatus: z.string().default(''),
  alert: z.string().default(''),
});

program
  .command('resolve')
  .argument('<orderJson>', 'Order as returned by the Shopify Admin API')
  .description('Show which scenario an order is in and the row it would get')
  .option('-r, --row <rowJson>', 'Existing ledger row for the order')
  .option('--now <date>', 'Evaluate as of this time', parseDateOption)
  .action((orderFile: string, options: { row?: string; now?: Date }) => {
    const config = loadCliConfig();

    const rawOrder = rawOrderSchema.safeParse(readJsonFile(orderFile));
    if (!rawOrder.success) {
      return fail(`Not a Shopify order: ${rawOrder.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    const order = mapShopifyOrder(rawOrder.data);

    let row: LedgerRow | undefined;
    if (options.row) {
      const parsed = rowFileSchema.safeParse(readJsonFile(options.row));
      if (!parsed.success) {
        return fail(`Not a ledger row: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
      }
      row = parsed.data;
    }

    const now = options.now?.getTime() ?? Date.now();
    const scenario = resolveScenario(order, row, {
      now,
      vocabulary: mergeVocabulary(config.tags),
      staleAfterHours: config.sync.staleAfterHours,
    });
    const labels = rowLabelsFor(scenario, order, row, undefined, {
      now,
      transitFollowUpDays: config.sync.transitFollowUpDays,
    });

    console.log(`\n  Order:    ${order.name} (${order.id})`);
    console.log(`  Scenario: \x1b[1m${scenario}\x1b[0m`);
    if (scenario === 'TrackParcel') {
      console.log('  \x1b[90mDelivery status and alert come from tracking classification during sync\x1b[0m');
    }
    console.log(labels ? `\n${JSON.stringify(labels, null, 2)}\n` : '\n  No ledger change\n');
  });

// ============================================================================
// status - Configuration readiness
// ============================================================================
program
  .command('status')
  .description('Show configuration readiness')
  .action(() => {
    const config = loadCliConfig();
    const missing = checkSyncReadiness(config);
    const mark = (ok: boolean) => (ok ? '\x1b[32m✓\x1b[0m' : '\x1b[31m✗\x1b[0m');

    console.log('\n\x1b[1mparcel-ledger status\x1b[0m\n');
    console.log(`  Config:     ${program.opts<{ config?: string }>().config ?? resolveConfigPath()}`);
    console.log(`  ${mark(Boolean(config.shopify.shopDomain && config.shopify.accessToken))} Shopify     ${config.shopify.shopDomain || 'not set'}`);
    console.log(
      `  ${mark(config.ledger.backend === 'sqlite' || Boolean(config.ledger.spreadsheetId && config.ledger.credentialsPath))} Ledger      ${config.ledger.backend}`,
    );
    console.log(`  ${mark(Boolean(config.classifier.apiKey))} Classifier  ${config.classifier.model}`);

    const couriers = config.couriers.filter((courier) => courier.enabled);
    console.log(`\n  Courier APIs: ${couriers.length > 0 ? couriers.map((c) => c.name).join(', ') : 'none'}`);

    if (missing.length > 0) {
      console.log('\n  Missing:');
      for (const item of missing) console.log(`    \x1b[90m○\x1b[0m ${item}`);
      console.log('');
      process.exitCode = 1;
    } else {
      console.log('\n  \x1b[32mReady to sync\x1b[0m\n');
    }
  });

program.parseAsync().catch((err: unknown) => {
  fail(err instanceof Error ? err.message : String(err));
});
