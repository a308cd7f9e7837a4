#!/usr/bin/env node
/**
 * doccat command line
 *
 * Usage:
 *   doccat provision          - Create the extended schema and missing extended tables
 *   doccat install            - Create merge views, triggers and aliases
 *   doccat uninstall          - Drop every overlay object
 *   doccat export [--apply]   - Print (or execute) native COMMENT ON statements
 *   doccat import             - Replace extended comments with the native ones
 *   doccat status             - Show how each catalog relation is exposed
 */

import 'dotenv/config';

import { getCatalogSettings } from './config.js';
import { closePool } from './database/client.js';
import { getCatalogDatabase } from './database/pg-catalog.js';
import { install } from './orchestrator/install.js';
import { provision } from './orchestrator/provision.js';
import { describeOverlay, readableSchema } from './orchestrator/status.js';
import { TEARDOWN_ORDER, uninstall } from './orchestrator/uninstall.js';
import { applyExport, exportStatements } from './sync/export.js';
import { importFromNative } from './sync/import.js';

const USAGE = 'Usage: doccat <provision|install|uninstall|export [--apply]|import|status>';

async function run(command: string | undefined, flags: string[]): Promise<number> {
  const settings = getCatalogSettings();
  const db = getCatalogDatabase();

  switch (command) {
    case 'provision': {
      const report = await provision(db, settings);
      console.log(`Created: ${report.created.join(', ') || 'none'}`);
      console.log(`Already present: ${report.skipped.join(', ') || 'none'}`);
      return 0;
    }

    case 'install': {
      const report = await install(db, settings);
      console.log(`Merged: ${report.merged.join(', ') || 'none'}`);
      console.log(`Aliased: ${report.aliased.length} relation(s)`);
      return 0;
    }

    case 'uninstall': {
      const report = await uninstall(db, settings);
      for (const group of TEARDOWN_ORDER) {
        console.log(`${group}: ${report.dropped[group].length}`);
      }
      return 0;
    }

    case 'export': {
      if (flags.includes('--apply')) {
        const summary = await applyExport(db, settings);
        console.log(`Applied ${summary.applied} statement(s), ${summary.truncated} truncated`);
        return 0;
      }
      for await (const exported of exportStatements(db, settings)) {
        console.log(`${exported.sql};`);
      }
      return 0;
    }

    case 'import': {
      const report = await importFromNative(db, settings);
      for (const kind of report.kinds) {
        console.log(`${kind.table}: ${kind.rows}`);
      }
      return 0;
    }

    case 'status': {
      const status = await describeOverlay(db, settings);
      console.log(`Readers should query: ${await readableSchema(db, settings)}`);
      for (const relation of status.relations) {
        console.log(`${relation.name.padEnd(20)} ${relation.mode.padEnd(8)} ${relation.extended ? 'extended' : ''}`.trimEnd());
      }
      return 0;
    }

    default:
      console.error(USAGE);
      return 2;
  }
}

async function main(): Promise<void> {
  const [command, ...flags] = process.argv.slice(2);

  try {
    process.exitCode = await run(command, flags);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
