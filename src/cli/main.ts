#!/usr/bin/env node
import { Command } from 'commander';

import { configOutput, loadConfig, type LoadedConfig } from '../app/config.js';
import { RbwCredentialStore } from '../credentials/rbw.js';
import { createRbwLookup } from '../lookup/plugin.js';

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

async function run(fn: () => Promise<unknown>): Promise<void> {
  try {
    const result = await fn();
    console.log(JSON.stringify(result, null, 2));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const kind = err instanceof Error ? err.name : 'Error';
    console.log(JSON.stringify({ success: false, error: message, kind }, null, 2));
    process.exit(1);
  }
}

async function runWithConfig(fn: (cfg: LoadedConfig) => Promise<unknown>): Promise<void> {
  await run(async () => {
    const opts = program.opts<{ config?: string }>();
    const cfg = await loadConfig(opts.config);
    if (opts.config !== undefined && !cfg.found) {
      console.warn(`Config file ${cfg.configPath} does not exist; using defaults`);
    }
    return fn(cfg);
  });
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('rbw-lookup')
  .description('Resolve credentials from the rbw Bitwarden client')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config file');

// ---------------------------------------------------------------------------
// get
// ---------------------------------------------------------------------------

program
  .command('get <names...>')
  .description('Print the requested field of each named entry as a JSON array')
  .option('--folder <folder>', 'only match entries in this folder')
  .option('--field <field>', 'field to return (default: password)')
  .option('--allow-empty', 'accept an empty value')
  .action(async (names: string[], opts: { folder?: string; field?: string; allowEmpty?: boolean }) => {
    await runWithConfig(async (cfg) => {
      const lookup = createRbwLookup(cfg.config);
      return lookup.run(names, {
        folder: opts.folder,
        field: opts.field,
        allow_empty: opts.allowEmpty,
      });
    });
  });

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

program
  .command('list')
  .description('Print entry names, folders and ids as JSON (no secrets)')
  .action(async () => {
    await runWithConfig(async (cfg) => {
      const store = new RbwCredentialStore({
        cliPath: cfg.config.rbw.cli_path,
        lockedMarkers: cfg.config.rbw.locked_markers,
      });
      return store.listEntries();
    });
  });

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

program
  .command('config')
  .description('Print configuration as JSON')
  .action(async () => {
    await runWithConfig(async (cfg) => configOutput(cfg));
  });

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

await program.parseAsync(process.argv);
