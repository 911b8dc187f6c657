#!/usr/bin/env node
/**
 * netbox-sync CLI - Reconcile a network inventory file with NetBox
 *
 * Commands:
 * - diff: Show what would change in NetBox
 * - sync: Apply the inventory to NetBox
 */

import { Command, Option } from 'commander';
import type { CommandContext, GlobalOptions } from './types.js';
import { diffCommand, syncCommand } from './commands/index.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';
import { describeSettings, loadSettings, type Settings } from './config/index.js';
import { createClient } from './api/client.js';
import { createLogger } from './api/logger.js';
import { InventoryError } from './inventory/errors.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 * Resolves settings from CLI, env, and the settings file
 */
function createContext(options: GlobalOptions): CommandContext {
  const settings = loadSettings({
    configPath: options.config,
    netboxAddress: options.netboxAddress,
    netboxToken: options.netboxToken,
    importVlans: options.importVlans,
    logLevel: options.verbose ? 'debug' : undefined,
  });

  if (options.verbose) {
    verboseLog(`Settings: ${JSON.stringify(describeSettings(settings))}`, true);
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    settings,
    logger: createLogger({ level: settings.logs.level, json: settings.logs.json }),
    createClient: (resolved: Settings) =>
      createClient({
        baseUrl: resolved.netbox.address,
        token: resolved.netbox.token,
        timeout: resolved.netbox.timeout,
        debug: options.verbose,
      }),
  };
}

function describeError(err: unknown): string {
  if (err instanceof InventoryError && err.issues.length > 0) {
    return `${err.message}\n${err.formatIssues()}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('netbox-sync')
  .description('Reconcile a network inventory file with NetBox')
  .version(VERSION)
  // Global options available to all commands
  .addOption(new Option('--config <path>', 'Settings file (default: ./netbox-sync.yml)'))
  .addOption(new Option('--netbox-address <url>', 'NetBox base URL'))
  .addOption(new Option('--netbox-token <token>', 'NetBox API token'))
  .addOption(
    new Option('--import-vlans <mode>', 'VLAN import mode')
      .choices(['no', 'config', 'cli'])
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * diff command - Show what would change
 */
program
  .command('diff')
  .description('Show the changes sync would make in NetBox')
  .requiredOption('-i, --inventory <file>', 'Inventory YAML file')
  .option('--no-prune', 'Do not plan deletes for objects missing from the inventory')
  .action(async (cmdOpts: { inventory: string; prune: boolean }) => {
    try {
      const ctx = createContext(program.opts<GlobalOptions>());
      const result = await diffCommand(ctx, {
        inventory: cmdOpts.inventory,
        prune: cmdOpts.prune,
      });

      if (ctx.outputFormat === 'json') {
        printResult(result, ctx.outputFormat);
      }

      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Diff failed: ${describeError(err)}`);
      process.exit(1);
    }
  });

/**
 * sync command - Apply changes
 */
program
  .command('sync')
  .description('Apply the inventory to NetBox')
  .requiredOption('-i, --inventory <file>', 'Inventory YAML file')
  .option('--dry-run', 'Show what would happen without making changes', false)
  .option('--no-prune', 'Do not delete objects missing from the inventory')
  .action(async (cmdOpts: { inventory: string; dryRun: boolean; prune: boolean }) => {
    try {
      const ctx = createContext(program.opts<GlobalOptions>());
      const result = await syncCommand(ctx, {
        inventory: cmdOpts.inventory,
        dryRun: cmdOpts.dryRun,
        prune: cmdOpts.prune,
      });

      printResult(result, ctx.outputFormat);

      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Sync failed: ${describeError(err)}`);
      process.exit(1);
    }
  });

// Parse and execute
program.parseAsync().catch((err: unknown) => {
  error(describeError(err));
  process.exit(1);
});
