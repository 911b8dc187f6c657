/**
 * sync command - Apply the inventory to NetBox
 *
 * Loads the inventory and NetBox's current state, plans the changes and
 * applies them in dependency order. With --dry-run the plan is recorded
 * without calling NetBox.
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ApplyResult, ApplySummary } from '../sync/types.js';
import { applyPlan } from '../sync/runner.js';
import {
  dryRunNotice,
  header,
  printRecords,
  printSummary,
  verbose,
  warn,
} from '../utils/output.js';
import { openSession } from './session.js';

export interface SyncOptions {
  /** Inventory file path */
  inventory: string;
  /** Plan and report without calling NetBox */
  dryRun?: boolean;
  /** Apply deletes (default: true) */
  prune?: boolean;
}

export interface SyncCommandResult {
  summary: ApplySummary;
  dryRun: boolean;
  records: Array<{
    intent: string;
    status: string;
    reason?: string;
    message?: string;
  }>;
}

function toData(result: ApplyResult): SyncCommandResult {
  return {
    summary: result.summary,
    dryRun: result.dryRun,
    records: result.records.map((record) => ({
      intent: record.intent.id,
      status: record.status,
      reason: record.reason,
      message: record.message,
    })),
  };
}

/**
 * Execute the sync command
 */
export async function syncCommand(
  ctx: CommandContext,
  options: SyncOptions
): Promise<CommandResult<SyncCommandResult>> {
  const { outputFormat } = ctx;
  const dryRun = options.dryRun ?? false;

  verbose(`Executing sync command`, ctx.options.verbose);

  if (outputFormat === 'human') {
    header('Inventory Sync');
    if (dryRun) dryRunNotice();
  }

  const { context, plan } = await openSession(ctx, options);

  if (outputFormat === 'human') {
    for (const entry of plan.missing) {
      warn(entry.message);
    }
  }

  const result = await applyPlan(context, plan, { dryRun });

  if (outputFormat === 'human') {
    printRecords(result.records);
    printSummary(result.summary);
  }

  const failures = result.records.filter((record) => record.status === 'failed');
  const { created, updated, deleted, skipped } = result.summary;

  return {
    success: failures.length === 0,
    message: dryRun
      ? `Dry run: ${plan.intents.length} change(s) planned`
      : failures.length > 0
        ? `Sync finished with ${failures.length} failure(s)`
        : `Sync complete: ${created} created, ${updated} updated, ${deleted} deleted, ${skipped} skipped`,
    data: toData(result),
    errors: failures.length > 0
      ? failures.map((record) => `${record.intent.id}: ${record.message ?? 'failed'}`)
      : undefined,
  };
}
