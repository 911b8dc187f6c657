/**
 * diff command - Show what sync would change in NetBox
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { MissingEntry, SyncIntent } from '../sync/types.js';
import { header, info, printPlan, verbose } from '../utils/output.js';
import { openSession } from './session.js';

export interface DiffOptions {
  /** Inventory file path */
  inventory: string;
  /** Include deletes (default: true) */
  prune?: boolean;
}

export interface DiffResult {
  intents: Array<Pick<SyncIntent, 'id' | 'action' | 'kind' | 'description' | 'changes' | 'dependsOn'>>;
  missing: MissingEntry[];
}

/**
 * Execute the diff command
 */
export async function diffCommand(
  ctx: CommandContext,
  options: DiffOptions
): Promise<CommandResult<DiffResult>> {
  const { outputFormat } = ctx;

  verbose(`Executing diff command`, ctx.options.verbose);

  if (outputFormat === 'human') {
    header('Inventory Diff');
    info(`Comparing ${options.inventory} with NetBox...`);
  }

  const { plan } = await openSession(ctx, options);

  if (outputFormat === 'human') {
    printPlan(plan.intents, plan.missing);
  }

  const result: DiffResult = {
    intents: plan.intents.map(({ id, action, kind, description, changes, dependsOn }) => ({
      id,
      action,
      kind,
      description,
      changes,
      dependsOn,
    })),
    missing: plan.missing,
  };

  return {
    success: true,
    message:
      plan.intents.length === 0
        ? 'No differences found'
        : `Found ${plan.intents.length} difference(s)`,
    data: result,
  };
}
