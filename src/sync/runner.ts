/**
 * Plan runner
 *
 * Applies intents one at a time, in plan order. A skipped or failed
 * intent never stops the run, but intents that depend on it are not
 * attempted.
 */

import type { ReconciliationContext } from '../context/context.js';
import { DependencyError } from '../errors/index.js';
import { interfaceUid } from '../models/entities.js';
import { createCable, deleteCable } from '../reconcilers/cables/apply.js';
import { createInterface, deleteInterface, updateInterface } from '../reconcilers/interfaces/apply.js';
import { createIpAddress, deleteIpAddress } from '../reconcilers/ip-addresses/apply.js';
import { createPrefix } from '../reconcilers/prefixes/apply.js';
import type { ApplyOutcome } from '../reconcilers/types.js';
import { createVlan, updateVlan } from '../reconcilers/vlans/apply.js';
import type {
  ApplyOptions,
  ApplyRecord,
  ApplyResult,
  ApplySummary,
  SyncIntent,
  SyncPlan,
} from './types.js';

function unsupported(intent: SyncIntent): Error {
  return new Error(`Unsupported intent: ${intent.action} ${intent.kind}`);
}

function missingEntity(intent: SyncIntent, uid: string): DependencyError {
  return new DependencyError(`Unable to ${intent.action} ${intent.description}: not present in context`, {
    kind: intent.kind,
    uid,
  });
}

/**
 * Dispatch one intent to its apply operation
 */
export async function applyIntent(
  ctx: ReconciliationContext,
  intent: SyncIntent
): Promise<ApplyOutcome<unknown>> {
  switch (intent.kind) {
    case 'vlan': {
      if (intent.action === 'create') return createVlan(ctx, intent.ids, intent.attrs);
      const vlan = ctx.getVlan(intent.ids.siteName, intent.ids.vid);
      if (!vlan) throw missingEntity(intent, `${intent.ids.siteName}__${intent.ids.vid}`);
      if (intent.action === 'update') return updateVlan(ctx, vlan, intent.attrs);
      throw unsupported(intent);
    }

    case 'interface': {
      if (intent.action === 'create') return createInterface(ctx, intent.ids, intent.attrs);
      const intf = ctx.getInterface(intent.ids.deviceName, intent.ids.name);
      if (!intf) throw missingEntity(intent, interfaceUid(intent.ids.deviceName, intent.ids.name));
      return intent.action === 'update'
        ? updateInterface(ctx, intf, intent.attrs)
        : deleteInterface(ctx, intf);
    }

    case 'ipAddress': {
      if (intent.action === 'create') return createIpAddress(ctx, intent.ids.address, intent.attrs);
      const ip = ctx.getIpAddress(intent.ids.address);
      if (!ip) throw missingEntity(intent, intent.ids.address);
      if (intent.action === 'delete') return deleteIpAddress(ctx, ip);
      throw unsupported(intent);
    }

    case 'prefix':
      if (intent.action === 'create') return createPrefix(ctx, intent.ids, intent.attrs);
      throw unsupported(intent);

    case 'cable': {
      if (intent.action === 'create') return createCable(ctx, intent.ids);
      const cable = ctx.getCable(intent.ids);
      if (!cable) throw missingEntity(intent, intent.description);
      if (intent.action === 'delete') return deleteCable(ctx, cable);
      throw unsupported(intent);
    }

    case 'site':
    case 'device':
      throw unsupported(intent);
  }
}

function emptySummary(): ApplySummary {
  return { created: 0, updated: 0, deleted: 0, unchanged: 0, skipped: 0, failed: 0, planned: 0 };
}

export function summarize(records: ApplyRecord[]): ApplySummary {
  const summary = emptySummary();
  for (const record of records) {
    switch (record.status) {
      case 'applied':
        if (record.intent.action === 'create') summary.created++;
        else if (record.intent.action === 'update') summary.updated++;
        else summary.deleted++;
        break;
      case 'unchanged':
        summary.unchanged++;
        break;
      case 'skipped':
        summary.skipped++;
        break;
      case 'failed':
        summary.failed++;
        break;
      case 'planned':
        summary.planned++;
        break;
    }
  }
  return summary;
}

function toRecord(intent: SyncIntent, outcome: ApplyOutcome<unknown>): ApplyRecord {
  if (outcome.status === 'skipped') {
    return { intent, status: 'skipped', reason: outcome.reason, message: outcome.message };
  }
  return { intent, status: outcome.status };
}

/**
 * A dependency is met when its intent applied, or was skipped because
 * the entity already exists in NetBox
 */
function dependencyMet(record: ApplyRecord | undefined): boolean {
  if (!record) return true;
  if (record.status === 'applied' || record.status === 'unchanged') return true;
  return record.status === 'skipped' && record.reason === 'already-exists';
}

/**
 * Execute a plan against NetBox
 */
export async function applyPlan(
  ctx: ReconciliationContext,
  plan: SyncPlan,
  options: ApplyOptions = {}
): Promise<ApplyResult> {
  const dryRun = options.dryRun ?? false;
  const records: ApplyRecord[] = [];
  const byId = new Map<string, ApplyRecord>();

  for (const intent of plan.intents) {
    let record: ApplyRecord;

    const blocker = intent.dependsOn.find((id) => !dependencyMet(byId.get(id)));
    if (dryRun) {
      record = { intent, status: 'planned' };
    } else if (blocker !== undefined) {
      record = {
        intent,
        status: 'skipped',
        reason: 'dependency-not-applied',
        message: `Not attempted: ${blocker} did not apply`,
      };
      ctx.logger.info(`Skipping ${intent.description}`, { intent: intent.id, blocker });
    } else {
      try {
        record = toRecord(intent, await applyIntent(ctx, intent));
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        record = { intent, status: 'failed', message: err.message, error: err };
        ctx.logger.error(`Failed to ${intent.action} ${intent.description}`, err, { intent: intent.id });
      }
    }

    records.push(record);
    byId.set(intent.id, record);
  }

  const summary = summarize(records);
  ctx.logger.info(dryRun ? 'Dry run complete' : 'Sync complete', { ...summary });
  return { records, summary, dryRun };
}
