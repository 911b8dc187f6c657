/**
 * Shared setup for commands that compare an inventory with NetBox
 */

import type { CommandContext } from '../types.js';
import { SettingsError } from '../config/settings.js';
import { ReconciliationContext } from '../context/context.js';
import { loadInventory } from '../inventory/loader.js';
import type { InventorySnapshot } from '../inventory/types.js';
import { loadRemoteInventory } from '../sync/remote.js';
import { diffInventories } from '../sync/diff.js';
import type { SyncPlan } from '../sync/types.js';
import { verbose } from '../utils/output.js';

export interface SessionOptions {
  /** Inventory file path */
  inventory: string;
  /** Plan deletes for what the inventory does not list (default: true) */
  prune?: boolean;
}

export interface Session {
  desired: InventorySnapshot;
  context: ReconciliationContext;
  plan: SyncPlan;
}

/**
 * Load the inventory, load NetBox's state for its sites, and diff them
 */
export async function openSession(ctx: CommandContext, options: SessionOptions): Promise<Session> {
  if (!ctx.settings.netbox.address) {
    throw new SettingsError(
      'NetBox address is not configured. Set netbox.address in netbox-sync.yml, NETBOX_ADDRESS, or --netbox-address'
    );
  }

  const desired = await loadInventory(options.inventory);
  verbose(
    `Loaded ${desired.store.count()} entities from ${desired.source} (${desired.warnings.length} warning(s))`,
    ctx.options.verbose
  );
  for (const warning of desired.warnings) {
    ctx.logger.warn(warning.message, { path: warning.path, code: warning.code });
  }

  const context = new ReconciliationContext({
    client: ctx.createClient(ctx.settings),
    settings: ctx.settings,
    logger: ctx.logger,
  });

  const siteNames = desired.store.getAll('site').map((site) => site.ids.name);
  const remote = await loadRemoteInventory(context, siteNames);
  verbose(
    `Loaded ${remote.sites.length} site(s) from NetBox, ${remote.missingSites.length} missing`,
    ctx.options.verbose
  );

  const plan = diffInventories(desired, context, { prune: options.prune });
  return { desired, context, plan };
}
