/**
 * Prefix creation
 */

import type { ReconciliationContext } from '../../context/context.js';
import type { Prefix, PrefixAttrs, PrefixIds } from '../../models/types.js';
import type { PrefixStatus } from '../../api/types.js';
import { makePrefix, materialize, remoteIdOf } from '../../models/entities.js';
import { applied, skipped, type ApplyOutcome } from '../types.js';

export const DEFAULT_PREFIX_STATUS: PrefixStatus = 'active';

/**
 * Create a prefix in its site
 *
 * @throws DependencyError when the site has no remote identifier
 */
export async function createPrefix(
  ctx: ReconciliationContext,
  ids: PrefixIds,
  attrs: PrefixAttrs
): Promise<ApplyOutcome<Prefix>> {
  const existing = ctx.getPrefix(ids.siteName, ids.prefix);
  if (existing && remoteIdOf(existing) !== undefined) {
    return skipped(
      'already-exists',
      `Prefix ${ids.prefix} already exists in site ${ids.siteName}`,
      existing
    );
  }

  const { remoteId: siteId } = ctx.requireSite(ids.siteName);
  const status = attrs.status ?? DEFAULT_PREFIX_STATUS;

  const remote = await ctx.client.prefixes.create({ prefix: ids.prefix, site: siteId, status });

  const entity = existing ?? ctx.add(makePrefix(ids));
  entity.attrs = { ...attrs, status };
  materialize(entity, remote.id);

  ctx.logger.info('Created prefix', { prefix: ids.prefix, site: ids.siteName, id: remote.id });
  return applied(entity);
}
