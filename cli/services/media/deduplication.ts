/**
 * Asset deduplication service
 * Collapses overlapping album enumerations into one entry per asset id
 */

import { RawAssetHandle } from '../../lib/media-types';
import { logger } from '../../utils/logger';

/**
 * Newest first; ties keep their input order (Array.prototype.sort is stable)
 */
export function compareByCreationTimeDesc(a: RawAssetHandle, b: RawAssetHandle): number {
  return b.creationTime.getTime() - a.creationTime.getTime();
}

/**
 * Deduplicate assets by id and re-sort by creation time descending.
 * Copies of one id carry identical snapshots, so which copy survives does not
 * matter; the first one seen is kept.
 */
export function deduplicateAssets(assets: readonly RawAssetHandle[]): RawAssetHandle[] {
  const seen = new Map<string, RawAssetHandle>();

  for (const asset of assets) {
    if (!seen.has(asset.id)) {
      seen.set(asset.id, asset);
    }
  }

  const deduplicated = Array.from(seen.values()).sort(compareByCreationTimeDesc);
  const removedCount = assets.length - deduplicated.length;

  if (removedCount > 0) {
    logger.debug(`Deduplicated ${removedCount} assets (${assets.length} → ${deduplicated.length})`);
  }

  return deduplicated;
}
