import { RawAssetHandle } from '../../lib/media-types';
import { logger } from '../../utils/logger';

/**
 * Keep assets whose title contains any search term, or the whole original
 * query, as a case-insensitive substring. No (non-blank) terms means no filtering.
 */
export function filterByTerms(
  assets: readonly RawAssetHandle[],
  terms: readonly string[],
  originalQuery: string
): RawAssetHandle[] {
  // Blank terms would match every title
  const needles = terms.map((term) => term.toLowerCase()).filter((term) => term.trim().length > 0);
  if (needles.length === 0) return [...assets];

  const phrase = originalQuery.toLowerCase().trim();

  const matches = assets.filter((asset) => {
    const title = asset.title?.toLowerCase() ?? '';
    return needles.some((term) => title.includes(term)) || (phrase.length > 0 && title.includes(phrase));
  });

  logger.debug(
    `Term filter kept ${matches.length}/${assets.length} assets matching [${terms.join(', ')}] or "${originalQuery}"`
  );

  return matches;
}
