/**
 * File birthprints: creation time, size and filename, used to recognise a
 * file that has moved or been renamed
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { CandidateRecord, MediaBirthprint } from '../../lib/media-types';

export const BIRTHPRINT_SIZE_WEIGHT = 0.4;
const TIME_WEIGHT = 0.3;
const NAME_WEIGHT = 0.3;

/**
 * Similarity between two birthprints in [0, 1]
 */
export function birthprintSimilarity(a: MediaBirthprint, b: MediaBirthprint): number {
  return Math.min(1, Math.max(0, partialSimilarity(a, b) + (a.fileSizeBytes === b.fileSizeBytes ? BIRTHPRINT_SIZE_WEIGHT : 0)));
}

/**
 * Time and filename contribution only; the size term needs a stat, so callers
 * can skip it when this plus BIRTHPRINT_SIZE_WEIGHT cannot reach their threshold
 */
export function partialSimilarity(
  a: Pick<MediaBirthprint, 'creationTime' | 'filename'>,
  b: Pick<MediaBirthprint, 'creationTime' | 'filename'>
): number {
  let score = 0;

  const timeDiffSeconds = Math.abs(a.creationTime.getTime() - b.creationTime.getTime()) / 1000;
  if (timeDiffSeconds <= 1) score += TIME_WEIGHT;
  else if (timeDiffSeconds <= 5) score += TIME_WEIGHT / 2;

  score += filenameSimilarity(a.filename, b.filename) * NAME_WEIGHT;
  return score;
}

export function filenameSimilarity(a: string, b: string): number {
  if (a === b) return 1;

  const aLower = a.toLowerCase();
  const bLower = b.toLowerCase();

  // One name embeds the other, e.g. "IMG_1.jpg" -> "Copy of IMG_1.jpg"
  if (aLower.includes(bLower) || bLower.includes(aLower)) return 0.8;

  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1;

  return 1 - levenshteinDistance(aLower, bLower) / maxLen;
}

export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Birthprint of a previously resolved candidate
 */
export function birthprintOf(record: CandidateRecord): MediaBirthprint {
  return {
    creationTime: record.deviceMetadata.creationTime,
    fileSizeBytes: record.deviceMetadata.fileSizeBytes,
    filename: filenameFromUri(record.fileUri) ?? record.id,
  };
}

/**
 * Local path for a file:// URL or an absolute path; null for anything else
 */
export function uriToPath(uri: string): string | null {
  const trimmed = uri.trim();
  if (trimmed.length === 0) return null;

  if (trimmed.startsWith('file:')) {
    try {
      const filePath = fileURLToPath(trimmed);
      return filePath.length > 1 ? filePath : null;
    } catch {
      return null;
    }
  }

  return path.isAbsolute(trimmed) ? trimmed : null;
}

export function filenameFromUri(uri: string): string | null {
  const filePath = uriToPath(uri);
  if (filePath === null) return null;
  const name = path.basename(filePath);
  return name.length > 0 ? name : null;
}
