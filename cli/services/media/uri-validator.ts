/**
 * URI validation and stale-reference recovery.
 *
 * A reference is valid when it points at a readable, non-empty file of a
 * supported format whose header matches that format. A missing file triggers
 * recovery through the media source, tried in order:
 * 1. the asset the reference was resolved from, looked up by id
 * 2. exact filename match on asset titles
 * 3. filename pattern (one stem extends the other, same extension)
 * 4. birthprint similarity (creation time, size, filename) above a threshold
 *
 * Permission errors, empty files and format problems are reported as-is.
 */

import * as path from 'path';
import { pathToFileURL } from 'url';
import {
  FileSystemProbe,
  MediaBirthprint,
  MediaSource,
  RawAssetHandle,
  RecoveryMethod,
  ValidationBatchResult,
  ValidationFailureReason,
  ValidationResult,
} from '../../lib/media-types';
import { FileAccessError, errorMessage } from '../../lib/types';
import { logger } from '../../utils/logger';
import { AssetScanner } from './asset-scanner';
import {
  BIRTHPRINT_SIZE_WEIGHT,
  birthprintSimilarity,
  filenameFromUri,
  filenameSimilarity,
  partialSimilarity,
  uriToPath,
} from './birthprint';
import { deduplicateAssets } from './deduplication';
import { classify, getExtension, mediaKindOf } from './format-classifier';
import { processInBatches, withTimeout } from './timeout-wrapper';

export const DEFAULT_METADATA_MATCH_THRESHOLD = 0.7;
export const DEFAULT_VALIDATION_TIMEOUT_MS = 10000;

const HEADER_BYTES = 12;
const MIN_PATTERN_STEM_LENGTH = 3;

export interface UriValidatorOptions {
  enableRecovery?: boolean;
  metadataMatchThreshold?: number;
  /** Batch size for validateAll */
  batchSize?: number;
  /** Upper bound for one validation, recovery included */
  validationTimeoutMs?: number;
}

export interface ValidationRequest {
  uri: string;
  reference?: MediaBirthprint;
  /** Media index id of the asset the URI was resolved from */
  assetId?: string;
}

type FileCheck =
  | { ok: true; mimeType: string }
  | { ok: false; reason: ValidationFailureReason; message: string };

interface RecoveredFile {
  filePath: string;
  method: RecoveryMethod;
}

export class UriValidator {
  private enableRecovery: boolean;
  private metadataMatchThreshold: number;
  private batchSize: number;
  private validationTimeoutMs: number;

  constructor(
    private source: MediaSource,
    private files: FileSystemProbe,
    private scanner: AssetScanner,
    options: UriValidatorOptions = {}
  ) {
    this.enableRecovery = options.enableRecovery ?? true;
    this.metadataMatchThreshold = options.metadataMatchThreshold ?? DEFAULT_METADATA_MATCH_THRESHOLD;
    this.batchSize = options.batchSize ?? 5;
    this.validationTimeoutMs = options.validationTimeoutMs ?? DEFAULT_VALIDATION_TIMEOUT_MS;
  }

  /**
   * Validate a file reference, recovering it through the media index when the
   * file has gone missing. Never throws.
   */
  async validate(uri: string, reference?: MediaBirthprint, assetId?: string): Promise<ValidationResult> {
    const filePath = uriToPath(uri);

    if (filePath !== null) {
      const check = await this.checkFile(filePath);
      if (check.ok) {
        return validResult(uri, uri, 'none');
      }
      if (check.reason !== 'NotFound') {
        logger.debug(`Media reference ${uri} is not usable: ${check.message}`);
        return failedResult(uri, check.reason, check.message, 'none');
      }
      logger.debug(`Media file does not exist: ${uri}`);
    } else {
      logger.debug(`Malformed media reference: ${uri}`);
    }

    if (!this.enableRecovery) {
      return failedResult(uri, 'NotFound', 'File not found', 'none');
    }

    const filename = filenameFromUri(uri) ?? reference?.filename ?? null;
    if (filename === null && assetId === undefined) {
      return failedResult(uri, 'NotFound', 'Reference has no filename to recover from');
    }

    let recovered: RecoveredFile | null;
    try {
      recovered = await this.recover(filename, reference, assetId);
    } catch (error) {
      logger.warn(`Recovery for ${uri} failed: ${errorMessage(error)}`);
      recovered = null;
    }

    if (recovered === null) {
      return failedResult(uri, 'NotFound', 'File not found and no matching asset in the media index');
    }

    const recheck = await this.checkFile(recovered.filePath);
    if (!recheck.ok) {
      const reason = recheck.reason === 'Unsupported' ? 'Unsupported' : 'NotFound';
      return failedResult(uri, reason, `Recovered file is not usable: ${recheck.message}`);
    }

    const effectiveUri = pathToFileURL(recovered.filePath).href;
    logger.info(`Recovered ${uri} -> ${effectiveUri} (${recovered.method})`);
    return validResult(uri, effectiveUri, recovered.method);
  }

  /**
   * Validate several references in sequential batches. Results line up with
   * the requests; a validation that exceeds its time budget counts as NotFound.
   */
  async validateAll(requests: readonly ValidationRequest[]): Promise<ValidationBatchResult> {
    const results = await processInBatches(
      requests,
      async (request) => {
        try {
          return await withTimeout(
            this.validate(request.uri, request.reference, request.assetId),
            this.validationTimeoutMs,
            `Validation of ${request.uri}`
          );
        } catch (error) {
          return failedResult(request.uri, 'NotFound', errorMessage(error));
        }
      },
      { batchSize: this.batchSize, operation: 'Validation' }
    );

    return summarizeValidation(results);
  }

  /**
   * Check existence, size, format and (for images) header bytes
   */
  private async checkFile(filePath: string): Promise<FileCheck> {
    let size: number;
    try {
      const stat = await this.files.stat(filePath);
      if (!stat.isFile) {
        return { ok: false, reason: 'NotFound', message: 'Not a regular file' };
      }
      size = stat.size;
    } catch (error) {
      return accessFailure(error);
    }

    if (size === 0) {
      return { ok: false, reason: 'Empty', message: 'File is empty' };
    }

    const { mimeType, supported } = classify(filePath);
    if (!supported) {
      return { ok: false, reason: 'Unsupported', message: `Unsupported media type ${mimeType}` };
    }

    if (mimeType.startsWith('image/')) {
      let header: Buffer;
      try {
        header = await this.files.readHeader(filePath, HEADER_BYTES);
      } catch (error) {
        return accessFailure(error);
      }
      if (!hasValidImageHeader(header, mimeType)) {
        return { ok: false, reason: 'Corrupted', message: `Invalid ${mimeType} file header` };
      }
    }

    return { ok: true, mimeType };
  }

  private async recover(
    filename: string | null,
    reference?: MediaBirthprint,
    assetId?: string
  ): Promise<RecoveredFile | null> {
    if (assetId !== undefined) {
      const asset = await this.source.getAssetById(assetId);
      const live = asset ? await this.liveFile(asset) : null;
      if (live) return { filePath: live.filePath, method: 'asset-id' };
    }
    if (filename === null) return null;

    const kind = mediaKindOf(classify(filename).mimeType) ?? undefined;
    const assets = deduplicateAssets(await this.scanner.scan({ type: 'default-albums' }, { kind }));
    if (assets.length === 0) return null;

    const exact = assets.filter((asset) => asset.title === filename);
    const exactMatch = await this.firstLive(rankByReference(exact, filename, reference));
    if (exactMatch) return { filePath: exactMatch, method: 'exact-filename' };

    const patternMatches = assets.filter((asset) => asset.title !== null && matchesFilenamePattern(asset.title, filename));
    const patternMatch = await this.firstLive(rankByReference(patternMatches, filename, reference));
    if (patternMatch) return { filePath: patternMatch, method: 'filename-pattern' };

    if (reference) {
      const metadataMatch = await this.bestMetadataMatch(assets, reference);
      if (metadataMatch) return { filePath: metadataMatch, method: 'metadata' };
    }

    return null;
  }

  /**
   * First candidate whose backing file exists and is non-empty
   */
  private async firstLive(candidates: readonly RawAssetHandle[]): Promise<string | null> {
    for (const asset of candidates) {
      const live = await this.liveFile(asset);
      if (live) return live.filePath;
    }
    return null;
  }

  private async bestMetadataMatch(
    assets: readonly RawAssetHandle[],
    reference: MediaBirthprint
  ): Promise<string | null> {
    let best: { filePath: string; score: number } | null = null;

    for (const asset of assets) {
      const assetPrint = { creationTime: asset.creationTime, filename: asset.title ?? '' };
      if (partialSimilarity(assetPrint, reference) + BIRTHPRINT_SIZE_WEIGHT < this.metadataMatchThreshold) {
        continue;
      }

      const live = await this.liveFile(asset);
      if (!live) continue;

      const score = birthprintSimilarity({ ...assetPrint, fileSizeBytes: live.size }, reference);
      if (score >= this.metadataMatchThreshold && (best === null || score > best.score)) {
        best = { filePath: live.filePath, score };
      }
    }

    if (best) {
      logger.debug(`Best metadata match scored ${best.score.toFixed(2)}`);
    }
    return best?.filePath ?? null;
  }

  private async liveFile(asset: RawAssetHandle): Promise<{ filePath: string; size: number } | null> {
    try {
      const filePath = await this.source.resolveFile(asset);
      if (filePath === null) return null;
      const stat = await this.files.stat(filePath);
      return stat.isFile && stat.size > 0 ? { filePath, size: stat.size } : null;
    } catch (error) {
      logger.debug(`Recovery candidate ${asset.id} unavailable: ${errorMessage(error)}`);
      return null;
    }
  }
}

/**
 * Aggregate counts for a set of validation results
 */
export function summarizeValidation(results: ValidationResult[]): ValidationBatchResult {
  const validItems = results.filter((r) => r.isValid && !r.wasRecovered).length;
  const recoveredItems = results.filter((r) => r.isValid && r.wasRecovered).length;
  const failedItems = results.filter((r) => !r.isValid).length;

  return {
    results,
    totalItems: results.length,
    validItems,
    recoveredItems,
    failedItems,
    successRate: results.length > 0 ? (validItems + recoveredItems) / results.length : 1,
  };
}

/**
 * Magic-number check for the image formats that have one. HEIC/HEIF are
 * accepted without inspection.
 */
export function hasValidImageHeader(bytes: Uint8Array, mimeType: string): boolean {
  if (bytes.length < 8) return false;

  switch (mimeType) {
    case 'image/jpeg':
      return bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff;
    case 'image/png':
      return startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    case 'image/gif':
      return startsWith(bytes, [0x47, 0x49, 0x46, 0x38]) && (bytes[4] === 0x37 || bytes[4] === 0x39) && bytes[5] === 0x61;
    case 'image/bmp':
      return bytes[0] === 0x42 && bytes[1] === 0x4d;
    case 'image/webp':
      return bytes.length >= 12 && startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes.subarray(8), [0x57, 0x45, 0x42, 0x50]);
    case 'image/tiff':
      return startsWith(bytes, [0x49, 0x49, 0x2a, 0x00]) || startsWith(bytes, [0x4d, 0x4d, 0x00, 0x2a]);
    default:
      return true;
  }
}

function startsWith(bytes: Uint8Array, signature: readonly number[]): boolean {
  return signature.every((value, index) => bytes[index] === value);
}

function accessFailure(error: unknown): FileCheck {
  if (error instanceof FileAccessError && error.code === 'PERMISSION_DENIED') {
    return { ok: false, reason: 'PermissionDenied', message: error.message };
  }
  return { ok: false, reason: 'NotFound', message: errorMessage(error) };
}

/**
 * Stems (name without extension) where one extends the other, same extension,
 * e.g. "IMG_1.jpg" and "IMG_1 (1).jpg"
 */
export function matchesFilenamePattern(title: string, filename: string): boolean {
  if (title === filename) return false;
  if (getExtension(title) !== getExtension(filename)) return false;

  const titleStem = stemOf(title);
  const stem = stemOf(filename);
  if (Math.min(titleStem.length, stem.length) < MIN_PATTERN_STEM_LENGTH) return false;

  return titleStem.startsWith(stem) || stem.startsWith(titleStem);
}

function stemOf(filename: string): string {
  return path.parse(filename).name.toLowerCase();
}

/**
 * Order candidates by closeness to the reference, or to the filename when
 * there is none. Ties keep newest-first order.
 */
function rankByReference(
  candidates: readonly RawAssetHandle[],
  filename: string,
  reference?: MediaBirthprint
): RawAssetHandle[] {
  const score = (asset: RawAssetHandle): number => {
    const title = asset.title ?? '';
    return reference
      ? partialSimilarity({ creationTime: asset.creationTime, filename: title }, reference)
      : filenameSimilarity(title, filename);
  };
  return [...candidates].sort((a, b) => score(b) - score(a));
}

function validResult(originalUri: string, effectiveUri: string, method: RecoveryMethod): ValidationResult {
  return {
    isValid: true,
    originalUri,
    effectiveUri,
    recoveryMethod: method,
    wasRecovered: method !== 'none',
  };
}

/**
 * `method` is 'none' when no recovery was attempted
 */
function failedResult(
  uri: string,
  reason: ValidationFailureReason,
  message: string,
  method: 'none' | 'failed' = 'failed'
): ValidationResult {
  return {
    isValid: false,
    originalUri: uri,
    effectiveUri: uri,
    recoveryMethod: method,
    wasRecovered: false,
    failureReason: reason,
    errorMessage: message,
  };
}
