/**
 * Batch metadata resolver
 *
 * Turns raw asset handles into candidate records:
 * - resolves each asset's backing file through the media source
 * - drops unsupported formats and empty or unreadable files
 * - runs items concurrently within fixed-size batches, batches one at a time
 * - bounds each item with a timeout; a failing item is dropped, never rethrown
 */

import path from 'path';
import { pathToFileURL } from 'url';
import {
  CandidateRecord,
  FileSystemProbe,
  MediaSource,
  RawAssetHandle,
} from '../../lib/media-types';
import { errorMessage } from '../../lib/types';
import { logger } from '../../utils/logger';
import { classify } from './format-classifier';
import { BatchProgress, processInBatches } from './timeout-wrapper';

export const DEFAULT_BATCH_SIZE = 5;
export const DEFAULT_ITEM_TIMEOUT_MS = 3000;

export interface MetadataResolverOptions {
  batchSize?: number;
  itemTimeoutMs?: number;
  /**
   * Emit a record with a synthesized `relativePath/title` URI and size 0 when
   * the source cannot produce a file for an asset, instead of dropping it
   */
  allowPlaceholderFallback?: boolean;
  onBatchComplete?: (progress: BatchProgress) => void;
}

export class MetadataResolver {
  private batchSize: number;
  private itemTimeoutMs: number;
  private allowPlaceholderFallback: boolean;
  private onBatchComplete?: (progress: BatchProgress) => void;

  constructor(
    private source: MediaSource,
    private files: FileSystemProbe,
    options: MetadataResolverOptions = {}
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.itemTimeoutMs = options.itemTimeoutMs ?? DEFAULT_ITEM_TIMEOUT_MS;
    this.allowPlaceholderFallback = options.allowPlaceholderFallback ?? false;
    this.onBatchComplete = options.onBatchComplete;
  }

  /**
   * Resolve assets into candidate records. Always returns; items that fail,
   * time out or are filtered out are simply absent.
   */
  async resolve(assets: readonly RawAssetHandle[]): Promise<CandidateRecord[]> {
    if (assets.length === 0) return [];

    const records = await processInBatches(assets, (asset) => this.resolveAsset(asset), {
      batchSize: this.batchSize,
      itemTimeoutMs: this.itemTimeoutMs,
      operation: 'Asset resolution',
      onItemError: (error, index) => {
        logger.debug(`Dropping asset ${assets[index].id}: ${errorMessage(error)}`);
      },
      onBatchComplete: (progress) => {
        logger.debug(
          `Processed batch ${progress.batchIndex + 1}/${progress.batchCount}, got ${progress.accepted} valid assets`
        );
        this.onBatchComplete?.(progress);
      },
    });

    logger.info(`Resolved ${assets.length} assets to ${records.length} candidates`);
    return records;
  }

  /**
   * Resolve a single asset, or null when it should be skipped
   */
  async resolveAsset(asset: RawAssetHandle): Promise<CandidateRecord | null> {
    const filePath = await this.source.resolveFile(asset);

    if (filePath === null) {
      return this.placeholderRecord(asset);
    }

    const { mimeType, supported } = classify(filePath);
    if (!supported) {
      logger.debug(`Skipping unsupported media type: ${filePath} (${mimeType})`);
      return null;
    }

    let fileSizeBytes: number;
    try {
      const stat = await this.files.stat(filePath);
      if (!stat.isFile) {
        logger.debug(`Skipping non-file entry: ${filePath}`);
        return null;
      }
      fileSizeBytes = stat.size;
    } catch (error) {
      logger.debug(`Cannot access file: ${filePath} - ${errorMessage(error)}`);
      return null;
    }

    if (fileSizeBytes === 0) {
      logger.debug(`Skipping empty file: ${filePath}`);
      return null;
    }

    return buildRecord(asset, pathToFileURL(filePath).href, mimeType, fileSizeBytes);
  }

  private placeholderRecord(asset: RawAssetHandle): CandidateRecord | null {
    if (!this.allowPlaceholderFallback) {
      logger.debug(`Could not get file for asset ${asset.id}, skipping`);
      return null;
    }

    const fallbackPath = `${asset.relativePath ?? ''}/${asset.title ?? asset.id}`;
    const { mimeType, supported } = classify(fallbackPath);
    if (!supported) {
      logger.debug(`Skipping unsupported fallback media type: ${fallbackPath} (${mimeType})`);
      return null;
    }

    logger.debug(`Could not get file for asset ${asset.id}, using fallback path`);
    return buildRecord(asset, pathToFileURL(path.resolve('/', fallbackPath)).href, mimeType, 0);
  }
}

function buildRecord(
  asset: RawAssetHandle,
  fileUri: string,
  mimeType: string,
  fileSizeBytes: number
): CandidateRecord {
  return {
    id: asset.id,
    fileUri,
    mimeType,
    deviceMetadata: {
      creationTime: asset.creationTime,
      latitude: asset.latitude,
      longitude: asset.longitude,
      width: asset.width,
      height: asset.height,
      fileSizeBytes,
      durationSeconds: asset.durationSeconds,
      orientation: asset.orientation,
    },
  };
}
