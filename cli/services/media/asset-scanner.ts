/**
 * Asset scanner: enumerates raw asset handles from a media source for a scope
 */

import * as path from 'path';
import {
  AssetFilter,
  MediaAlbum,
  MediaSource,
  RawAssetHandle,
  ScanScope,
} from '../../lib/media-types';
import { errorMessage } from '../../lib/types';
import { logger } from '../../utils/logger';
import { compareByCreationTimeDesc } from './deduplication';

export const DEFAULT_ALBUM_PAGE_SIZE = 100;
export const DEFAULT_MAX_VIDEO_DURATION_SECONDS = 15 * 60;

export interface AssetScannerOptions {
  albumPageSize?: number;
  maxVideoDurationSeconds?: number;
}

/**
 * Whether a handle passes kind, inclusive date range and video duration limits.
 * Media sources call this before paging.
 */
export function matchesAssetFilter(asset: RawAssetHandle, filter: AssetFilter): boolean {
  if (filter.kind && asset.kind !== filter.kind) return false;

  if (filter.dateRange) {
    const created = asset.creationTime.getTime();
    if (created < filter.dateRange.start.getTime() || created > filter.dateRange.end.getTime()) {
      return false;
    }
  }

  if (
    asset.kind === 'video' &&
    filter.maxVideoDurationSeconds !== undefined &&
    asset.durationSeconds > filter.maxVideoDurationSeconds
  ) {
    return false;
  }

  return true;
}

export class AssetScanner {
  private albumPageSize: number;
  private maxVideoDurationSeconds: number;

  constructor(
    private source: MediaSource,
    options: AssetScannerOptions = {}
  ) {
    this.albumPageSize = options.albumPageSize ?? DEFAULT_ALBUM_PAGE_SIZE;
    this.maxVideoDurationSeconds = options.maxVideoDurationSeconds ?? DEFAULT_MAX_VIDEO_DURATION_SECONDS;
  }

  /**
   * Enumerate assets in scope, newest first. Copies of an asset reached through
   * several albums are all returned; deduplication is a separate step.
   * Never throws: unreadable albums are skipped.
   */
  async scan(scope: ScanScope, filter: Omit<AssetFilter, 'maxVideoDurationSeconds'> = {}): Promise<RawAssetHandle[]> {
    if (!this.source.supported) {
      logger.debug(`Media source '${this.source.name}' does not support asset enumeration`);
      return [];
    }

    const effectiveFilter: AssetFilter = {
      ...filter,
      maxVideoDurationSeconds: this.maxVideoDurationSeconds,
    };

    let albums: MediaAlbum[];
    try {
      albums = await this.source.listAlbums(effectiveFilter);
    } catch (error) {
      logger.warn(`Failed to list albums from '${this.source.name}': ${errorMessage(error)}`);
      return [];
    }

    if (albums.length === 0) {
      logger.debug('No albums available to scan');
      return [];
    }

    const targets = scope.type === 'directories' ? this.selectAlbums(albums, scope.paths) : albums;
    logger.debug(`Scanning ${targets.length}/${albums.length} albums`);

    const results: RawAssetHandle[] = [];
    for (const album of targets) {
      try {
        const assets = await this.source.getAssets(
          album,
          { start: 0, end: this.albumPageSize },
          effectiveFilter
        );
        results.push(...assets);
        logger.debug(`Album "${album.name}" contributed ${assets.length} assets`);
      } catch (error) {
        logger.warn(`Skipping unreadable album "${album.name}": ${errorMessage(error)}`);
      }
    }

    return results.sort(compareByCreationTimeDesc);
  }

  /**
   * Match requested directories to albums by path, then by last path segment.
   * Unmatched directories are skipped; if none match, the first album is used.
   */
  private selectAlbums(albums: MediaAlbum[], directories: readonly string[]): MediaAlbum[] {
    const selected = new Map<string, MediaAlbum>();

    for (const directory of directories) {
      const album = findAlbumForDirectory(albums, directory);
      if (album) {
        selected.set(album.id, album);
      } else {
        logger.debug(`No album matches directory "${directory}"`);
      }
    }

    if (selected.size === 0) {
      logger.debug(`Falling back to first album "${albums[0].name}"`);
      return [albums[0]];
    }

    return Array.from(selected.values());
  }
}

export function findAlbumForDirectory(albums: readonly MediaAlbum[], directory: string): MediaAlbum | undefined {
  const normalized = path.resolve(directory);
  const byPath = albums.find((album) => album.path !== null && path.resolve(album.path) === normalized);
  if (byPath) return byPath;

  const name = lastSegment(directory);
  return albums.find((album) => album.name === name);
}

function lastSegment(directory: string): string {
  const parts = directory.split(/[\\/]/).filter(Boolean);
  return parts[parts.length - 1] ?? '';
}
