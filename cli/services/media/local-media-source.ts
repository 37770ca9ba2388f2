/**
 * Filesystem-backed media index.
 *
 * Every configured root directory is an album; media files found under it
 * (recursively by default) are its assets. An asset's id is derived from the
 * file's real path, so a file reachable from overlapping albums keeps one id.
 * Creation time is the capture time recorded in the file, else its birth time.
 */

import crypto from 'crypto';
import type { Dirent } from 'fs';
import fs from 'fs-extra';
import path from 'path';
import {
  AssetFilter,
  MediaAlbum,
  MediaKind,
  MediaSource,
  PageRange,
  RawAssetHandle,
} from '../../lib/media-types';
import type { AlbumRoot } from '../../lib/config';
import { errorMessage } from '../../lib/types';
import { logger } from '../../utils/logger';
import { matchesAssetFilter } from './asset-scanner';
import { compareByCreationTimeDesc } from './deduplication';
import { classify, mediaKindOf } from './format-classifier';
import { MediaProbe, SharpFfprobeMediaProbe } from './media-probe';

export interface LocalMediaSourceOptions {
  albums: AlbumRoot[];
  recursive?: boolean;
  probe?: MediaProbe;
}

interface FileEntry {
  id: string;
  filePath: string;
  kind: MediaKind;
  /** File birth time, else modification time */
  fileTime: Date;
}

interface IndexedAsset {
  filePath: string;
  handle: RawAssetHandle;
}

export class LocalMediaSource implements MediaSource {
  readonly name = 'local';
  readonly supported = true;

  private albums: MediaAlbum[];
  private recursive: boolean;
  private probe: MediaProbe;
  // Album id -> assets of the last page returned for it
  private pages = new Map<string, Map<string, IndexedAsset>>();

  constructor(options: LocalMediaSourceOptions) {
    const seen = new Set<string>();
    this.albums = [];
    for (const root of options.albums) {
      const albumPath = path.resolve(root.path);
      if (seen.has(albumPath)) continue;
      seen.add(albumPath);
      this.albums.push({ id: hashId(albumPath), name: root.name, path: albumPath });
    }
    this.recursive = options.recursive ?? true;
    this.probe = options.probe ?? new SharpFfprobeMediaProbe();
  }

  /**
   * Albums whose root directory currently exists
   */
  async listAlbums(_filter: AssetFilter): Promise<MediaAlbum[]> {
    const available: MediaAlbum[] = [];
    for (const album of this.albums) {
      if (album.path !== null && await fs.pathExists(album.path)) {
        available.push(album);
      }
    }
    return available;
  }

  async getAssets(album: MediaAlbum, range: PageRange, filter: AssetFilter): Promise<RawAssetHandle[]> {
    if (album.path === null) return [];

    const entries = await this.listMediaFiles(album.path);
    const indexed: IndexedAsset[] = [];
    for (const entry of entries) {
      if (filter.kind && entry.kind !== filter.kind) continue;
      indexed.push({ filePath: entry.filePath, handle: await this.buildHandle(entry) });
    }

    // Capture time and duration are only known after probing
    const page = indexed
      .filter(({ handle }) => matchesAssetFilter(handle, filter))
      .sort((a, b) => compareByCreationTimeDesc(a.handle, b.handle))
      .slice(range.start, range.end);

    this.pages.set(album.id, new Map(page.map((item) => [item.handle.id, item])));
    return page.map(({ handle }) => handle);
  }

  async resolveFile(asset: RawAssetHandle): Promise<string | null> {
    const filePath = this.lookup(asset.id)?.filePath;
    if (!filePath) return null;
    return (await fs.pathExists(filePath)) ? filePath : null;
  }

  async getAssetById(id: string): Promise<RawAssetHandle | null> {
    return this.lookup(id)?.handle ?? null;
  }

  private lookup(id: string): IndexedAsset | undefined {
    for (const page of this.pages.values()) {
      const item = page.get(id);
      if (item) return item;
    }
    return undefined;
  }

  private async listMediaFiles(root: string): Promise<FileEntry[]> {
    const entries: FileEntry[] = [];
    const visited = new Set<string>();

    const walk = async (dir: string, isRoot: boolean): Promise<void> => {
      const realDir = await fs.realpath(dir);
      if (visited.has(realDir)) return;
      visited.add(realDir);

      let dirents: Dirent[];
      try {
        dirents = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (isRoot) throw error;
        logger.debug(`Skipping unreadable directory ${dir}: ${errorMessage(error)}`);
        return;
      }

      for (const dirent of dirents) {
        const entryPath = path.join(dir, dirent.name);

        if (dirent.isDirectory()) {
          if (this.recursive) await walk(entryPath, false);
          continue;
        }

        const kind = mediaKindOf(classify(entryPath).mimeType);
        if (!kind) continue;

        try {
          const realPath = await fs.realpath(entryPath);
          const stats = await fs.stat(realPath);
          if (!stats.isFile()) continue;
          entries.push({
            id: hashId(realPath),
            filePath: realPath,
            kind,
            fileTime: stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime,
          });
        } catch (error) {
          logger.debug(`Skipping unreadable file ${entryPath}: ${errorMessage(error)}`);
        }
      }
    };

    await walk(root, true);
    return entries;
  }

  private async buildHandle(entry: FileEntry): Promise<RawAssetHandle> {
    let width = 0;
    let height = 0;
    let durationSeconds = 0;
    let orientation = 1;
    let capturedAt: Date | null = null;
    let latitude: number | null = null;
    let longitude: number | null = null;

    try {
      if (entry.kind === 'photo') {
        ({ width, height, orientation, capturedAt, latitude, longitude } = await this.probe.probeImage(entry.filePath));
      } else {
        ({ width, height, durationSeconds, capturedAt } = await this.probe.probeVideo(entry.filePath));
      }
    } catch (error) {
      logger.debug(`Could not read metadata for ${entry.filePath}: ${errorMessage(error)}`);
    }

    return {
      id: entry.id,
      kind: entry.kind,
      creationTime: capturedAt ?? entry.fileTime,
      latitude,
      longitude,
      width,
      height,
      durationSeconds,
      orientation,
      title: path.basename(entry.filePath),
      relativePath: path.dirname(entry.filePath),
    };
  }
}

function hashId(value: string): string {
  return crypto.createHash('sha1').update(value).digest('hex');
}
