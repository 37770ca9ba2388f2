/**
 * Media services exports
 */

export * from './format-classifier';
export * from './deduplication';
export * from './term-filter';
export * from './asset-scanner';
export * from './metadata-resolver';
export * from './uri-validator';
export * from './birthprint';
export * from './timeout-wrapper';
export * from './query-codec';
export * from './file-system';
export * from './media-probe';
export * from './local-media-source';
export * from './unsupported-media-source';
export * from './media-engine';

import { defaultAlbumRoots, MediaResolverConfig } from '../../lib/config';
import { DirectoryConfig, FileSystemProbe, MediaSource } from '../../lib/media-types';
import { logger } from '../../utils/logger';
import { AssetScanner } from './asset-scanner';
import { NodeFileSystem } from './file-system';
import { LocalMediaSource } from './local-media-source';
import { MediaResolutionEngine } from './media-engine';
import { MetadataResolver } from './metadata-resolver';
import { BatchProgress } from './timeout-wrapper';
import { UriValidator } from './uri-validator';

export interface MediaEngineOptions {
  config: MediaResolverConfig;
  /** Defaults to a LocalMediaSource over the configured albums */
  source?: MediaSource;
  files?: FileSystemProbe;
  /** Overrides `config.directories` */
  directories?: DirectoryConfig;
  onBatchComplete?: (progress: BatchProgress) => void;
}

/**
 * Wire a media resolution engine from configuration
 */
export function createMediaEngine(options: MediaEngineOptions): MediaResolutionEngine {
  const { config } = options;
  const directories: DirectoryConfig = options.directories ?? {
    enabled: config.directories.enabled,
    paths: new Set(config.directories.paths),
  };

  const source = options.source ?? createLocalMediaSource(config, directories);
  const files = options.files ?? new NodeFileSystem();

  const scanner = new AssetScanner(source, {
    albumPageSize: config.scanner.albumPageSize,
    maxVideoDurationSeconds: config.scanner.maxVideoDurationSeconds,
  });
  const resolver = new MetadataResolver(source, files, {
    batchSize: config.resolver.batchSize,
    itemTimeoutMs: config.resolver.itemTimeoutMs,
    allowPlaceholderFallback: config.resolver.allowPlaceholderFallback,
    onBatchComplete: options.onBatchComplete,
  });
  const validator = new UriValidator(source, files, scanner, {
    enableRecovery: config.validation.enableRecovery,
    metadataMatchThreshold: config.validation.metadataMatchThreshold,
    batchSize: config.resolver.batchSize,
  });

  logger.debug(`Initialized media engine with source '${source.name}'`);
  return new MediaResolutionEngine({
    scanner,
    resolver,
    validator,
    directories,
    postValidate: config.validation.postValidate,
  });
}

/**
 * Album roots from config (or the defaults) plus enabled custom directories,
 * each custom directory becoming an album named after its last segment
 */
export function createLocalMediaSource(config: MediaResolverConfig, directories: DirectoryConfig): LocalMediaSource {
  const albums = [...(config.albums ?? defaultAlbumRoots())];
  if (directories.enabled) {
    for (const dir of directories.paths) {
      albums.push({ name: dir.split(/[\\/]/).filter(Boolean).pop() ?? dir, path: dir });
    }
  }
  return new LocalMediaSource({ albums, recursive: config.scanner.recursive });
}
