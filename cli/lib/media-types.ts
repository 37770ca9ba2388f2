/**
 * Media resolution types shared by the scanner, resolver and validator
 */

export type MediaKind = 'photo' | 'video';

export interface DateRange {
  start: Date;
  end: Date;
}

/**
 * Structured query produced by the natural-language parser
 */
export interface MediaQuery {
  readonly terms: readonly string[];
  readonly originalQuery: string;
  readonly dateRange?: Readonly<DateRange>;
  readonly mediaKind?: MediaKind;
  readonly directoryScope?: string;
}

/**
 * Snapshot of an asset as reported by the media index. The engine only ever
 * reads these; identity is `id`.
 */
export interface RawAssetHandle {
  readonly id: string;
  readonly kind: MediaKind;
  readonly creationTime: Date;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly width: number;
  readonly height: number;
  /** 0 for photos */
  readonly durationSeconds: number;
  readonly orientation: number;
  readonly title: string | null;
  /** Directory the asset lives in, when the index knows it */
  readonly relativePath: string | null;
}

export interface DeviceMetadata {
  readonly creationTime: Date;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly width: number;
  readonly height: number;
  readonly fileSizeBytes: number;
  readonly durationSeconds: number;
  readonly orientation: number;
}

/**
 * A media item that survived enumeration, filtering and metadata resolution
 */
export interface CandidateRecord {
  readonly id: string;
  readonly fileUri: string;
  readonly mimeType: string;
  readonly deviceMetadata: DeviceMetadata;
}

export type ValidationFailureReason =
  | 'NotFound'
  | 'PermissionDenied'
  | 'Empty'
  | 'Unsupported'
  | 'Corrupted';

export type RecoveryMethod =
  | 'none'
  | 'asset-id'
  | 'exact-filename'
  | 'filename-pattern'
  | 'metadata'
  | 'failed';

export interface ValidationResult {
  isValid: boolean;
  originalUri: string;
  effectiveUri: string;
  recoveryMethod: RecoveryMethod;
  /** True when the effective URI differs from the original */
  wasRecovered: boolean;
  failureReason?: ValidationFailureReason;
  errorMessage?: string;
}

export interface ValidationBatchResult {
  results: ValidationResult[];
  totalItems: number;
  validItems: number;
  recoveredItems: number;
  failedItems: number;
  /** 0-1, 1 for an empty batch */
  successRate: number;
}

/**
 * Enabled custom directories, resolved from user preferences by the caller
 */
export interface DirectoryConfig {
  readonly enabled: boolean;
  readonly paths: ReadonlySet<string>;
}

/**
 * Album-like grouping reported by a media source
 */
export interface MediaAlbum {
  readonly id: string;
  readonly name: string;
  readonly path: string | null;
}

export interface AssetFilter {
  kind?: MediaKind;
  /** Inclusive */
  dateRange?: DateRange;
  /** Videos longer than this are excluded; photos are unaffected */
  maxVideoDurationSeconds?: number;
}

export interface PageRange {
  start: number;
  end: number;
}

/**
 * Capability interface over the platform media index.
 *
 * Implementations apply `AssetFilter` before paging and return assets ordered
 * by creation time, newest first.
 */
export interface MediaSource {
  readonly name: string;
  /** False for hosts without media library access */
  readonly supported: boolean;
  listAlbums(filter: AssetFilter): Promise<MediaAlbum[]>;
  getAssets(album: MediaAlbum, range: PageRange, filter: AssetFilter): Promise<RawAssetHandle[]>;
  /** Absolute path of the asset's backing file, or null when unavailable */
  resolveFile(asset: RawAssetHandle): Promise<string | null>;
  getAssetById(id: string): Promise<RawAssetHandle | null>;
}

export interface FileStat {
  size: number;
  isFile: boolean;
  birthtime: Date;
  mtime: Date;
}

/**
 * Read-only file system access. Failures surface as FileAccessError.
 */
export interface FileSystemProbe {
  stat(filePath: string): Promise<FileStat>;
  /** Reads up to `length` bytes from the start of the file */
  readHeader(filePath: string, length: number): Promise<Buffer>;
}

/**
 * Identity of a previously seen file, used to find it again after a move
 */
export interface MediaBirthprint {
  creationTime: Date;
  fileSizeBytes: number;
  filename: string;
}

export type ScanScope =
  | { type: 'default-albums' }
  | { type: 'directories'; paths: string[] };
