import { MediaAlbum, MediaSource, RawAssetHandle } from '../../lib/media-types';

/**
 * Media source for hosts without media library access; enumerates and
 * resolves nothing
 */
export class UnsupportedMediaSource implements MediaSource {
  readonly supported = false;

  constructor(readonly name: string = 'unsupported') {}

  async listAlbums(): Promise<MediaAlbum[]> {
    return [];
  }

  async getAssets(): Promise<RawAssetHandle[]> {
    return [];
  }

  async resolveFile(): Promise<string | null> {
    return null;
  }

  async getAssetById(): Promise<RawAssetHandle | null> {
    return null;
  }
}
