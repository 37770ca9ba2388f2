/**
 * Extension-based MIME classification against the supported allow-lists
 */

import { MediaKind } from '../../lib/media-types';

export const UNSUPPORTED_MIME_TYPE = 'application/octet-stream';

const IMAGE_MIME_TYPES: Readonly<Record<string, string>> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  bmp: 'image/bmp',
  webp: 'image/webp',
  heic: 'image/heic',
  heif: 'image/heif',
  tiff: 'image/tiff',
  tif: 'image/tiff',
};

const VIDEO_MIME_TYPES: Readonly<Record<string, string>> = {
  mp4: 'video/mp4',
  mov: 'video/quicktime',
  avi: 'video/x-msvideo',
  mkv: 'video/x-matroska',
  webm: 'video/webm',
  m4v: 'video/x-m4v',
  '3gp': 'video/3gpp',
  flv: 'video/x-flv',
  wmv: 'video/x-ms-wmv',
  mpg: 'video/mpeg',
  mpeg: 'video/mpeg',
};

const SUPPORTED_MIME_TYPES = new Set<string>([
  ...Object.values(IMAGE_MIME_TYPES),
  ...Object.values(VIDEO_MIME_TYPES),
]);

export interface FormatClassification {
  mimeType: string;
  supported: boolean;
}

/**
 * Lower-cased text after the last '.' of the final path segment, '' if none
 */
export function getExtension(filePath: string): string {
  const lastSegment = filePath.split(/[\\/]/).pop() ?? '';
  const dot = lastSegment.lastIndexOf('.');
  return dot === -1 ? '' : lastSegment.slice(dot + 1).toLowerCase();
}

export function classify(filePath: string): FormatClassification {
  const ext = getExtension(filePath);
  const mimeType = Object.prototype.hasOwnProperty.call(IMAGE_MIME_TYPES, ext)
    ? IMAGE_MIME_TYPES[ext]
    : Object.prototype.hasOwnProperty.call(VIDEO_MIME_TYPES, ext)
      ? VIDEO_MIME_TYPES[ext]
      : UNSUPPORTED_MIME_TYPE;

  return { mimeType, supported: isSupportedMimeType(mimeType) };
}

export function isSupportedMimeType(mimeType: string): boolean {
  return SUPPORTED_MIME_TYPES.has(mimeType);
}

export function mediaKindOf(mimeType: string): MediaKind | null {
  if (!isSupportedMimeType(mimeType)) return null;
  return mimeType.startsWith('image/') ? 'photo' : 'video';
}
