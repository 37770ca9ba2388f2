import * as exifr from 'exifr';
import ffmpeg from 'fluent-ffmpeg';
import ffprobe from 'ffprobe-static';
import sharp from 'sharp';
import { errorMessage } from '../../lib/types';
import { logger } from '../../utils/logger';

ffmpeg.setFfprobePath(ffprobe.path);

export interface ImageProbeResult {
  width: number;
  height: number;
  /** EXIF orientation, 1 when absent */
  orientation: number;
  /** EXIF DateTimeOriginal, else CreateDate */
  capturedAt: Date | null;
  latitude: number | null;
  longitude: number | null;
}

export interface VideoProbeResult {
  width: number;
  height: number;
  durationSeconds: number;
  /** Container creation_time tag */
  capturedAt: Date | null;
}

/**
 * Reads intrinsic media properties from files on disk
 */
export interface MediaProbe {
  probeImage(filePath: string): Promise<ImageProbeResult>;
  probeVideo(filePath: string): Promise<VideoProbeResult>;
}

interface ExifCapture {
  capturedAt: Date | null;
  latitude: number | null;
  longitude: number | null;
}

/**
 * Image metadata via sharp and exifr, video metadata via ffprobe
 */
export class SharpFfprobeMediaProbe implements MediaProbe {
  async probeImage(filePath: string): Promise<ImageProbeResult> {
    const metadata = await sharp(filePath).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error('Unable to read image dimensions');
    }
    return {
      width: metadata.width,
      height: metadata.height,
      orientation: metadata.orientation ?? 1,
      ...(await readExifCapture(filePath)),
    };
  }

  probeVideo(filePath: string): Promise<VideoProbeResult> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err, data) => {
        if (err) return reject(err);

        const videoStream = data.streams.find(stream => stream.codec_type === 'video');
        if (!videoStream || !videoStream.width || !videoStream.height) {
          return reject(new Error('Unable to read video dimensions'));
        }

        const durationSeconds = data.format?.duration
          ? Number(data.format.duration)
          : Number(videoStream.duration || 0);

        resolve({
          width: videoStream.width,
          height: videoStream.height,
          durationSeconds: Number.isFinite(durationSeconds) ? durationSeconds : 0,
          capturedAt: toDate(data.format?.tags?.creation_time),
        });
      });
    });
  }
}

/**
 * Capture time and GPS position; nulls when the file carries no EXIF
 */
export async function readExifCapture(filePath: string): Promise<ExifCapture> {
  try {
    const data: unknown = await exifr.parse(filePath, { tiff: true, exif: true, gps: true });
    if (typeof data !== 'object' || data === null) {
      return { capturedAt: null, latitude: null, longitude: null };
    }

    const tags = new Map<string, unknown>(Object.entries(data));
    return {
      capturedAt: toDate(tags.get('DateTimeOriginal')) ?? toDate(tags.get('CreateDate')),
      latitude: toCoordinate(tags.get('latitude')),
      longitude: toCoordinate(tags.get('longitude')),
    };
  } catch (error) {
    logger.debug(`No EXIF data in ${filePath}: ${errorMessage(error)}`);
    return { capturedAt: null, latitude: null, longitude: null };
  }
}

function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

function toCoordinate(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
