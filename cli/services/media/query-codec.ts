/**
 * Wire format for parser queries and candidate records
 */

import { z } from 'zod';
import { CandidateRecord, MediaQuery } from '../../lib/media-types';
import { QueryValidationError } from '../../lib/types';

const IsoDateSchema = z
  .string()
  .superRefine((value, ctx) => {
    // Fatal, so the range check below never sees an unparsed string
    if (Number.isNaN(Date.parse(value))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid ISO-8601 date', fatal: true });
    }
  })
  .transform((value) => new Date(value));

export const MediaQueryInputSchema = z.object({
  terms: z.array(z.string()).default([]),
  original_query: z.string().optional(),
  date_range: z
    .object({ start: IsoDateSchema, end: IsoDateSchema })
    .refine((range) => range.start.getTime() <= range.end.getTime(), {
      message: 'date_range.start must not be after date_range.end',
    })
    .nullish(),
  media_type: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['photo', 'video']))
    .nullish(),
  directory: z.string().min(1).nullish(),
});

export interface WireCandidate {
  id: string;
  file_uri: string;
  mime_type: string;
  device_metadata: {
    creation_time: string;
    latitude: number | null;
    longitude: number | null;
    width: number;
    height: number;
    file_size_bytes: number;
    duration: number | null;
    orientation: number;
  };
}

/**
 * Validate a parser query object and convert it to a MediaQuery
 */
export function parseMediaQuery(input: unknown): MediaQuery {
  const result = MediaQueryInputSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
    throw new QueryValidationError(`Invalid media query: ${details}`, result.error);
  }

  const data = result.data;
  return {
    terms: data.terms,
    originalQuery: data.original_query ?? data.terms.join(' '),
    dateRange: data.date_range ?? undefined,
    mediaKind: data.media_type ?? undefined,
    directoryScope: data.directory ?? undefined,
  };
}

export function toWireCandidate(record: CandidateRecord): WireCandidate {
  const metadata = record.deviceMetadata;
  const isVideo = record.mimeType.startsWith('video/');
  return {
    id: record.id,
    file_uri: record.fileUri,
    mime_type: record.mimeType,
    device_metadata: {
      creation_time: metadata.creationTime.toISOString(),
      latitude: metadata.latitude,
      longitude: metadata.longitude,
      width: metadata.width,
      height: metadata.height,
      file_size_bytes: metadata.fileSizeBytes,
      duration: isVideo ? metadata.durationSeconds : null,
      orientation: metadata.orientation,
    },
  };
}
