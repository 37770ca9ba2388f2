import { test } from 'node:test';
import assert from 'node:assert/strict';
import { QueryValidationError } from '../cli/lib/types';
import { parseMediaQuery, toWireCandidate } from '../cli/services/media/query-codec';

test('parseMediaQuery converts the parser wire format', () => {
  const query = parseMediaQuery({
    terms: ['sunset', 'beach'],
    original_query: 'sunset at the beach',
    date_range: { start: '2024-06-01T00:00:00Z', end: '2024-06-30T23:59:59Z' },
    media_type: 'PHOTO',
    directory: '/media/Trips',
  });

  assert.deepEqual(query, {
    terms: ['sunset', 'beach'],
    originalQuery: 'sunset at the beach',
    dateRange: { start: new Date('2024-06-01T00:00:00Z'), end: new Date('2024-06-30T23:59:59Z') },
    mediaKind: 'photo',
    directoryScope: '/media/Trips',
  });
});

test('parseMediaQuery fills defaults for omitted and null fields', () => {
  const query = parseMediaQuery({ terms: ['cat', 'dog'], date_range: null, media_type: null, directory: null });

  assert.deepEqual(query, {
    terms: ['cat', 'dog'],
    originalQuery: 'cat dog',
    dateRange: undefined,
    mediaKind: undefined,
    directoryScope: undefined,
  });
  assert.deepEqual(parseMediaQuery({}).terms, []);
});

test('parseMediaQuery rejects invalid queries with the failing fields', () => {
  assert.throws(
    () => parseMediaQuery({ terms: 'sunset' }),
    (error: unknown) => error instanceof QueryValidationError && error.message.startsWith('Invalid media query: terms:')
  );
  assert.throws(() => parseMediaQuery({ media_type: 'audio' }), QueryValidationError);
  assert.throws(() => parseMediaQuery({ date_range: { start: 'yesterday', end: '2024-01-01' } }), /date_range\.start: Invalid ISO-8601 date/);
  assert.throws(
    () => parseMediaQuery({ date_range: { start: '2024-02-01', end: '2024-01-01' } }),
    /date_range: date_range\.start must not be after date_range\.end/
  );
  assert.throws(() => parseMediaQuery(null), QueryValidationError);
});

test('toWireCandidate serializes metadata in snake_case', () => {
  const base = {
    creationTime: new Date('2024-06-01T12:00:00.000Z'),
    latitude: 48.85,
    longitude: 2.35,
    width: 1920,
    height: 1080,
    fileSizeBytes: 1234,
    durationSeconds: 12.5,
    orientation: 1,
  };

  assert.deepEqual(
    toWireCandidate({ id: 'v', fileUri: 'file:///m/v.mp4', mimeType: 'video/mp4', deviceMetadata: base }),
    {
      id: 'v',
      file_uri: 'file:///m/v.mp4',
      mime_type: 'video/mp4',
      device_metadata: {
        creation_time: '2024-06-01T12:00:00.000Z',
        latitude: 48.85,
        longitude: 2.35,
        width: 1920,
        height: 1080,
        file_size_bytes: 1234,
        duration: 12.5,
        orientation: 1,
      },
    }
  );

  const photo = toWireCandidate({
    id: 'p',
    fileUri: 'file:///m/p.jpg',
    mimeType: 'image/jpeg',
    deviceMetadata: { ...base, durationSeconds: 0 },
  });
  assert.equal(photo.device_metadata.duration, null);
});
