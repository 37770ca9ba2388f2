import { test } from 'node:test';
import assert from 'node:assert/strict';
import { AssetScanner } from '../cli/services/media/asset-scanner';
import {
  hasValidImageHeader,
  matchesFilenamePattern,
  summarizeValidation,
  UriValidator,
  UriValidatorOptions,
} from '../cli/services/media/uri-validator';
import { FakeFileSystem, JPEG_HEADER, PNG_HEADER } from './helpers/fake-file-system';
import { FakeMediaSource, makeAsset } from './helpers/fake-media-source';

const taken = new Date('2024-08-15T10:00:00Z');

function setup(options: UriValidatorOptions = {}) {
  const source = new FakeMediaSource();
  const files = new FakeFileSystem();
  const validator = new UriValidator(source, files, new AssetScanner(source), options);
  return { source, files, validator };
}

test('validate accepts a live file without recovery', async () => {
  const { files, validator } = setup();
  files.addFile('/lib/a.jpg');
  files.addFile('/lib/clip.mp4');

  assert.deepEqual(await validator.validate('file:///lib/a.jpg'), {
    isValid: true,
    originalUri: 'file:///lib/a.jpg',
    effectiveUri: 'file:///lib/a.jpg',
    recoveryMethod: 'none',
    wasRecovered: false,
  });
  assert.equal((await validator.validate('/lib/clip.mp4')).isValid, true);
});

test('validate reports permission, empty, unsupported and corrupted files without recovery', async () => {
  const { source, files, validator } = setup();
  files.addUnreadable('/lib/locked.jpg', 'PERMISSION_DENIED');
  files.addFile('/lib/empty.jpg', { size: 0 });
  files.addFile('/lib/notes.txt');
  files.addFile('/lib/fake.jpg', { header: PNG_HEADER });
  // A recovery candidate that must not be used for these failures
  source.addAlbum('Camera', [makeAsset({ id: 'x', title: 'empty.jpg' })]);
  source.setFile('x', { type: 'path', path: '/other/empty.jpg' });
  files.addFile('/other/empty.jpg');

  const locked = await validator.validate('file:///lib/locked.jpg');
  assert.equal(locked.failureReason, 'PermissionDenied');
  assert.equal(locked.recoveryMethod, 'none');
  assert.equal(locked.isValid, false);

  const empty = await validator.validate('file:///lib/empty.jpg');
  assert.equal(empty.failureReason, 'Empty');
  assert.equal(empty.effectiveUri, 'file:///lib/empty.jpg');

  assert.equal((await validator.validate('file:///lib/notes.txt')).failureReason, 'Unsupported');
  assert.equal((await validator.validate('file:///lib/fake.jpg')).failureReason, 'Corrupted');
});

test('validate reports NotFound without searching when recovery is disabled', async () => {
  const { source, validator } = setup({ enableRecovery: false });
  source.addAlbum('Camera', [makeAsset({ id: 'a', title: 'gone.jpg' })]);

  const result = await validator.validate('file:///lib/gone.jpg');

  assert.equal(result.failureReason, 'NotFound');
  assert.equal(result.recoveryMethod, 'none');
  assert.equal(source.getAssetsCalls.length, 0);
});

test('validate recovers a moved file by exact filename', async () => {
  const { source, files, validator } = setup();
  source.addAlbum('Camera', [makeAsset({ id: 'moved', title: 'IMG_1.jpg' })]);
  source.setFile('moved', { type: 'path', path: '/new/IMG_1.jpg' });
  files.addFile('/new/IMG_1.jpg', { header: JPEG_HEADER });

  assert.deepEqual(await validator.validate('file:///old/IMG_1.jpg'), {
    isValid: true,
    originalUri: 'file:///old/IMG_1.jpg',
    effectiveUri: 'file:///new/IMG_1.jpg',
    recoveryMethod: 'exact-filename',
    wasRecovered: true,
  });
});

test('exact filename recovery prefers the copy closest to the reference', async () => {
  const { source, files, validator } = setup();
  source.addAlbum('Camera', [
    makeAsset({ id: 'far', title: 'IMG_5.jpg', creationTime: new Date('2024-08-16T10:00:00Z') }),
    makeAsset({ id: 'near', title: 'IMG_5.jpg', creationTime: taken }),
  ]);
  source.setFile('far', { type: 'path', path: '/a/IMG_5.jpg' });
  source.setFile('near', { type: 'path', path: '/b/IMG_5.jpg' });
  files.addFile('/a/IMG_5.jpg');
  files.addFile('/b/IMG_5.jpg');

  const result = await validator.validate('file:///old/IMG_5.jpg', {
    creationTime: taken,
    fileSizeBytes: 2048,
    filename: 'IMG_5.jpg',
  });

  assert.equal(result.effectiveUri, 'file:///b/IMG_5.jpg');
});

test('validate skips exact matches without a live file and falls back to the filename pattern', async () => {
  const { source, files, validator } = setup();
  source.addAlbum('Camera', [
    makeAsset({ id: 'stale', title: 'IMG_2.jpg' }),
    makeAsset({ id: 'edited', title: 'IMG_2-edited.jpg' }),
  ]);
  source.setFile('stale', { type: 'path', path: '/gone/IMG_2.jpg' });
  source.setFile('edited', { type: 'path', path: '/new/IMG_2-edited.jpg' });
  files.addFile('/new/IMG_2-edited.jpg');

  const result = await validator.validate('file:///old/IMG_2.jpg');

  assert.equal(result.isValid, true);
  assert.equal(result.recoveryMethod, 'filename-pattern');
  assert.equal(result.effectiveUri, 'file:///new/IMG_2-edited.jpg');
});

test('validate recovers a renamed file by birthprint similarity', async () => {
  const { source, files, validator } = setup();
  source.addAlbum('Camera', [
    makeAsset({ id: 'decoy', title: 'other.jpg', creationTime: new Date('2024-08-15T11:00:00Z') }),
    makeAsset({ id: 'renamed', title: 'DSC_0042.jpg', creationTime: taken }),
  ]);
  source.setFile('decoy', { type: 'path', path: '/new/other.jpg' });
  source.setFile('renamed', { type: 'path', path: '/new/DSC_0042.jpg' });
  files.addFile('/new/other.jpg', { size: 100 });
  files.addFile('/new/DSC_0042.jpg', { size: 5000 });

  const reference = { creationTime: taken, fileSizeBytes: 5000, filename: 'holiday.jpg' };
  const result = await validator.validate('file:///old/holiday.jpg', reference);

  assert.equal(result.recoveryMethod, 'metadata');
  assert.equal(result.effectiveUri, 'file:///new/DSC_0042.jpg');

  const withoutReference = await validator.validate('file:///old/holiday.jpg');
  assert.equal(withoutReference.isValid, false);
  assert.equal(withoutReference.failureReason, 'NotFound');
  assert.equal(withoutReference.recoveryMethod, 'failed');
});

test('validate only searches assets of the missing file\'s kind', async () => {
  const { source, files, validator } = setup();
  source.addAlbum('Mixed', [makeAsset({ id: 'still', title: 'trip.mp4', kind: 'photo' })]);
  source.setFile('still', { type: 'path', path: '/new/trip.mp4' });
  files.addFile('/new/trip.mp4');

  const result = await validator.validate('file:///old/trip.mp4');

  assert.equal(result.recoveryMethod, 'failed');
  assert.equal(source.getAssetsCalls[0].filter.kind, 'video');
});

test('validate fails malformed references that carry no filename', async () => {
  const { validator } = setup();

  const result = await validator.validate('not a uri');

  assert.equal(result.isValid, false);
  assert.equal(result.failureReason, 'NotFound');
  assert.equal(result.recoveryMethod, 'failed');
  assert.equal(result.errorMessage, 'Reference has no filename to recover from');
});

test('validateAll keeps request order and summarizes the batch', async () => {
  const { source, files, validator } = setup();
  files.addFile('/lib/ok.jpg');
  files.addFile('/lib/empty.png', { size: 0 });
  source.addAlbum('Camera', [makeAsset({ id: 'm', title: 'moved.png' })]);
  source.setFile('m', { type: 'path', path: '/new/moved.png' });
  files.addFile('/new/moved.png');

  const batch = await validator.validateAll([
    { uri: 'file:///lib/ok.jpg' },
    { uri: 'file:///lib/missing.jpg' },
    { uri: 'file:///lib/empty.png' },
    { uri: 'file:///old/moved.png' },
  ]);

  assert.deepEqual(
    batch.results.map((r) => [r.originalUri, r.isValid, r.failureReason ?? null]),
    [
      ['file:///lib/ok.jpg', true, null],
      ['file:///lib/missing.jpg', false, 'NotFound'],
      ['file:///lib/empty.png', false, 'Empty'],
      ['file:///old/moved.png', true, null],
    ]
  );
  assert.equal(batch.totalItems, 4);
  assert.equal(batch.validItems, 1);
  assert.equal(batch.recoveredItems, 1);
  assert.equal(batch.failedItems, 2);
  assert.equal(batch.successRate, 0.5);
});

test('validateAll reports a validation that exceeds its time budget as NotFound', async () => {
  const { source, validator } = setup({ validationTimeoutMs: 50 });
  source.addAlbum('Camera', [makeAsset({ id: 'h', title: 'IMG_9.jpg' })]);
  source.setFile('h', { type: 'hang' });

  const batch = await validator.validateAll([{ uri: 'file:///old/IMG_9.jpg' }]);

  assert.equal(batch.failedItems, 1);
  assert.equal(batch.results[0].failureReason, 'NotFound');
  assert.equal(batch.results[0].errorMessage, 'Validation of file:///old/IMG_9.jpg timed out after 50ms');
});

test('summarizeValidation treats an empty batch as fully successful', () => {
  assert.deepEqual(summarizeValidation([]), {
    results: [],
    totalItems: 0,
    validItems: 0,
    recoveredItems: 0,
    failedItems: 0,
    successRate: 1,
  });
});

test('hasValidImageHeader checks format magic numbers', () => {
  assert.equal(hasValidImageHeader(JPEG_HEADER, 'image/jpeg'), true);
  assert.equal(hasValidImageHeader(PNG_HEADER, 'image/png'), true);
  assert.equal(hasValidImageHeader(JPEG_HEADER, 'image/png'), false);
  assert.equal(hasValidImageHeader(Buffer.from('GIF89a\0\0\0\0', 'latin1'), 'image/gif'), true);
  assert.equal(hasValidImageHeader(Buffer.from('RIFF\0\0\0\0WEBP', 'latin1'), 'image/webp'), true);
  assert.equal(hasValidImageHeader(Buffer.from('RIFF\0\0\0\0WAVE', 'latin1'), 'image/webp'), false);
  assert.equal(hasValidImageHeader(Buffer.from([0xff, 0xd8]), 'image/jpeg'), false);
  assert.equal(hasValidImageHeader(Buffer.alloc(12), 'image/heic'), true);
});

test('matchesFilenamePattern needs a shared stem prefix and extension', () => {
  assert.equal(matchesFilenamePattern('IMG_1 (1).jpg', 'IMG_1.jpg'), true);
  assert.equal(matchesFilenamePattern('IMG_1.jpg', 'IMG_1_edit.jpg'), true);
  assert.equal(matchesFilenamePattern('IMG_1.png', 'IMG_1.jpg'), false);
  assert.equal(matchesFilenamePattern('IMG_1.jpg', 'IMG_1.jpg'), false);
  assert.equal(matchesFilenamePattern('ab1.jpg', 'ab.jpg'), false);
});

test('validate recovers through the asset id before searching by filename', async () => {
  const { source, files, validator } = setup();
  source.addAlbum('Camera', [
    makeAsset({ id: 'same-name', title: 'IMG_7.jpg' }),
    makeAsset({ id: 'original', title: 'IMG_7-edited.jpg' }),
  ]);
  source.setFile('same-name', { type: 'path', path: '/other/IMG_7.jpg' });
  source.setFile('original', { type: 'path', path: '/new/IMG_7-edited.jpg' });
  files.addFile('/other/IMG_7.jpg');
  files.addFile('/new/IMG_7-edited.jpg');

  const result = await validator.validate('file:///old/IMG_7.jpg', undefined, 'original');

  assert.equal(result.recoveryMethod, 'asset-id');
  assert.equal(result.effectiveUri, 'file:///new/IMG_7-edited.jpg');
  assert.equal(source.getAssetsCalls.length, 0);
});

test('validate falls back to filename recovery when the asset id has no live file', async () => {
  const { source, files, validator } = setup();
  source.addAlbum('Camera', [
    makeAsset({ id: 'deleted', title: 'IMG_8.jpg' }),
    makeAsset({ id: 'copy', title: 'IMG_8.jpg' }),
  ]);
  source.setFile('deleted', { type: 'missing' });
  source.setFile('copy', { type: 'path', path: '/backup/IMG_8.jpg' });
  files.addFile('/backup/IMG_8.jpg');

  const byUnknownId = await validator.validate('file:///old/IMG_8.jpg', undefined, 'no-such-asset');
  assert.equal(byUnknownId.recoveryMethod, 'exact-filename');

  const byDeletedId = await validator.validate('file:///old/IMG_8.jpg', undefined, 'deleted');
  assert.equal(byDeletedId.recoveryMethod, 'exact-filename');
  assert.equal(byDeletedId.effectiveUri, 'file:///backup/IMG_8.jpg');
});

test('validateAll passes each request\'s asset id to recovery', async () => {
  const { source, files, validator } = setup();
  source.addAlbum('Camera', [makeAsset({ id: 'asset-42', title: 'renamed.png' })]);
  source.setFile('asset-42', { type: 'path', path: '/lib/renamed.png' });
  files.addFile('/lib/renamed.png');

  const batch = await validator.validateAll([
    { uri: 'file:///old/original.png', assetId: 'asset-42' },
    { uri: 'file:///old/original.png' },
  ]);

  assert.deepEqual(
    batch.results.map((result) => [result.recoveryMethod, result.effectiveUri]),
    [
      ['asset-id', 'file:///lib/renamed.png'],
      ['failed', 'file:///old/original.png'],
    ]
  );
});
