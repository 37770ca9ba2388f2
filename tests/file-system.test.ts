import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { FileAccessError } from '../cli/lib/types';
import { NodeFileSystem, toFileAccessError } from '../cli/services/media/file-system';

let tmpDir: string;
const files = new NodeFileSystem();

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'media-fs-test-'));
});

afterEach(async () => {
  await fs.remove(tmpDir);
});

test('stat reports size and file type', async () => {
  const filePath = path.join(tmpDir, 'a.bin');
  await fs.writeFile(filePath, Buffer.alloc(1500, 1));

  const fileStat = await files.stat(filePath);
  assert.equal(fileStat.size, 1500);
  assert.equal(fileStat.isFile, true);

  assert.equal((await files.stat(tmpDir)).isFile, false);
});

test('stat raises NOT_FOUND for missing paths', async () => {
  const missing = path.join(tmpDir, 'missing.jpg');

  await assert.rejects(
    () => files.stat(missing),
    (error: unknown) => error instanceof FileAccessError && error.code === 'NOT_FOUND' && error.path === missing
  );
});

test('readHeader returns at most the requested bytes', async () => {
  const filePath = path.join(tmpDir, 'h.bin');
  await fs.writeFile(filePath, Buffer.from([1, 2, 3, 4, 5, 6]));

  assert.deepEqual(await files.readHeader(filePath, 4), Buffer.from([1, 2, 3, 4]));
  assert.deepEqual(await files.readHeader(filePath, 12), Buffer.from([1, 2, 3, 4, 5, 6]));
  await assert.rejects(() => files.readHeader(path.join(tmpDir, 'nope'), 4), FileAccessError);
});

test('toFileAccessError classifies OS error codes', () => {
  const withCode = (code: string) => Object.assign(new Error(`${code}: failed`), { code });

  assert.equal(toFileAccessError(withCode('ENOENT'), '/x').code, 'NOT_FOUND');
  assert.equal(toFileAccessError(withCode('ENOTDIR'), '/x').code, 'NOT_FOUND');
  assert.equal(toFileAccessError(withCode('EACCES'), '/x').code, 'PERMISSION_DENIED');
  assert.equal(toFileAccessError(withCode('EPERM'), '/x').code, 'PERMISSION_DENIED');
  assert.equal(toFileAccessError(withCode('EIO'), '/x').code, 'UNREADABLE');
  assert.equal(toFileAccessError('weird', '/x').message, 'weird');

  const original = new FileAccessError('kept', 'PERMISSION_DENIED', '/y');
  assert.equal(toFileAccessError(original, '/x'), original);
});
