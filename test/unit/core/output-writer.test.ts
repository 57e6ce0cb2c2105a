import os from 'os';
import path from 'path';
import { writeFileSync } from 'fs';
import fs from 'fs/promises';
import { DEFAULT_NUMBERING, chooseName } from '../../../src/core/numbering.js';
import { OutputWriter, destinationFor, writeAtomic, type NameChooser } from '../../../src/core/output-writer.js';
import { PatchErrorCode } from '../../../src/shared/errors.js';
import { MemoryStream } from '../../helpers/memory-stream.js';

const named =
  (subject: string, force = false): NameChooser =>
  (existingNames) =>
    chooseName({ subject, spec: { ...DEFAULT_NUMBERING, force }, existingNames, disambiguator: '1234567890' });

describe('destinationFor', () => {
  it('maps the output options to a destination', () => {
    expect(destinationFor({ write: false, dir: 'ignored' })).toEqual({ kind: 'stdout' });
    expect(destinationFor({ write: true })).toEqual({ kind: 'cwd' });
    expect(destinationFor({ write: true, dir: 'out' })).toEqual({ kind: 'directory', path: 'out' });
    expect(destinationFor({ write: true, dir: 'out', output: 'one.patch' })).toEqual({ kind: 'file', path: 'one.patch' });
  });

  it('refuses a single output file for several patches', () => {
    expect(() => destinationFor({ write: true, output: 'one.patch' }, 2)).toThrow(
      expect.objectContaining({ code: PatchErrorCode.INVALID_DESTINATION })
    );
  });
});

describe('OutputWriter', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patch-export-test-'));
  });

  afterEach(async () => {
    await fs.chmod(tmpDir, 0o700);
    await fs.rm(tmpDir, { recursive: true });
  });

  it('writes patch text to the stream', async () => {
    const stdout = new MemoryStream();
    const outcome = await new OutputWriter({ stdout, cwd: tmpDir }).write({ content: 'text\n', destination: { kind: 'stdout' } });
    expect(outcome).toEqual({ kind: 'stream' });
    expect(stdout.text()).toBe('text\n');
    expect(await fs.readdir(tmpDir)).toEqual([]);
  });

  it('writes into the working directory under the chosen name', async () => {
    const writer = new OutputWriter({ cwd: tmpDir });
    const outcome = await writer.write({ content: 'one\n', destination: { kind: 'cwd' }, chooseName: named('Fix a.c') });
    expect(outcome).toEqual({
      kind: 'file',
      path: path.join(tmpDir, 'Fix-a.c'),
      requestedPath: path.join(tmpDir, 'Fix-a.c'),
      outcome: 'new',
    });
    expect(await fs.readFile(path.join(tmpDir, 'Fix-a.c'), 'utf-8')).toBe('one\n');
    expect(await fs.readdir(tmpDir)).toEqual(['Fix-a.c']);
  });

  it('resolves a relative directory against its working directory', async () => {
    await fs.mkdir(path.join(tmpDir, 'out'));
    const writer = new OutputWriter({ cwd: tmpDir });
    await writer.write({ content: 'x\n', destination: { kind: 'directory', path: 'out' }, chooseName: named('x') });
    expect(await fs.readdir(path.join(tmpDir, 'out'))).toEqual(['x']);
  });

  it('keeps an existing file and picks another name without force', async () => {
    await fs.writeFile(path.join(tmpDir, 'Fix-a.c'), 'old\n');
    const writer = new OutputWriter({ cwd: tmpDir });
    const outcome = await writer.write({ content: 'new\n', destination: { kind: 'cwd' }, chooseName: named('Fix a.c') });
    expect(outcome).toMatchObject({ path: path.join(tmpDir, 'Fix-a.c-12345678'), outcome: 'renamed' });
    expect(await fs.readFile(path.join(tmpDir, 'Fix-a.c'), 'utf-8')).toBe('old\n');
    expect(await fs.readFile(path.join(tmpDir, 'Fix-a.c-12345678'), 'utf-8')).toBe('new\n');
  });

  it('overwrites an existing file with force', async () => {
    await fs.writeFile(path.join(tmpDir, 'Fix-a.c'), 'old\n');
    const writer = new OutputWriter({ cwd: tmpDir });
    const outcome = await writer.write({ content: 'new\n', destination: { kind: 'cwd' }, chooseName: named('Fix a.c', true) });
    expect(outcome).toMatchObject({ outcome: 'overwrite' });
    expect(await fs.readFile(path.join(tmpDir, 'Fix-a.c'), 'utf-8')).toBe('new\n');
    expect(await fs.readdir(tmpDir)).toEqual(['Fix-a.c']);
  });

  it('sees files written earlier in the same run', async () => {
    const writer = new OutputWriter({ cwd: tmpDir });
    await writer.write({ content: '1\n', destination: { kind: 'cwd' }, chooseName: named('same') });
    const second = await writer.write({ content: '2\n', destination: { kind: 'cwd' }, chooseName: named('same') });
    expect(second).toMatchObject({ outcome: 'renamed', path: path.join(tmpDir, 'same-12345678') });
  });

  it('chooses again when the name is taken between listing and writing', async () => {
    let calls = 0;
    const racing: NameChooser = (existingNames) => {
      calls++;
      // Another writer claims the name right after the listing.
      if (calls === 1) writeFileSync(path.join(tmpDir, 'same'), 'theirs\n');
      return named('same')(existingNames);
    };
    const writer = new OutputWriter({ cwd: tmpDir });
    const outcome = await writer.write({ content: 'ours\n', destination: { kind: 'cwd' }, chooseName: racing });

    expect(calls).toBe(2);
    expect(outcome).toMatchObject({ path: path.join(tmpDir, 'same-12345678'), outcome: 'renamed' });
    expect(await fs.readFile(path.join(tmpDir, 'same'), 'utf-8')).toBe('theirs\n');
    expect(await fs.readFile(path.join(tmpDir, 'same-12345678'), 'utf-8')).toBe('ours\n');
    expect((await fs.readdir(tmpDir)).sort()).toEqual(['same', 'same-12345678']);
  });

  it('writes an explicit file, renaming on conflict before the extension', async () => {
    await fs.writeFile(path.join(tmpDir, 'out.patch'), 'old\n');
    const writer = new OutputWriter({ cwd: tmpDir });
    const outcome = await writer.write({
      content: 'new\n',
      destination: { kind: 'file', path: 'out.patch' },
      disambiguator: 'extract',
    });
    expect(outcome).toMatchObject({ path: path.join(tmpDir, 'out-extract.patch'), outcome: 'renamed' });
  });

  it('overwrites an explicit file with force', async () => {
    await fs.writeFile(path.join(tmpDir, 'out.patch'), 'old\n');
    const writer = new OutputWriter({ cwd: tmpDir });
    await writer.write({ content: 'new\n', destination: { kind: 'file', path: 'out.patch' }, force: true });
    expect(await fs.readFile(path.join(tmpDir, 'out.patch'), 'utf-8')).toBe('new\n');
  });

  it('rejects a missing directory', async () => {
    const writer = new OutputWriter({ cwd: tmpDir });
    await expect(
      writer.write({ content: 'x', destination: { kind: 'directory', path: 'nope' }, chooseName: named('x') })
    ).rejects.toMatchObject({ code: PatchErrorCode.INVALID_DESTINATION });
  });

  it('rejects a directory that is a file', async () => {
    await fs.writeFile(path.join(tmpDir, 'plain'), '');
    const writer = new OutputWriter({ cwd: tmpDir });
    await expect(
      writer.write({ content: 'x', destination: { kind: 'directory', path: 'plain' }, chooseName: named('x') })
    ).rejects.toMatchObject({ code: PatchErrorCode.INVALID_DESTINATION, message: `Not a directory: ${path.join(tmpDir, 'plain')}` });
  });

  it('rejects an output file that is a directory', async () => {
    await fs.mkdir(path.join(tmpDir, 'sub'));
    const writer = new OutputWriter({ cwd: tmpDir });
    await expect(writer.write({ content: 'x', destination: { kind: 'file', path: 'sub' } })).rejects.toMatchObject({
      code: PatchErrorCode.INVALID_DESTINATION,
    });
  });

  it('needs a name chooser for directory destinations', async () => {
    const writer = new OutputWriter({ cwd: tmpDir });
    await expect(writer.write({ content: 'x', destination: { kind: 'cwd' } })).rejects.toMatchObject({
      code: PatchErrorCode.INVALID_DESTINATION,
    });
  });

  // root ignores directory permissions
  const asUser = process.getuid?.() === 0 ? it.skip : it;

  asUser('reports an unwritable directory and writes nothing', async () => {
    const locked = path.join(tmpDir, 'locked');
    await fs.mkdir(locked);
    await fs.chmod(locked, 0o500);
    const writer = new OutputWriter({ cwd: tmpDir });
    await expect(
      writer.write({ content: 'x', destination: { kind: 'directory', path: 'locked' }, chooseName: named('x') })
    ).rejects.toMatchObject({ code: PatchErrorCode.PERMISSION_DENIED });
    await fs.chmod(locked, 0o700);
    expect(await fs.readdir(locked)).toEqual([]);
  });
});

describe('writeAtomic', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patch-export-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('writes a new file and leaves no temporary sibling', async () => {
    const target = path.join(tmpDir, 'new.patch');
    await expect(writeAtomic(target, 'text\n')).resolves.toBe(true);
    expect(await fs.readFile(target, 'utf-8')).toBe('text\n');
    expect(await fs.readdir(tmpDir)).toEqual(['new.patch']);
  });

  it('leaves an existing file alone without overwrite', async () => {
    const target = path.join(tmpDir, 'taken.patch');
    await fs.writeFile(target, 'old\n');
    await expect(writeAtomic(target, 'new\n')).resolves.toBe(false);
    expect(await fs.readFile(target, 'utf-8')).toBe('old\n');
    expect(await fs.readdir(tmpDir)).toEqual(['taken.patch']);
  });

  it('replaces an existing file with overwrite', async () => {
    const target = path.join(tmpDir, 'taken.patch');
    await fs.writeFile(target, 'old\n');
    await expect(writeAtomic(target, 'new\n', { overwrite: true })).resolves.toBe(true);
    expect(await fs.readFile(target, 'utf-8')).toBe('new\n');
    expect(await fs.readdir(tmpDir)).toEqual(['taken.patch']);
  });

  it('keeps the target and removes the temporary file when the final move fails', async () => {
    const blocked = path.join(tmpDir, 'blocked');
    await fs.mkdir(blocked);
    await fs.writeFile(path.join(blocked, 'keep'), 'kept\n');

    await expect(writeAtomic(blocked, 'new\n', { overwrite: true })).rejects.toMatchObject({
      code: PatchErrorCode.INVALID_DESTINATION,
      message: `Failed to write ${blocked}`,
    });
    expect(await fs.readdir(tmpDir)).toEqual(['blocked']);
    expect(await fs.readdir(blocked)).toEqual(['keep']);
    expect(await fs.readFile(path.join(blocked, 'keep'), 'utf-8')).toBe('kept\n');
  });
});
