import { randomBytes } from 'crypto';
import { constants } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { PatchError, PatchErrorCode, describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Destination, WriteOutcome } from '../types/patch.js';
import { resolveConflict, type NameChoice } from './numbering.js';

export interface OutputArgs {
  write: boolean;
  dir?: string;
  output?: string;
}

/** Map the write/dir/output options of a request to a destination. */
export function destinationFor(args: OutputArgs, count = 1): Destination {
  if (!args.write) return { kind: 'stdout' };
  if (args.output !== undefined) {
    if (count > 1) {
      throw new PatchError(PatchErrorCode.INVALID_DESTINATION, 'An output file names one patch; use a directory for several', {
        path: args.output,
      });
    }
    return { kind: 'file', path: args.output };
  }
  if (args.dir !== undefined) return { kind: 'directory', path: args.dir };
  return { kind: 'cwd' };
}

export type NameChooser = (existingNames: ReadonlySet<string>) => NameChoice;

const MAX_PLACE_ATTEMPTS = 5;

export interface WriteRequest {
  content: string;
  destination: Destination;
  /** Picks the file name inside a directory destination. */
  chooseName?: NameChooser;
  /** File destinations only: overwrite an existing file instead of renaming. */
  force?: boolean;
  /** File destinations only: distinguishes the alternate name on conflict. */
  disambiguator?: string;
}

export interface OutputWriterOptions {
  stdout?: NodeJS.WritableStream;
  /** Base for relative destinations and the `cwd` destination. */
  cwd?: string;
}

/** The one side effect of an export: patch text to a stream, a directory or a file. */
export class OutputWriter {
  private readonly stdout: NodeJS.WritableStream;
  private readonly cwd: string;

  constructor(options: OutputWriterOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.cwd = options.cwd ?? process.cwd();
  }

  async write(request: WriteRequest): Promise<WriteOutcome> {
    const { destination } = request;
    switch (destination.kind) {
      case 'stdout':
        await this.writeStream(request.content);
        return { kind: 'stream' };
      case 'cwd':
        return this.writeIntoDirectory(this.cwd, request);
      case 'directory':
        return this.writeIntoDirectory(path.resolve(this.cwd, destination.path), request);
      case 'file':
        return this.writeFile(path.resolve(this.cwd, destination.path), request);
    }
  }

  private async writeIntoDirectory(dir: string, request: WriteRequest): Promise<WriteOutcome> {
    const { chooseName } = request;
    if (!chooseName) {
      throw new PatchError(PatchErrorCode.INVALID_DESTINATION, `No file name given for directory ${dir}`, { path: dir });
    }
    await ensureWritableDirectory(dir);
    return this.place(dir, chooseName, request.content);
  }

  private async writeFile(target: string, request: WriteRequest): Promise<WriteOutcome> {
    const targetInfo = await statOrNull(target);
    if (targetInfo?.isDirectory()) {
      throw new PatchError(PatchErrorCode.INVALID_DESTINATION, `Output file is a directory: ${target}`, {
        path: target,
      });
    }
    const dir = path.dirname(target);
    await ensureWritableDirectory(dir);

    const base = path.basename(target);
    const ext = path.extname(base);
    const choose: NameChooser = (existingNames) =>
      resolveConflict(base.slice(0, base.length - ext.length), ext, existingNames, request.force ?? false, request.disambiguator);
    return this.place(dir, choose, request.content);
  }

  /**
   * Pick a name and write it. Names are read fresh for every attempt: earlier writes in
   * the same batch, or another process, change the namespace.
   */
  private async place(dir: string, choose: NameChooser, content: string): Promise<WriteOutcome> {
    for (let attempt = 1; attempt <= MAX_PLACE_ATTEMPTS; attempt++) {
      const choice = choose(await listNames(dir));
      const finalPath = path.join(dir, choice.name);
      const written = await writeAtomic(finalPath, content, { overwrite: choice.outcome === 'overwrite' });
      if (!written) {
        logger.debug({ path: finalPath, attempt }, 'Target appeared while writing; choosing again');
        continue;
      }

      if (choice.outcome === 'renamed') {
        logger.warn({ requested: choice.requested, written: choice.name }, `${choice.requested} already exists. Using ${choice.name}`);
      } else if (choice.outcome === 'overwrite') {
        logger.info({ path: finalPath }, 'Overwriting existing patch file');
      }
      return { kind: 'file', path: finalPath, requestedPath: path.join(dir, choice.requested), outcome: choice.outcome };
    }
    throw new PatchError(PatchErrorCode.INVALID_DESTINATION, `Could not claim a file name in ${dir}`, {
      path: dir,
      attempts: MAX_PLACE_ATTEMPTS,
    });
  }

  private writeStream(content: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stdout.write(content, (err) => (err ? reject(err) : resolve()));
    });
  }
}

export async function ensureWritableDirectory(dir: string): Promise<void> {
  const info = await statOrNull(dir);
  if (!info || !info.isDirectory()) {
    throw new PatchError(
      PatchErrorCode.INVALID_DESTINATION,
      info ? `Not a directory: ${dir}` : `Directory does not exist: ${dir}`,
      { path: dir }
    );
  }
  try {
    await fs.access(dir, constants.W_OK);
  } catch (err) {
    throw new PatchError(PatchErrorCode.PERMISSION_DENIED, `Directory is not writable: ${dir}`, {
      path: dir,
      cause: describeError(err),
    });
  }
}

export interface AtomicWriteOptions {
  /** Replace an existing target. Without it an existing target is left alone. */
  overwrite?: boolean;
}

/**
 * Write through a temporary sibling and move it into place, so the target is either
 * the complete new content or left as it was. Resolves false, writing nothing, when
 * the target exists and `overwrite` is off.
 */
export async function writeAtomic(target: string, content: string, options: AtomicWriteOptions = {}): Promise<boolean> {
  const dir = path.dirname(target);
  const temp = path.join(dir, `.${path.basename(target)}.${randomBytes(4).toString('hex')}.tmp`);
  try {
    await fs.writeFile(temp, content, { encoding: 'utf-8', flag: 'wx' });
    if (options.overwrite) {
      await fs.rename(temp, target);
      return true;
    }
    // link fails with EEXIST where rename would replace.
    await fs.link(temp, target);
    return true;
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === 'EEXIST' && !options.overwrite) return false;
    if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS') {
      throw new PatchError(PatchErrorCode.PERMISSION_DENIED, `Cannot write ${target}`, {
        path: target,
        cause: describeError(err),
      });
    }
    throw new PatchError(PatchErrorCode.INVALID_DESTINATION, `Failed to write ${target}`, {
      path: target,
      cause: describeError(err),
    });
  } finally {
    await fs.rm(temp, { force: true });
  }
}

async function listNames(dir: string): Promise<Set<string>> {
  return new Set(await fs.readdir(dir));
}

async function statOrNull(target: string) {
  try {
    return await fs.stat(target);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT' || (err as NodeJS.ErrnoException).code === 'ENOTDIR') {
      return null;
    }
    throw err;
  }
}
