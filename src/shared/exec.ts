import execa from 'execa';
import { decodeUtf8 } from './encoding.js';
import { PatchError, PatchErrorCode, describeError } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
}

export interface ExecOptions {
  cwd?: string;
}

export async function run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  let result: execa.ExecaReturnValue<Buffer>;
  try {
    result = await execa(command, args, {
      cwd: options?.cwd,
      reject: false,
      // Diff text must survive byte-for-byte, trailing newline included.
      stripFinalNewline: false,
      encoding: null,
    });
  } catch (err) {
    throw new PatchError(PatchErrorCode.GIT_ERROR, `Command failed to spawn: ${command}`, {
      cause: describeError(err),
    });
  }

  const stdout = decodeUtf8(result.stdout ?? Buffer.alloc(0));
  if (stdout === null) {
    throw new PatchError(PatchErrorCode.GIT_ERROR, `Output of ${command} ${args[0] ?? ''} is not valid UTF-8`, {
      command: [command, ...args].join(' '),
    });
  }
  return {
    stdout,
    stderr: (result.stderr ?? Buffer.alloc(0)).toString('utf-8'),
    exitCode: result.exitCode ?? (result.isCanceled || result.killed || result.failed ? 128 : 0),
    signal: result.signal ?? undefined,
  };
}

export async function runOrThrow(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  const result = await run(command, args, options);
  if (result.exitCode !== 0) {
    throw new PatchError(
      PatchErrorCode.GIT_ERROR,
      `Command exited with ${result.exitCode}: ${command} ${args.join(' ')}`,
      {
        stdout: result.stdout,
        stderr: result.stderr,
      }
    );
  }
  return result;
}
