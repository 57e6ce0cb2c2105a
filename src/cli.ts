#!/usr/bin/env node
/**
 * Command line front end.
 *
 *   patch-export export -w -d ./patches -n 1234abcd v6.3 5678ef01
 *   patch-export export -x drivers/scsi/st.c -F bsc#1234 -S 1234abcd > st.patch
 *   patch-export extract -X Documentation/ -w -d ./out old.patch
 *
 * Exit status is 0 on success (written file names go to stdout) and 1 on any error.
 */
import path from 'path';
import yargs, { type Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { readGitIdentity, resolveSigner } from './config/identity.js';
import { loadConfig, type ConfigResult, type LoadConfigOptions } from './config/loader.js';
import { exportCommits, extractFromPatch } from './core/exporter.js';
import { OutputWriter, destinationFor } from './core/output-writer.js';
import { PatchError, PatchErrorCode, describeError } from './shared/errors.js';
import { enableDebug, logger } from './shared/logger.js';
import type { PatchConfig } from './types/config.js';
import type { Identity, WriteOutcome } from './types/patch.js';
import { openRepository } from './vcs/git.js';
import type { RepositoryOpener } from './vcs/types.js';

export interface CliRuntime {
  stdout: NodeJS.WritableStream;
  cwd: string;
  env: NodeJS.ProcessEnv;
  openRepository: RepositoryOpener;
  loadConfig: (options: LoadConfigOptions) => ConfigResult;
  /** Identity from the local git configuration, used when the config names no contact. */
  gitIdentity: (cwd: string) => Promise<Identity | null>;
}

function defaultRuntime(): CliRuntime {
  return {
    stdout: process.stdout,
    cwd: process.cwd(),
    env: process.env,
    openRepository: (location) => openRepository(location, process.cwd()),
    loadConfig,
    gitIdentity: readGitIdentity,
  };
}

function reportOutcome(outcome: WriteOutcome, runtime: CliRuntime): void {
  if (outcome.kind === 'file') runtime.stdout.write(`${path.basename(outcome.path)}\n`);
}

function withCommonOptions<T>(argv: Argv<T>) {
  return argv
    .option('write', { alias: 'w', type: 'boolean', default: false, describe: 'write patch files instead of stdout' })
    .option('dir', { alias: 'd', type: 'string', describe: 'with -w, write into this directory (default ".")' })
    .option('output', { alias: 'o', type: 'string', describe: 'with -w, write to this file' })
    .option('suffix', { alias: 's', type: 'boolean', default: false, describe: 'with -w, append .patch to file names' })
    .option('force', { alias: 'f', type: 'boolean', default: false, describe: 'overwrite existing files' })
    .option('reference', { alias: 'F', type: 'string', array: true, nargs: 1, describe: 'add a reference tag (repeatable)' })
    .option('extract', { alias: 'x', type: 'string', array: true, nargs: 1, describe: 'keep only these paths; a path ending in / selects a directory (repeatable)' })
    .option('exclude', { alias: 'X', type: 'string', array: true, nargs: 1, describe: 'drop paths matching these globs; a path ending in / drops a directory (repeatable)' })
    .option('signed-off-by', { alias: 'S', type: 'boolean', default: false, describe: 'add a Signed-off-by line for the configured contact' })
    .option('config', { type: 'string', describe: 'read only this config file' })
    .option('debug', { alias: 'D', type: 'boolean', default: false, describe: 'debug logging' });
}

export function buildCli(argv: string[], overrides: Partial<CliRuntime> = {}) {
  const runtime: CliRuntime = { ...defaultRuntime(), ...overrides };

  const prepare = (args: { debug: boolean; config?: string }): PatchConfig => {
    if (args.debug) enableDebug();
    const explicitPath = args.config ?? runtime.env.PATCH_EXPORT_CONFIG;
    return runtime.loadConfig({ explicitPath, cwd: runtime.cwd }).config;
  };
  const writer = () => new OutputWriter({ stdout: runtime.stdout, cwd: runtime.cwd });

  return yargs(argv)
    .scriptName('patch-export')
    .command(
      'export <commits..>',
      'Export commits as patch files with provenance headers',
      (y) =>
        withCommonOptions(y)
          .positional('commits', { type: 'string', array: true, demandOption: true, describe: 'commit hashes or tags' })
          .option('numeric', { alias: 'n', type: 'boolean', default: false, describe: 'with -w, prefix file names with numbers' })
          .option('first-number', { alias: 'N', type: 'number', default: 1, describe: 'first patch number' })
          .option('num-width', { type: 'number', describe: 'digits in patch numbers (default from config, 4)' }),
      async (args) => {
        const config = prepare(args);
        const commits = args.commits.map(String);
        const signedOffBy = args.signedOffBy ? await resolveSigner(config, runtime.cwd, runtime.gitIdentity) : undefined;

        const results = await exportCommits(
          commits,
          {
            destination: destinationFor(args, commits.length),
            numbering: {
              enabled: args.numeric,
              start: args.firstNumber,
              width: args.numWidth,
              suffix: args.suffix ? '.patch' : '',
              force: args.force,
            },
            filters: { extract: args.extract, exclude: args.exclude },
            references: args.reference,
            signedOffBy,
            allowLocal: args.force,
          },
          { config, openRepository: runtime.openRepository, writer: writer() }
        );
        for (const result of results) reportOutcome(result.outcome, runtime);
      }
    )
    .command(
      'extract <patch>',
      'Re-extract selected files from an existing patch',
      (y) =>
        withCommonOptions(y)
          .positional('patch', { type: 'string', demandOption: true, describe: 'patch file to read' })
          .option('mainline', { alias: 'M', type: 'string', describe: 'set the Patch-mainline header' }),
      async (args) => {
        const config = prepare(args);
        const signedOffBy = args.signedOffBy ? await resolveSigner(config, runtime.cwd, runtime.gitIdentity) : undefined;
        const result = await extractFromPatch(
          {
            patchPath: path.resolve(runtime.cwd, args.patch),
            destination: destinationFor(args),
            filters: { extract: args.extract, exclude: args.exclude },
            references: args.reference,
            mainline: args.mainline,
            signedOffBy,
            suffix: args.suffix ? '.patch' : '',
            force: args.force,
          },
          { config, writer: writer() }
        );
        reportOutcome(result.outcome, runtime);
      }
    )
    .demandCommand(1, 'Specify a command: export or extract')
    .strict()
    .help()
    .fail((message, err) => {
      throw err ?? new PatchError(PatchErrorCode.USAGE_ERROR, message, {});
    });
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<number> {
  try {
    await buildCli(argv).parseAsync();
    return 0;
  } catch (err) {
    if (err instanceof PatchError) {
      process.stderr.write(`Error [${err.code}]: ${err.message}\n`);
      logger.debug({ code: err.code, context: err.context }, 'Command failed');
    } else {
      process.stderr.write(`Error: ${describeError(err)}\n`);
    }
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`Error: ${describeError(err)}\n`);
      process.exitCode = 1;
    }
  );
}
