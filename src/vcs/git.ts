import { stat } from 'fs/promises';
import { homedir } from 'os';
import path from 'path';
import { run, runOrThrow } from '../shared/exec.js';
import { PatchError, PatchErrorCode, describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ResolvedCommit } from '../types/patch.js';
import { parseUnifiedDiff } from './diff-parser.js';
import type { VcsRepository } from './types.js';

const FIELD_SEPARATOR = '\x00';
// id, author name, author email, committer name, committer email, author date, raw message
const SHOW_FORMAT = ['%H', '%an', '%ae', '%cn', '%ce', '%aD', '%B'].join('%x00');

export class GitRepository implements VcsRepository {
  constructor(
    readonly location: string,
    /** Absolute directory git commands run in. */
    readonly workdir: string
  ) {}

  async resolveReference(reference: string): Promise<string | null> {
    const result = await this.git(['rev-parse', '--verify', '--quiet', `${reference}^{commit}`]);
    if (result.exitCode !== 0) return null;
    const id = result.stdout.trim();
    return id.length > 0 ? id : null;
  }

  async readCommit(id: string): Promise<ResolvedCommit> {
    const shown = await this.gitOrThrow(['show', '-s', `--format=${SHOW_FORMAT}`, id]);
    const meta = parseShowOutput(shown.stdout);

    // -m --first-parent: a merge is exported as its diff against the mainline parent.
    const diff = await this.gitOrThrow([
      'diff-tree', '-r', '-p', '-M', '--root', '-m', '--first-parent', '--no-commit-id', '--no-color', id,
    ]);
    const { changes } = parseUnifiedDiff(diff.stdout);

    return Object.freeze({
      ...meta,
      changes: Object.freeze(changes),
      repository: this.location,
    });
  }

  async contains(id: string): Promise<boolean> {
    // Exit 1 means "not an ancestor"; anything else (unknown object) is also a no.
    const result = await this.git(['merge-base', '--is-ancestor', id, 'HEAD']);
    return result.exitCode === 0;
  }

  async describeVersion(id: string): Promise<string | null> {
    const result = await this.git(['name-rev', '--name-only', '--refs=refs/tags/v*', id]);
    if (result.exitCode !== 0) return null;
    return parseNameRev(result.stdout);
  }

  async nextVersion(): Promise<string | null> {
    const result = await this.git(['tag', '-l', 'v[0-9]*']);
    if (result.exitCode !== 0) return null;
    return predictNextVersion(result.stdout.split('\n').map((tag) => tag.trim()).filter(Boolean));
  }

  async isPublished(id: string): Promise<boolean> {
    const remotes = await this.git(['remote']);
    if (remotes.exitCode !== 0 || remotes.stdout.trim() === '') return true;
    const branches = await this.git(['branch', '-r', '--contains', id]);
    return branches.exitCode === 0 && branches.stdout.trim() !== '';
  }

  private git(args: string[]) {
    return run('git', args, { cwd: this.workdir });
  }

  private async gitOrThrow(args: string[]) {
    try {
      return await runOrThrow('git', args, { cwd: this.workdir });
    } catch (err) {
      if (err instanceof PatchError) {
        throw new PatchError(PatchErrorCode.GIT_ERROR, `git ${args[0]} failed in ${this.location}: ${err.message}`, {
          ...err.context,
          repository: this.location,
        });
      }
      throw err;
    }
  }
}

export function expandHome(location: string, home: string = homedir()): string {
  if (location === '~') return home;
  if (location.startsWith('~/')) return path.join(home, location.slice(2));
  return location;
}

/** Open the repository at `location` (relative to `cwd`); null when it is not one. */
export async function openRepository(location: string, cwd: string = process.cwd()): Promise<GitRepository | null> {
  const workdir = path.resolve(cwd, expandHome(location));
  try {
    const info = await stat(workdir);
    if (!info.isDirectory()) return null;
  } catch (err) {
    logger.debug({ location, error: describeError(err) }, 'Repository location is not accessible');
    return null;
  }
  const probe = await run('git', ['rev-parse', '--git-dir'], { cwd: workdir });
  if (probe.exitCode !== 0) {
    logger.debug({ location, stderr: probe.stderr.trim() }, 'Not a git repository');
    return null;
  }
  return new GitRepository(location, workdir);
}

export function parseShowOutput(output: string): Omit<ResolvedCommit, 'changes' | 'repository'> {
  const fields = output.split(FIELD_SEPARATOR);
  if (fields.length < 7) {
    throw new PatchError(PatchErrorCode.GIT_ERROR, 'Unexpected git show output', { output });
  }
  const [id, authorName, authorEmail, committerName, committerEmail, date] = fields;
  const message = fields.slice(6).join(FIELD_SEPARATOR).replace(/\s+$/, '');
  const [subjectLine, ...rest] = message.split('\n');
  return {
    id: id.trim(),
    author: { name: authorName, email: authorEmail },
    committer: { name: committerName, email: committerEmail },
    date,
    subject: subjectLine.trim(),
    body: rest.join('\n').replace(/^\s*\n/, '').trim(),
  };
}

/** `v6.3-rc2~12` → `v6.3-rc2`; null for `undefined` or empty output. */
export function parseNameRev(output: string): string | null {
  const name = output.trim().split(/\s+/).pop() ?? '';
  if (name === '' || name === 'undefined') return null;
  const tag = name.replace(/^tags\//, '').replace(/[~^].*$/, '');
  return tag.length > 0 ? tag : null;
}

interface VersionKey {
  major: number;
  minor: number;
  patch: number;
  rc: number | null;
}

// x.y.z tags come from -stable and never name a mainline release, except in the 2.6 era.
export function versionKey(tag: string): VersionKey | null {
  const legacy = /^v2\.(\d+)\.(\d+)(?:-rc(\d+))?$/.exec(tag);
  if (legacy) {
    return { major: 2, minor: Number(legacy[1]), patch: Number(legacy[2]), rc: legacy[3] ? Number(legacy[3]) : null };
  }
  const modern = /^v(\d+)\.(\d+)(?:-rc(\d+))?$/.exec(tag);
  if (modern && modern[1] !== '2') {
    return { major: Number(modern[1]), minor: Number(modern[2]), patch: 0, rc: modern[3] ? Number(modern[3]) : null };
  }
  return null;
}

export function compareVersions(a: VersionKey, b: VersionKey): number {
  if (a.major !== b.major) return a.major - b.major;
  if (a.minor !== b.minor) return a.minor - b.minor;
  if (a.patch !== b.patch) return a.patch - b.patch;
  // A release sorts after all of its release candidates.
  if (a.rc === null || b.rc === null) return (a.rc === null ? 1 : 0) - (b.rc === null ? 1 : 0);
  return a.rc - b.rc;
}

export function predictNextVersion(tags: string[]): string | null {
  const keyed = tags
    .map((tag) => ({ tag, key: versionKey(tag) }))
    .filter((entry): entry is { tag: string; key: VersionKey } => entry.key !== null)
    .sort((a, b) => compareVersions(a.key, b.key));
  const latest = keyed[keyed.length - 1];
  if (!latest) return null;

  const match = /^v(\d+)\.(\d+)(?:-rc(\d+))?$/.exec(latest.tag);
  if (!match) return null;
  const [, major, minor, rc] = match;
  if (rc === undefined) {
    return `v${major}.${Number(minor) + 1}-rc1`;
  }
  return `v${major}.${minor} or v${major}.${minor}-rc${Number(rc) + 1} (next release)`;
}
