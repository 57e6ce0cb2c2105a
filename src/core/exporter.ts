import fs from 'fs/promises';
import path from 'path';
import { decodeUtf8 } from '../shared/encoding.js';
import { PatchError, PatchErrorCode, describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { SEARCH_KEY, type PatchConfig } from '../types/config.js';
import type {
  Destination,
  FilterSelection,
  Identity,
  NumberingSpec,
  ResolvedCommit,
  WriteOutcome,
} from '../types/patch.js';
import type { RepositoryOpener, VcsRepository } from '../vcs/types.js';
import { resolveCommit, validateReference } from './commit-resolver.js';
import { filterChanges } from './file-filter.js';
import { resolveMainlineTag } from './mainline-tag.js';
import { checkNumberingRange, chooseName, DEFAULT_MAX_NAME_LENGTH, DEFAULT_NUMBERING } from './numbering.js';
import { OutputWriter } from './output-writer.js';
import { getHeader, parsePatch } from './patch-parser.js';
import { renderParsedPatch, renderPatch } from './patch-generator.js';

export interface ExportDeps {
  config?: PatchConfig;
  openRepository: RepositoryOpener;
  writer: OutputWriter;
}

export interface ExportRequest {
  destination: Destination;
  numbering?: Partial<NumberingSpec>;
  filters?: FilterSelection;
  references?: readonly string[];
  signedOffBy?: Identity;
  /** Export commits that no remote-tracking branch contains. */
  allowLocal?: boolean;
}

export interface ExportResult {
  reference: string;
  commit: ResolvedCommit;
  outcome: WriteOutcome;
  /** Extract selectors that matched no file of the commit. */
  unmatched: string[];
  /** Every change was filtered away; the patch has a header and no diff. */
  empty: boolean;
}

export function numberingFor(request: Pick<ExportRequest, 'numbering'>, config?: PatchConfig): NumberingSpec {
  const given = request.numbering ?? {};
  return {
    enabled: given.enabled ?? DEFAULT_NUMBERING.enabled,
    start: given.start ?? DEFAULT_NUMBERING.start,
    width: given.width ?? config?.format.numberWidth ?? DEFAULT_NUMBERING.width,
    suffix: given.suffix ?? DEFAULT_NUMBERING.suffix,
    force: given.force ?? DEFAULT_NUMBERING.force,
  };
}

async function openSearchRepositories(deps: ExportDeps): Promise<VcsRepository[]> {
  const locations = deps.config?.repositories[SEARCH_KEY] ?? ['.'];
  const repos: VcsRepository[] = [];
  for (const location of locations) {
    const repo = await deps.openRepository(location);
    if (repo) repos.push(repo);
    else logger.debug({ location }, 'Search location is not a repository');
  }
  return repos;
}

/** Export one commit: resolve, tag, filter, render, write. `position` numbers it within a batch. */
export async function exportCommit(
  reference: string,
  request: ExportRequest,
  deps: ExportDeps,
  position = 0
): Promise<ExportResult> {
  const filters = request.filters ?? {};
  // Fail on a bad reference or filter combination before touching any repository.
  validateReference(reference);
  filterChanges([], filters);

  const repos = await openSearchRepositories(deps);
  const commit = await resolveCommit(reference, repos, { allowLocal: request.allowLocal });
  const tag = await resolveMainlineTag(commit, deps.config, deps.openRepository);
  const { changes, unmatched } = filterChanges(commit.changes, filters);

  for (const selector of unmatched) {
    logger.warn({ reference, path: selector }, `Commit ${commit.id.slice(0, 12)} does not touch ${selector}`);
  }
  if (changes.length === 0 && commit.changes.length > 0) {
    logger.warn({ reference }, `Commit ${commit.id.slice(0, 12)} is empty after filtering`);
  }

  const content = renderPatch({
    commit,
    changes,
    tag,
    signedOffBy: request.signedOffBy,
    references: request.references,
    notInMainline: deps.config?.format.notInMainline,
  });

  const spec = numberingFor(request, deps.config);
  const outcome = await deps.writer.write({
    content,
    destination: request.destination,
    chooseName: (existingNames) =>
      chooseName({
        subject: commit.subject,
        spec,
        position,
        existingNames,
        disambiguator: commit.id,
        maxLength: deps.config?.format.maxNameLength ?? DEFAULT_MAX_NAME_LENGTH,
      }),
    force: spec.force,
    disambiguator: commit.id,
  });

  return { reference, commit, outcome, unmatched, empty: changes.length === 0 };
}

/**
 * Export commits one at a time, in order. For file destinations the numbering range of
 * the whole batch is checked first; the first failure stops the batch.
 */
export async function exportCommits(
  references: readonly string[],
  request: ExportRequest,
  deps: ExportDeps
): Promise<ExportResult[]> {
  // A stream has no file names to number.
  if (request.destination.kind !== 'stdout') {
    checkNumberingRange(numberingFor(request, deps.config), references.length);
  }
  const results: ExportResult[] = [];
  for (const [position, reference] of references.entries()) {
    results.push(await exportCommit(reference, request, deps, position));
  }
  return results;
}

export interface ExtractRequest {
  /** Path of the existing patch file. */
  patchPath: string;
  destination: Destination;
  filters?: FilterSelection;
  references?: readonly string[];
  mainline?: string;
  signedOffBy?: Identity;
  suffix?: string;
  force?: boolean;
}

export interface ExtractResult {
  outcome: WriteOutcome;
  unmatched: string[];
  empty: boolean;
  /** Number of file changes kept out of the patch's total. */
  kept: number;
  total: number;
}

/** Re-extract selected files from an existing patch file. */
export async function extractFromPatch(
  request: ExtractRequest,
  deps: Pick<ExportDeps, 'writer' | 'config'>
): Promise<ExtractResult> {
  const filters = request.filters ?? {};
  filterChanges([], filters);

  let bytes: Buffer;
  try {
    bytes = await fs.readFile(request.patchPath);
  } catch (err) {
    throw new PatchError(PatchErrorCode.INVALID_PATCH, `Cannot read patch file ${request.patchPath}`, {
      path: request.patchPath,
      cause: describeError(err),
    });
  }
  const text = decodeUtf8(bytes);
  if (text === null) {
    throw new PatchError(PatchErrorCode.INVALID_PATCH, `Patch file ${request.patchPath} is not valid UTF-8`, {
      path: request.patchPath,
    });
  }

  const parsed = parsePatch(text, request.patchPath);
  const { changes, unmatched } = filterChanges(parsed.diff.changes, filters);
  for (const selector of unmatched) {
    logger.warn({ patch: request.patchPath, path: selector }, `Patch does not touch ${selector}`);
  }

  const content = renderParsedPatch(parsed, changes, {
    references: request.references,
    mainline: request.mainline,
    signedOffBy: request.signedOffBy,
  });

  const subject = getHeader(parsed, 'Subject') ?? path.basename(request.patchPath, path.extname(request.patchPath));
  const spec: NumberingSpec = { ...DEFAULT_NUMBERING, suffix: request.suffix ?? '', force: request.force ?? false };
  const outcome = await deps.writer.write({
    content,
    destination: request.destination,
    chooseName: (existingNames) =>
      chooseName({
        subject,
        spec,
        existingNames,
        disambiguator: 'extract',
        maxLength: deps.config?.format.maxNameLength ?? DEFAULT_MAX_NAME_LENGTH,
      }),
    force: spec.force,
    disambiguator: 'extract',
  });

  return { outcome, unmatched, empty: changes.length === 0, kept: changes.length, total: parsed.diff.changes.length };
}
