import type { FileChange, Identity, MainlineTag, ResolvedCommit } from '../types/patch.js';
import { renderDiffstat } from './diffstat.js';
import { renderMainlineTag } from './mainline-tag.js';
import type { ParsedPatch, PatchHeader } from './patch-parser.js';

export const MAINLINE_HEADER = 'Patch-mainline';
export const REFERENCES_HEADER = 'References';
export const SIGNED_OFF_BY = 'Signed-off-by';
export const DIFF_SEPARATOR = '---';
export const DEFAULT_NOT_IN_MAINLINE = 'Not yet in mainline';

export interface RenderInput {
  commit: ResolvedCommit;
  /** Filtered changes, in the order they appear in the commit. */
  changes: readonly FileChange[];
  tag: MainlineTag;
  signedOffBy?: Identity;
  references?: readonly string[];
  notInMainline?: string;
}

export function formatIdentity(identity: Identity): string {
  return `${identity.name} <${identity.email}>`;
}

/** Split on whitespace and commas, drop duplicates, sort. */
export function normalizeReferences(references: readonly string[]): string[] {
  const all = references.flatMap((ref) => ref.split(/[\s,]+/)).filter((ref) => ref.length > 0);
  return [...new Set(all)].sort();
}

export function fileChangeLines(change: FileChange): string[] {
  const lines = [...change.headerLines];
  for (const hunk of change.hunks) {
    lines.push(hunk.header, ...hunk.lines);
  }
  return lines;
}

/** `---`, then the diffstat of `changes` and a blank line when there are any. */
export function separatorLines(changes: readonly FileChange[]): string[] {
  const stat = renderDiffstat(changes);
  return stat.length > 0 ? [DIFF_SEPARATOR, ...stat, ''] : [DIFF_SEPARATOR];
}

/**
 * Render one commit as patch text. The output depends only on the input: identical
 * input always gives byte-identical text, and an empty change list still gives a
 * complete header.
 */
export function renderPatch(input: RenderInput): string {
  const { commit } = input;
  const lines: string[] = [
    `From: ${formatIdentity(commit.author)}`,
    `Date: ${commit.date}`,
    `Subject: ${commit.subject}`,
    `${MAINLINE_HEADER}: ${renderMainlineTag(input.tag, input.notInMainline ?? DEFAULT_NOT_IN_MAINLINE)}`,
  ];

  const references = normalizeReferences(input.references ?? []);
  if (references.length > 0) lines.push(`${REFERENCES_HEADER}: ${references.join(' ')}`);
  if (input.signedOffBy) lines.push(`${SIGNED_OFF_BY}: ${formatIdentity(input.signedOffBy)}`);

  lines.push('');
  if (commit.body.length > 0) lines.push(...commit.body.split('\n'), '');
  lines.push(...separatorLines(input.changes));
  for (const change of input.changes) lines.push(...fileChangeLines(change));

  return lines.join('\n') + '\n';
}

export interface ReRenderOverrides {
  references?: readonly string[];
  /** Replaces (or adds) the Patch-mainline header. */
  mainline?: string;
  /** Appended to the description's trailer block unless already present. */
  signedOffBy?: Identity;
}

/**
 * Render a parsed patch back to text with a new set of changes. With the parsed
 * changes and no overrides the original text comes back unchanged.
 */
export function renderParsedPatch(
  parsed: ParsedPatch,
  changes: readonly FileChange[],
  overrides: ReRenderOverrides = {}
): string {
  const lines: string[] = [];
  if (parsed.envelope !== undefined) lines.push(parsed.envelope);

  const headers = applyHeaderOverrides(parsed.headers, overrides);
  for (const header of headers) lines.push(...header.raw);
  if (parsed.headerTerminated || headers.length > 0) lines.push('');

  lines.push(...withSignature(parsed.description, overrides.signedOffBy));

  // Once files were dropped the diffstat is recomputed from what is left.
  const filtered = changes.length !== parsed.diff.changes.length;
  if (parsed.separator.length > 0) {
    lines.push(...(filtered ? separatorLines(changes) : parsed.separator));
  }
  lines.push(...parsed.diff.preamble);
  for (const change of changes) lines.push(...fileChangeLines(change));
  lines.push(...parsed.diff.trailing);

  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

function applyHeaderOverrides(headers: readonly PatchHeader[], overrides: ReRenderOverrides): PatchHeader[] {
  const result = headers.map((header) => ({ ...header, raw: [...header.raw] }));
  const set = (name: string, value: string) => {
    const header: PatchHeader = { name, value, raw: [`${name}: ${value}`] };
    const index = result.findIndex((existing) => existing.name.toLowerCase() === name.toLowerCase());
    if (index >= 0) result[index] = header;
    else result.push(header);
  };

  if (overrides.mainline !== undefined) set(MAINLINE_HEADER, overrides.mainline);
  if (overrides.references && overrides.references.length > 0) {
    const existing = result.find((header) => header.name.toLowerCase() === REFERENCES_HEADER.toLowerCase());
    set(REFERENCES_HEADER, normalizeReferences([...(existing ? [existing.value] : []), ...overrides.references]).join(' '));
  }
  return result;
}

function withSignature(description: readonly string[], signer: Identity | undefined): string[] {
  const lines = [...description];
  if (!signer) return lines;

  const signature = `${SIGNED_OFF_BY}: ${formatIdentity(signer)}`;
  if (lines.some((line) => line.trim() === signature)) return lines;

  // Keep the blank lines that separate the description from the diff.
  let end = lines.length;
  while (end > 0 && lines[end - 1].trim() === '') end--;
  const tail = lines.slice(end);
  const head = lines.slice(0, end);

  // Start a new trailer block unless the description already ends in one.
  if (head.length > 0 && !/^[A-Za-z-]+-by: /.test(head[head.length - 1])) head.push('');
  head.push(signature);
  return [...head, ...tail];
}
