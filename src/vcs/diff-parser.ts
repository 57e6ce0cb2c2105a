/**
 * Unified diff parser.
 *
 * Turns `git diff-tree -p` output, or the diff section of an existing patch file,
 * into ordered FileChange records. Header lines and hunk lines are kept verbatim
 * so that a parsed change renders back to exactly the text it came from.
 */

import type { ChangeKind, FileChange, Hunk } from '../types/patch.js';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const DEV_NULL = '/dev/null';

export interface ParsedDiff {
  changes: FileChange[];
  /** Lines before the first file header. */
  preamble: string[];
  /** Lines after the last hunk that belong to no file (e.g. a `-- ` signature). */
  trailing: string[];
}

interface FileBuilder {
  headerLines: string[];
  hunks: Hunk[];
  gitOld?: string;
  gitNew?: string;
  minusPath?: string | null;
  plusPath?: string | null;
  renameFrom?: string;
  renameTo?: string;
  created: boolean;
  deleted: boolean;
}

interface HunkBuilder {
  header: string;
  lines: string[];
  oldRemaining: number;
  newRemaining: number;
}

/** Split on `\n` only: a `\r` before it is part of the line, as in a CRLF file. */
export function splitLines(text: string): string[] {
  const lines = text.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function isDiffStart(line: string, next: string | undefined): boolean {
  return line.startsWith('diff --git ') || (line.startsWith('--- ') && next !== undefined && next.startsWith('+++ '));
}

export function parseUnifiedDiff(text: string): ParsedDiff {
  const lines = splitLines(text);
  const changes: FileChange[] = [];
  const preamble: string[] = [];
  let trailing: string[] = [];
  let file: FileBuilder | null = null;
  let hunk: HunkBuilder | null = null;

  const flushHunk = () => {
    if (file && hunk) file.hunks.push({ header: hunk.header, lines: hunk.lines });
    hunk = null;
  };
  const flushFile = () => {
    flushHunk();
    if (file) changes.push(buildChange(file));
    file = null;
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const next = lines[i + 1];

    if (hunk !== null) {
      const open: HunkBuilder = hunk;
      if (open.oldRemaining > 0 || open.newRemaining > 0) {
        if (consumeHunkLine(open, line)) continue;
      } else if (line.startsWith('\\')) {
        open.lines.push(line);
        continue;
      }
      flushHunk();
    }

    // Inside a `diff --git` header the ---/+++ pair belongs to the open file.
    const opensFile = line.startsWith('diff --git ') || file === null || file.hunks.length > 0;
    if (opensFile && isDiffStart(line, next)) {
      flushFile();
      // Stray lines between two files (e.g. `Index:` banners) travel with the next one.
      file = { headerLines: trailing, hunks: [], created: false, deleted: false };
      trailing = [];
      if (line.startsWith('diff --git ')) {
        const paths = parseGitDiffLine(line);
        file.gitOld = paths?.[0];
        file.gitNew = paths?.[1];
      }
    }

    if (file === null) {
      if (changes.length === 0) preamble.push(line);
      else trailing.push(line);
      continue;
    }
    const current: FileBuilder = file;

    const hunkMatch = HUNK_HEADER.exec(line);
    if (hunkMatch) {
      hunk = {
        header: line,
        lines: [],
        oldRemaining: hunkMatch[2] === undefined ? 1 : Number(hunkMatch[2]),
        newRemaining: hunkMatch[4] === undefined ? 1 : Number(hunkMatch[4]),
      };
      continue;
    }

    if (current.hunks.length > 0) {
      // Past the last hunk of this file: whatever follows belongs to no file.
      flushFile();
      trailing.push(line);
      continue;
    }

    current.headerLines.push(line);
    readHeaderLine(current, line);
  }

  flushFile();
  return { changes, preamble, trailing };
}

function consumeHunkLine(hunk: HunkBuilder, line: string): boolean {
  const marker = line.charAt(0);
  if (marker === ' ' || line === '') {
    hunk.oldRemaining--;
    hunk.newRemaining--;
  } else if (marker === '-') {
    hunk.oldRemaining--;
  } else if (marker === '+') {
    hunk.newRemaining--;
  } else if (marker !== '\\') {
    return false;
  }
  hunk.lines.push(line);
  return true;
}

function readHeaderLine(file: FileBuilder, line: string): void {
  if (line.startsWith('--- ')) {
    file.minusPath = parseMarkerPath(line.slice(4));
    if (file.minusPath === null) file.created = true;
  } else if (line.startsWith('+++ ')) {
    file.plusPath = parseMarkerPath(line.slice(4));
    if (file.plusPath === null) file.deleted = true;
  } else if (line.startsWith('new file mode')) {
    file.created = true;
  } else if (line.startsWith('deleted file mode')) {
    file.deleted = true;
  } else if (line.startsWith('rename from ')) {
    file.renameFrom = unquotePath(line.slice('rename from '.length));
  } else if (line.startsWith('rename to ')) {
    file.renameTo = unquotePath(line.slice('rename to '.length));
  }
}

function buildChange(file: FileBuilder): FileChange {
  const oldPath = file.renameFrom ?? file.minusPath ?? file.gitOld;
  const newPath = file.renameTo ?? file.plusPath ?? file.gitNew;

  let kind: ChangeKind = 'modified';
  if (file.renameFrom !== undefined || file.renameTo !== undefined) kind = 'renamed';
  else if (file.created) kind = 'added';
  else if (file.deleted) kind = 'deleted';

  const path = (kind === 'deleted' ? oldPath : newPath) ?? oldPath ?? newPath ?? '';
  return {
    path,
    ...(kind === 'renamed' && oldPath !== undefined ? { oldPath } : {}),
    kind,
    headerLines: file.headerLines,
    hunks: file.hunks,
  };
}

/** Path named by a `---`/`+++` line, without its `a/` style prefix; null for /dev/null. */
export function parseMarkerPath(raw: string): string | null {
  // Plain diffs may append a tab and a timestamp.
  const withoutStamp = raw.startsWith('"') ? raw : raw.split('\t')[0];
  const path = unquotePath(withoutStamp.trimEnd());
  if (path === DEV_NULL) return null;
  return stripPrefix(path);
}

export function parseGitDiffLine(line: string): [string, string] | null {
  const rest = line.slice('diff --git '.length);

  if (rest.startsWith('"')) {
    const first = readQuoted(rest);
    if (!first) return null;
    const second = rest.slice(first.consumed + 1);
    return [stripPrefix(first.value), stripPrefix(unquotePath(second))];
  }
  if (rest.endsWith('"')) {
    const split = rest.indexOf(' "');
    if (split < 0) return null;
    return [stripPrefix(rest.slice(0, split)), stripPrefix(unquotePath(rest.slice(split + 1)))];
  }

  // Without quoting, both halves are equal for everything but renames.
  if (rest.length % 2 === 1) {
    const half = (rest.length - 1) / 2;
    const a = rest.slice(0, half);
    const b = rest.slice(half + 1);
    if (rest.charAt(half) === ' ' && stripPrefix(a) === stripPrefix(b)) {
      return [stripPrefix(a), stripPrefix(b)];
    }
  }
  const match = /^(\S+\/.*?) (\S+\/.*)$/.exec(rest);
  return match ? [stripPrefix(match[1]), stripPrefix(match[2])] : null;
}

function stripPrefix(path: string): string {
  const slash = path.indexOf('/');
  return slash >= 0 ? path.slice(slash + 1) : path;
}

/** Undo git's C-style path quoting; unquoted input is returned as is. */
export function unquotePath(raw: string): string {
  if (!raw.startsWith('"')) return raw;
  return readQuoted(raw)?.value ?? raw;
}

function readQuoted(raw: string): { value: string; consumed: number } | null {
  const bytes: number[] = [];
  let i = 1;
  while (i < raw.length) {
    const ch = raw.charAt(i);
    if (ch === '"') {
      return { value: Buffer.from(bytes).toString('utf-8'), consumed: i + 1 };
    }
    if (ch === '\\') {
      const esc = raw.charAt(i + 1);
      const octal = /^[0-7]{3}/.exec(raw.slice(i + 1));
      if (octal) {
        bytes.push(parseInt(octal[0], 8));
        i += 4;
        continue;
      }
      const mapped: Record<string, string> = { n: '\n', t: '\t', '"': '"', '\\': '\\', a: '\x07', b: '\b', f: '\f', r: '\r', v: '\v' };
      bytes.push(...Buffer.from(mapped[esc] ?? esc, 'utf-8'));
      i += 2;
      continue;
    }
    bytes.push(...Buffer.from(ch, 'utf-8'));
    i++;
  }
  return null;
}
