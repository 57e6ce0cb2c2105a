import { PatchError, PatchErrorCode } from '../shared/errors.js';
import { isDiffStart, parseUnifiedDiff, splitLines, type ParsedDiff } from '../vcs/diff-parser.js';
import { DIFF_SEPARATOR } from './patch-generator.js';

export interface PatchHeader {
  name: string;
  /** Value with folded continuation lines joined by a single space. */
  value: string;
  /** The header as it appeared, continuation lines included. */
  raw: string[];
}

export interface ParsedPatch {
  /** mbox `From <hash> <date>` line, when present. */
  envelope?: string;
  headers: PatchHeader[];
  /** Whether a blank line closed the header block. */
  headerTerminated: boolean;
  /** Lines between the header block and the `---` separator (or the first diff). */
  description: string[];
  /** The `---` line plus any diffstat that follows it. */
  separator: string[];
  diff: ParsedDiff;
}

const HEADER_LINE = /^([A-Za-z][A-Za-z0-9-]*):(?:\s(.*)|$)/;
const ENVELOPE_LINE = /^From [0-9a-f]{7,64} /;

export function parsePatch(text: string, origin = '<patch>'): ParsedPatch {
  const lines = unwrapCrlf(splitLines(text));
  let i = 0;

  let envelope: string | undefined;
  if (lines.length > 0 && ENVELOPE_LINE.test(lines[0])) {
    envelope = lines[0];
    i = 1;
  }

  const headers: PatchHeader[] = [];
  let headerTerminated = false;
  while (i < lines.length && !isDiffStart(lines[i], lines[i + 1])) {
    const line = lines[i];
    if (line === '') {
      headerTerminated = true;
      i++;
      break;
    }
    const last = headers[headers.length - 1];
    if (/^[ \t]/.test(line) && last) {
      last.raw.push(line);
      last.value = `${last.value} ${line.trim()}`.trim();
      i++;
      continue;
    }
    const match = HEADER_LINE.exec(line);
    if (!match) break;
    headers.push({ name: match[1], value: (match[2] ?? '').trim(), raw: [line] });
    i++;
  }

  const description: string[] = [];
  const separator: string[] = [];
  while (i < lines.length && !isDiffStart(lines[i], lines[i + 1])) {
    if (separator.length > 0 || lines[i] === DIFF_SEPARATOR) separator.push(lines[i]);
    else description.push(lines[i]);
    i++;
  }

  const diffLines = lines.slice(i);
  const diff = parseUnifiedDiff(diffLines.length > 0 ? diffLines.join('\n') + '\n' : '');

  if (headers.length === 0 && diff.changes.length === 0) {
    throw new PatchError(PatchErrorCode.INVALID_PATCH, `No patch headers or diff found in ${origin}`, { path: origin });
  }

  return { envelope, headers, headerTerminated, description, separator, diff };
}

/** Mail transport can end every line in CRLF; only a patch wrapped whole is unwrapped. */
function unwrapCrlf(lines: string[]): string[] {
  if (lines.length === 0 || !lines.every((line) => line.endsWith('\r'))) return lines;
  return lines.map((line) => line.slice(0, -1));
}

export function getHeader(parsed: ParsedPatch, name: string): string | undefined {
  return parsed.headers.find((header) => header.name.toLowerCase() === name.toLowerCase())?.value;
}
