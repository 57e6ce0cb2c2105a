import { PatchError, PatchErrorCode } from '../shared/errors.js';
import type { NameOutcome, NumberingSpec } from '../types/patch.js';

export const DEFAULT_MAX_NAME_LENGTH = 64;
export const NUMBER_SEPARATOR = '-';
const FALLBACK_NAME = 'patch';

export const DEFAULT_NUMBERING: NumberingSpec = {
  enabled: false,
  start: 1,
  width: 4,
  suffix: '',
  force: false,
};

/**
 * Subject line → file name stem, following the clean-up git-am applies to mail subjects
 * and the character filter git-format-patch applies to file names.
 */
export function sanitizeSubject(subject: string): string {
  return subject
    .replace(/^(?:(?:[Rr][Ee]:|\[PATCH[^\]]*\])[ \t]*)+/, '')
    .replace(/[^_A-Za-z0-9.]/g, '-')
    .replace(/-+/g, '-')
    .replace(/\.+/g, '.')
    .replace(/^[-. ]+|[-. ]+$/g, '');
}

/** Zero-pad `n` to `width` digits; never widens or truncates. */
export function formatNumber(n: number, width: number): string {
  if (!Number.isInteger(width) || width < 1) {
    throw new PatchError(PatchErrorCode.NUMBER_OUT_OF_RANGE, `Number width must be a positive integer, got ${width}`, {
      width,
    });
  }
  if (!Number.isInteger(n) || n < 0) {
    throw new PatchError(PatchErrorCode.NUMBER_OUT_OF_RANGE, `Patch number must be a non-negative integer, got ${n}`, {
      number: n,
      width,
    });
  }
  const digits = String(n);
  if (digits.length > width) {
    throw new PatchError(
      PatchErrorCode.NUMBER_OUT_OF_RANGE,
      `Patch number ${n} needs ${digits.length} digits but the number width is ${width}`,
      { number: n, width }
    );
  }
  return digits.padStart(width, '0');
}

/** Check every number a batch of `count` exports will use, before anything is written. */
export function checkNumberingRange(spec: NumberingSpec, count: number): void {
  if (!spec.enabled || count < 1) return;
  formatNumber(spec.start, spec.width);
  formatNumber(spec.start + count - 1, spec.width);
}

export interface NameRequest {
  subject: string;
  spec: NumberingSpec;
  /** Index of this export within its batch; the number used is `spec.start + position`. */
  position?: number;
  /** Names already present in the destination, read just before this call. */
  existingNames: ReadonlySet<string>;
  /** Distinguishes an alternate name on conflict; the commit id for exports. */
  disambiguator?: string;
  maxLength?: number;
}

export interface NameChoice {
  name: string;
  /** The name computed before the conflict policy applied. */
  requested: string;
  outcome: NameOutcome;
  number?: number;
}

export function chooseName(request: NameRequest): NameChoice {
  const { spec } = request;
  const maxLength = request.maxLength ?? DEFAULT_MAX_NAME_LENGTH;

  let prefix = '';
  let number: number | undefined;
  if (spec.enabled) {
    number = spec.start + (request.position ?? 0);
    prefix = formatNumber(number, spec.width) + NUMBER_SEPARATOR;
  }

  const stem = prefix + truncateStem(sanitizeSubject(request.subject), maxLength - prefix.length - spec.suffix.length);
  return { ...resolveConflict(stem, spec.suffix, request.existingNames, spec.force, request.disambiguator), number };
}

/**
 * Conflict policy for a computed name: keep it when free, keep it with `force`, and
 * otherwise switch to `<stem>-<first 8 chars of disambiguator><suffix>`, adding -2, -3,
 * ... while that is taken too.
 */
export function resolveConflict(
  stem: string,
  suffix: string,
  existingNames: ReadonlySet<string>,
  force: boolean,
  disambiguator = 'alt'
): NameChoice {
  const requested = stem + suffix;
  if (!existingNames.has(requested)) return { name: requested, requested, outcome: 'new' };
  if (force) return { name: requested, requested, outcome: 'overwrite' };

  const base = `${stem}-${disambiguator.slice(0, 8)}`;
  let candidate = base + suffix;
  for (let counter = 2; existingNames.has(candidate); counter++) {
    candidate = `${base}-${counter}${suffix}`;
  }
  return { name: candidate, requested, outcome: 'renamed' };
}

function truncateStem(name: string, room: number): string {
  const stem = name.length > room ? name.slice(0, Math.max(room, 1)).replace(/[-.]+$/, '') : name;
  return stem.length > 0 ? stem : FALLBACK_NAME;
}
