import { minimatch } from 'minimatch';
import { PatchError, PatchErrorCode } from '../shared/errors.js';
import type { FileChange, FilterResult, FilterSelection } from '../types/patch.js';

function changePaths(change: FileChange): string[] {
  return change.oldPath !== undefined && change.oldPath !== change.path ? [change.path, change.oldPath] : [change.path];
}

/** Exact path, or everything below a selector that ends in `/`. */
export function selectorMatches(selector: string, path: string): boolean {
  if (selector.endsWith('/')) return path.startsWith(selector);
  return path === selector;
}

export function patternMatches(pattern: string, path: string): boolean {
  if (pattern.endsWith('/')) return path.startsWith(pattern);
  return path === pattern || minimatch(path, pattern, { dot: true });
}

/**
 * Apply extract-only or exclude rules to the changes of one commit. The two modes are
 * mutually exclusive. Surviving changes keep their original order and hunks.
 */
export function filterChanges(changes: readonly FileChange[], selection: FilterSelection): FilterResult {
  const extract = selection.extract ?? [];
  const exclude = selection.exclude ?? [];

  if (extract.length > 0 && exclude.length > 0) {
    throw new PatchError(
      PatchErrorCode.CONFLICTING_FILTER,
      `Extract and exclude filters cannot be combined (extract: ${extract.join(', ')}; exclude: ${exclude.join(', ')})`,
      { extract: [...extract], exclude: [...exclude] }
    );
  }

  if (extract.length > 0) {
    const matched = new Set<string>();
    const kept = changes.filter((change) => {
      let keep = false;
      for (const selector of extract) {
        if (changePaths(change).some((path) => selectorMatches(selector, path))) {
          matched.add(selector);
          keep = true;
        }
      }
      return keep;
    });
    const unmatched = [...new Set(extract)].filter((selector) => !matched.has(selector));
    return { changes: kept, unmatched };
  }

  if (exclude.length > 0) {
    const kept = changes.filter(
      (change) => !exclude.some((pattern) => changePaths(change).some((path) => patternMatches(pattern, path)))
    );
    return { changes: kept, unmatched: [] };
  }

  return { changes: [...changes], unmatched: [] };
}
