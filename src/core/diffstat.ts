import type { FileChange } from '../types/patch.js';

/** Widest `+`/`-` graph before counts are scaled down to fit. */
export const MAX_GRAPH_WIDTH = 40;

export interface FileStat {
  name: string;
  insertions: number;
  deletions: number;
  binary: boolean;
}

export function fileStat(change: FileChange): FileStat {
  let insertions = 0;
  let deletions = 0;
  for (const hunk of change.hunks) {
    for (const line of hunk.lines) {
      if (line.startsWith('+')) insertions++;
      else if (line.startsWith('-')) deletions++;
    }
  }
  const binary = change.headerLines.some((line) => line.startsWith('Binary files ') || line === 'GIT binary patch');
  const name = change.oldPath !== undefined && change.oldPath !== change.path ? `${change.oldPath} => ${change.path}` : change.path;
  return { name, insertions, deletions, binary };
}

function plural(count: number, one: string, many: string): string {
  return `${count} ${count === 1 ? one : many}`;
}

export function summaryLine(stats: readonly FileStat[]): string {
  const insertions = stats.reduce((sum, stat) => sum + stat.insertions, 0);
  const deletions = stats.reduce((sum, stat) => sum + stat.deletions, 0);
  let line = ` ${plural(stats.length, 'file', 'files')} changed`;
  if (insertions > 0 || deletions === 0) line += `, ${plural(insertions, 'insertion(+)', 'insertions(+)')}`;
  if (deletions > 0 || insertions === 0) line += `, ${plural(deletions, 'deletion(-)', 'deletions(-)')}`;
  return line;
}

/**
 * git-style diffstat of the given changes: one ` name | count graph` line per file and a
 * summary line. No lines at all for an empty change list.
 */
export function renderDiffstat(changes: readonly FileChange[]): string[] {
  if (changes.length === 0) return [];
  const stats = changes.map(fileStat);

  const counts = stats.map((stat) => (stat.binary ? 'Bin' : String(stat.insertions + stat.deletions)));
  const nameWidth = Math.max(...stats.map((stat) => stat.name.length));
  const countWidth = Math.max(...counts.map((count) => count.length));
  const largest = Math.max(...stats.map((stat) => (stat.binary ? 0 : stat.insertions + stat.deletions)));
  const scale = (n: number) =>
    largest <= MAX_GRAPH_WIDTH || n === 0 ? n : Math.max(1, Math.round((n * MAX_GRAPH_WIDTH) / largest));

  const lines = stats.map((stat, index) => {
    const graph = stat.binary ? '' : '+'.repeat(scale(stat.insertions)) + '-'.repeat(scale(stat.deletions));
    const row = ` ${stat.name.padEnd(nameWidth)} | ${counts[index].padStart(countWidth)}`;
    return graph.length > 0 ? `${row} ${graph}` : row;
  });
  lines.push(summaryLine(stats));
  return lines;
}
