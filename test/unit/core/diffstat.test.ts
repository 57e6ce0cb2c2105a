import { MAX_GRAPH_WIDTH, fileStat, renderDiffstat, summaryLine } from '../../../src/core/diffstat.js';
import type { FileChange } from '../../../src/types/patch.js';
import { makeChange } from '../../helpers/fake-vcs.js';

function withLines(path: string, lines: string[]): FileChange {
  return {
    path,
    kind: 'modified',
    headerLines: [`diff --git a/${path} b/${path}`, `--- a/${path}`, `+++ b/${path}`],
    hunks: [{ header: '@@ -1,9 +1,9 @@', lines }],
  };
}

describe('fileStat', () => {
  it('counts added and removed hunk lines', () => {
    expect(fileStat(withLines('a.c', [' ctx', '-old', '+new', '+more']))).toEqual({
      name: 'a.c',
      insertions: 2,
      deletions: 1,
      binary: false,
    });
  });

  it('names both paths of a rename', () => {
    const renamed: FileChange = { path: 'new.c', oldPath: 'old.c', kind: 'renamed', headerLines: [], hunks: [] };
    expect(fileStat(renamed).name).toBe('old.c => new.c');
  });

  it('recognizes a binary change', () => {
    const binary: FileChange = {
      path: 'fw.bin',
      kind: 'modified',
      headerLines: ['diff --git a/fw.bin b/fw.bin', 'Binary files a/fw.bin and b/fw.bin differ'],
      hunks: [],
    };
    expect(fileStat(binary).binary).toBe(true);
  });
});

describe('summaryLine', () => {
  it('uses singular and plural forms the way git does', () => {
    expect(summaryLine([{ name: 'a', insertions: 1, deletions: 0, binary: false }])).toBe(' 1 file changed, 1 insertion(+)');
    expect(
      summaryLine([
        { name: 'a', insertions: 2, deletions: 1, binary: false },
        { name: 'b', insertions: 0, deletions: 2, binary: false },
      ])
    ).toBe(' 2 files changed, 2 insertions(+), 3 deletions(-)');
    expect(summaryLine([{ name: 'a', insertions: 0, deletions: 0, binary: false }])).toBe(
      ' 1 file changed, 0 insertions(+), 0 deletions(-)'
    );
  });
});

describe('renderDiffstat', () => {
  it('aligns names and counts', () => {
    const lines = renderDiffstat([
      makeChange('drivers/scsi/st.c', ['+a', '+b']),
      withLines('x.h', [...Array.from({ length: 10 }, () => '-gone'), '+kept']),
    ]);
    expect(lines).toEqual([
      ' drivers/scsi/st.c |  2 ++',
      ' x.h               | 11 +----------',
      ' 2 files changed, 3 insertions(+), 10 deletions(-)',
    ]);
  });

  it('scales a long graph down to the maximum width', () => {
    const big = withLines('big.c', Array.from({ length: MAX_GRAPH_WIDTH * 2 }, () => '+x'));
    const [row] = renderDiffstat([big]);
    expect(row).toBe(` big.c | 80 ${'+'.repeat(MAX_GRAPH_WIDTH)}`);
  });

  it('prints Bin for a binary change and nothing for no changes', () => {
    const binary: FileChange = {
      path: 'fw.bin',
      kind: 'modified',
      headerLines: ['diff --git a/fw.bin b/fw.bin', 'GIT binary patch'],
      hunks: [],
    };
    expect(renderDiffstat([binary])).toEqual([' fw.bin | Bin', ' 1 file changed, 0 insertions(+), 0 deletions(-)']);
    expect(renderDiffstat([])).toEqual([]);
  });
});
