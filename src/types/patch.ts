export type ChangeKind = 'added' | 'modified' | 'deleted' | 'renamed';

/** One `@@ ... @@` block and the lines that follow it, without trailing newlines. */
export interface Hunk {
  readonly header: string;
  readonly lines: readonly string[];
}

export interface FileChange {
  /** New path; the old path for deletions. */
  readonly path: string;
  /** Set for renames only. */
  readonly oldPath?: string;
  readonly kind: ChangeKind;
  /** `diff --git`, `index`, mode, rename, `---`/`+++` and binary lines, verbatim. */
  readonly headerLines: readonly string[];
  readonly hunks: readonly Hunk[];
}

export interface Identity {
  readonly name: string;
  readonly email: string;
}

export interface ResolvedCommit {
  readonly id: string;
  readonly author: Identity;
  readonly committer: Identity;
  /** RFC 2822 author date, as git prints it. */
  readonly date: string;
  readonly subject: string;
  readonly body: string;
  readonly changes: readonly FileChange[];
  /** Location of the repository the commit was found in. */
  readonly repository: string;
}

export type MainlineTag =
  | { readonly kind: 'resolved'; readonly value: string; readonly repository: string }
  | { readonly kind: 'unresolved' };

export interface NumberingSpec {
  enabled: boolean;
  start: number;
  width: number;
  suffix: string;
  force: boolean;
}

export type Destination =
  | { kind: 'stdout' }
  | { kind: 'cwd' }
  | { kind: 'directory'; path: string }
  | { kind: 'file'; path: string };

export type NameOutcome = 'new' | 'overwrite' | 'renamed';

export type WriteOutcome =
  | { kind: 'stream' }
  | { kind: 'file'; path: string; requestedPath: string; outcome: NameOutcome };

export interface FilterSelection {
  extract?: readonly string[];
  exclude?: readonly string[];
}

export interface FilterResult {
  changes: FileChange[];
  /** Extract selectors that matched no change, in the order given. */
  unmatched: string[];
}
