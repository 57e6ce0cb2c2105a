/** Resolved configuration, after defaults are merged in. */
export interface PatchConfig {
  /** Lookup key to repository locations. `search` and `mainline` are consumed. */
  repositories: Record<string, string[]>;
  /** Tag template per mainline location; `{version}` expands to the release tag. */
  mainlineTags: Record<string, string>;
  contact: {
    name?: string;
    emails: string[];
  };
  format: {
    numberWidth: number;
    notInMainline: string;
    queued: string;
    maxNameLength: number;
  };
}

export const SEARCH_KEY = 'search';
export const MAINLINE_KEY = 'mainline';
