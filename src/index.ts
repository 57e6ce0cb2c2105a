export * from './types/patch.js';
export * from './types/config.js';
export { PatchError, PatchErrorCode, isPatchError } from './shared/errors.js';
export { loadConfig, parseConfigText, applyConfigFile, DEFAULT_CONFIG } from './config/loader.js';
export { resolveSigner } from './config/identity.js';
export { resolveCommit, validateReference } from './core/commit-resolver.js';
export { resolveMainlineTag } from './core/mainline-tag.js';
export { filterChanges } from './core/file-filter.js';
export { renderPatch, renderParsedPatch } from './core/patch-generator.js';
export { renderDiffstat } from './core/diffstat.js';
export { parsePatch, getHeader, type ParsedPatch } from './core/patch-parser.js';
export { chooseName, formatNumber, sanitizeSubject, checkNumberingRange, resolveConflict } from './core/numbering.js';
export { OutputWriter, destinationFor } from './core/output-writer.js';
export { exportCommit, exportCommits, extractFromPatch } from './core/exporter.js';
export { GitRepository, openRepository } from './vcs/git.js';
export { parseUnifiedDiff } from './vcs/diff-parser.js';
export type { VcsRepository, RepositoryOpener } from './vcs/types.js';
export { createServer } from './server.js';
