import { run } from '../shared/exec.js';
import { PatchError, PatchErrorCode } from '../shared/errors.js';
import type { PatchConfig } from '../types/config.js';
import type { Identity } from '../types/patch.js';

export type IdentityLookup = (cwd: string) => Promise<Identity | null>;

/**
 * Identity for a Signed-off-by line: the configured contact, with gaps filled from
 * the local git configuration.
 */
export async function resolveSigner(config: PatchConfig, cwd: string, gitIdentity: IdentityLookup): Promise<Identity> {
  const email = config.contact.emails[0];
  if (config.contact.name && email) return { name: config.contact.name, email };

  const fromGit = await gitIdentity(cwd);
  const name = config.contact.name ?? fromGit?.name;
  const address = email ?? fromGit?.email;
  if (!name || !address) {
    throw new PatchError(
      PatchErrorCode.CONFIG_ERROR,
      'No identity for Signed-off-by: set contact.name and contact.email in the config, or user.name and user.email in git',
      { name: name ?? null, email: address ?? null }
    );
  }
  return { name, email: address };
}

export async function readGitIdentity(cwd: string): Promise<Identity | null> {
  const [name, email] = await Promise.all([
    run('git', ['config', 'user.name'], { cwd }),
    run('git', ['config', 'user.email'], { cwd }),
  ]);
  if (name.exitCode !== 0 || email.exitCode !== 0) return null;
  return { name: name.stdout.trim(), email: email.stdout.trim() };
}
