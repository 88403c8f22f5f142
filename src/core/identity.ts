import type { GitClient } from './git.js';
import type { Prompter, Reporter } from './ui.js';
import type { UserIdentity } from './types.js';
import { FatalError } from './errors.js';

export const NAME_KEY = 'user.name';

export type IdentityOptions = {
  git: GitClient;
  prompter: Prompter;
  reporter: Reporter;
  emailKey: string;
  emailDomain: string;
  user?: string;
};

/**
 * Resolves the operator's name and organization email once per run. Values
 * come from global git config when present; otherwise the operator is asked,
 * the answer is written back globally, and every later caller gets the cache.
 */
export class IdentityResolver {
  private cached: UserIdentity | null = null;

  constructor(private readonly opts: IdentityOptions) {}

  async resolve(): Promise<UserIdentity> {
    if (this.cached) return this.cached;
    const name = await this.resolveName();
    const email = await this.resolveEmail();
    this.cached = { name, email };
    return this.cached;
  }

  private async resolveName(): Promise<string> {
    const { git, prompter } = this.opts;
    const existing = await git.getConfig(NAME_KEY);
    if (existing) return existing;

    const entered = (await prompter.text('Enter your full name (First Last)')).trim();
    if (!entered) throw new FatalError('A name is required to configure git; none was entered');
    await git.setGlobalConfig(NAME_KEY, entered);
    const stored = await git.getConfig(NAME_KEY);
    if (!stored) throw new FatalError(`Unable to read back ${NAME_KEY} after setting it`);
    return stored;
  }

  private async resolveEmail(): Promise<string> {
    const { git, prompter, reporter, emailKey, emailDomain, user } = this.opts;
    const existing = await git.getConfig(emailKey);
    if (existing) return existing;

    const entered = (await prompter.text(`Enter your ${emailDomain} email, without the @${emailDomain}`, {
      placeholder: user,
      defaultValue: user,
    })).trim() || user;
    if (!entered) throw new FatalError('An organization email is required to clone repositories; none was entered');
    const email = entered.includes('@') ? entered : `${entered}@${emailDomain}`;
    await git.setGlobalConfig(emailKey, email);
    const stored = await git.getConfig(emailKey);
    if (!stored) throw new FatalError(`Unable to read back ${emailKey} after setting it`);
    reporter.info(`Setting default clone email to ${stored}`);
    return stored;
  }
}
