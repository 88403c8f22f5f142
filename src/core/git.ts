import { simpleGit } from 'simple-git';

export type GitVersion = {
  installed: boolean;
  major: number;
  minor: number;
};

/** The version-control operations provisioning needs, kept narrow so tests can fake them. */
export interface GitClient {
  version(): Promise<GitVersion>;
  getConfig(key: string): Promise<string | null>;
  getLocalConfig(dir: string, key: string): Promise<string | null>;
  setGlobalConfig(key: string, value: string): Promise<void>;
  clone(url: string, dest: string): Promise<void>;
  updateSubmodules(dir: string): Promise<void>;
}

function emptyToNull(value: string | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function createGitClient(): GitClient {
  const git = simpleGit();
  return {
    async version() {
      const v = await git.version();
      return { installed: v.installed, major: v.major, minor: v.minor };
    },
    async getConfig(key) {
      const result = await git.getConfig(key);
      return emptyToNull(result.value);
    },
    async getLocalConfig(dir, key) {
      const result = await simpleGit(dir).getConfig(key, 'local');
      return emptyToNull(result.value);
    },
    async setGlobalConfig(key, value) {
      await git.addConfig(key, value, false, 'global');
    },
    async clone(url, dest) {
      await git.clone(url, dest);
    },
    async updateSubmodules(dir) {
      await simpleGit(dir).submoduleUpdate(['--init', '--recursive']);
    },
  };
}

export function meetsMinimumVersion(version: GitVersion, minimum: { major: number; minor: number }): boolean {
  if (!version.installed) return false;
  if (version.major !== minimum.major) return version.major > minimum.major;
  return version.minor >= minimum.minor;
}
