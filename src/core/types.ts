export type InstallMode = 'symlink' | 'copy-with-inclusion' | 'copy-if-absent';
export type CopyMode = Exclude<InstallMode, 'symlink'>;

export type DotfileRule = {
  pattern: string;
  mode: InstallMode;
  marker?: string;
};

export type DotfileMapping = {
  name: string;
  source: string;
  target: string;
  mode: InstallMode;
  marker?: string;
};

export type DotfileTask =
  | { type: 'link'; source: string; target: string }
  | { type: 'copy'; source: string; target: string; mode: CopyMode }
  | { type: 'noop'; source: string; target: string }
  | { type: 'conflict'; source: string; target: string; reason: string }
  | { type: 'fatal'; source: string; target: string; marker: string };

export type ConflictTask = Extract<DotfileTask, { type: 'conflict' }>;
export type FatalTask = Extract<DotfileTask, { type: 'fatal' }>;

export type DotfilePlan = {
  tasks: DotfileTask[];
  changes: DotfileTask[];
  conflicts: ConflictTask[];
  fatals: FatalTask[];
};

export type DotfileStatus = {
  name: string;
  target: string;
  status: 'installed' | 'missing' | 'conflict' | 'incompatible';
};

export type CloneMode = 'bootstrap' | 'identity';

export type RepositorySpec = {
  url: string;
  dest: string;
  mode: CloneMode;
  mandatory: boolean;
  requiresAuth: boolean;
  protectedHooks: boolean;
};

export type UserIdentity = {
  name: string;
  email: string;
};

export type CapabilityResult = { ok: true } | { ok: false; message: string };
