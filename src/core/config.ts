import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { FatalError, getErrorMessage } from './errors.js';

export const MANIFEST_FILE = 'devstrap.json';
export const MAIN_PROJECT_ENV = 'DEVSTRAP_MAIN_PROJECT';

const CommandSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.enum(['home', 'devtools', 'dotfiles', 'main-project']).default('home'),
});

const DotfileRuleSchema = z
  .object({
    pattern: z.string().min(1),
    mode: z.enum(['symlink', 'copy-with-inclusion', 'copy-if-absent']),
    marker: z.string().min(1).optional(),
  })
  .refine((rule) => rule.mode !== 'copy-with-inclusion' || rule.marker !== undefined, {
    message: 'copy-with-inclusion rules need a marker',
  });

const ToolSchema = z.object({
  name: z.string().min(1),
  probe: CommandSchema,
  install: CommandSchema,
});

export const ManifestSchema = z.object({
  organization: z.object({
    name: z.string().min(1),
    emailDomain: z.string().min(1),
  }),
  paths: z
    .object({
      repos: z.string().min(1).default('src'),
      devtools: z.string().min(1).default('src/devtools'),
    })
    .default({}),
  identity: z
    .object({
      emailKey: z.string().min(1).default('orgclone.email'),
    })
    .default({}),
  cloneTool: z.object({
    url: z.string().min(1),
    bin: z.string().min(1),
  }),
  devtools: z.array(z.string().min(1)).default([]),
  mainProject: z.object({
    url: z.string().min(1),
    dumpFile: z.string().min(1).optional(),
  }),
  dotfiles: z.array(DotfileRuleSchema).default([]),
  tools: z.array(ToolSchema).default([]),
  commands: z.object({
    cloudAuth: CommandSchema.optional(),
    installDeps: CommandSchema.optional(),
    installHooks: CommandSchema.optional(),
    fetchDump: CommandSchema.optional(),
    createDatabases: CommandSchema.optional(),
  }).default({}),
  authTool: z
    .object({
      credentialFile: z.string().min(1),
      loginUrl: z.string().min(1),
      install: CommandSchema,
    })
    .optional(),
  services: z.array(z.object({ name: z.string().min(1), port: z.number().int().min(1).max(65535) })).default([]),
}).refine((manifest) => !manifest.commands.fetchDump || manifest.mainProject.dumpFile !== undefined, {
  // Without it the fetch would run on every invocation.
  message: 'commands.fetchDump needs mainProject.dumpFile',
  path: ['mainProject', 'dumpFile'],
});

export type Manifest = z.infer<typeof ManifestSchema>;
export type CommandSpec = z.infer<typeof CommandSchema>;
export type ToolSpec = z.infer<typeof ToolSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseManifest(raw: unknown, source = MANIFEST_FILE): Manifest {
  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new FatalError(`Invalid manifest ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export async function loadManifest(file: string): Promise<Manifest> {
  let text: string;
  try {
    text = await fs.promises.readFile(file, 'utf8');
  } catch (err) {
    throw new FatalError(`Unable to read manifest ${file}: ${getErrorMessage(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new FatalError(`Manifest ${file} is not valid JSON: ${getErrorMessage(err)}`);
  }
  return parseManifest(raw, path.basename(file));
}

/** Unset means on; only an explicit false-ish value turns the main project off. */
export function parseToggle(value: string | undefined): boolean {
  if (value === undefined) return true;
  const normalized = value.trim().toLowerCase();
  return !['false', '0', 'no', 'off'].includes(normalized);
}

export type ProvisionEnv = {
  shell?: string;
  virtualEnv?: string;
  user?: string;
};

export function readProvisionEnv(env: NodeJS.ProcessEnv): ProvisionEnv {
  return {
    shell: env.SHELL || undefined,
    virtualEnv: env.VIRTUAL_ENV || undefined,
    user: env.USER || undefined,
  };
}
