import path from 'path';
import fg from 'fast-glob';
import type { DotfileMapping, DotfileRule } from './types.js';
import { FatalError } from './errors.js';
import { isInside } from './paths.js';

export type MappingOptions = {
  rules: DotfileRule[];
  dotfilesDir: string;
  homeDir: string;
};

// bashrc.default -> bashrc, gitignore.template -> gitignore
function stripSuffix(file: string): string {
  const ext = path.extname(file);
  return ext ? file.slice(0, -ext.length) : file;
}

function targetFor(rule: DotfileRule, rel: string, homeDir: string): { target: string; stem: string } {
  if (rule.mode === 'symlink') {
    return { target: path.join(homeDir, rel), stem: path.basename(rel) };
  }
  const stem = stripSuffix(path.basename(rel));
  const dotted = stem.startsWith('.') ? stem : `.${stem}`;
  return { target: path.join(homeDir, path.dirname(rel), dotted), stem };
}

export async function getMappings(opts: MappingOptions): Promise<DotfileMapping[]> {
  const mappings: DotfileMapping[] = [];
  const seen = new Set<string>();

  for (const rule of opts.rules) {
    const matches = await fg(rule.pattern, {
      cwd: opts.dotfilesDir,
      dot: true,
      onlyFiles: true,
      ignore: ['.git/**', 'node_modules/**'],
    });
    matches.sort();

    for (const rel of matches) {
      const { target, stem } = targetFor(rule, rel, opts.homeDir);
      if (!isInside(opts.homeDir, target)) {
        throw new FatalError(`Dotfile ${rel} would be installed outside ${opts.homeDir}`);
      }
      // First rule to claim a destination wins.
      if (seen.has(target)) continue;
      seen.add(target);
      mappings.push({
        name: rel,
        source: path.join(opts.dotfilesDir, rel),
        target,
        mode: rule.mode,
        marker: rule.marker?.replaceAll('{name}', stem),
      });
    }
  }

  return mappings;
}
