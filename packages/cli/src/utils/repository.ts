import { resolve as resolvePath } from 'path';
import { ENV_VARS, loadRepository, type OutputPort, type PackageUniverse } from '@pkgformula/core';

/**
 * Repository directory: --repo, then PKGFORMULA_REPO, then the working directory.
 */
export function resolveRepositoryDir(repo?: string, env: NodeJS.ProcessEnv = process.env): string {
  return resolvePath(repo ?? env[ENV_VARS.REPO] ?? process.cwd());
}

/**
 * Loads a repository, reporting unreadable entries as warnings instead of
 * failing the whole command.
 */
export async function loadCliRepository(repoDir: string, output: OutputPort): Promise<PackageUniverse> {
  const spinner = output.spinner();
  spinner.start(`Loading packages from ${repoDir}`);
  let skipped = 0;
  const universe = await loadRepository(repoDir, {
    onInvalidEntry: issue => {
      skipped++;
      output.warn(`Skipped ${issue.origin ?? 'entry'}: ${issue.error.message}`);
    }
  });
  const suffix = skipped > 0 ? ` (${skipped} skipped)` : '';
  spinner.stop(`Loaded ${universe.packageNames().length} packages, ${universe.size} versions${suffix}`);
  return universe;
}
