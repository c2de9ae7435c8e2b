import { formatFormula, ValidationError, type CommandResult, type OutputPort } from '@pkgformula/core';
import { getCliOutput } from '../cli/context.js';
import { loadCliRepository, resolveRepositoryDir } from '../utils/repository.js';

export interface ListOptions {
  repo?: string;
}

export interface ListedPackage {
  name: string;
  versions: string[];
}

export async function listCommand(
  packageName: string | undefined,
  options: ListOptions,
  output: OutputPort
): Promise<CommandResult<ListedPackage[]>> {
  const universe = await loadCliRepository(resolveRepositoryDir(options.repo), output);

  if (packageName !== undefined) {
    if (!universe.has(packageName)) {
      throw new ValidationError(`Package '${packageName}' is not in the repository`);
    }
    const entries = universe.versions(packageName);
    for (const entry of entries) {
      const depends = entry.depends ? formatFormula(entry.depends) : '(no dependencies)';
      output.info(`${entry.name} ${entry.version.raw}: ${depends}`);
    }
    return { success: true, data: [{ name: packageName, versions: entries.map(entry => entry.version.raw) }] };
  }

  const listed: ListedPackage[] = universe.packageNames().map(name => ({
    name,
    versions: universe.versions(name).map(entry => entry.version.raw)
  }));

  if (listed.length === 0) {
    output.warn('No packages found');
  }
  for (const pkg of listed) {
    output.info(`${pkg.name}: ${pkg.versions.join(', ')}`);
  }
  output.info(`Total: ${listed.length} packages, ${universe.size} versions`);

  return { success: true, data: listed };
}

export async function setupListCommand(packageName: string | undefined, options: ListOptions): Promise<void> {
  await listCommand(packageName, options, getCliOutput());
}
