import * as yaml from 'js-yaml';
import { InvalidManifestError } from '../../utils/errors.js';
import type { PackageRecord } from '../universe/universe.js';

/**
 * Parse a package.yml manifest:
 *
 *   name: A
 *   version: "1.0.0"
 *   depends:
 *     - '"B" {>= "1.0"}'
 *     - '"C" | "D"'
 *
 * `depends` is a formula string or a list of them; list items are ANDed.
 */
export function parsePackageManifest(content: string, origin?: string): PackageRecord {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidManifestError(`YAML parse failed: ${reason}`, { origin });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidManifestError('package.yml must be a mapping', { origin });
  }

  const name: unknown = Reflect.get(parsed, 'name');
  const version: unknown = Reflect.get(parsed, 'version');
  const depends: unknown = Reflect.get(parsed, 'depends');

  if (typeof name !== 'string' || name.trim() === '') {
    throw new InvalidManifestError('package.yml must contain a name field', { origin });
  }
  if (typeof version !== 'string') {
    // An unquoted 1.0 is read by YAML as a number and loses its text
    throw new InvalidManifestError(`version of '${name}' must be a quoted string`, { origin });
  }

  const dependsText = joinDepends(depends, name, origin);
  return {
    name,
    version,
    ...(dependsText ? { depends: dependsText } : {}),
    ...(origin ? { origin } : {})
  };
}

function joinDepends(depends: unknown, name: string, origin: string | undefined): string | undefined {
  if (depends === undefined || depends === null) {
    return undefined;
  }
  if (typeof depends === 'string') {
    return depends.trim() || undefined;
  }
  if (Array.isArray(depends)) {
    const items: string[] = [];
    for (const item of depends) {
      if (typeof item !== 'string') {
        throw new InvalidManifestError(`depends of '${name}' must list formula strings`, { origin });
      }
      if (item.trim()) items.push(item.trim());
    }
    if (items.length === 0) return undefined;
    if (items.length === 1) return items[0];
    return items.map(item => `(${item})`).join(' & ');
  }
  throw new InvalidManifestError(`depends of '${name}' must be a string or a list`, { origin });
}
