/**
 * Reader for opam-style package metadata files.
 *
 * Only the fields the resolver needs are read: `name`, `version` and the
 * `depends: [ ... ]` list. Everything else in the file is ignored.
 */

import { InvalidManifestError } from '../../utils/errors.js';
import type { PackageRecord } from '../universe/universe.js';

export interface OpamFileFallback {
  name?: string;
  version?: string;
  origin?: string;
}

const STRING_FIELD = (field: string): RegExp => new RegExp(`^\\s*${field}\\s*:\\s*"((?:[^"\\\\]|\\\\.)*)"`, 'm');

function unescape(value: string): string {
  return value.replace(/\\(.)/g, '$1');
}

function readStringField(content: string, field: string): string | undefined {
  const match = content.match(STRING_FIELD(field));
  return match?.[1] === undefined ? undefined : unescape(match[1]);
}

/**
 * Body of the `depends: [ ... ]` field, brackets excluded.
 * Brackets inside quoted strings do not count.
 */
function readDependsField(content: string, origin: string | undefined): string | undefined {
  const start = content.match(/^\s*depends\s*:\s*\[/m);
  if (!start || start.index === undefined) {
    return undefined;
  }

  const bodyStart = start.index + start[0].length;
  let depth = 1;
  let inString = false;

  for (let i = bodyStart; i < content.length; i++) {
    const ch = content[i];
    if (inString) {
      if (ch === '\\') {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '[') {
      depth++;
    } else if (ch === ']') {
      depth--;
      if (depth === 0) {
        return content.slice(bodyStart, i);
      }
    }
  }

  throw new InvalidManifestError('unterminated depends list', { origin });
}

/**
 * Splits a `<name>.<version>` directory name at its first dot.
 */
export function parseVersionedDirName(dirName: string): { name: string; version: string } | undefined {
  const dot = dirName.indexOf('.');
  if (dot <= 0 || dot === dirName.length - 1) {
    return undefined;
  }
  return { name: dirName.slice(0, dot), version: dirName.slice(dot + 1) };
}

/**
 * Reads an opam file into a package record. `name` and `version` fall back
 * to the given values (usually taken from the enclosing directory).
 */
export function parseOpamFile(content: string, fallback: OpamFileFallback = {}): PackageRecord {
  const { origin } = fallback;
  const name = readStringField(content, 'name') ?? fallback.name;
  const version = readStringField(content, 'version') ?? fallback.version;

  if (!name) {
    throw new InvalidManifestError('missing name field', { origin });
  }
  if (!version) {
    throw new InvalidManifestError(`missing version field for '${name}'`, { origin });
  }

  const depends = readDependsField(content, origin)?.trim();
  return {
    name,
    version,
    ...(depends ? { depends } : {}),
    ...(origin ? { origin } : {})
  };
}
