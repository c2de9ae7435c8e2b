import { PackageFormulaError } from '../../types/index.js';
import { DuplicateVersionError, ValidationError } from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { parseDependsList } from '../formula/parser.js';
import type { Formula } from '../formula/types.js';
import { compareVersions, parseVersion, type Version } from '../version/version.js';

const logger = rootLogger.child('universe');

/**
 * One available version of a package and the formula it declares.
 * An entry without `depends` has no dependencies.
 */
export interface PackageVersionEntry {
  readonly name: string;
  readonly version: Version;
  readonly depends?: Formula;
}

/**
 * Raw package metadata as handed over by a loader.
 */
export interface PackageRecord {
  name: string;
  version: string;
  /** Formula text; several formulas side by side are ANDed */
  depends?: string;
  /** Where the record came from (file path, registry key), for diagnostics */
  origin?: string;
}

export interface UniverseLoadIssue {
  /** Absent when the metadata could not be read into a record at all */
  record?: PackageRecord;
  origin?: string;
  error: PackageFormulaError;
}

export interface LoadUniverseOptions {
  /**
   * When set, records that fail to parse are reported here and skipped.
   * When unset, the first failure is thrown.
   */
  onInvalidEntry?: (issue: UniverseLoadIssue) => void;
}

/**
 * Known packages and their versions, newest first.
 *
 * Built once, then shared read-only between resolution runs.
 */
export class PackageUniverse {
  private readonly packages: Map<string, PackageVersionEntry[]> = new Map();

  add(entry: PackageVersionEntry): void {
    if (entry.name.trim() === '') {
      throw new ValidationError('package name must not be empty', { version: entry.version.raw });
    }

    let versions = this.packages.get(entry.name);
    if (!versions) {
      versions = [];
      this.packages.set(entry.name, versions);
    }

    const existing = versions.find(candidate => compareVersions(candidate.version, entry.version) === 0);
    if (existing) {
      throw new DuplicateVersionError(entry.name, entry.version.raw, existing.version.raw);
    }

    const index = versions.findIndex(candidate => compareVersions(candidate.version, entry.version) < 0);
    if (index === -1) {
      versions.push(entry);
    } else {
      versions.splice(index, 0, entry);
    }
  }

  has(name: string): boolean {
    return this.packages.has(name);
  }

  /**
   * All versions of a package, newest first. Empty for unknown packages.
   */
  versions(name: string): readonly PackageVersionEntry[] {
    return this.packages.get(name) ?? [];
  }

  get(name: string, version: Version | string): PackageVersionEntry | undefined {
    const target = typeof version === 'string' ? parseVersion(version) : version;
    return this.versions(name).find(entry => compareVersions(entry.version, target) === 0);
  }

  packageNames(): string[] {
    return [...this.packages.keys()].sort();
  }

  *entries(): IterableIterator<PackageVersionEntry> {
    for (const name of this.packageNames()) {
      yield* this.versions(name);
    }
  }

  /** Number of package versions */
  get size(): number {
    let total = 0;
    for (const versions of this.packages.values()) {
      total += versions.length;
    }
    return total;
  }
}

function toEntry(record: PackageRecord): PackageVersionEntry {
  const version = parseVersion(record.version);
  const text = record.depends?.trim();
  const depends = text ? parseDependsList(text) : undefined;
  return Object.freeze({ name: record.name, version, depends });
}

/**
 * Builds a universe from raw records. Each record is parsed on its own, so
 * with `onInvalidEntry` one bad record does not keep the others out.
 */
export function loadUniverse(
  records: Iterable<PackageRecord>,
  options: LoadUniverseOptions = {}
): PackageUniverse {
  const universe = new PackageUniverse();

  for (const record of records) {
    try {
      universe.add(toEntry(record));
    } catch (error) {
      if (!(error instanceof PackageFormulaError) || !options.onInvalidEntry) {
        throw error;
      }
      const where = record.origin ? ` (${record.origin})` : '';
      logger.warn(`Skipping ${record.name}@${record.version}${where}: ${error.message}`);
      options.onInvalidEntry({ record, origin: record.origin, error });
    }
  }

  logger.debug(`Loaded universe: ${universe.packageNames().length} packages, ${universe.size} versions`);
  return universe;
}
