/**
 * Repository loader: builds a universe from a directory of package metadata.
 *
 * Two layouts are read, and may be mixed:
 *   packages/<name>/<name>.<version>/opam
 *   <anything>/package.yml
 */

import { basename, dirname } from 'path';
import { isJunk } from 'junk';
import { FILE_PATTERNS } from '../../constants/index.js';
import { PackageFormulaError } from '../../types/index.js';
import { FileSystemError } from '../../utils/errors.js';
import { walkFiles } from '../../utils/file-walker.js';
import { isDirectory, readTextFile } from '../../utils/fs.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { loadUniverse, type LoadUniverseOptions, type PackageRecord, type PackageUniverse } from '../universe/universe.js';
import { parseOpamFile, parseVersionedDirName } from './opam-file.js';
import { parsePackageManifest } from './package-manifest.js';

const logger = rootLogger.child('repository');

function isMetadataFile(fileName: string): boolean {
  return fileName === FILE_PATTERNS.OPAM_FILE || fileName === FILE_PATTERNS.PACKAGE_YML;
}

async function readRecord(filePath: string): Promise<PackageRecord> {
  const content = await readTextFile(filePath);
  if (basename(filePath) === FILE_PATTERNS.PACKAGE_YML) {
    return parsePackageManifest(content, filePath);
  }
  const fromDir = parseVersionedDirName(basename(dirname(filePath)));
  return parseOpamFile(content, { ...fromDir, origin: filePath });
}

/**
 * Reads every metadata file under `rootDir`, in path order.
 *
 * With `onInvalidEntry`, files that cannot be read into a record are
 * reported and skipped; without it the first failure is thrown.
 */
export async function readPackageRecords(
  rootDir: string,
  options: LoadUniverseOptions = {}
): Promise<PackageRecord[]> {
  if (!(await isDirectory(rootDir))) {
    throw new FileSystemError(`Repository directory not found: ${rootDir}`, { path: rootDir });
  }

  const records: PackageRecord[] = [];
  const walker = walkFiles(rootDir, {
    filter: (path, isDir) => !isJunk(basename(path)) && (isDir || isMetadataFile(basename(path)))
  });

  for await (const filePath of walker) {
    try {
      records.push(await readRecord(filePath));
    } catch (error) {
      if (!(error instanceof PackageFormulaError) || !options.onInvalidEntry) {
        throw error;
      }
      logger.warn(`Skipping ${filePath}: ${error.message}`);
      options.onInvalidEntry({ origin: filePath, error });
    }
  }

  logger.debug(`Read ${records.length} package records from ${rootDir}`);
  return records;
}

export async function loadRepository(rootDir: string, options: LoadUniverseOptions = {}): Promise<PackageUniverse> {
  const records = await readPackageRecords(rootDir, options);
  return loadUniverse(records, options);
}
