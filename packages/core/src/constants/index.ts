/**
 * Shared constants for pkgformula.
 * Single source of truth for metadata file names, environment variables
 * and resolver limits.
 */

export const FILE_PATTERNS = {
  OPAM_FILE: 'opam',
  PACKAGE_YML: 'package.yml'
} as const;

export const ENV_VARS = {
  VERBOSE: 'PKGFORMULA_VERBOSE',
  REPO: 'PKGFORMULA_REPO'
} as const;

export const RESOLVER_DEFAULTS = {
  /** Safety valve on search loop iterations */
  MAX_STEPS: 100_000
} as const;

export const COMPARATORS = ['=', '!=', '<', '<=', '>', '>='] as const;
