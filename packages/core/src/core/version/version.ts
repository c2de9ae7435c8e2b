/**
 * Version parsing and ordering.
 *
 * A version is split on `.` and then on every boundary between a run of
 * digits and a run of non-digits, so `1.10rc2` becomes `1`, `10`, `rc`, `2`.
 *
 * Ordering, segment by segment:
 * - numeric segments compare numerically (any length, leading zeros ignored)
 * - text segments compare by code unit
 * - at one position a missing segment sorts lowest, then text, then numeric
 *
 * Consequences: `1.0 < 1.0.0`, `1.0.rc1 < 1.0.0`, `1.01 == 1.1`.
 */

import { MalformedVersionError } from '../../utils/errors.js';

export type VersionSegment =
  | { readonly kind: 'numeric'; readonly value: string }
  | { readonly kind: 'text'; readonly value: string };

export interface Version {
  /** Trimmed source text */
  readonly raw: string;
  readonly segments: readonly VersionSegment[];
}

export type Ordering = -1 | 0 | 1;

const RUN_PATTERN = /\d+|\D+/g;
const DIGITS = /^\d+$/;

function stripLeadingZeros(digits: string): string {
  return digits.replace(/^0+(?=\d)/, '');
}

export function parseVersion(text: string): Version {
  const raw = text.trim();
  if (raw === '') {
    throw new MalformedVersionError(text, 'version is empty');
  }
  if (/\s/.test(raw)) {
    throw new MalformedVersionError(text, 'version contains whitespace');
  }

  const segments: VersionSegment[] = [];
  for (const part of raw.split('.')) {
    if (part === '') {
      throw new MalformedVersionError(text, 'empty segment between dots');
    }
    for (const run of part.match(RUN_PATTERN) ?? []) {
      segments.push(
        DIGITS.test(run)
          ? { kind: 'numeric', value: stripLeadingZeros(run) }
          : { kind: 'text', value: run }
      );
    }
  }

  return Object.freeze({ raw, segments: Object.freeze(segments) });
}

/**
 * Returns null instead of throwing for unparsable input.
 */
export function tryParseVersion(text: string): Version | null {
  try {
    return parseVersion(text);
  } catch (error) {
    if (error instanceof MalformedVersionError) {
      return null;
    }
    throw error;
  }
}

function compareText(a: string, b: string): Ordering {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareDigits(a: string, b: string): Ordering {
  if (a.length !== b.length) {
    return a.length < b.length ? -1 : 1;
  }
  return compareText(a, b);
}

function segmentRank(segment: VersionSegment | undefined): number {
  if (!segment) return 0;
  return segment.kind === 'text' ? 1 : 2;
}

function compareSegments(a: VersionSegment | undefined, b: VersionSegment | undefined): Ordering {
  const rankA = segmentRank(a);
  const rankB = segmentRank(b);
  if (rankA !== rankB) {
    return rankA < rankB ? -1 : 1;
  }
  if (!a || !b) return 0;
  return a.kind === 'numeric' ? compareDigits(a.value, b.value) : compareText(a.value, b.value);
}

export function compareVersions(a: Version, b: Version): Ordering {
  const length = Math.max(a.segments.length, b.segments.length);
  for (let i = 0; i < length; i++) {
    const result = compareSegments(a.segments[i], b.segments[i]);
    if (result !== 0) return result;
  }
  return 0;
}

export function versionsEqual(a: Version, b: Version): boolean {
  return compareVersions(a, b) === 0;
}

/**
 * Newest first. Returns a new array.
 */
export function sortVersionsDescending<T extends Version>(versions: readonly T[]): T[] {
  return [...versions].sort((a, b) => compareVersions(b, a));
}

export function formatVersion(version: Version): string {
  return version.raw;
}
