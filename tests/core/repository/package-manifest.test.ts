import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { parsePackageManifest } from '../../../packages/core/src/core/repository/package-manifest.js';
import { parseDependsList } from '../../../packages/core/src/core/formula/parser.js';
import { formatFormula } from '../../../packages/core/src/core/formula/format.js';

describe('parsePackageManifest', () => {
  it('reads a single formula string', () => {
    const record = parsePackageManifest(`name: A\nversion: "1.0.0"\ndepends: '"B" {>= "1.0"}'\n`, 'pkg/package.yml');
    assert.deepEqual(record, { name: 'A', version: '1.0.0', depends: '"B" {>= "1.0"}', origin: 'pkg/package.yml' });
  });

  it('ANDs the items of a depends list', () => {
    const record = parsePackageManifest(
      [
        'name: A',
        'version: "1.0.0"',
        'depends:',
        `  - '"B" {>= "1.0"}'`,
        `  - '"C" | "D"'`,
        ''
      ].join('\n')
    );
    assert.equal(record.depends, '("B" {>= "1.0"}) & ("C" | "D")');
    const formula = parseDependsList(record.depends ?? '');
    assert.ok(formula);
    assert.equal(formatFormula(formula), '"B" {>= "1.0"} & ("C" | "D")');
  });

  it('keeps a one-item list as is and drops empty lists', () => {
    assert.equal(parsePackageManifest(`name: A\nversion: "1"\ndepends: ['"B"']\n`).depends, '"B"');
    assert.equal(parsePackageManifest('name: A\nversion: "1"\ndepends: []\n').depends, undefined);
    assert.equal(parsePackageManifest('name: A\nversion: "1"\n').depends, undefined);
  });

  it('requires a quoted version', () => {
    assert.throws(() => parsePackageManifest('name: A\nversion: 1.0\n'), {
      name: 'InvalidManifestError',
      message: "Invalid package manifest: version of 'A' must be a quoted string"
    });
  });

  it('requires a mapping with a name', () => {
    assert.throws(() => parsePackageManifest('- A\n'), { message: 'Invalid package manifest: package.yml must be a mapping' });
    assert.throws(() => parsePackageManifest('version: "1"\n'), {
      message: 'Invalid package manifest: package.yml must contain a name field'
    });
  });

  it('rejects depends of the wrong shape', () => {
    assert.throws(() => parsePackageManifest('name: A\nversion: "1"\ndepends: 3\n'), {
      message: "Invalid package manifest: depends of 'A' must be a string or a list"
    });
    assert.throws(() => parsePackageManifest('name: A\nversion: "1"\ndepends: [1]\n'), {
      message: "Invalid package manifest: depends of 'A' must list formula strings"
    });
  });

  it('wraps YAML syntax errors', () => {
    assert.throws(
      () => parsePackageManifest('name: [\n'),
      (error: unknown) => error instanceof Error && error.message.startsWith('Invalid package manifest: YAML parse failed:')
    );
  });
});
