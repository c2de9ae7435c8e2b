import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
  FormulaSyntaxError,
  handleError,
  MalformedVersionError,
  UnknownPackageError,
  ValidationError
} from '../../packages/core/src/utils/errors.js';
import { resolveLogLevel } from '../../packages/core/src/utils/logger.js';
import { ErrorCodes, LogLevel, PackageFormulaError } from '../../packages/core/src/types/index.js';

describe('error classes', () => {
  it('carry a code and structured details', () => {
    const error = new MalformedVersionError('1..0', 'empty segment between dots');
    assert.ok(error instanceof PackageFormulaError);
    assert.equal(error.code, ErrorCodes.MALFORMED_VERSION);
    assert.deepEqual(error.details, { input: '1..0', reason: 'empty segment between dots' });
    assert.equal(error.input, '1..0');
  });

  it('point a caret at the syntax error position', () => {
    const error = new FormulaSyntaxError('"A" | |', 6, 'a package name, "(" or "!"', '"|"');
    assert.equal(error.message, 'Expected a package name, "(" or "!" but found "|" at position 6\n  "A" | |\n        ^');
    assert.equal(error.code, ErrorCodes.SYNTAX_ERROR);
  });

  it('clamps the caret to the source', () => {
    const error = new FormulaSyntaxError('"A"', 10, '")"');
    assert.equal(error.message, 'Expected ")" at position 3\n  "A"\n     ^');
    assert.equal(error.position, 10);
  });

  it('prefix validation messages', () => {
    assert.equal(new ValidationError('bad input').message, 'Validation error: bad input');
  });
});

describe('handleError', () => {
  it('maps library errors to their message', () => {
    assert.deepEqual(handleError(new UnknownPackageError('Z')), {
      success: false,
      error: "Package 'Z' not found in universe"
    });
  });

  it('maps plain errors and unknown values', () => {
    assert.deepEqual(handleError(new Error('boom')), { success: false, error: 'boom' });
    assert.deepEqual(handleError('boom'), { success: false, error: 'An unknown error occurred' });
  });
});

describe('resolveLogLevel', () => {
  it('reads the log level from the environment', () => {
    assert.equal(resolveLogLevel({ PKGFORMULA_VERBOSE: '1' }), LogLevel.DEBUG);
    assert.equal(resolveLogLevel({ NODE_ENV: 'development' }), LogLevel.INFO);
    assert.equal(resolveLogLevel({ PKGFORMULA_VERBOSE: '0', NODE_ENV: 'production' }), LogLevel.ERROR);
    assert.equal(resolveLogLevel({}), LogLevel.ERROR);
  });
});
