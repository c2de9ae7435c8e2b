import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { resolve } from '../../../packages/core/src/core/resolver/resolver.js';
import type { ResolutionEvent, ResolutionOutcome, Selection } from '../../../packages/core/src/core/resolver/types.js';
import { evaluateForSelection } from '../../../packages/core/src/core/formula/evaluate.js';
import { createConstraint } from '../../../packages/core/src/core/version/constraint.js';
import { fixtureUniverse, universeOf } from '../../test-helpers.js';

function pairs(selection: Selection): string[] {
  return [...selection].map(([name, version]) => `${name}@${version.raw}`);
}

function solved(outcome: ResolutionOutcome): string[] {
  assert.equal(outcome.status, 'solved', outcome.status === 'conflict' ? outcome.conflict.message : outcome.status);
  return outcome.status === 'solved' ? pairs(outcome.selection) : [];
}

const pin = (version: string) => [createConstraint('=', version)];

describe('resolve over the fixture repository', () => {
  const universe = fixtureUniverse();

  it('solves A 1.0.0 through both sides of its conjunction', () => {
    assert.deepEqual(solved(resolve(universe, 'A', pin('1.0.0'))), ['A@1.0.0', 'B@2.0.0', 'E@1.0.0', 'C@1.0.0']);
  });

  it('solves A 1.1.0 with the first alternative', () => {
    assert.deepEqual(solved(resolve(universe, 'A', pin('1.1.0'))), ['A@1.1.0', 'B@2.0.0', 'E@1.0.0']);
  });

  it('falls back to the second alternative when the first has no versions', () => {
    assert.deepEqual(solved(resolve(universe, 'A', pin('1.2.0'))), ['A@1.2.0', 'C@1.0.0']);
  });

  it('tries alternatives in written order', () => {
    assert.deepEqual(solved(resolve(universe, 'A', pin('1.3.0'))), ['A@1.3.0', 'C@1.0.0']);
  });

  it('prefers the newest matching version', () => {
    assert.deepEqual(solved(resolve(universe, 'A', pin('2.0.0'))), ['A@2.0.0', 'B@2.0.0', 'E@1.0.0', 'C@1.5.0']);
    assert.deepEqual(solved(resolve(universe, 'A', pin('2.1.0'))), ['A@2.1.0', 'B@2.0.0', 'E@1.0.0', 'C@1.5.0']);
  });

  it('backtracks out of a branch that contradicts an earlier choice', () => {
    assert.deepEqual(solved(resolve(universe, 'A', pin('3.0.0'))), ['A@3.0.0', 'B@2.0.0', 'C@1.5.0', 'E@1.0.0']);
  });

  it('returns selections in which every selected formula holds', () => {
    for (const version of ['1.0.0', '1.1.0', '1.2.0', '1.3.0', '2.0.0', '2.1.0', '3.0.0']) {
      const outcome = resolve(universe, 'A', pin(version));
      assert.ok(outcome.status === 'solved', version);
      for (const [name, selected] of outcome.selection) {
        const depends = universe.get(name, selected)?.depends;
        assert.ok(!depends || evaluateForSelection(depends, outcome.selection), `${name}@${selected.raw} in A@${version}`);
      }
    }
  });

  it('is deterministic', () => {
    const first = solved(resolve(universe, 'A', pin('3.0.0')));
    const second = solved(resolve(universe, 'A', pin('3.0.0')));
    assert.deepEqual(first, second);
  });

  it('picks the newest root when unconstrained', () => {
    assert.deepEqual(solved(resolve(universe, 'A')), ['A@3.0.0', 'B@2.0.0', 'C@1.5.0', 'E@1.0.0']);
  });

  it('honours root range constraints', () => {
    const outcome = resolve(universe, 'A', [createConstraint('<', '2.0.0'), createConstraint('>', '1.1.0')]);
    assert.deepEqual(solved(outcome), ['A@1.3.0', 'C@1.0.0']);
  });

  it('returns a selection that satisfies the pinned root', () => {
    const outcome = resolve(universe, 'B', pin('1.0.0'));
    assert.deepEqual(solved(outcome), ['B@1.0.0', 'E@1.0.0']);
  });
});

describe('resolve conflicts', () => {
  it('reports a dependency with no matching version', () => {
    const universe = universeOf(
      ['A', '1.0.0', '("B" {> "1.0.0"} & "C" {< "1.4.0"})'],
      ['B', '1.0.0', '"E" {= "1.0.0"}'],
      ['E', '1.0.0']
    );
    const outcome = resolve(universe, 'A', pin('1.0.0'));
    assert.equal(outcome.status, 'conflict');
    if (outcome.status !== 'conflict') return;

    const { conflict } = outcome;
    assert.equal(conflict.reason, 'no-matching-version');
    assert.equal(conflict.packageName, 'B');
    assert.equal(conflict.requestedBy?.name, 'A');
    assert.equal(conflict.requestedBy?.version.raw, '1.0.0');
    assert.deepEqual(conflict.availableVersions.map(v => v.raw), ['1.0.0']);
    assert.deepEqual(pairs(conflict.partialSelection), ['A@1.0.0']);
    assert.equal(
      conflict.message,
      `No version of 'B' satisfies {> "1.0.0"} (required by A@1.0.0); available: 1.0.0`
    );
  });

  it('reports an unknown dependency', () => {
    const outcome = resolve(universeOf(['P', '1.0.0', '"Z"']), 'P');
    assert.ok(outcome.status === 'conflict');
    assert.equal(outcome.conflict.reason, 'unknown-package');
    assert.equal(outcome.conflict.message, "Package 'Z' is not in the universe (required by P@1.0.0)");
    assert.deepEqual(outcome.conflict.availableVersions, []);
  });

  it('reports an unknown root as requested by the root request', () => {
    const outcome = resolve(universeOf(['P', '1.0.0']), 'Q');
    assert.ok(outcome.status === 'conflict');
    assert.equal(outcome.conflict.requestedBy, null);
    assert.equal(outcome.conflict.message, "Package 'Q' is not in the universe (required by the root request)");
  });

  it('reports a root constraint no version meets', () => {
    const outcome = resolve(fixtureUniverse(), 'C', pin('9.9'));
    assert.ok(outcome.status === 'conflict');
    assert.equal(
      outcome.conflict.message,
      `No version of 'C' satisfies {= "9.9"} (required by the root request); available: 1.5.0, 1.0.0`
    );
  });

  it('reports a version already selected that a later leaf rejects', () => {
    const universe = universeOf(
      ['P', '1.0.0', '"R" {= "2.0.0"} & "Q"'],
      ['Q', '1.0.0', '"R" {= "1.0.0"}'],
      ['R', '1.0.0'],
      ['R', '2.0.0']
    );
    const outcome = resolve(universe, 'P');
    assert.ok(outcome.status === 'conflict');
    assert.equal(outcome.conflict.reason, 'version-mismatch');
    assert.equal(outcome.conflict.selectedVersion?.raw, '2.0.0');
    assert.deepEqual(pairs(outcome.conflict.partialSelection), ['P@1.0.0', 'R@2.0.0', 'Q@1.0.0']);
    assert.equal(
      outcome.conflict.message,
      `'R' is selected at 2.0.0, which does not satisfy {= "1.0.0"} (required by Q@1.0.0)`
    );
  });

  it('keeps the deepest failure across backtracking', () => {
    const universe = universeOf(
      ['P', '1.0.0', '"Q" | "S"'],
      ['Q', '1.0.0', '"R" & "T"'],
      ['R', '1.0.0'],
      ['S', '1.0.0', '"Z"']
    );
    const outcome = resolve(universe, 'P');
    assert.ok(outcome.status === 'conflict');
    assert.equal(outcome.conflict.packageName, 'T');
    assert.deepEqual(pairs(outcome.conflict.partialSelection), ['P@1.0.0', 'Q@1.0.0', 'R@1.0.0']);
  });
});

describe('negation', () => {
  it('rejects a selection that contains an excluded package', () => {
    const universe = universeOf(['P', '1.0.0', '"Q" & !"R"'], ['Q', '1.0.0', '"R"'], ['R', '1.0.0']);
    const outcome = resolve(universe, 'P');
    assert.ok(outcome.status === 'conflict');
    assert.equal(outcome.conflict.reason, 'formula-unsatisfied');
    assert.equal(outcome.conflict.packageName, 'P');
    assert.equal(outcome.conflict.message, 'Dependencies of P@1.0.0 do not hold for the final selection');
  });

  it('backtracks to a version that avoids the excluded package', () => {
    const universe = universeOf(
      ['P', '1.0.0', '"Q" & !"R"'],
      ['Q', '2.0.0', '"R"'],
      ['Q', '1.0.0'],
      ['R', '1.0.0']
    );
    assert.deepEqual(solved(resolve(universe, 'P')), ['P@1.0.0', 'Q@1.0.0']);
  });

  it('never commits a package only named under negation', () => {
    const universe = universeOf(['P', '1.0.0', '!"R"'], ['R', '1.0.0']);
    assert.deepEqual(solved(resolve(universe, 'P')), ['P@1.0.0']);
  });
});

describe('termination', () => {
  it('solves cyclic dependencies', () => {
    const universe = universeOf(['X', '1.0.0', '"Y"'], ['Y', '1.0.0', '"X" {>= "1.0.0"}']);
    assert.deepEqual(solved(resolve(universe, 'X')), ['X@1.0.0', 'Y@1.0.0']);
  });

  it('stops at the step limit', () => {
    const outcome = resolve(fixtureUniverse(), 'A', [], { maxSteps: 1 });
    assert.ok(outcome.status === 'conflict');
    assert.equal(outcome.steps, 1);
    assert.equal(outcome.conflict.reason, 'search-limit');
    assert.equal(outcome.conflict.message, "Search for 'A' stopped after 1 steps without a solution");
    assert.deepEqual(pairs(outcome.conflict.partialSelection), ['A@3.0.0']);
  });

  it('returns cancelled for an already aborted signal', () => {
    const outcome = resolve(fixtureUniverse(), 'A', [], { signal: AbortSignal.abort() });
    assert.equal(outcome.status, 'cancelled');
    assert.ok(outcome.status === 'cancelled');
    assert.equal(outcome.partialSelection.size, 0);
    assert.equal(outcome.steps, 0);
  });

  it('returns the partial selection when aborted mid-search', () => {
    const controller = new AbortController();
    const outcome = resolve(fixtureUniverse(), 'A', [], {
      signal: controller.signal,
      onEvent: event => {
        if (event.type === 'committed') controller.abort();
      }
    });
    assert.ok(outcome.status === 'cancelled');
    assert.deepEqual(pairs(outcome.partialSelection), ['A@3.0.0']);
  });
});

describe('events', () => {
  it('reports choices and commits in search order', () => {
    const events: ResolutionEvent[] = [];
    resolve(fixtureUniverse(), 'C', [], { onEvent: event => events.push(event) });

    const summary = events.map(event => {
      switch (event.type) {
        case 'choosing':
          return `choosing ${event.packageName} ${event.candidates.map(v => v.raw).join('/')} @${event.depth}`;
        case 'committed':
          return `committed ${event.packageName}@${event.version.raw} @${event.depth}`;
        case 'backtrack':
          return `backtrack ${event.choice}`;
        case 'solved':
          return `solved ${event.selection.size}`;
        case 'exhausted':
          return 'exhausted';
      }
    });
    assert.deepEqual(summary, [
      'choosing C 1.5.0/1.0.0 @0',
      'committed C@1.5.0 @0',
      'choosing E 1.0.0 @1',
      'committed E@1.0.0 @1',
      'solved 2'
    ]);
  });

  it('reports backtracking to an alternative branch', () => {
    const events: ResolutionEvent[] = [];
    resolve(fixtureUniverse(), 'A', pin('1.2.0'), { onEvent: event => events.push(event) });
    assert.ok(events.some(event => event.type === 'backtrack' && event.choice === 'or' && event.depth === 1));
  });
});
