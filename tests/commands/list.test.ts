import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';
import { listCommand } from '../../packages/cli/src/commands/list.js';
import { createRecordingOutput, FIXTURE_REPO, makeTempDir, removeDir, writeFile } from '../test-helpers.js';

describe('list command', () => {
  it('lists every package with its versions, newest first', async () => {
    const recorder = createRecordingOutput();
    const result = await listCommand(undefined, { repo: FIXTURE_REPO }, recorder.output);

    assert.equal(result.success, true);
    assert.equal(result.data?.length, 5);
    assert.deepEqual(recorder.lines('info'), [
      'A: 3.0.0, 2.1.0, 2.0.0, 1.3.0, 1.2.0, 1.1.0, 1.0.0',
      'B: 2.0.0, 1.2.0, 1.0.0',
      'C: 1.5.0, 1.0.0',
      'D: 2.0.0',
      'E: 1.0.0',
      'Total: 5 packages, 14 versions'
    ]);
  });

  it('shows the formulas of one package', async () => {
    const recorder = createRecordingOutput();
    const result = await listCommand('C', { repo: FIXTURE_REPO }, recorder.output);

    assert.deepEqual(result.data, [{ name: 'C', versions: ['1.5.0', '1.0.0'] }]);
    assert.deepEqual(recorder.lines('info'), ['C 1.5.0: "E" {>= "1.0.0"}', 'C 1.0.0: (no dependencies)']);
  });

  it('rejects a package the repository does not have', async () => {
    await assert.rejects(listCommand('Z', { repo: FIXTURE_REPO }, createRecordingOutput().output), {
      message: "Validation error: Package 'Z' is not in the repository"
    });
  });
});

describe('list command on a repository with problems', () => {
  let repo: string;

  before(() => {
    repo = makeTempDir('list');
    writeFile(repo, 'packages/P/P.1.0/opam', 'depends: [ "Q" ]\n');
    writeFile(repo, 'packages/Q/Q.1..0/opam', '');
  });

  after(() => {
    removeDir(repo);
  });

  it('warns about skipped entries and lists the rest', async () => {
    const recorder = createRecordingOutput();
    await listCommand(undefined, { repo }, recorder.output);

    assert.equal(recorder.lines('warn').length, 1);
    assert.match(recorder.lines('warn')[0] ?? '', /^Skipped .*Q\.1\.\.0.*: Malformed version '1\.\.0': empty segment between dots$/);
    assert.deepEqual(recorder.lines('spinner'), [`Loading packages from ${repo}`, 'Loaded 1 packages, 1 versions (1 skipped)']);
    assert.deepEqual(recorder.lines('info'), ['P: 1.0', 'Total: 1 packages, 1 versions']);
  });

  it('warns when there is nothing to list', async () => {
    const empty = makeTempDir('empty');
    try {
      const recorder = createRecordingOutput();
      await listCommand(undefined, { repo: empty }, recorder.output);
      assert.deepEqual(recorder.lines('warn'), ['No packages found']);
      assert.deepEqual(recorder.lines('info'), ['Total: 0 packages, 0 versions']);
    } finally {
      removeDir(empty);
    }
  });
});
