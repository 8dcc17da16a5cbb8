/**
 * CLI option parsing and command tests
 */

import { describe, it, before, after, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { executeGenerateMatrixCommand } from '../../src/cli/commands/generate-matrix.js';
import { executeRunCommand } from '../../src/cli/commands/run.js';
import {
  EXIT_CODES,
  UsageError,
  parseIntegerOption,
  splitList,
  toAppOverrides,
  toPlanFilters,
} from '../../src/cli/commands/shared-options.js';
import { executeValidateConfigCommand } from '../../src/cli/commands/validate-config.js';
import { createConfigDocument } from '../fixtures/run-config.fixture.js';

function printed(fn: { mock: { calls: Array<{ arguments: unknown[] }> } }): string[] {
  return fn.mock.calls.map((call) => call.arguments.map(String).join(' '));
}

describe('shared options', () => {
  it('should split comma-separated lists', () => {
    assert.deepStrictEqual(splitList(' ios, ,android '), ['ios', 'android']);
    assert.strictEqual(splitList(' , '), undefined);
    assert.strictEqual(splitList(undefined), undefined);
  });

  it('should map options to plan filters', () => {
    assert.deepStrictEqual(toPlanFilters({ platforms: 'ios', langs: 'en-US,de-DE' }), {
      platforms: ['ios'],
      devices: undefined,
      languages: ['en-US', 'de-DE'],
      screenshots: undefined,
    });
  });

  it('should only override the apps that were given', () => {
    assert.deepStrictEqual(toAppOverrides({ 'android-app': '/builds/app.apk' }), { android: '/builds/app.apk' });
    assert.deepStrictEqual(toAppOverrides({}), {});
  });

  it('should parse integer options', () => {
    assert.strictEqual(parseIntegerOption('base-port', '4800'), 4800);
    assert.strictEqual(parseIntegerOption('base-port', undefined), undefined);
    assert.throws(
      () => parseIntegerOption('max-parallel', 'two'),
      (error: unknown) =>
        error instanceof UsageError && error.message === "--max-parallel must be a positive integer, got 'two'"
    );
  });
});

describe('commands', () => {
  let workDir: string;
  let validPath: string;
  let invalidPath: string;
  let apps: string[];

  before(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'cli-'));
    validPath = join(workDir, 'valid.json');
    invalidPath = join(workDir, 'invalid.json');
    await writeFile(validPath, JSON.stringify(createConfigDocument()), 'utf8');
    await writeFile(invalidPath, JSON.stringify(createConfigDocument({ languages: ['en-US', 'fr-FR'] })), 'utf8');
    apps = ['--ios-app', join(workDir, 'App.app'), '--android-app', join(workDir, 'app.apk')];
    await writeFile(join(workDir, 'App.app'), 'ios-build', 'utf8');
    await writeFile(join(workDir, 'app.apk'), 'android-build', 'utf8');
  });

  after(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  describe('validate-config', () => {
    it('should summarise a valid configuration', async () => {
      const log = mock.method(console, 'log', () => undefined);

      const code = await executeValidateConfigCommand(['--config', validPath]);

      assert.strictEqual(code, EXIT_CODES.success);
      assert.deepStrictEqual(printed(log), [
        `${validPath} is valid: 2 device(s), 2 language(s), 2 screenshot plan(s)`,
      ]);
    });

    it('should list the errors of an invalid configuration', async () => {
      const error = mock.method(console, 'error', () => undefined);

      const code = await executeValidateConfigCommand(['-c', invalidPath]);

      assert.strictEqual(code, EXIT_CODES.failure);
      assert.deepStrictEqual(printed(error), [
        `${invalidPath} is invalid:`,
        '  - Languages missing from locale_mapping: [fr-FR]',
      ]);
    });

    it('should require a configuration path', async () => {
      await assert.rejects(executeValidateConfigCommand([]), UsageError);
    });
  });

  describe('generate-matrix', () => {
    it('should print a GitLab matrix for the filtered plan', async () => {
      const log = mock.method(console, 'log', () => undefined);
      const outputRoot = join(workDir, 'shots');

      const code = await executeGenerateMatrixCommand([
        '--config',
        validPath,
        '--format',
        'GitLab',
        '--output',
        outputRoot,
        '--langs',
        'de-DE',
        ...apps,
      ]);

      assert.strictEqual(code, EXIT_CODES.success);
      const [output] = printed(log);
      assert.deepStrictEqual(JSON.parse(output), {
        JOB_0: {
          PLATFORM: 'ios',
          DEVICE: 'iphone15',
          LANGUAGE: 'de-DE',
          OUTPUT_DIR: join(outputRoot, 'iOS', 'iphone15', 'de-DE'),
        },
        JOB_1: {
          PLATFORM: 'android',
          DEVICE: 'pixel7',
          LANGUAGE: 'de-DE',
          OUTPUT_DIR: join(outputRoot, 'Android', 'pixel7', 'de-DE'),
        },
      });
    });

    it('should reject an unknown format', async () => {
      await assert.rejects(
        executeGenerateMatrixCommand(['--config', validPath, '--format', 'jenkins', ...apps]),
        (error: unknown) =>
          error instanceof UsageError && error.message === "Unknown format 'jenkins'. Valid formats: github, gitlab, azure"
      );
    });
  });

  describe('run --dry-run', () => {
    it('should print the plan without starting any job', async () => {
      const log = mock.method(console, 'log', () => undefined);
      const outputRoot = join(workDir, 'dry');

      const code = await executeRunCommand([
        '--config',
        validPath,
        '--output',
        outputRoot,
        '--platforms',
        'android',
        '--base-port',
        '4800',
        '--dry-run',
        ...apps,
      ]);

      assert.strictEqual(code, EXIT_CODES.success);
      const lines = printed(log);
      assert.ok(lines.includes('  [0] Android Pixel 7 en-US (2 plan(s), port 4800)'));
      assert.ok(lines.includes(`      -> ${join(outputRoot, 'Android', 'pixel7', 'en-US')}`));
      assert.ok(lines.includes('  [1] Android Pixel 7 de-DE (2 plan(s), port 4810)'));
    });

    it('should reject a non-numeric base port', async () => {
      await assert.rejects(
        executeRunCommand(['--config', validPath, '--base-port', 'high', '--dry-run', ...apps]),
        UsageError
      );
    });
  });
});
