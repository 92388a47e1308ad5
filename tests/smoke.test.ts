import { describe, it, expect } from 'vitest';
import { testContext } from './helpers/test-context.js';
import { writeFileSync, readFileSync, statSync, chmodSync, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { formatDuration, plural } from '../src/lib/utils/format.js';
import { expandHome } from '../src/lib/utils/paths.js';
import { writeFileAtomic } from '../src/lib/utils/fs.js';
import {
  ProvisionError,
  DuplicateStepNameError,
  PrivilegeError,
  ErrorCode,
  errorMessage,
} from '../src/lib/errors.js';

describe('Bootstrap smoke test', () => {
  const ctx = testContext();

  it('testContext creates temp dirs on the real filesystem', () => {
    const dir = ctx.createTempDir();
    const testFile = join(dir, 'test.txt');
    writeFileSync(testFile, 'hello');
    expect(readFileSync(testFile, 'utf-8')).toBe('hello');
  });

  it('testContext generates unique IDs', () => {
    const id1 = ctx.uniqueId('step');
    const id2 = ctx.uniqueId('step');
    expect(id1).not.toBe(id2);
    expect(id1).toMatch(/^step-[0-9a-f]{8}$/);
  });

  it('schemas are importable', async () => {
    const types = await import('../src/plan/types.js');
    expect(types.planSchema).toBeDefined();
    expect(types.stepSchema).toBeDefined();
    expect(types.checkSchema).toBeDefined();
  });
});

describe('errors', () => {
  it('carry code and hint', () => {
    const err = new ProvisionError(
      ErrorCode.PLAN_NOT_FOUND,
      'plan file not found: plan.yaml',
      'Run: hostprep run <path-to-plan.yaml>',
    );
    expect(err.code).toBe('PLAN_NOT_FOUND');
    expect(err.hint).toContain('hostprep run');
    expect(err).toBeInstanceOf(Error);
  });

  it('DuplicateStepNameError names the step', () => {
    const err = new DuplicateStepNameError('install-gh');
    expect(err).toBeInstanceOf(ProvisionError);
    expect(err.code).toBe('DUPLICATE_STEP_NAME');
    expect(err.stepName).toBe('install-gh');
    expect(err.message).toBe('duplicate step name: "install-gh"');
  });

  it('PrivilegeError suggests sudo', () => {
    const err = new PrivilegeError('root privileges required (running as dev)');
    expect(err.code).toBe('PRIVILEGE_REQUIRED');
    expect(err.hint).toBe('Run with sudo or as root.');
  });

  it('errorMessage handles non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('format', () => {
  it('formats durations', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(5000)).toBe('5s');
    expect(formatDuration(90_000)).toBe('1m 30s');
    expect(formatDuration(3_600_000)).toBe('1h');
    expect(formatDuration(3_661_000)).toBe('1h 1m 1s');
  });

  it('pluralizes nouns', () => {
    expect(plural(1, 'step')).toBe('1 step');
    expect(plural(0, 'step')).toBe('0 steps');
    expect(plural(3, 'command')).toBe('3 commands');
  });
});

describe('expandHome', () => {
  it('expands a leading tilde', () => {
    expect(expandHome('~', '/home/dev')).toBe('/home/dev');
    expect(expandHome('~/.ssh/authorized_keys', '/home/dev')).toBe('/home/dev/.ssh/authorized_keys');
  });

  it('leaves other paths alone', () => {
    expect(expandHome('/etc/ssh/sshd_config', '/home/dev')).toBe('/etc/ssh/sshd_config');
    expect(expandHome('~other/file', '/home/dev')).toBe('~other/file');
  });
});

describe('writeFileAtomic', () => {
  const ctx = testContext();

  it('replaces content and keeps the file mode', () => {
    const file = join(ctx.createTempDir(), 'config');
    writeFileSync(file, 'old\n');
    chmodSync(file, 0o640);

    writeFileAtomic(file, 'new\n');

    expect(readFileSync(file, 'utf-8')).toBe('new\n');
    expect(statSync(file).mode & 0o777).toBe(0o640);
    expect(existsSync(`${file}.tmp`)).toBe(false);
  });

  it('removes the temp file when the rename fails', () => {
    // Renaming a file over a directory fails after the temp file exists
    const target = join(ctx.createTempDir(), 'sshd_config');
    mkdirSync(target);

    expect(() => writeFileAtomic(target, 'new\n')).toThrow();
    expect(existsSync(`${target}.tmp`)).toBe(false);
  });
});
