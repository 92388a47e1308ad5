import { describe, it, expect, vi } from 'vitest';
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { Runner } from '../src/core/runner.js';
import { ProvisionError } from '../src/lib/errors.js';
import { SilentReporter } from '../src/lib/ui/reporter.js';
import type { AuthorizedKeyStepDef } from '../src/plan/types.js';
import { appendKeyLine, createAuthorizedKeyStep, hasKeyLine } from '../src/steps/authorized-key.js';
import { fakeContext } from './helpers/fakes.js';
import { testContext } from './helpers/test-context.js';

const KEY = 'ssh-ed25519 AAAA... user@host';

function keyDef(overrides: Partial<AuthorizedKeyStepDef> = {}): AuthorizedKeyStepDef {
  return {
    kind: 'authorized_key',
    name: 'add-ssh-key',
    path: '~/.ssh/authorized_keys',
    prompt: 'Enter the SSH key to add',
    ...overrides,
  };
}

async function rejection(promise: Promise<unknown>): Promise<ProvisionError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ProvisionError) return err;
    throw err;
  }
  throw new Error('expected a ProvisionError');
}

describe('appendKeyLine', () => {
  const ctx = testContext();

  it('creates the directory and file with owner-only modes', () => {
    const sshDir = join(ctx.createTempDir(), '.ssh');
    const file = join(sshDir, 'authorized_keys');

    expect(appendKeyLine(file, KEY)).toBe(true);

    expect(readFileSync(file, 'utf-8')).toBe(`${KEY}\n`);
    expect(statSync(sshDir).mode & 0o777).toBe(0o700);
    expect(statSync(file).mode & 0o777).toBe(0o600);
  });

  it('does not append a key that is already listed', () => {
    const file = join(ctx.createTempDir(), 'authorized_keys');
    writeFileSync(file, `ssh-rsa AAAAother a@b\n${KEY}\n`);

    expect(appendKeyLine(file, KEY)).toBe(false);
    expect(readFileSync(file, 'utf-8')).toBe(`ssh-rsa AAAAother a@b\n${KEY}\n`);
  });

  it('starts a new line when the file lacks a trailing newline', () => {
    const file = join(ctx.createTempDir(), 'authorized_keys');
    writeFileSync(file, 'ssh-rsa AAAAother a@b');

    appendKeyLine(file, KEY);

    expect(readFileSync(file, 'utf-8')).toBe(`ssh-rsa AAAAother a@b\n${KEY}\n`);
  });

  it('matches whole lines only', () => {
    const file = join(ctx.createTempDir(), 'authorized_keys');
    writeFileSync(file, `${KEY} extra-comment\n`);

    expect(hasKeyLine(file, KEY)).toBe(false);
    expect(appendKeyLine(file, KEY)).toBe(true);
  });

  it('recognizes keys in a CRLF file', () => {
    const file = join(ctx.createTempDir(), 'authorized_keys');
    writeFileSync(file, `${KEY}\r\n`);

    expect(hasKeyLine(file, KEY)).toBe(true);
  });

  it('reports a missing file as not containing the key', () => {
    expect(hasKeyLine(join(ctx.createTempDir(), 'missing'), KEY)).toBe(false);
  });
});

describe('authorized_key step', () => {
  const ctx = testContext();

  it('adds the key once across two runs', async () => {
    const home = ctx.createTempDir();
    const step = createAuthorizedKeyStep(keyDef({ key: KEY }), fakeContext({ homeDir: home }));
    const runner = new Runner({ context: fakeContext(), reporter: new SilentReporter() });

    const first = await runner.run([step]);
    const second = await runner.run([step]);

    const file = join(home, '.ssh', 'authorized_keys');
    expect(first.results[0]?.outcome).toBe('succeeded');
    expect(first.results[0]?.detail).toBe(`key added to ${file}`);
    expect(second.results[0]?.outcome).toBe('skipped');
    expect(readFileSync(file, 'utf-8').split('\n').filter((line) => line === KEY)).toHaveLength(1);
  });

  it('asks for the key at most once and trims it', async () => {
    const home = ctx.createTempDir();
    const ask = vi.fn(async () => `  ${KEY}  \n`);
    const step = createAuthorizedKeyStep(keyDef(), fakeContext({ homeDir: home, input: { ask } }));

    expect(await step.check()).toBe(false);
    await step.apply();
    expect(await step.check()).toBe(true);

    expect(ask).toHaveBeenCalledTimes(1);
    expect(ask).toHaveBeenCalledWith('Enter the SSH key to add');
    expect(readFileSync(join(home, '.ssh', 'authorized_keys'), 'utf-8')).toBe(`${KEY}\n`);
  });

  it('prefers the key from the plan over asking', async () => {
    const ask = vi.fn(async () => 'ssh-rsa AAAAprompted p@q');
    const step = createAuthorizedKeyStep(
      keyDef({ key: KEY }),
      fakeContext({ homeDir: ctx.createTempDir(), input: { ask } }),
    );

    await step.check();
    expect(ask).not.toHaveBeenCalled();
  });

  it('rejects an empty key without touching the file', async () => {
    const home = ctx.createTempDir();
    const step = createAuthorizedKeyStep(
      keyDef(),
      fakeContext({ homeDir: home, input: { ask: async () => '   ' } }),
    );

    const err = await rejection(step.apply());
    expect(err.code).toBe('EMPTY_SSH_KEY');
    expect(err.message).toBe('no SSH key given');
    expect(existsSync(join(home, '.ssh'))).toBe(false);
  });

  it('rejects a key spanning several lines', async () => {
    const step = createAuthorizedKeyStep(
      keyDef({ key: `${KEY}\nssh-rsa AAAAsecond x@y` }),
      fakeContext({ homeDir: ctx.createTempDir() }),
    );

    const err = await rejection(step.check());
    expect(err.code).toBe('INVALID_SSH_KEY');
  });

  it('writes to an absolute path as given', async () => {
    const dir = ctx.createTempDir();
    mkdirSync(join(dir, 'keys'));
    const file = join(dir, 'keys', 'deploy');
    const step = createAuthorizedKeyStep(keyDef({ path: file, key: KEY }), fakeContext());

    const outcome = await step.apply();

    expect(outcome).toEqual({ ok: true, detail: `key added to ${file}` });
  });
});
