import { describe, it, expect } from 'vitest';
import { StepRegistry } from '../src/core/registry.js';
import { DuplicateStepNameError, ProvisionError } from '../src/lib/errors.js';
import { memoryStep } from './helpers/fakes.js';

describe('StepRegistry', () => {
  it('keeps registration order', () => {
    const registry = new StepRegistry()
      .register(memoryStep('c').step)
      .register(memoryStep('a').step)
      .register(memoryStep('b').step);

    expect(registry.sequence().map((s) => s.name)).toEqual(['c', 'a', 'b']);
    expect(registry.size).toBe(3);
  });

  it('rejects a duplicate name at registration time', () => {
    const registry = new StepRegistry().register(memoryStep('install-gh').step);

    expect(() => registry.register(memoryStep('install-gh').step)).toThrow(DuplicateStepNameError);
    expect(registry.size).toBe(1);
  });

  it('reports the duplicate name and code', () => {
    const registry = new StepRegistry().register(memoryStep('x').step);
    try {
      registry.register(memoryStep('x').step);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DuplicateStepNameError);
      if (err instanceof DuplicateStepNameError) {
        expect(err.code).toBe('DUPLICATE_STEP_NAME');
        expect(err.stepName).toBe('x');
        expect(err.message).toBe('duplicate step name: "x"');
      }
    }
  });

  it('returns a copy from sequence()', () => {
    const registry = new StepRegistry().register(memoryStep('a').step);
    registry.sequence().pop();
    expect(registry.size).toBe(1);
    expect(registry.has('a')).toBe(true);
  });

  describe('select', () => {
    const registry = new StepRegistry()
      .register(memoryStep('a').step)
      .register(memoryStep('b').step)
      .register(memoryStep('c').step);

    it('returns everything by default', () => {
      expect(registry.select().map((s) => s.name)).toEqual(['a', 'b', 'c']);
    });

    it('keeps registration order for --only', () => {
      expect(registry.select({ only: ['c', 'a'] }).map((s) => s.name)).toEqual(['a', 'c']);
    });

    it('drops skipped steps', () => {
      expect(registry.select({ skip: ['b'] }).map((s) => s.name)).toEqual(['a', 'c']);
    });

    it('rejects unknown names', () => {
      expect(() => registry.select({ skip: ['nope'] })).toThrow(ProvisionError);
      expect(() => registry.select({ only: ['nope'] })).toThrow('unknown step: "nope"');
    });
  });
});
