import { describe, it, expect } from 'vitest';
import { InitialisationError, IntermediateStateError, ReadOnlyModificationError } from '../src/errors.js';
import { LifecyclePhase } from '../src/lifecycle.js';
import { NestedConfiguration, RootConfiguration } from './helpers.js';

describe('Configuration.finalise', () => {
  it('makes the whole tree read-only', () => {
    const root = RootConfiguration.initialise().finalise();
    expect(root.lifecyclePhase).toBe(LifecyclePhase.Finalised);
    expect(root.nested.get().finalised).toBe(true);
    expect(() => root.setValue('nested.x', 3)).toThrow(ReadOnlyModificationError);
    expect(() => root.nested.set(NestedConfiguration.initialise())).toThrow(ReadOnlyModificationError);
  });

  it('keeps values readable', () => {
    const root = RootConfiguration.initialise((c) => c.size.set(8)).finalise();
    expect(root.name.get()).toBe('root');
    expect(root.size.get()).toBe(8);
    expect(root.getValue('nested.x')).toBe(1);
  });

  it('replaces sub-configurations that are not finalised with finalised clones', () => {
    const root = RootConfiguration.initialise();
    const before = root.nested.get();
    root.finalise();
    expect(root.nested.get()).not.toBe(before);
    expect(before.finalised).toBe(false);

    before.x.set(7);
    expect(root.nested.get().x.get()).toBe(1);
  });

  it('shares sub-configurations that are already finalised', () => {
    const root = RootConfiguration.initialise();
    const child = root.nested.get().finalise();
    root.finalise();
    expect(root.nested.get()).toBe(child);
  });

  it('is idempotent', () => {
    const root = RootConfiguration.initialise().finalise();
    const nested = root.nested.get();
    expect(root.finalise()).toBe(root);
    expect(root.nested.get()).toBe(nested);
  });

  it('cannot finalise mid-transaction', () => {
    const root = RootConfiguration.initialise();
    root.reconfigure((r) => {
      expect(() => r.finalise()).toThrow(IntermediateStateError);
    });
    expect(root.finalised).toBe(false);
  });

  it('cannot finalise before initialisation', () => {
    expect(() => new RootConfiguration().finalise()).toThrow(InitialisationError);
  });

  it('leaves a finalised sub-configuration out of later transactions', () => {
    const root = RootConfiguration.initialise();
    root.nested.get().finalise();
    root.reconfigure((r) => {
      expect(r.nested.get().lifecyclePhase).toBe(LifecyclePhase.Finalised);
      r.name.set('changed');
    });
    expect(root.name.get()).toBe('changed');
  });
});
