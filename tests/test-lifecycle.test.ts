import { describe, it, expect } from 'vitest';
import {
  LifecyclePhase,
  areIntegrityChecksSuspended,
  isInitialised,
  isIntegrityAssured,
  isReconfigurable,
  isWritable,
} from '../src/lifecycle.js';

const { Uninitialised, Initialising, Initialised, Reconfiguring, Finalised } = LifecyclePhase;
const phases = [Uninitialised, Initialising, Initialised, Reconfiguring, Finalised];

function holding(predicate: (phase: LifecyclePhase) => boolean): LifecyclePhase[] {
  return phases.filter(predicate);
}

describe('lifecycle predicates', () => {
  it('isInitialised', () => {
    expect(holding(isInitialised)).toEqual([Initialised, Reconfiguring, Finalised]);
  });

  it('isWritable', () => {
    expect(holding(isWritable)).toEqual([Initialising, Initialised, Reconfiguring]);
  });

  it('isReconfigurable', () => {
    expect(holding(isReconfigurable)).toEqual([Initialised, Reconfiguring]);
  });

  it('isIntegrityAssured', () => {
    expect(holding(isIntegrityAssured)).toEqual([Initialised, Finalised]);
  });

  it('areIntegrityChecksSuspended', () => {
    expect(holding(areIntegrityChecksSuspended)).toEqual([Initialising, Reconfiguring]);
  });
});
