/**
 * Lifecycle phases of a configuration and the predicates derived from them.
 */

export enum LifecyclePhase {
  /** Constructed, elements registered, no values yet. */
  Uninitialised = 'uninitialised',
  /** Running the initialiser block and element defaults. */
  Initialising = 'initialising',
  Initialised = 'initialised',
  /** Inside a transaction; integrity checks deferred until it closes. */
  Reconfiguring = 'reconfiguring',
  /** Read-only. Terminal. */
  Finalised = 'finalised',
}

export function isInitialised(phase: LifecyclePhase): boolean {
  return phase === LifecyclePhase.Initialised
    || phase === LifecyclePhase.Reconfiguring
    || phase === LifecyclePhase.Finalised;
}

export function isWritable(phase: LifecyclePhase): boolean {
  return phase === LifecyclePhase.Initialising
    || phase === LifecyclePhase.Initialised
    || phase === LifecyclePhase.Reconfiguring;
}

export function isReconfigurable(phase: LifecyclePhase): boolean {
  return phase === LifecyclePhase.Initialised || phase === LifecyclePhase.Reconfiguring;
}

export function isIntegrityAssured(phase: LifecyclePhase): boolean {
  return phase === LifecyclePhase.Initialised || phase === LifecyclePhase.Finalised;
}

export function areIntegrityChecksSuspended(phase: LifecyclePhase): boolean {
  return phase === LifecyclePhase.Initialising || phase === LifecyclePhase.Reconfiguring;
}
