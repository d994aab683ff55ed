/**
 * Absent-tolerant access to configuration values.
 */

import { AbsentError } from '../errors.js';

export interface Otherwise {
  /** Runs `action` if the value was absent. */
  otherwise(action: () => void): void;
}

/**
 * Reads a value with `accessor` and passes it to `action`. An
 * {@link AbsentError} from the accessor is caught and routed to the
 * `otherwise` continuation instead; any other error propagates.
 *
 * @example
 * ifNotAbsent(() => source.getValue('timeout'), (v) => target.setValue('timeout', v))
 *   .otherwise(() => target.clearValue('timeout'));
 */
export function ifNotAbsent<T>(accessor: () => T, action: (value: T) => void): Otherwise {
  let value: T;
  try {
    value = accessor();
  } catch (e) {
    if (!(e instanceof AbsentError)) throw e;
    return { otherwise: (fallback) => fallback() };
  }
  action(value);
  return { otherwise: () => undefined };
}
