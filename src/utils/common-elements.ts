/**
 * Element names shared between two configurations.
 */

import type { Configuration } from '../configuration.js';
import { UnrelatedConfigurationsError } from '../errors.js';

/**
 * Returns the element names of whichever configuration is the ancestor type
 * of the other. Configurations of sibling types (neither extends the other)
 * are not supported.
 */
export function commonElementNames(first: Configuration, second: Configuration): readonly string[] {
  if (first instanceof second.constructor) return second.orderedElementNames;
  if (second instanceof first.constructor) return first.orderedElementNames;
  throw new UnrelatedConfigurationsError(first.constructor.name, second.constructor.name);
}
