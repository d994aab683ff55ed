/**
 * Objects that can be visited in the same manner as a configuration.
 */

import type { ConfigurationType } from '../configuration.js';
import type { ElementMetadata } from '../element.js';

export type VisitableElement =
  | {
      readonly kind: 'item';
      readonly name: string;
      readonly value: unknown;
      readonly metadata: ElementMetadata;
    }
  | {
      readonly kind: 'subConfiguration';
      readonly name: string;
      readonly value: ConfigurationVisitable;
      readonly metadata: ElementMetadata;
    };

export interface ConfigurationVisitable {
  /** The type of configuration this visitable represents. */
  getConfigurationType(): ConfigurationType;

  /** The elements to visit, in order. Absent elements are not included. */
  iterateElements(): Iterable<VisitableElement>;
}
