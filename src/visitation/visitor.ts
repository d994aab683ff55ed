/**
 * Push-based visitor over configuration trees.
 */

import type { ConfigurationType } from '../configuration.js';
import type { ElementMetadata } from '../element.js';

/**
 * Receives a configuration tree as a stream of calls:
 * `begin (item | beginSubConfiguration ... endSubConfiguration)* end`.
 * Sub-configurations nest, and are never wrapped in their own begin/end.
 */
export interface ConfigurationVisitor {
  begin(type: ConfigurationType): void;
  item(name: string, value: unknown, metadata: ElementMetadata): void;
  beginSubConfiguration(name: string, type: ConfigurationType, metadata: ElementMetadata): void;
  endSubConfiguration(): void;
  end(): void;
}
