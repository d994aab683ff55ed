/**
 * Depth-first traversal of a visitable, driving a visitor.
 */

import type { ConfigurationVisitable } from './visitable.js';
import type { ConfigurationVisitor } from './visitor.js';

/**
 * Lets `visitor` visit `visitable`, wrapped in a single begin/end pair.
 *
 * @returns The visitor, for chaining.
 */
export function visit<V extends ConfigurationVisitor>(visitable: ConfigurationVisitable, visitor: V): V {
  visitor.begin(visitable.getConfigurationType());
  visitWithoutBegin(visitable, visitor);
  visitor.end();
  return visitor;
}

/** The body of {@link visit}, shared by the root and nested levels. */
export function visitWithoutBegin(visitable: ConfigurationVisitable, visitor: ConfigurationVisitor): void {
  for (const element of visitable.iterateElements()) {
    if (element.kind === 'item') {
      visitor.item(element.name, element.value, element.metadata);
    } else {
      const sub = element.value;
      visitor.beginSubConfiguration(element.name, sub.getConfigurationType(), element.metadata);
      visitWithoutBegin(sub, visitor);
      visitor.endSubConfiguration();
    }
  }
}
