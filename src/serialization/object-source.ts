/**
 * ObjectSource: a visitable over the plain-object form of a configuration.
 */

import { Value } from '@sinclair/typebox/value';
import type { ConfigurationType } from '../configuration.js';
import { NoSuchElementError, SerializationError } from '../errors.js';
import type { ConfigurationVisitable, VisitableElement } from '../visitation/visitable.js';
import { SerializedConfigurationSchema } from './types.js';
import type { ConfigurationTypeRegistry, SerializedConfiguration } from './types.js';

function validateDocument(data: unknown): SerializedConfiguration {
  if (Value.Check(SerializedConfigurationSchema, data)) return data;
  const errors = [...Value.Errors(SerializedConfigurationSchema, data)].map((error) => ({
    path: error.path || '/',
    message: error.message,
  }));
  throw new SerializationError('Malformed configuration document', errors);
}

/**
 * Element metadata isn't stored in documents, so it is looked up on an
 * uninitialised instance of the document's type. Elements are emitted in the
 * type's declaration order.
 */
export class ObjectSource implements ConfigurationVisitable {
  private _document: SerializedConfiguration;
  private _types: ConfigurationTypeRegistry;

  constructor(data: unknown, types: ConfigurationTypeRegistry) {
    this._document = validateDocument(data);
    this._types = types;
  }

  getConfigurationType(): ConfigurationType {
    return this._types.typeOf(this._document.type);
  }

  *iterateElements(): Generator<VisitableElement> {
    const template = new (this.getConfigurationType())();
    const values = this._document.values ?? {};
    const children = this._document.children ?? {};

    for (const name of [...Object.keys(values), ...Object.keys(children)]) {
      if (!template.hasElement(name)) throw new NoSuchElementError(name);
      if (Object.hasOwn(values, name) && Object.hasOwn(children, name)) {
        throw new SerializationError(`Element '${name}' appears both as a value and as a child`);
      }
    }

    for (const name of template.orderedElementNames) {
      const metadata = template.element(name).metadata;
      if (Object.hasOwn(values, name)) {
        yield { kind: 'item', name, value: values[name], metadata };
      } else if (Object.hasOwn(children, name)) {
        yield { kind: 'subConfiguration', name, value: new ObjectSource(children[name], this._types), metadata };
      }
    }
  }
}
