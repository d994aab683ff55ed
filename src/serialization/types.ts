/**
 * Plain-object form of a configuration tree, and the registry of type names
 * used to write and read it.
 */

import { Type, type Static } from '@sinclair/typebox';
import type { ConfigurationType } from '../configuration.js';
import { SerializationError } from '../errors.js';

export const SerializedConfigurationSchema = Type.Recursive(
  (This) =>
    Type.Object({
      type: Type.String({ minLength: 1 }),
      values: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
      children: Type.Optional(Type.Record(Type.String(), This)),
    }),
  { $id: 'SerializedConfiguration' },
);

/**
 * `values` holds the items, `children` the sub-configurations, each keyed by
 * element name. Absent optional elements are simply missing.
 */
export type SerializedConfiguration = Static<typeof SerializedConfigurationSchema>;

/**
 * Two-way mapping between configuration types and the names they are
 * serialized under.
 */
export class ConfigurationTypeRegistry {
  private _byName: Map<string, ConfigurationType> = new Map();
  private _byType: Map<ConfigurationType, string> = new Map();

  register(name: string, type: ConfigurationType): this {
    const existing = this._byName.get(name);
    if (existing !== undefined && existing !== type) {
      throw new SerializationError(`Type name '${name}' is already registered to ${existing.name}`);
    }
    this._byName.set(name, type);
    this._byType.set(type, name);
    return this;
  }

  has(name: string): boolean {
    return this._byName.has(name);
  }

  typeOf(name: string): ConfigurationType {
    const type = this._byName.get(name);
    if (type === undefined) throw new SerializationError(`Unknown configuration type '${name}'`);
    return type;
  }

  nameOf(type: ConfigurationType): string {
    const name = this._byType.get(type);
    if (name === undefined) throw new SerializationError(`Configuration type ${type.name} is not registered`);
    return name;
  }
}
