/**
 * YAML reading and writing of configuration trees, on top of the visitor protocol.
 */

import yaml from 'js-yaml';
import type { Configuration, ConfigurationType } from '../configuration.js';
import { SerializationError } from '../errors.js';
import { readConfiguration } from '../visitation/reader.js';
import { visit } from '../visitation/visit.js';
import type { ConfigurationVisitable } from '../visitation/visitable.js';
import { ObjectSource } from './object-source.js';
import { ObjectWriter } from './object-writer.js';
import type { ConfigurationTypeRegistry, SerializedConfiguration } from './types.js';

export function toObject(source: ConfigurationVisitable, types: ConfigurationTypeRegistry): SerializedConfiguration {
  return visit(source, new ObjectWriter(types)).result;
}

export function fromObject(data: unknown, types: ConfigurationTypeRegistry): Configuration;
export function fromObject<C extends Configuration>(data: unknown, types: ConfigurationTypeRegistry, expectedType: ConfigurationType<C>): C;
export function fromObject(data: unknown, types: ConfigurationTypeRegistry, expectedType?: ConfigurationType): Configuration {
  const source = new ObjectSource(data, types);
  return expectedType === undefined ? readConfiguration(source) : readConfiguration(source, expectedType);
}

export function toYaml(source: ConfigurationVisitable, types: ConfigurationTypeRegistry): string {
  return yaml.dump(toObject(source, types));
}

export function fromYaml(text: string, types: ConfigurationTypeRegistry): Configuration;
export function fromYaml<C extends Configuration>(text: string, types: ConfigurationTypeRegistry, expectedType: ConfigurationType<C>): C;
export function fromYaml(text: string, types: ConfigurationTypeRegistry, expectedType?: ConfigurationType): Configuration {
  let data: unknown;
  try {
    data = yaml.load(text);
  } catch (e) {
    if (e instanceof Error) throw new SerializationError(`Invalid YAML: ${e.message}`, [], { cause: e });
    throw new SerializationError(`Invalid YAML: ${String(e)}`);
  }
  return expectedType === undefined ? fromObject(data, types) : fromObject(data, types, expectedType);
}
