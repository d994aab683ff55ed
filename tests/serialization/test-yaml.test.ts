import { describe, it, expect } from 'vitest';
import { IntegrityError, NoSuchElementError, SerializationError, VisitationError } from '../../src/errors.js';
import { ObjectWriter } from '../../src/serialization/object-writer.js';
import { ConfigurationTypeRegistry } from '../../src/serialization/types.js';
import { fromObject, fromYaml, toObject, toYaml } from '../../src/serialization/yaml.js';
import { captureError, NestedConfiguration, RangeConfiguration, RootConfiguration } from '../helpers.js';

function createTypes(): ConfigurationTypeRegistry {
  return new ConfigurationTypeRegistry()
    .register('root', RootConfiguration)
    .register('nested', NestedConfiguration)
    .register('range', RangeConfiguration);
}

describe('toObject', () => {
  it('writes values and children by element name', () => {
    expect(toObject(RootConfiguration.initialise(), createTypes())).toEqual({
      type: 'root',
      values: { name: 'root' },
      children: { nested: { type: 'nested', values: { x: 1 } } },
    });
  });

  it('omits absent optional values', () => {
    const document = toObject(RootConfiguration.initialise((c) => c.size.set(3)), createTypes());
    expect(document.values).toEqual({ name: 'root', size: 3 });
  });

  it('rejects unregistered configuration types', () => {
    const types = new ConfigurationTypeRegistry().register('root', RootConfiguration);
    expect(() => toObject(RootConfiguration.initialise(), types)).toThrow(
      'Configuration type NestedConfiguration is not registered',
    );
  });
});

describe('fromObject', () => {
  it('reads a document back into a configuration', () => {
    const root = fromObject(
      { type: 'root', values: { name: 'loaded', size: 7 }, children: { nested: { type: 'nested', values: { y: 2 } } } },
      createTypes(),
      RootConfiguration,
    );
    expect(root.name.get()).toBe('loaded');
    expect(root.size.get()).toBe(7);
    expect(root.nested.get().x.get()).toBe(1);
    expect(root.nested.get().y.get()).toBe(2);
  });

  it('applies defaults for missing elements', () => {
    const range = fromObject({ type: 'range' }, createTypes());
    expect(range).toBeInstanceOf(RangeConfiguration);
    expect(range.getValue('max')).toBe(10);
  });

  it('rejects malformed documents', () => {
    const error = captureError(SerializationError, () => fromObject({ values: {} }, createTypes()));
    expect(error.message).toBe('Malformed configuration document');
    expect(error.details['errors']).not.toEqual([]);
  });

  it('rejects unknown type names', () => {
    expect(() => fromObject({ type: 'mystery' }, createTypes())).toThrow("Unknown configuration type 'mystery'");
  });

  it('rejects unknown element names', () => {
    const error = captureError(NoSuchElementError, () =>
      fromObject({ type: 'range', values: { width: 3 } }, createTypes()),
    );
    expect(error.elementName).toBe('width');
  });

  it('rejects an element given both as a value and as a child', () => {
    expect(() =>
      fromObject({ type: 'root', values: { nested: 1 }, children: { nested: { type: 'nested' } } }, createTypes()),
    ).toThrow("Element 'nested' appears both as a value and as a child");
  });

  it('checks the integrity of what it reads', () => {
    const error = captureError(IntegrityError, () =>
      fromObject({ type: 'root', children: { nested: { type: 'nested', values: { x: -1 } } } }, createTypes()),
    );
    expect(error.reason).toBe('x must be non-negative');
  });
});

describe('YAML', () => {
  it('dumps a configuration', () => {
    expect(toYaml(RootConfiguration.initialise(), createTypes())).toBe(
      [
        'type: root',
        'values:',
        '  name: root',
        'children:',
        '  nested:',
        '    type: nested',
        '    values:',
        '      x: 1',
        '',
      ].join('\n'),
    );
  });

  it('round-trips through YAML text', () => {
    const types = createTypes();
    const root = RootConfiguration.initialise((c) => {
      c.name.set('round-trip');
      c.nested.get().x.set(6);
    });
    const loaded = fromYaml(toYaml(root, types), types, RootConfiguration);
    expect(loaded.name.get()).toBe('round-trip');
    expect(loaded.nested.get().x.get()).toBe(6);
    expect(loaded.size.hasValue).toBe(false);
  });

  it('reads hand-written YAML', () => {
    const range = fromYaml('type: range\nvalues:\n  min: 2\n  max: 4\n', createTypes(), RangeConfiguration);
    expect(range.min.get()).toBe(2);
    expect(range.max.get()).toBe(4);
  });

  it('rejects invalid YAML', () => {
    expect(() => fromYaml('type: [unclosed', createTypes())).toThrow(SerializationError);
    expect(() => fromYaml('type: [unclosed', createTypes())).toThrow(/^Invalid YAML: /);
  });

  it('keeps the parser error as the cause', () => {
    const error = captureError(SerializationError, () => fromYaml('type: [unclosed', createTypes()));
    expect(error.cause).toBeInstanceOf(Error);
    expect(error.message).toBe(`Invalid YAML: ${error.cause?.message}`);
  });
});

describe('ConfigurationTypeRegistry', () => {
  it('maps names and types both ways', () => {
    const types = createTypes();
    expect(types.has('range')).toBe(true);
    expect(types.typeOf('range')).toBe(RangeConfiguration);
    expect(types.nameOf(RangeConfiguration)).toBe('range');
  });

  it('refuses to rebind a name to another type', () => {
    const types = createTypes();
    expect(() => types.register('root', RangeConfiguration)).toThrow(
      "Type name 'root' is already registered to RootConfiguration",
    );
    expect(types.register('root', RootConfiguration)).toBe(types);
  });
});

describe('ObjectWriter', () => {
  it('has no result before a configuration is written', () => {
    expect(() => new ObjectWriter(createTypes()).result).toThrow(VisitationError);
  });
});
