/**
 * Shared fixture configurations and helpers.
 */

import { Configuration } from '../src/configuration.js';
import type { ConfigurationType } from '../src/configuration.js';
import type { ElementMetadata } from '../src/element.js';
import type { ConfigurationVisitor } from '../src/visitation/visitor.js';

export class NestedConfiguration extends Configuration {
  readonly x = this.item<number>('x', { description: 'A non-negative number', default: () => 1 });
  readonly y = this.item<number>('y', { description: 'An optional number', optional: true });

  override checkIntegrity(): string | null {
    return this.x.get() < 0 ? 'x must be non-negative' : null;
  }
}

export class RootConfiguration extends Configuration {
  readonly name = this.item<string>('name', { description: 'Display name', default: () => 'root' });
  readonly size = this.item<number>('size', { description: 'Optional size', optional: true });
  readonly nested = this.subConfiguration('nested', NestedConfiguration, { description: 'Nested settings' });

  override checkIntegrity(): string | null {
    if (this.size.hasValue && this.size.get() > 100) return 'size must be at most 100';
    return null;
  }
}

export class ExtendedRootConfiguration extends RootConfiguration {
  readonly label = this.item<string>('label', { description: 'Optional label', optional: true });
}

export class SiblingRootConfiguration extends RootConfiguration {
  readonly flag = this.item<boolean>('flag', { description: 'A flag', default: () => false });
}

export class RangeConfiguration extends Configuration {
  readonly min = this.item<number>('min', { description: 'Lower bound', default: () => 0 });
  readonly max = this.item<number>('max', { description: 'Upper bound', default: () => 10 });

  override checkIntegrity(): string | null {
    const min = this.min.get();
    const max = this.max.get();
    return min > max ? `min (${min}) must not exceed max (${max})` : null;
  }
}

export class OptionalHolderConfiguration extends Configuration {
  readonly extra = this.subConfiguration('extra', NestedConfiguration, {
    description: 'Optional nested settings',
    optional: true,
  });
}

/** Records every visitor call as a line of text. */
export class RecordingVisitor implements ConfigurationVisitor {
  calls: string[] = [];
  metadata: Record<string, ElementMetadata> = {};

  begin(type: ConfigurationType): void {
    this.calls.push(`begin ${type.name}`);
  }

  item(name: string, value: unknown, metadata: ElementMetadata): void {
    this.metadata[name] = metadata;
    this.calls.push(`item ${name}=${JSON.stringify(value)}`);
  }

  beginSubConfiguration(name: string, type: ConfigurationType, metadata: ElementMetadata): void {
    this.metadata[name] = metadata;
    this.calls.push(`beginSub ${name} ${type.name}`);
  }

  endSubConfiguration(): void {
    this.calls.push('endSub');
  }

  end(): void {
    this.calls.push('end');
  }
}

export function createBufferOutput(): { output: { write: (s: string) => void }; lines: string[] } {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

/** Runs `fn` and returns the error it throws, which must be a `type`. */
export function captureError<E extends Error>(type: new (...args: never[]) => E, fn: () => unknown): E {
  try {
    fn();
  } catch (e) {
    if (e instanceof type) return e;
    throw e;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
