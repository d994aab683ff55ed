/**
 * ConfigurationReader: rebuilds a live configuration from any visitable source.
 */

import { initialise } from '../configuration.js';
import type { Configuration, ConfigurationType } from '../configuration.js';
import type { ElementMetadata } from '../element.js';
import { VisitationError } from '../errors.js';
import { visit } from './visit.js';
import type { ConfigurationVisitable } from './visitable.js';
import type { ConfigurationVisitor } from './visitor.js';

/**
 * Accumulates initialisation steps for one configuration, then builds it.
 */
class PieceWiseConfigurationBuilder {
  readonly type: ConfigurationType;
  private _steps: Array<(configuration: Configuration) => void> = [];

  constructor(type: ConfigurationType) {
    this.type = type;
  }

  append(step: (configuration: Configuration) => void): void {
    this._steps.push(step);
  }

  instantiate(): Configuration {
    return initialise(this.type, (configuration) => {
      for (const step of this._steps) step(configuration);
    });
  }
}

interface Frame {
  name: string;
  builder: PieceWiseConfigurationBuilder;
}

/**
 * Visitor which builds a configuration bottom-up: each sub-configuration is
 * fully initialised and integrity-checked before it is assigned to its
 * parent, and the parent is built last.
 */
export class ConfigurationReader implements ConfigurationVisitor {
  private _stack: Frame[] = [];
  private _result: Configuration | null = null;

  get result(): Configuration {
    if (this._result === null) throw new VisitationError('No configuration has been read yet');
    return this._result;
  }

  private _peek(call: string): Frame {
    const top = this._stack[this._stack.length - 1];
    if (top === undefined) throw new VisitationError(`${call}() called outside begin()/end()`);
    return top;
  }

  begin(type: ConfigurationType): void {
    if (this._stack.length > 0) throw new VisitationError('begin() called while a configuration is being read');
    this._result = null;
    this._stack.push({ name: '', builder: new PieceWiseConfigurationBuilder(type) });
  }

  item(name: string, value: unknown, _metadata: ElementMetadata): void {
    this._peek('item').builder.append((configuration) => configuration.setValue(name, value));
  }

  beginSubConfiguration(name: string, type: ConfigurationType, _metadata: ElementMetadata): void {
    this._peek('beginSubConfiguration');
    this._stack.push({ name, builder: new PieceWiseConfigurationBuilder(type) });
  }

  endSubConfiguration(): void {
    if (this._stack.length < 2) throw new VisitationError('endSubConfiguration() without matching beginSubConfiguration()');
    const frame = this._stack.pop();
    if (frame === undefined) return;
    const sub = frame.builder.instantiate();
    this._peek('endSubConfiguration').builder.append((configuration) => configuration.setValue(frame.name, sub));
  }

  end(): void {
    if (this._stack.length !== 1) throw new VisitationError('end() called with unbalanced sub-configurations');
    const frame = this._stack.pop();
    if (frame === undefined) return;
    this._result = frame.builder.instantiate();
  }
}

/**
 * Reads a configuration from a source that can be visited like one.
 *
 * When `expectedType` is given, the result is checked to be an instance of it.
 */
export function readConfiguration(source: ConfigurationVisitable): Configuration;
export function readConfiguration<C extends Configuration>(source: ConfigurationVisitable, expectedType: ConfigurationType<C>): C;
export function readConfiguration(source: ConfigurationVisitable, expectedType?: ConfigurationType): Configuration {
  const result = visit(source, new ConfigurationReader()).result;
  const actual: object = result;
  if (expectedType !== undefined && !(result instanceof expectedType)) {
    throw new VisitationError(`Expected a ${expectedType.name} but read a ${actual.constructor.name}`);
  }
  return result;
}
