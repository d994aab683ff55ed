/**
 * ObjectWriter: a visitor producing the plain-object form of a configuration.
 */

import type { ConfigurationType } from '../configuration.js';
import type { ElementMetadata } from '../element.js';
import { VisitationError } from '../errors.js';
import type { ConfigurationVisitor } from '../visitation/visitor.js';
import type { ConfigurationTypeRegistry, SerializedConfiguration } from './types.js';

interface Frame {
  name: string;
  type: string;
  values: Record<string, unknown>;
  children: Record<string, SerializedConfiguration>;
}

function toDocument(frame: Frame): SerializedConfiguration {
  const document: SerializedConfiguration = { type: frame.type };
  if (Object.keys(frame.values).length > 0) document.values = frame.values;
  if (Object.keys(frame.children).length > 0) document.children = frame.children;
  return document;
}

export class ObjectWriter implements ConfigurationVisitor {
  private _types: ConfigurationTypeRegistry;
  private _stack: Frame[] = [];
  private _result: SerializedConfiguration | null = null;

  constructor(types: ConfigurationTypeRegistry) {
    this._types = types;
  }

  get result(): SerializedConfiguration {
    if (this._result === null) throw new VisitationError('No configuration has been written yet');
    return this._result;
  }

  private _top(call: string): Frame {
    const top = this._stack[this._stack.length - 1];
    if (top === undefined) throw new VisitationError(`${call}() called outside begin()/end()`);
    return top;
  }

  private _push(name: string, type: ConfigurationType): void {
    this._stack.push({ name, type: this._types.nameOf(type), values: {}, children: {} });
  }

  begin(type: ConfigurationType): void {
    if (this._stack.length > 0) throw new VisitationError('begin() called while a configuration is being written');
    this._result = null;
    this._push('', type);
  }

  item(name: string, value: unknown, _metadata: ElementMetadata): void {
    this._top('item').values[name] = value;
  }

  beginSubConfiguration(name: string, type: ConfigurationType, _metadata: ElementMetadata): void {
    this._top('beginSubConfiguration');
    this._push(name, type);
  }

  endSubConfiguration(): void {
    if (this._stack.length < 2) throw new VisitationError('endSubConfiguration() without matching beginSubConfiguration()');
    const frame = this._stack.pop();
    if (frame === undefined) return;
    this._top('endSubConfiguration').children[frame.name] = toDocument(frame);
  }

  end(): void {
    if (this._stack.length !== 1) throw new VisitationError('end() called with unbalanced sub-configurations');
    const frame = this._stack.pop();
    if (frame === undefined) return;
    this._result = toDocument(frame);
  }
}
