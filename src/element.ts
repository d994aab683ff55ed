/**
 * Configuration elements: the named value slots of a configuration.
 */

import type { TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { Configuration, ConfigurationType } from './configuration.js';
import {
  AbsentError,
  ClearRequiredValueError,
  InitialisationError,
  IntermediateStateError,
  InvalidValueError,
  MissingDefaultError,
  ReadOnlyModificationError,
} from './errors.js';
import { LifecyclePhase, areIntegrityChecksSuspended, isWritable } from './lifecycle.js';
import { ABSENT, present } from './utils/optional.js';
import type { Optional } from './utils/optional.js';

export interface ElementMetadata {
  readonly description: string;
}

/**
 * Whether an element's default supplier is still waiting to run. Suppliers
 * are single-shot: running one, or setting/clearing the value explicitly,
 * moves the element to `resolved` for good.
 */
export type DefaultState<T> =
  | { readonly state: 'pending'; readonly supplier: () => T }
  | { readonly state: 'resolved' };

const RESOLVED: DefaultState<never> = Object.freeze({ state: 'resolved' });

export interface ElementOptions<T> {
  description: string;
  optional?: boolean;
  default?: () => T;
}

export interface ItemOptions<T> extends ElementOptions<T> {
  /** Runtime type guard for values assigned to the item. */
  schema?: TSchema;
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

export abstract class ConfigurationElement<T> {
  readonly owner: Configuration;
  readonly name: string;
  readonly optional: boolean;
  readonly metadata: ElementMetadata;
  private _actual: Optional<T> = ABSENT;
  private _default: DefaultState<T>;

  constructor(owner: Configuration, name: string, options: ElementOptions<T>) {
    this.owner = owner;
    this.name = name;
    this.optional = options.optional ?? false;
    this.metadata = Object.freeze({ description: options.description });
    this._default = options.default !== undefined ? { state: 'pending', supplier: options.default } : RESOLVED;
    owner._registerElement(this);
  }

  /** True when the element currently holds a value. */
  get hasValue(): boolean {
    return this._actual.present;
  }

  get defaultState(): DefaultState<T> {
    return this._default;
  }

  get(): T {
    const phase = this.owner.lifecyclePhase;
    if (phase === LifecyclePhase.Uninitialised) {
      throw new InitialisationError(`Attempted to read '${this.name}' before initialisation`);
    }
    if (phase === LifecyclePhase.Initialising) this._applyDefault();

    if (this._actual.present) return this._actual.value;
    throw new AbsentError(this.name);
  }

  set(value: T): void {
    this._modify(() => present(this.prepare(value)));
  }

  clear(): void {
    if (!this.optional) throw new ClearRequiredValueError(this.name);
    this._modify(() => ABSENT);
  }

  /** Validates or transforms a value before it is stored. */
  protected abstract prepare(value: T): T;

  /** Values produced by the element's own default supplier. */
  protected prepareDefault(value: T): T {
    return this.prepare(value);
  }

  private _modify(next: () => Optional<T>): void {
    const phase = this.owner.lifecyclePhase;
    if (phase === LifecyclePhase.Finalised) throw new ReadOnlyModificationError(this.name);
    if (!isWritable(phase)) {
      throw new InitialisationError(
        `Attempted to modify value of '${this.name}' (${this.owner.constructor.name}) before initialisation`,
      );
    }

    if (areIntegrityChecksSuspended(phase)) {
      const original = this._actual;
      this.owner._setRestorePoint(this.name, () => {
        this._actual = original;
      });
      this._actual = next();
    } else {
      const current = this._actual;
      this._actual = next();
      try {
        this.owner._performIntegrityCheck();
      } catch (e) {
        this._actual = current;
        throw e;
      }
    }

    this._default = RESOLVED;
  }

  /** @internal */
  _applyDefault(): void {
    if (this._default.state !== 'pending') return;
    const { supplier } = this._default;
    this._default = RESOLVED;
    this._actual = present(this.prepareDefault(supplier()));
  }

  /** @internal Runs at the end of the owner's initialisation. */
  _completeInitialisation(): void {
    this._applyDefault();
    if (!this.optional && !this._actual.present) {
      throw new MissingDefaultError(this.owner.constructor.name, this.name);
    }
  }

  /** @internal Passes the current value through `prepare` again, e.g. after the owner is finalised. */
  _reprepare(): void {
    if (this._actual.present) this._actual = present(this.prepare(this._actual.value));
  }
}

export class ConfigurationItem<T> extends ConfigurationElement<T> {
  readonly schema: TSchema | null;

  constructor(owner: Configuration, name: string, options: ItemOptions<T>) {
    super(owner, name, options);
    this.schema = options.schema ?? null;
  }

  protected prepare(value: T): T {
    if (this.schema !== null && !Value.Check(this.schema, value)) {
      const first = Value.Errors(this.schema, value).First();
      throw new InvalidValueError(this.name, first?.message ?? `${describeValue(value)} does not match the schema`);
    }
    return value;
  }
}

/**
 * An element whose value is itself a configuration.
 *
 * Assigned values are cloned so the owner never shares a mutable tree with
 * outside code. The one exception is a finalised value assigned under a
 * finalised owner, which is kept by reference.
 */
export class SubConfiguration<C extends Configuration> extends ConfigurationElement<C> {
  readonly configurationType: ConfigurationType<C>;

  constructor(owner: Configuration, name: string, configurationType: ConfigurationType<C>, options: ElementOptions<C>) {
    super(owner, name, options);
    this.configurationType = configurationType;
  }

  protected prepare(value: C): C {
    this._checkType(value);
    if (!value.integrityAssured) throw new IntermediateStateError();

    if (this.owner.finalised && value.finalised) return value;

    const clone = value.clone();
    if (this.owner.finalised) return clone.finalise();
    if (this.owner.lifecyclePhase === LifecyclePhase.Reconfiguring) this.owner._joinTransaction(clone);
    return clone;
  }

  protected override prepareDefault(value: C): C {
    this._checkType(value);
    return value;
  }

  private _checkType(value: C): void {
    if (!(value instanceof this.configurationType)) {
      throw new InvalidValueError(
        this.name,
        `expected ${this.configurationType.name}, got ${describeValue(value)}`,
      );
    }
  }
}
