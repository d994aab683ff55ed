/**
 * Configuration trees: element registration, dotted-name resolution and the
 * lifecycle state machine (initialise, reconfigure, finalise).
 */

import { v4 as uuidv4 } from 'uuid';
import { ConfigurationItem, SubConfiguration } from './element.js';
import type { ConfigurationElement, ElementOptions, ItemOptions } from './element.js';
import {
  AbsentError,
  DuplicateElementError,
  InitialisationError,
  IntegrityError,
  IntermediateStateError,
  InvalidValueError,
  NoSuchElementError,
  NotNavigableError,
  ReadOnlyModificationError,
} from './errors.js';
import {
  LifecyclePhase,
  areIntegrityChecksSuspended,
  isInitialised,
  isIntegrityAssured,
  isReconfigurable,
  isWritable,
} from './lifecycle.js';
import { getLogger } from './settings.js';
import { commonElementNames } from './utils/common-elements.js';
import { ifNotAbsent } from './utils/if-not-absent.js';
import type { ConfigurationVisitable, VisitableElement } from './visitation/visitable.js';

export type ConfigurationType<C extends Configuration = Configuration> = new () => C;

export type Initialiser<C extends Configuration> = (configuration: C) => void;

export interface SubConfigurationOptions<C extends Configuration> {
  description: string;
  optional?: boolean;
  /** Builds the default value with this block (integrity-checked). */
  initialise?: Initialiser<C>;
  /** Uses a clone of this configuration as the default value. */
  defaultValue?: C;
}

/**
 * Base class for configuration objects.
 *
 * Sub-types declare their elements as fields, in order, using
 * {@link Configuration.item} and {@link Configuration.subConfiguration}, and
 * may override {@link Configuration.checkIntegrity}. Instances are created
 * with the static `initialise`, never with `new` directly.
 *
 * @example
 * class ServerConfiguration extends Configuration {
 *   readonly host = this.item<string>('host', { description: 'Bind address', default: () => '0.0.0.0' });
 *   readonly port = this.item<number>('port', { description: 'Listen port' });
 * }
 *
 * const server = ServerConfiguration.initialise((c) => c.port.set(8080));
 */
export abstract class Configuration implements ConfigurationVisitable {
  private readonly _orderedElementNames: string[] = [];
  private readonly _elements: Map<string, ConfigurationElement<unknown>> = new Map();
  private _phase: LifecyclePhase = LifecyclePhase.Uninitialised;
  private readonly _restorePoint: Map<string, () => void> = new Map();
  private readonly _participants: Set<Configuration> = new Set();

  static initialise<C extends Configuration>(this: ConfigurationType<C>, block?: Initialiser<C>): C {
    return initialise(this, block);
  }

  // ── Element declaration ─────────────────────────────────────────

  protected item<T>(name: string, options: ItemOptions<T>): ConfigurationItem<T> {
    return new ConfigurationItem<T>(this, name, options);
  }

  protected subConfiguration<C extends Configuration>(
    name: string,
    configurationType: ConfigurationType<C>,
    options: SubConfigurationOptions<C>,
  ): SubConfiguration<C> {
    const elementOptions: ElementOptions<C> = {
      description: options.description,
      optional: options.optional,
    };
    const template = options.defaultValue;
    const block = options.initialise;
    if (template !== undefined) {
      elementOptions.default = () => template.clone();
    } else if (block !== undefined) {
      elementOptions.default = () => initialise(configurationType, block);
    } else if (!options.optional) {
      elementOptions.default = () => initialise(configurationType);
    }
    return new SubConfiguration<C>(this, name, configurationType, elementOptions);
  }

  /** @internal Called by elements as they are constructed. */
  _registerElement(element: ConfigurationElement<unknown>): void {
    if (this._phase !== LifecyclePhase.Uninitialised) {
      throw new InitialisationError(`Cannot register element '${element.name}' after construction`);
    }
    if (element.name === '' || element.name.includes('.')) {
      throw new InvalidValueError(element.name, 'element names must be non-empty and contain no dots');
    }
    if (this._elements.has(element.name)) throw new DuplicateElementError(element.name);
    this._orderedElementNames.push(element.name);
    this._elements.set(element.name, element);
  }

  // ── Lifecycle state ─────────────────────────────────────────────

  get lifecyclePhase(): LifecyclePhase {
    return this._phase;
  }

  get initialised(): boolean {
    return isInitialised(this._phase);
  }

  get initialising(): boolean {
    return this._phase === LifecyclePhase.Initialising;
  }

  get writable(): boolean {
    return isWritable(this._phase);
  }

  get reconfigurable(): boolean {
    return isReconfigurable(this._phase);
  }

  get integrityAssured(): boolean {
    return isIntegrityAssured(this._phase);
  }

  get integrityChecksSuspended(): boolean {
    return areIntegrityChecksSuspended(this._phase);
  }

  get finalised(): boolean {
    return this._phase === LifecyclePhase.Finalised;
  }

  private _ensureInitialised(): void {
    if (!this.initialised) throw new InitialisationError('Configuration is not initialised');
  }

  private _ensureReconfigurable(): void {
    this._ensureInitialised();
    if (!this.reconfigurable) throw new ReadOnlyModificationError();
  }

  private _ensureIntegrity(): void {
    this._ensureInitialised();
    if (!this.integrityAssured) throw new IntermediateStateError();
  }

  // ── Elements by name ────────────────────────────────────────────

  get orderedElementNames(): readonly string[] {
    return this._orderedElementNames;
  }

  elementNames(): string[] {
    return [...this._orderedElementNames];
  }

  hasElement(name: string): boolean {
    return this._elements.has(name);
  }

  /**
   * Resolves a dotted name to an element of this configuration or one of its
   * sub-configurations. Errors from deeper levels are re-raised with the full
   * path from this configuration.
   */
  element(name: string): ConfigurationElement<unknown> {
    const dot = name.indexOf('.');
    if (dot === -1) return this._getRegisteredElement(name, name);

    const head = name.slice(0, dot);
    const rest = name.slice(dot + 1);

    const element = this._getRegisteredElement(head, name);
    if (!(element instanceof SubConfiguration)) throw new NotNavigableError(name, head);

    let sub: Configuration;
    try {
      sub = element.get();
    } catch (e) {
      if (e instanceof AbsentError) throw new AbsentError(head, { cause: e });
      throw e;
    }

    try {
      return sub.element(rest);
    } catch (e) {
      if (e instanceof NotNavigableError) throw new NotNavigableError(name, e.problemElement, { cause: e });
      if (e instanceof NoSuchElementError) throw new NoSuchElementError(`${head}.${e.elementName}`, name, { cause: e });
      if (e instanceof AbsentError) throw new AbsentError(`${head}.${e.elementName}`, { cause: e });
      throw e;
    }
  }

  private _getRegisteredElement(name: string, fullName: string): ConfigurationElement<unknown> {
    const element = this._elements.get(name);
    if (element === undefined) throw new NoSuchElementError(name, fullName);
    return element;
  }

  getValue(name: string): unknown {
    return this.element(name).get();
  }

  setValue(name: string, value: unknown): void {
    this.element(name).set(value);
  }

  clearValue(name: string): void {
    this.element(name).clear();
  }

  private _subConfigurationValues(): Configuration[] {
    const values: Configuration[] = [];
    for (const element of this._elements.values()) {
      if (element instanceof SubConfiguration && element.hasValue) values.push(element.get());
    }
    return values;
  }

  // ── Visitation ──────────────────────────────────────────────────

  getConfigurationType(): ConfigurationType {
    return this.constructor as ConfigurationType;
  }

  /** Present elements in declaration order. Absent optional elements are skipped. */
  *iterateElements(): Generator<VisitableElement> {
    for (const name of this._orderedElementNames) {
      const element = this._getRegisteredElement(name, name);
      if (!element.hasValue) continue;
      if (element instanceof SubConfiguration) {
        const sub: Configuration = element.get();
        yield { kind: 'subConfiguration', name, value: sub.safeVisitable(), metadata: element.metadata };
      } else {
        yield { kind: 'item', name, value: element.get(), metadata: element.metadata };
      }
    }
  }

  /** A visitable view of this configuration that exposes no write access. */
  safeVisitable(): ConfigurationVisitable {
    return {
      getConfigurationType: () => this.getConfigurationType(),
      iterateElements: () => this.iterateElements(),
    };
  }

  // ── Integrity ───────────────────────────────────────────────────

  /**
   * Validates the configuration as a whole. Override to enforce
   * constraints between elements.
   *
   * @returns A description of the problem, or null if the configuration is sound.
   */
  checkIntegrity(): string | null {
    return null;
  }

  /** @internal */
  _performIntegrityCheck(): void {
    this._ensureInitialised();
    const reason = this.checkIntegrity();
    if (reason !== null) throw new IntegrityError(reason);
  }

  /** @internal Records how to undo the first change to an element inside a transaction. */
  _setRestorePoint(name: string, restore: () => void): void {
    if (this._phase !== LifecyclePhase.Reconfiguring) return;
    if (this._restorePoint.has(name)) return;
    this._restorePoint.set(name, restore);
  }

  /** @internal Brings a sub-configuration assigned mid-transaction into the transaction. */
  _joinTransaction(sub: Configuration): void {
    if (sub._enterTransaction()) this._participants.add(sub);
  }

  // ── Initialisation ──────────────────────────────────────────────

  /** @internal */
  _initialise(block: () => void): void {
    if (this._phase !== LifecyclePhase.Uninitialised) {
      throw new InitialisationError('Configuration is already initialised or initialising');
    }

    this._phase = LifecyclePhase.Initialising;
    block();

    for (const element of this._elements.values()) {
      element._completeInitialisation();
    }

    this._phase = LifecyclePhase.Initialised;
    this._performIntegrityCheck();
  }

  // ── Reconfiguration ─────────────────────────────────────────────

  /**
   * Opens a transaction on this configuration and every sub-configuration.
   *
   * @returns false if a transaction was already open.
   */
  private _enterTransaction(): boolean {
    this._ensureReconfigurable();
    if (this._phase === LifecyclePhase.Reconfiguring) return false;

    for (const sub of this._subConfigurationValues()) {
      if (sub.finalised) continue;
      if (sub._enterTransaction()) this._participants.add(sub);
    }

    this._phase = LifecyclePhase.Reconfiguring;
    return true;
  }

  /**
   * Checks the tree as it stands when the transaction closes. Participants
   * that were replaced during the transaction are no longer part of it and
   * are not checked.
   */
  private _validateTransaction(): void {
    for (const sub of this._subConfigurationValues()) {
      if (sub.lifecyclePhase === LifecyclePhase.Reconfiguring) sub._validateTransaction();
    }
    this._performIntegrityCheck();
  }

  private _commitTransaction(): void {
    for (const participant of this._participants) {
      participant._commitTransaction();
    }
    this._participants.clear();
    this._restorePoint.clear();
    this._phase = LifecyclePhase.Initialised;
  }

  private _rollbackTransaction(): void {
    for (const restore of this._restorePoint.values()) {
      restore();
    }
    this._restorePoint.clear();
    for (const participant of this._participants) {
      participant._rollbackTransaction();
    }
    this._participants.clear();
    this._phase = LifecyclePhase.Initialised;
  }

  /**
   * Makes bulk changes with integrity checks deferred until the block
   * returns. If the block throws, or the configuration (or any
   * sub-configuration) fails its integrity check afterwards, every change
   * is reverted and the error re-raised.
   *
   * Calling this on a configuration that is already inside a transaction
   * just runs the block; the outermost call closes the transaction.
   */
  reconfigure(block: (configuration: this) => void): this {
    if (!this._enterTransaction()) {
      block(this);
      return this;
    }

    const logger = getLogger().child({
      transaction_id: uuidv4(),
      configuration: this.constructor.name,
    });
    logger.debug('Reconfiguration started');

    try {
      block(this);
    } catch (e) {
      this._rollbackTransaction();
      logger.debug('Reconfiguration aborted, changes reverted', { error: String(e) });
      throw e;
    }

    try {
      this._validateTransaction();
    } catch (e) {
      this._rollbackTransaction();
      logger.debug('Reconfiguration failed its integrity check, changes reverted', { error: String(e) });
      throw e;
    }

    this._commitTransaction();
    logger.debug('Reconfiguration committed');
    return this;
  }

  /**
   * Copies the values of the elements this configuration shares with
   * `other`, as a single transaction. The two types must be the same, or
   * one must extend the other.
   */
  update(other: Configuration): this {
    return this.reconfigure((target) => target._updateFrom(other));
  }

  private _updateFrom(other: Configuration): void {
    for (const name of commonElementNames(this, other)) {
      ifNotAbsent(
        () => other.getValue(name),
        (value) => this.setValue(name, value),
      ).otherwise(() => this.clearValue(name));
    }
  }

  /**
   * An initialiser that applies this configuration's values to its
   * argument, which may be of the same type, an ancestor or a descendant.
   */
  asReconfigureBlock<O extends Configuration>(): Initialiser<O> {
    const apply = (target: Configuration): void => {
      this._ensureIntegrity();
      if (target.integrityChecksSuspended) {
        target._updateFrom(this);
      } else {
        target.update(this);
      }
    };
    return apply;
  }

  clone(): this {
    this._ensureInitialised();
    const type = this.constructor as ConfigurationType<this>;
    return initialise(type, this.asReconfigureBlock<this>());
  }

  // ── Finalisation ────────────────────────────────────────────────

  /**
   * Makes this configuration, and every sub-configuration, permanently
   * read-only. Sub-configurations that aren't already finalised are
   * replaced by finalised clones.
   */
  finalise(): this {
    this._ensureIntegrity();
    if (this._phase === LifecyclePhase.Finalised) return this;

    this._phase = LifecyclePhase.Finalised;
    for (const element of this._elements.values()) {
      if (element instanceof SubConfiguration) element._reprepare();
    }
    return this;
  }
}

/**
 * Constructs and initialises a configuration in one step: runs `block`,
 * applies defaults to everything the block left unset, then checks
 * integrity.
 */
export function initialise<C extends Configuration>(type: ConfigurationType<C>, block?: Initialiser<C>): C {
  const configuration = new type();
  configuration._initialise(() => block?.(configuration));
  return configuration;
}
