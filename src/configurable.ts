/**
 * Configurable objects and the registry binding them to their configuration types.
 */

import { Configuration, initialise } from './configuration.js';
import type { ConfigurationType, Initialiser } from './configuration.js';
import { ConfigurableNotRegisteredError, InvalidValueError } from './errors.js';
import type { ConfigurationVisitable, VisitableElement } from './visitation/visitable.js';

/**
 * Base class for objects configured by a separate {@link Configuration}.
 *
 * The configuration is built from either an initialiser block or an existing
 * configuration (whose values are copied), then finalised, so a configurable
 * never shares mutable state with its caller.
 *
 * @example
 * class Server extends Configurable<ServerConfiguration> {
 *   constructor(source?: ServerConfiguration | Initialiser<ServerConfiguration>) {
 *     super(ServerConfiguration, source);
 *   }
 * }
 */
export abstract class Configurable<C extends Configuration> implements ConfigurationVisitable {
  readonly configuration: C;

  protected constructor(configurationType: ConfigurationType<C>, source?: C | Initialiser<C>) {
    const block: Initialiser<C> | undefined = source instanceof Configuration ? source.asReconfigureBlock<C>() : source;
    this.configuration = initialise(configurationType, block).finalise();
  }

  getConfigurationType(): ConfigurationType {
    return this.configuration.getConfigurationType();
  }

  iterateElements(): Iterable<VisitableElement> {
    return this.configuration.iterateElements();
  }
}

export type ConfigurableType<C extends Configuration, T extends Configurable<C> = Configurable<C>> =
  new (source?: C | Initialiser<C>) => T;

interface Registration {
  configurableType: Function;
  configurationType: ConfigurationType;
  construct(configuration: Configuration): Configurable<Configuration>;
}

/**
 * Explicit table of configurable types and the configuration type each
 * takes. Used to construct configurables from configurations whose concrete
 * type is only known at run time (for example after reading one back).
 */
export class ConfigurableRegistry {
  private _byConfigurable: Map<Function, Registration> = new Map();
  private _byConfiguration: Map<Function, Registration> = new Map();

  register<C extends Configuration>(configurableType: ConfigurableType<C>, configurationType: ConfigurationType<C>): void {
    const registration: Registration = {
      configurableType,
      configurationType,
      construct: (configuration) => {
        if (!(configuration instanceof configurationType)) {
          throw new InvalidValueError(
            configurableType.name,
            `expected a ${configurationType.name}, got ${configuration.constructor.name}`,
          );
        }
        return new configurableType(configuration);
      },
    };
    this._byConfigurable.set(configurableType, registration);
    this._byConfiguration.set(configurationType, registration);
  }

  unregister(configurableType: Function): boolean {
    const registration = this._byConfigurable.get(configurableType);
    if (registration === undefined) return false;
    this._byConfigurable.delete(configurableType);
    if (this._byConfiguration.get(registration.configurationType) === registration) {
      this._byConfiguration.delete(registration.configurationType);
    }
    return true;
  }

  has(configurableType: Function): boolean {
    return this._byConfigurable.has(configurableType);
  }

  configurationTypeOf(configurableType: Function): ConfigurationType {
    const registration = this._byConfigurable.get(configurableType);
    if (registration === undefined) throw new ConfigurableNotRegisteredError(configurableType.name);
    return registration.configurationType;
  }

  /** Constructs the configurable registered for the configuration's exact type. */
  construct(configuration: Configuration): Configurable<Configuration> {
    const registration = this._byConfiguration.get(configuration.constructor);
    if (registration === undefined) throw new ConfigurableNotRegisteredError(configuration.constructor.name);
    return registration.construct(configuration);
  }

  /** A new configurable of the same registered type, built from `instance`'s configuration. */
  clone(instance: Configurable<Configuration>): Configurable<Configuration> {
    const registration = this._byConfigurable.get(instance.constructor);
    if (registration === undefined) throw new ConfigurableNotRegisteredError(instance.constructor.name);
    return registration.construct(instance.configuration);
  }
}

export const defaultRegistry = new ConfigurableRegistry();

export function registerConfigurable<C extends Configuration>(
  configurableType: ConfigurableType<C>,
  configurationType: ConfigurationType<C>,
): void {
  defaultRegistry.register(configurableType, configurationType);
}

/**
 * Integrity helper: checks that `configuration` can be used to construct a
 * `configurableType`.
 *
 * @returns null if it can, otherwise a description of the mismatch.
 */
export function classMatchesConfiguration(
  configurableType: Function,
  configuration: Configuration,
  registry: ConfigurableRegistry = defaultRegistry,
): string | null {
  if (!(configurableType.prototype instanceof Configurable)) {
    return `${configurableType.name} is not configurable`;
  }
  if (!registry.has(configurableType)) {
    return `${configurableType.name} is not registered with a configuration type`;
  }
  const required = registry.configurationTypeOf(configurableType);
  const actual: object = configuration;
  if (!(configuration instanceof required)) {
    return `The configuration for ${configurableType.name} should be a ${required.name} `
      + `but is a ${actual.constructor.name} instead`;
  }
  return null;
}
