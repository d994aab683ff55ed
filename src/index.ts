/**
 * structconf - Structured configuration trees with transactional reconfiguration.
 */

// Core
export { Configuration, initialise } from './configuration.js';
export type { ConfigurationType, Initialiser, SubConfigurationOptions } from './configuration.js';
export { ConfigurationElement, ConfigurationItem, SubConfiguration } from './element.js';
export type { DefaultState, ElementMetadata, ElementOptions, ItemOptions } from './element.js';
export {
  LifecyclePhase,
  isInitialised,
  isWritable,
  isReconfigurable,
  isIntegrityAssured,
  areIntegrityChecksSuspended,
} from './lifecycle.js';

// Configurables
export {
  Configurable,
  ConfigurableRegistry,
  defaultRegistry,
  registerConfigurable,
  classMatchesConfiguration,
} from './configurable.js';
export type { ConfigurableType } from './configurable.js';

// Errors
export {
  ConfigurationError,
  InitialisationError,
  IntermediateStateError,
  ReadOnlyModificationError,
  AbsentError,
  ClearRequiredValueError,
  NotNavigableError,
  NoSuchElementError,
  IntegrityError,
  MissingDefaultError,
  DuplicateElementError,
  InvalidValueError,
  UnrelatedConfigurationsError,
  ConfigurableNotRegisteredError,
  VisitationError,
  SerializationError,
  ErrorCodes,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Visitation
export { visit, visitWithoutBegin } from './visitation/visit.js';
export { ConfigurationReader, readConfiguration } from './visitation/reader.js';
export type { ConfigurationVisitor } from './visitation/visitor.js';
export type { ConfigurationVisitable, VisitableElement } from './visitation/visitable.js';

// Serialization
export { ConfigurationTypeRegistry, SerializedConfigurationSchema } from './serialization/types.js';
export type { SerializedConfiguration } from './serialization/types.js';
export { ObjectWriter } from './serialization/object-writer.js';
export { ObjectSource } from './serialization/object-source.js';
export { toObject, fromObject, toYaml, fromYaml } from './serialization/yaml.js';

// Utils
export { ifNotAbsent } from './utils/if-not-absent.js';
export type { Otherwise } from './utils/if-not-absent.js';
export { commonElementNames } from './utils/common-elements.js';
export { ABSENT, present } from './utils/optional.js';
export type { Optional } from './utils/optional.js';

// Settings & observability
export {
  Settings,
  createLogger,
  getLogger,
  setLogger,
  resetLogger,
  ENV_LOG_LEVEL,
  ENV_LOG_FORMAT,
} from './settings.js';
export { Logger, isLogLevel, isLogFormat } from './observability/logger.js';
export type { LogLevel, LogFormat, LoggerOptions, WritableOutput } from './observability/logger.js';

export const VERSION = '0.1.0';
