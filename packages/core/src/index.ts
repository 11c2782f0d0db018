export {
  bitsOf,
  defineFlags,
  FlagSpace,
  isSingleBit,
  MAX_FLAGS,
  NONE,
  type Flag,
  type FlagMembers,
} from './core/flag-space.js';
export { HandlerRegistry } from './core/registry.js';
export { getDefaultRegistry, resetDefaultRegistries } from './registry/default-registry.js';

export type {
  BindingHandle,
  BindingSlot,
  HandlerBinding,
  MultiBinding,
  SingleBinding,
} from './core/binding.js';
export type {
  BuildOptions,
  BuildResult,
  DuplicatePolicy,
  Handler,
  RegisterOptions,
  RegistryConfig,
  RegistryLogger,
} from './types/types.js';

// Errors
export {
  CircularDependencyError,
  ConfigurationError,
  DuplicateTriggerError,
  InvalidHandlerResultError,
  UnknownFlagError,
} from './errors/errors.js';
