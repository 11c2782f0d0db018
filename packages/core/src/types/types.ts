import type { Flag } from '../core/flag-space.js';

/**
 * Result structure written by a build: an open mapping from key to value.
 */
export type BuildResult = Record<string, unknown>;

/**
 * Registered callable. The engine never inspects its parameters; it passes the
 * build arguments (and, when required, the result structure first).
 */
export type Handler = (...args: never[]) => unknown;

/**
 * What happens when a trigger flag is registered a second time.
 * - 'error' (default): throw DuplicateTriggerError and keep the first binding.
 * - 'warn': the latest registration takes the flag over; a warning is logged.
 * - 'replace': the latest registration takes the flag over silently.
 */
export type DuplicatePolicy = 'error' | 'warn' | 'replace';

/**
 * Minimal logging surface used by the registry. `console` satisfies it.
 */
export interface RegistryLogger {
  warn: (message: string) => void;
}

/**
 * Registry configuration passed to the constructor.
 */
export interface RegistryConfig {
  /**
   * Name used in error messages and warnings.
   *
   * @default 'HandlerRegistry'
   */
  name?: string;

  /**
   * Policy for a trigger flag that is already bound.
   *
   * @default 'error'
   */
  duplicatePolicy?: DuplicatePolicy;

  /**
   * Destination for registry warnings.
   *
   * @default console
   */
  logger?: RegistryLogger;

  /**
   * Optional hook invoked after every handler call, including calls that throw.
   *
   * Receives the binding label and the call duration in nanoseconds.
   */
  onExecute?: (label: string, durationNs: number) => void;
}

/**
 * Registration metadata for one binding.
 *
 * A single `flag` makes a single-output binding; an array of flags makes a
 * multi-output binding whose handler returns one value per flag, positionally
 * aligned with `key`.
 */
export interface RegisterOptions {
  flag: Flag | readonly Flag[];

  /**
   * Output key(s). Omitted (or an `undefined` slot) means the returned value is
   * a mapping merged key by key into the result.
   */
  key?: string | readonly (string | undefined)[];

  /**
   * Flag(s) whose handlers must run first. Several flags are OR-ed together.
   */
  dependsOn?: Flag | readonly Flag[];

  /** Name shown in messages; defaults to the handler's function name. */
  label?: string;
}

/**
 * Options for a single build.
 */
export interface BuildOptions<T extends BuildResult = BuildResult> {
  /** Pass-through arguments given to every handler. */
  args?: readonly unknown[];

  /** Structure to mutate in place instead of a fresh `{}`. */
  startWith?: T;

  /**
   * Pass the result structure as the first argument to every handler, not only
   * to handlers with dependencies.
   *
   * @default false
   */
  passStructure?: boolean;
}
