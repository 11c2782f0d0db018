/*
 * HandlerRegistry: binding table plus the build entry point.
 *
 * Registration stores frozen bindings and tracks which binding owns each trigger
 * bit. No dependency validation happens here: dependencies may be registered in
 * any order, so cycles and dangling `dependsOn` flags surface at build time.
 *
 * `build` never mutates the registry. Planning (selection, dependency closure,
 * cycle detection, ordering) is delegated to Planner; running handlers and
 * merging their output is delegated to Executor.
 */
import { ConfigurationError, DuplicateTriggerError } from '../errors/errors.js';
import type {
  BuildOptions,
  BuildResult,
  DuplicatePolicy,
  Handler,
  RegisterOptions,
  RegistryConfig,
  RegistryLogger,
} from '../types/types.js';
import { createBinding, triggersOf, type BindingHandle, type HandlerBinding } from './binding.js';
import { Executor } from './executor.js';
import { NONE, type Flag, type FlagSpace } from './flag-space.js';
import { Planner } from './planner.js';

const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = ['error', 'warn', 'replace'];

const LOG_PREFIX = '[capflag]';

export class HandlerRegistry {
  readonly space: FlagSpace;
  readonly name: string;

  // Bindings in registration order. A binding stays here while it owns at
  // least one trigger bit.
  private entries: HandlerBinding[] = [];
  private readonly owners = new Map<Flag, HandlerBinding>();
  private nextId = 0;

  private readonly duplicatePolicy: DuplicatePolicy;
  private readonly logger: RegistryLogger;
  private readonly executeHook?: (label: string, durationNs: number) => void;

  private readonly planner: Planner;
  private readonly executor: Executor;

  constructor(space: FlagSpace, config: RegistryConfig = {}) {
    const cfg = this._validateConfig(config);
    this.space = space;
    this.name = cfg.name;
    this.duplicatePolicy = cfg.duplicatePolicy;
    this.logger = cfg.logger;
    this.executeHook = cfg.onExecute;
    this.planner = new Planner(this);
    this.executor = new Executor(this);
  }

  /**
   * Register a handler for one or more trigger flags.
   *
   * @returns The frozen binding
   * @throws ConfigurationError for malformed metadata
   * @throws UnknownFlagError for flags outside the space
   * @throws DuplicateTriggerError when a trigger is already bound and the
   *         duplicate policy is 'error'
   *
   * @example
   * ```typescript
   * registry.register({ flag: FLAGS.flags.LISTENERS, key: 'listeners' }, getListeners);
   * registry.register(
   *   { flag: FLAGS.flags.RULES, dependsOn: FLAGS.flags.LISTENERS, key: 'rules' },
   *   (alb: { listeners: Listener[] }) => alb.listeners.map(describeRules)
   * );
   * ```
   */
  register(options: RegisterOptions, handler: Handler): BindingHandle {
    const binding = createBinding(this.space, this.nextId, options, handler);
    const triggers = triggersOf(binding);

    for (const trigger of triggers) {
      const existing = this.owners.get(trigger);
      if (!existing) continue;
      const flagName = this.space.nameOf(trigger);
      if (this.duplicatePolicy === 'error') {
        throw new DuplicateTriggerError(flagName, existing.label, binding.label, this.name);
      }
      if (this.duplicatePolicy === 'warn') {
        this.logger.warn(
          `${LOG_PREFIX} Flag '${flagName}' in '${this.name}' rebound from '${existing.label}' to '${binding.label}'.`
        );
      }
    }

    this.nextId++;
    this.entries.push(binding);
    for (const trigger of triggers) this.owners.set(trigger, binding);
    this.entries = this.entries.filter((b) => this.ownedMask(b) !== NONE);
    return binding;
  }

  /**
   * Curried registration: returns a function that registers the handler it is
   * given and hands that same handler back.
   *
   * @example
   * ```typescript
   * const getLifecycle = registry.handler({ flag: FLAGS.flags.LIFECYCLE, key: 'lifecycle' })(
   *   (bucket: string) => fetchLifecycle(bucket)
   * );
   * ```
   */
  handler(options: RegisterOptions): <H extends Handler>(fn: H) => H {
    return <H extends Handler>(fn: H): H => {
      this.register(options, fn);
      return fn;
    };
  }

  /**
   * Registered bindings, in registration order.
   */
  bindings(): readonly HandlerBinding[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Binding currently bound to a single trigger bit.
   */
  ownerOf(flag: Flag): HandlerBinding | undefined {
    return this.owners.get(flag);
  }

  /**
   * Trigger bits of `binding` it still owns (a later registration may have
   * taken some over).
   */
  ownedMask(binding: HandlerBinding): Flag {
    let mask = NONE;
    for (const trigger of triggersOf(binding)) {
      if (this.owners.get(trigger) === binding) mask |= trigger;
    }
    return mask;
  }

  /**
   * OR of every bound trigger bit.
   */
  get registeredFlags(): Flag {
    let mask = NONE;
    for (const trigger of this.owners.keys()) mask |= trigger;
    return mask;
  }

  /**
   * Bindings owning any bit of `flag`, in registration order.
   */
  bindingsMatching(flag: Flag): HandlerBinding[] {
    return this.planner.select(flag);
  }

  /**
   * `requested` plus every flag its handlers transitively depend on.
   */
  expand(requested: Flag): Flag {
    return this.planner.expand(requested);
  }

  /**
   * Transitive dependency flag of the binding bound to `flag`.
   */
  dependencyFlagOf(flag: Flag): Flag {
    return this.planner.dependencyFlagOf(flag);
  }

  /**
   * The bindings `build(requested)` would run, in execution order.
   */
  plan(requested: Flag): readonly HandlerBinding[] {
    return this.planner.plan(requested).bindings;
  }

  /**
   * Select, order and execute the handlers needed for `requested`, merging their
   * output into `options.startWith` (mutated in place) or a fresh object.
   *
   * @throws UnknownFlagError for bits outside the space or dangling dependencies
   * @throws CircularDependencyError before any handler runs
   * @throws InvalidHandlerResultError when a return value cannot be merged
   * Handler exceptions propagate as thrown.
   */
  build<T extends BuildResult>(requested: Flag, options: BuildOptions<T> & { startWith: T }): T;
  build(requested: Flag, options?: BuildOptions): BuildResult;
  build(requested: Flag, options: BuildOptions = {}): BuildResult {
    const plan = this.planner.plan(requested);
    const result = options.startWith ?? {};
    this.executor.execute(plan, result, {
      args: options.args ?? [],
      passStructure: options.passStructure ?? false,
    });
    return result;
  }

  /**
   * @internal Used by Executor to instrument handler calls.
   */
  getExecuteHook(): ((label: string, durationNs: number) => void) | undefined {
    return this.executeHook;
  }

  private _validateConfig(config: RegistryConfig) {
    const duplicatePolicy = config.duplicatePolicy ?? 'error';
    if (!DUPLICATE_POLICIES.includes(duplicatePolicy)) {
      throw new ConfigurationError(
        `duplicatePolicy must be one of ${DUPLICATE_POLICIES.join(', ')}, got '${String(duplicatePolicy)}'`
      );
    }
    if (config.onExecute !== undefined && typeof config.onExecute !== 'function') {
      throw new ConfigurationError(`onExecute must be a function`);
    }
    const logger = config.logger ?? console;
    if (typeof logger.warn !== 'function') {
      throw new ConfigurationError(`logger must provide a warn(message) function`);
    }
    return {
      name: config.name ?? 'HandlerRegistry',
      duplicatePolicy,
      logger,
      onExecute: config.onExecute,
    };
  }
}
