/*
 * HandlerBinding
 * --------------
 * Frozen association between trigger flag(s), dependency flags, output key(s)
 * and a handler. Two kinds, chosen at registration:
 *
 *  - single: one trigger bit, an optional key. The handler's return value is
 *    stored under the key, or merged key by key when there is none.
 *  - multi:  parallel trigger/key lists. The handler returns an array and slot i
 *    belongs to triggers[i] / keys[i].
 *
 * Bindings are validated here once, so the planner and executor can trust them.
 */
import { ConfigurationError, UnknownFlagError } from '../errors/errors.js';
import type { Handler, RegisterOptions } from '../types/types.js';
import { isSingleBit, NONE, type Flag, type FlagSpace } from './flag-space.js';

interface BindingBase {
  /** Registration sequence number; lower runs first when unconstrained. */
  readonly id: number;
  readonly label: string;
  /** OR of every trigger declared at registration. */
  readonly triggerMask: Flag;
  /** OR of every dependency flag. */
  readonly dependsOn: Flag;
  readonly handler: Handler;
}

export interface SingleBinding extends BindingBase {
  readonly kind: 'single';
  readonly trigger: Flag;
  readonly key?: string;
}

export interface MultiBinding extends BindingBase {
  readonly kind: 'multi';
  readonly triggers: readonly Flag[];
  readonly keys: readonly (string | undefined)[];
}

export type HandlerBinding = SingleBinding | MultiBinding;

/**
 * What `register` hands back: the frozen binding itself.
 */
export type BindingHandle = HandlerBinding;

/**
 * One positional output of a binding.
 */
export interface BindingSlot {
  readonly index: number;
  readonly trigger: Flag;
  readonly key: string | undefined;
}

export function triggersOf(binding: HandlerBinding): readonly Flag[] {
  return binding.kind === 'single' ? [binding.trigger] : binding.triggers;
}

export function slotsOf(binding: HandlerBinding): BindingSlot[] {
  if (binding.kind === 'single') {
    return [{ index: 0, trigger: binding.trigger, key: binding.key }];
  }
  return binding.triggers.map((trigger, index) => ({
    index,
    trigger,
    key: binding.keys[index],
  }));
}

function assertTrigger(space: FlagSpace, flag: Flag, at: string, label: string): void {
  if (!isSingleBit(flag)) {
    throw new ConfigurationError(`${at} of '${label}' must be exactly one flag bit, got ${flag}`);
  }
  if (!space.contains(flag)) {
    throw new UnknownFlagError(flag, [...space.names], label);
  }
}

function assertKey(key: unknown, at: string, label: string): asserts key is string | undefined {
  if (key !== undefined && (typeof key !== 'string' || key.length === 0)) {
    throw new ConfigurationError(`${at} of '${label}' must be a non-empty string or undefined`);
  }
}

function combineDependencies(
  space: FlagSpace,
  dependsOn: RegisterOptions['dependsOn'],
  label: string
): Flag {
  if (dependsOn === undefined) return NONE;
  const list: readonly Flag[] = typeof dependsOn === 'number' ? [dependsOn] : dependsOn;
  let mask = NONE;
  for (const flag of list) {
    if (!Number.isInteger(flag) || flag < 0) {
      throw new ConfigurationError(`dependsOn of '${label}' must hold flag values, got ${flag}`);
    }
    if (!space.contains(flag)) {
      throw new UnknownFlagError(flag, [...space.names], label);
    }
    mask |= flag;
  }
  return mask;
}

/**
 * Validate registration metadata and build a frozen binding.
 *
 * @throws ConfigurationError for malformed triggers, keys, or mismatched lists
 * @throws UnknownFlagError for flags outside the space
 */
export function createBinding(
  space: FlagSpace,
  id: number,
  options: RegisterOptions,
  handler: Handler
): HandlerBinding {
  if (typeof handler !== 'function') {
    throw new ConfigurationError(`handler #${id} must be a function`);
  }
  const label = options.label ?? (handler.name || `handler#${id}`);
  const dependsOn = combineDependencies(space, options.dependsOn, label);
  const { flag, key } = options;

  if (typeof flag === 'number') {
    if (key !== undefined && typeof key !== 'string') {
      throw new ConfigurationError(
        `'${label}' has a single trigger flag and takes a single key, got ${key.length} keys`
      );
    }
    assertTrigger(space, flag, 'flag', label);
    assertKey(key, 'key', label);
    const single: SingleBinding = {
      kind: 'single',
      id,
      label,
      trigger: flag,
      key,
      triggerMask: flag,
      dependsOn,
      handler,
    };
    return Object.freeze(single);
  }

  if (flag.length === 0) {
    throw new ConfigurationError(`'${label}' must declare at least one trigger flag`);
  }
  if (typeof key === 'string') {
    throw new ConfigurationError(
      `'${label}' has ${flag.length} trigger flags and needs a key list of the same length`
    );
  }
  const keys: readonly (string | undefined)[] = key ?? flag.map(() => undefined);
  if (keys.length !== flag.length) {
    throw new ConfigurationError(
      `'${label}' declares ${flag.length} trigger flags but ${keys.length} keys`
    );
  }

  let triggerMask = NONE;
  flag.forEach((trigger, i) => {
    assertTrigger(space, trigger, `flag[${i}]`, label);
    assertKey(keys[i], `key[${i}]`, label);
    if (triggerMask & trigger) {
      throw new ConfigurationError(`'${label}' lists flag '${space.nameOf(trigger)}' twice`);
    }
    triggerMask |= trigger;
  });

  const multi: MultiBinding = {
    kind: 'multi',
    id,
    label,
    triggers: Object.freeze([...flag]),
    keys: Object.freeze([...keys]),
    triggerMask,
    dependsOn,
    handler,
  };
  return Object.freeze(multi);
}
