/* Executor
 *
 * Runs an ExecutionPlan against a result structure, one binding at a time, on
 * the caller's stack. Responsibilities:
 *  - Assemble arguments: the build arguments, with the result structure first
 *    when the build asked for it or the binding has dependencies. A structure
 *    that is already among the arguments is not passed a second time.
 *  - Invoke the handler. Handler exceptions propagate untouched; whatever ran
 *    before the failure has already been merged.
 *  - Merge the return value:
 *      key present  -> result[key] = value
 *      key absent   -> value must be a plain mapping, merged key by key
 *      multi-output -> value must be an array with one entry per trigger;
 *                      slot i is merged (by the two rules above) only if its
 *                      trigger is in the plan's flags and still owned by this
 *                      binding
 *    Later writes overwrite earlier ones, in execution order.
 *  - Report each call's duration to the registry's onExecute hook, if any.
 */

import { InvalidHandlerResultError } from '../errors/errors.js';
import type { BuildResult } from '../types/types.js';
import { slotsOf, type HandlerBinding } from './binding.js';
import type { ExecutionPlan } from './planner.js';
import type { HandlerRegistry } from './registry.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for the instrumentation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

export interface ExecuteOptions {
  args: readonly unknown[];
  passStructure: boolean;
}

/**
 * Plain object (prototype `Object.prototype` or `null`). Maps, dates, arrays and
 * class instances are not mappings.
 */
export function isMapping(value: unknown): value is BuildResult {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export class Executor {
  constructor(private readonly registry: HandlerRegistry) {}

  /**
   * Execute every binding of `plan` in order, writing into `result`.
   */
  execute(plan: ExecutionPlan, result: BuildResult, options: ExecuteOptions): void {
    for (const binding of plan.bindings) {
      const value = this.invoke(binding, this.argumentsFor(binding, result, options));
      this.merge(binding, value, result, plan.flags);
    }
  }

  private argumentsFor(
    binding: HandlerBinding,
    result: BuildResult,
    { args, passStructure }: ExecuteOptions
  ): unknown[] {
    const wantsStructure = passStructure || binding.dependsOn !== 0;
    if (wantsStructure && !args.includes(result)) return [result, ...args];
    return [...args];
  }

  private invoke(binding: HandlerBinding, args: unknown[]): unknown {
    const hook = this.registry.getExecuteHook();
    if (!hook) return Reflect.apply(binding.handler, undefined, args);

    const start = nowMs();
    try {
      return Reflect.apply(binding.handler, undefined, args);
    } finally {
      hook(binding.label, toNs(nowMs() - start));
    }
  }

  private merge(binding: HandlerBinding, value: unknown, result: BuildResult, flags: number): void {
    if (binding.kind === 'single') {
      this.mergeSlot(binding, binding.key, value, result);
      return;
    }

    if (!Array.isArray(value) || value.length !== binding.triggers.length) {
      throw new InvalidHandlerResultError(
        binding.label,
        `an array of ${binding.triggers.length} values`,
        value
      );
    }
    const values: readonly unknown[] = value;

    for (const slot of slotsOf(binding)) {
      if ((flags & slot.trigger) === 0) continue;
      if (this.registry.ownerOf(slot.trigger) !== binding) continue;
      this.mergeSlot(binding, slot.key, values[slot.index], result);
    }
  }

  private mergeSlot(
    binding: HandlerBinding,
    key: string | undefined,
    value: unknown,
    result: BuildResult
  ): void {
    if (key !== undefined) {
      result[key] = value;
      return;
    }
    if (!isMapping(value)) {
      throw new InvalidHandlerResultError(binding.label, 'a mapping to merge', value);
    }
    Object.assign(result, value);
  }
}
