/* Planner
 *
 * Turns a requested flag combination into an execution plan. Responsibilities:
 *  - Select every binding owning a requested trigger bit.
 *  - Pull in dependencies transitively, whether requested or not. Each bit of a
 *    `dependsOn` mask must be owned by some binding; a composite mask is only
 *    satisfied once every owning binding has run.
 *  - Detect dependency cycles over the pulled-in graph (a binding depending on
 *    its own trigger included) and throw `CircularDependencyError` naming the
 *    flags along the cycle.
 *  - Order the bindings topologically. Among bindings that are ready at the same
 *    time the one registered first wins, so plans are stable across runs.
 *
 * Nothing here executes a handler or mutates the registry; `build` plans first
 * and only then hands the ordered list to the Executor, so cycle and
 * unknown-flag failures never leave a partially written result.
 */

import { CircularDependencyError, UnknownFlagError } from '../errors/errors.js';
import type { HandlerBinding } from './binding.js';
import { bitsOf, NONE, type Flag } from './flag-space.js';
import type { HandlerRegistry } from './registry.js';

/**
 * Ordered bindings plus the effective flags they were planned for.
 *
 * `flags` is the request widened with every dependency flag pulled in; the
 * executor merges a multi-output slot only when its trigger is in `flags`.
 */
export interface ExecutionPlan {
  readonly bindings: readonly HandlerBinding[];
  readonly flags: Flag;
}

const byId = (a: HandlerBinding, b: HandlerBinding): number => a.id - b.id;

export class Planner {
  constructor(private readonly registry: HandlerRegistry) {}

  /**
   * Build the execution plan for `requested`.
   *
   * @throws UnknownFlagError when `requested` has bits outside the flag space or
   *         a dependency names a flag no binding owns
   * @throws CircularDependencyError when the selected bindings form a cycle
   */
  plan(requested: Flag): ExecutionPlan {
    const nodes = this.resolve(this.select(requested));
    return {
      bindings: this.order(nodes),
      flags: this.effectiveFlags(requested, nodes),
    };
  }

  /**
   * `requested` widened with the transitive dependency flags of every selected
   * binding. Bindings are not ordered.
   */
  expand(requested: Flag): Flag {
    return this.effectiveFlags(requested, this.resolve(this.select(requested)));
  }

  /**
   * Transitive dependency flag of the binding that owns `flag`.
   *
   * @throws UnknownFlagError when no binding owns `flag`
   */
  dependencyFlagOf(flag: Flag): Flag {
    const owner = this.registry.ownerOf(flag);
    if (!owner) {
      throw new UnknownFlagError(flag, this.registeredNames());
    }
    let mask = NONE;
    for (const binding of this.resolve([owner])) mask |= binding.dependsOn;
    return mask;
  }

  /**
   * Bindings owning a trigger bit set in `requested`, in registration order.
   */
  select(requested: Flag): HandlerBinding[] {
    this.assertInSpace(requested);
    return this.registry.bindings().filter((b) => (this.registry.ownedMask(b) & requested) !== 0);
  }

  /**
   * Distinct bindings `binding` depends on, in registration order.
   */
  dependenciesOf(binding: HandlerBinding): HandlerBinding[] {
    const out = new Set<HandlerBinding>();
    for (const bit of bitsOf(binding.dependsOn)) {
      const owner = this.registry.ownerOf(bit);
      if (!owner) {
        throw new UnknownFlagError(
          this.registry.space.nameOf(bit),
          this.registeredNames(),
          binding.label
        );
      }
      out.add(owner);
    }
    return [...out].sort(byId);
  }

  // ---- internals ----

  /**
   * Closure of `seeds` over dependency edges, checked for cycles.
   */
  private resolve(seeds: readonly HandlerBinding[]): HandlerBinding[] {
    const nodes = new Set<HandlerBinding>();
    const pending = [...seeds];
    while (pending.length > 0) {
      const next = pending.pop();
      if (!next || nodes.has(next)) continue;
      nodes.add(next);
      pending.push(...this.dependenciesOf(next));
    }
    const sorted = [...nodes].sort(byId);
    this.assertAcyclic(sorted);
    return sorted;
  }

  /**
   * Depth-first walk with an explicit stack. Reaching a binding that is still on
   * the stack closes a cycle; the reported cycle starts and ends at that binding.
   */
  private assertAcyclic(nodes: readonly HandlerBinding[]): void {
    const done = new Set<HandlerBinding>();
    const stack: HandlerBinding[] = [];

    const visit = (binding: HandlerBinding): void => {
      if (done.has(binding)) return;
      const at = stack.indexOf(binding);
      if (at >= 0) {
        const cycle = stack.slice(at).concat(binding);
        throw new CircularDependencyError(cycle.map((b) => this.describeBinding(b)));
      }
      stack.push(binding);
      for (const dep of this.dependenciesOf(binding)) visit(dep);
      stack.pop();
      done.add(binding);
    };

    for (const node of nodes) visit(node);
  }

  /**
   * Kahn's algorithm, always taking the ready binding with the lowest
   * registration id. Callers have already rejected cycles.
   */
  private order(nodes: readonly HandlerBinding[]): HandlerBinding[] {
    const remaining = new Map<HandlerBinding, number>();
    const dependents = new Map<HandlerBinding, HandlerBinding[]>();

    for (const node of nodes) {
      const deps = this.dependenciesOf(node);
      remaining.set(node, deps.length);
      for (const dep of deps) {
        const list = dependents.get(dep);
        if (list) list.push(node);
        else dependents.set(dep, [node]);
      }
    }

    const ready = nodes.filter((n) => remaining.get(n) === 0);
    const ordered: HandlerBinding[] = [];

    while (ready.length > 0) {
      let pick = 0;
      for (let i = 1; i < ready.length; i++) {
        if (ready[i].id < ready[pick].id) pick = i;
      }
      const [next] = ready.splice(pick, 1);
      ordered.push(next);

      for (const dependent of dependents.get(next) ?? []) {
        const left = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, left);
        if (left === 0) ready.push(dependent);
      }
    }

    return ordered;
  }

  private effectiveFlags(requested: Flag, nodes: readonly HandlerBinding[]): Flag {
    let flags = requested;
    for (const node of nodes) flags |= node.dependsOn;
    return flags;
  }

  private assertInSpace(flags: Flag): void {
    if (!this.registry.space.contains(flags)) {
      throw new UnknownFlagError(flags, [...this.registry.space.names]);
    }
  }

  private registeredNames(): string[] {
    return this.registry.space.describe(this.registry.registeredFlags);
  }

  private describeBinding(binding: HandlerBinding): string {
    return this.registry.space.describe(this.registry.ownedMask(binding)).join('|');
  }
}
