import type { FlagSpace } from '../core/flag-space.js';
import { HandlerRegistry } from '../core/registry.js';
import type { RegistryConfig } from '../types/types.js';

/**
 * Per-space default registries, keyed weakly so an unused flag space can be collected.
 */
type DefaultStore = WeakMap<FlagSpace, HandlerRegistry>;

/**
 * Global symbol for storing the default registries on globalThis.
 *
 * This ensures a single store per process, even if the module is bundled
 * multiple times (e.g., in monorepos or microfrontends).
 */
const GLOBAL_SYMBOL = Symbol.for('capflag.defaultRegistries');

function createStore(): DefaultStore {
  return new WeakMap();
}

/**
 * Ensure the global store exists, replacing anything foreign found under the symbol.
 */
function ensureStore(): DefaultStore {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (existing instanceof WeakMap) return existing;
  const fresh = createStore();
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

/**
 * Process-wide registry for `space`, created on first use.
 *
 * Entirely optional: nothing in the engine reads it. `config` only applies when
 * the registry is created.
 *
 * @example
 * ```typescript
 * const FLAGS = defineFlags('BASE', 'TAGS');
 * getDefaultRegistry(FLAGS).register({ flag: FLAGS.flags.TAGS, key: 'tags' }, listTags);
 * ```
 */
export function getDefaultRegistry(space: FlagSpace, config?: RegistryConfig): HandlerRegistry {
  const store = ensureStore();
  let registry = store.get(space);
  if (!registry) {
    registry = new HandlerRegistry(space, config);
    store.set(space, registry);
  }
  return registry;
}

/**
 * Drop every default registry.
 *
 * ⚠️ Intended for test environments; handlers registered at module load are lost.
 */
export function resetDefaultRegistries(): void {
  Reflect.set(globalThis, GLOBAL_SYMBOL, createStore());
}
