import type { AttributeKey, TagName } from "./tokens.js";
import type { NestedRegistry, PolicyState } from "./types.js";

/** Mutable form of {@link NestedRegistry}, owned by the builder */
export type MutableNestedRegistry<V> = Map<TagName, Map<AttributeKey, Set<V>>>;

/**
 * Union `values` into registry[tag][key], creating the intermediate map
 * and set on first use.
 */
export function addNested<V>(
  registry: MutableNestedRegistry<V>,
  tag: TagName,
  key: AttributeKey,
  values: readonly V[],
): void {
  let byKey = registry.get(tag);
  if (!byKey) {
    byKey = new Map();
    registry.set(tag, byKey);
  }
  let set = byKey.get(key);
  if (!set) {
    set = new Set();
    byKey.set(key, set);
  }
  for (const value of values) {
    set.add(value);
  }
}

/**
 * Remove `values` from registry[tag][key]. An emptied set is deleted, then
 * an emptied tag map, so no empty container is ever left behind.
 */
export function removeNested<V>(
  registry: MutableNestedRegistry<V>,
  tag: TagName,
  key: AttributeKey,
  values: readonly V[],
): void {
  const byKey = registry.get(tag);
  const set = byKey?.get(key);
  if (!byKey || !set) return;

  for (const value of values) {
    set.delete(value);
  }
  if (set.size === 0) {
    byKey.delete(key);
    if (byKey.size === 0) {
      registry.delete(tag);
    }
  }
}

export function lookupNested<V>(
  registry: NestedRegistry<V>,
  tag: TagName,
  key: AttributeKey,
): ReadonlySet<V> | undefined {
  return registry.get(tag)?.get(key);
}

export function cloneNested<V>(registry: NestedRegistry<V>): MutableNestedRegistry<V> {
  const copy: MutableNestedRegistry<V> = new Map();
  for (const [tag, byKey] of registry) {
    const keyCopy = new Map<AttributeKey, Set<V>>();
    for (const [key, set] of byKey) {
      keyCopy.set(key, new Set(set));
    }
    copy.set(tag, keyCopy);
  }
  return copy;
}

export function cloneSetMap<K, V>(map: ReadonlyMap<K, ReadonlySet<V>>): Map<K, Set<V>> {
  const copy = new Map<K, Set<V>>();
  for (const [key, set] of map) {
    copy.set(key, new Set(set));
  }
  return copy;
}

export function cloneMapMap<K, K2, V>(map: ReadonlyMap<K, ReadonlyMap<K2, V>>): Map<K, Map<K2, V>> {
  const copy = new Map<K, Map<K2, V>>();
  for (const [key, inner] of map) {
    copy.set(key, new Map(inner));
  }
  return copy;
}

/** Deep copy of every registry; the copy shares no Set or Map with `state` */
export function cloneState(state: PolicyState): PolicyState {
  return {
    tags: new Set(state.tags),
    attributes: cloneSetMap(state.attributes),
    enforcedAttributes: cloneMapMap(state.enforcedAttributes),
    protocols: cloneNested(state.protocols),
    domains: cloneNested(state.domains),
    preserveRelativeLinks: state.preserveRelativeLinks,
  };
}
