/**
 * Inflation of flat `a.b.c=value` configuration into nested mappings.
 *
 * @module git/inflate
 */

import { ConfigTypeError } from '../errors';

export interface ConfigTree {
  [key: string]: string | ConfigTree;
}

export interface InflateOptions {
  /** Key segment separator (default "."). */
  separator?: string;
  /** Levels to inflate; -1 means unlimited, 0 leaves keys untouched. */
  depth?: number;
}

function assign(tree: ConfigTree, key: string, value: string, fullKey: string, separator: string, depth: number): void {
  const at = key.indexOf(separator);
  if (depth === 0 || at === -1) {
    tree[key] = value;
    return;
  }
  const head = key.slice(0, at);
  const tail = key.slice(at + separator.length);
  const existing = Object.hasOwn(tree, head) ? tree[head] : undefined;
  if (typeof existing === 'string') {
    throw new ConfigTypeError(fullKey);
  }
  const child: ConfigTree = existing ?? {};
  tree[head] = child;
  assign(child, tail, value, fullKey, separator, depth < 0 ? -1 : depth - 1);
}

/**
 * Inflates a flat key/value mapping.
 *
 * Keys are sorted first, so a scalar (`section`) is always assigned before
 * a nested key under it (`section.key`), and the collision throws instead
 * of one value silently replacing the other.
 *
 * @throws ConfigTypeError when a nested key lands on a scalar.
 */
export function inflateConfig(flat: ReadonlyMap<string, string>, options: InflateOptions = {}): ConfigTree {
  const separator = options.separator ?? '.';
  const depth = options.depth ?? -1;
  const entries = [...flat.entries()];
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const tree: ConfigTree = {};
  for (const [key, value] of entries) {
    assign(tree, key, value, key, separator, depth);
  }
  return tree;
}
