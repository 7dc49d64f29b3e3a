import type { ConfTree } from './cst';
import type { NamedConfig } from './types';

// A config never keeps its tree alive.
const trees = new WeakMap<NamedConfig, ConfTree>();

export function linkTree(config: NamedConfig, tree: ConfTree): void {
  trees.set(config, tree);
}

export function linkedTree(config: NamedConfig): ConfTree | undefined {
  return trees.get(config);
}
