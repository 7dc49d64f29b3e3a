/**
 * named-model — Accessors
 *
 * Lookup, insert and remove by name. Every lookup returns the first match;
 * nothing here enforces unique names.
 */

import type { NamedConfig, TrustAnchors, View, Zone } from './types';
import type { EncodeOptions } from './encoder';
import { apply, MissingTreeError } from './encoder';
import { linkedTree } from './tree-link';

function upsertByName<T extends { name: string }>(items: T[], item: T): void {
  const index = items.findIndex(existing => existing.name === item.name);
  if (index === -1) items.push(item);
  else items[index] = item;
}

function removeByName<T extends { name: string }>(items: T[], name: string): boolean {
  let removed = false;
  for (let i = items.length - 1; i >= 0; i--) {
    if (items[i].name === name) {
      items.splice(i, 1);
      removed = true;
    }
  }
  return removed;
}

/** The first zone called `name`, top-level zones first, then each view's. */
export function getZone(config: NamedConfig, name: string): Zone | undefined {
  const top = config.zones.find(zone => zone.name === name);
  if (top) return top;

  for (const view of config.views) {
    const zone = view.zones.find(candidate => candidate.name === name);
    if (zone) return zone;
  }
  return undefined;
}

/** Replace the top-level zone with the same name, or append it. */
export function upsertZone(config: NamedConfig, zone: Zone): void {
  upsertByName(config.zones, zone);
}

/** Remove every top-level zone called `name`. */
export function removeZone(config: NamedConfig, name: string): boolean {
  return removeByName(config.zones, name);
}

export function findView(config: NamedConfig, name: string): View | undefined {
  return config.views.find(view => view.name === name);
}

export function upsertView(config: NamedConfig, view: View): void {
  upsertByName(config.views, view);
}

export function removeView(config: NamedConfig, name: string): boolean {
  return removeByName(config.views, name);
}

/** Set `options.recursion`, creating the options block when absent. */
export function setRecursion(config: NamedConfig, recursion: boolean): void {
  config.options ??= { other: [] };
  config.options.recursion = recursion;
}

/** Replace or append a zone inside a view, creating the view when absent. */
export function upsertZoneInView(config: NamedConfig, viewName: string, zone: Zone): void {
  const view = findView(config, viewName);
  if (!view) {
    config.views.push({ name: viewName, zones: [zone], includes: [] });
    return;
  }
  upsertByName(view.zones, zone);
}

export function removeZoneInView(config: NamedConfig, viewName: string, zoneName: string): boolean {
  const view = findView(config, viewName);
  return view ? removeByName(view.zones, zoneName) : false;
}

/** Set a view's trust anchors, creating the view when absent. */
export function setTrustAnchorsInView(config: NamedConfig, viewName: string, anchors: TrustAnchors): void {
  const view = findView(config, viewName);
  if (!view) {
    config.views.push({ name: viewName, trustAnchors: anchors, zones: [], includes: [] });
    return;
  }
  view.trustAnchors = anchors;
}

/**
 * Encode the config into the tree it was loaded from and save that tree.
 *
 * @throws {MissingTreeError} when the config did not come from loadConfig()
 */
export async function saveConfig(config: NamedConfig, path: string, options: EncodeOptions = {}): Promise<void> {
  const tree = linkedTree(config);
  if (!tree) throw new MissingTreeError();

  apply(config, tree, options);
  await tree.save(path);
}
