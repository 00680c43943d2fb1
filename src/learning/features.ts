/**
 * @fileoverview Feature unification and encoding
 *
 * Feature documents expose `invoked_before` / `invoked_after` maps from a
 * function name to whether it was called before/after the target call. Keys
 * differ between traces, so they are first unified across the pool and then
 * every document is encoded as a 0/1 vector over the unified keys.
 */

import type { JsonValue } from '../storage/types.js';
import { isJsonObject } from '../utils/safe_json.js';
import { compareNames } from '../storage/fs_walk.js';

export const FEATURE_GROUPS = ['invoked_before', 'invoked_after'] as const;
export type FeatureGroup = (typeof FEATURE_GROUPS)[number];

export type UnifiedFeatureKeys = Record<FeatureGroup, string[]>;

function groupOf(document: JsonValue, group: FeatureGroup): Record<string, JsonValue> {
  if (!isJsonObject(document)) return {};
  const value = document[group];
  return isJsonObject(value) ? value : {};
}

/** Sorted union of the keys every document exposes, per group */
export function unifyFeatures(documents: readonly JsonValue[]): UnifiedFeatureKeys {
  const collect = (group: FeatureGroup): string[] => {
    const keys = new Set<string>();
    for (const document of documents) {
      for (const key of Object.keys(groupOf(document, group))) keys.add(key);
    }
    return [...keys].sort(compareNames);
  };
  return { invoked_before: collect('invoked_before'), invoked_after: collect('invoked_after') };
}

function truthy(value: JsonValue | undefined): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return false;
}

/** 0/1 vector: `invoked_before` keys first, then `invoked_after` keys */
export function encodeFeature(document: JsonValue, unified: UnifiedFeatureKeys): number[] {
  const vector: number[] = [];
  for (const group of FEATURE_GROUPS) {
    const values = groupOf(document, group);
    for (const key of unified[group]) {
      vector.push(truthy(values[key]) ? 1 : 0);
    }
  }
  return vector;
}
