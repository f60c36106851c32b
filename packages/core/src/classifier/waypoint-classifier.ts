/**
 * Waypoint name classification
 *
 * Matching is a plain substring test on the case-folded name. There is no
 * word-boundary check: `pool` matches "Carpool Lot".
 */

import type { ColorRule, ColorRules } from './color-rules.js';

/**
 * Find the first rule whose keyword occurs in the name
 *
 * @param name - Waypoint display name (empty or missing never matches)
 * @param rules - Ordered rule table
 */
export function findMatchingRule(
  name: string | undefined,
  rules: ColorRules,
): ColorRule | undefined {
  if (!name) {
    return undefined;
  }

  const folded = name.toLowerCase();
  for (const rule of rules) {
    if (folded.includes(rule.keyword.toLowerCase())) {
      return rule;
    }
  }
  return undefined;
}

/**
 * Map a waypoint name to the color of its first matching rule
 *
 * @returns The ARGB color code, or undefined when no keyword occurs
 */
export function classifyWaypointName(
  name: string | undefined,
  rules: ColorRules,
): string | undefined {
  return findMatchingRule(name, rules)?.color;
}
