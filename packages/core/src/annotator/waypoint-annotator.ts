/**
 * Waypoint Annotator
 *
 * Walks the waypoints of a parsed document in order and, for each name that
 * matches a rule, appends this subtree under the waypoint:
 *
 *   <extensions>
 *     <gpx><color>#AARRGGBB</color></gpx>
 *   </extensions>
 *
 * An existing <extensions> element is reused. An existing color subtree is
 * not replaced, so annotating an already colored file adds a second one.
 */

import type { GpxDocument } from '@gpx-colorizer/gpx';

import type { ColorRules } from '../classifier/color-rules.js';
import { findMatchingRule } from '../classifier/waypoint-classifier.js';

/**
 * Display name used when reporting a waypoint without a name
 */
export const UNNAMED_WAYPOINT = '[Unnamed Waypoint]';

/**
 * Element names of the color extension subtree
 */
export const COLOR_EXTENSION = {
  extensions: 'extensions',
  container: 'gpx',
  color: 'color',
} as const;

/**
 * Outcome for a single waypoint
 */
export interface WaypointColoring {
  /** 0-based position among the document's waypoints */
  index: number;
  /** Display name ([Unnamed Waypoint] when missing or empty) */
  name: string;
  /** Keyword of the rule that matched */
  keyword?: string;
  /** Color applied to the waypoint */
  color?: string;
}

/**
 * Options for annotation
 */
export interface AnnotateOptions {
  /** Called for each waypoint, in document order, after it is handled */
  onWaypoint?: (outcome: WaypointColoring) => void;
}

/**
 * Result of annotating a document
 */
export interface AnnotationResult {
  /** The input document, mutated in place */
  document: GpxDocument;
  /** Waypoints that received a color extension */
  processedCount: number;
  /** Waypoints seen */
  totalWaypoints: number;
  /** Per-waypoint outcomes in document order */
  colorings: WaypointColoring[];
}

/**
 * Append color extensions to every waypoint whose name matches a rule
 *
 * @param document - Parsed document; mutated in place
 * @param rules - Ordered rule table
 * @param options - Optional per-waypoint callback
 */
export function annotateWaypoints(
  document: GpxDocument,
  rules: ColorRules,
  options: AnnotateOptions = {},
): AnnotationResult {
  const waypoints = document.waypoints();
  const colorings: WaypointColoring[] = [];
  let processedCount = 0;

  waypoints.forEach((waypoint, index) => {
    const rawName = document.childText(waypoint, 'name');
    const name = rawName ? rawName : UNNAMED_WAYPOINT;
    const rule = rawName ? findMatchingRule(rawName, rules) : undefined;

    const outcome: WaypointColoring = { index, name };
    if (rule) {
      appendColorExtension(document, waypoint, rule.color);
      outcome.keyword = rule.keyword;
      outcome.color = rule.color;
      processedCount++;
    }

    colorings.push(outcome);
    options.onWaypoint?.(outcome);
  });

  return { document, processedCount, totalWaypoints: waypoints.length, colorings };
}

/**
 * Append a <gpx><color/></gpx> subtree under the waypoint's <extensions>,
 * creating the <extensions> element when the waypoint has none
 */
export function appendColorExtension(
  document: GpxDocument,
  waypoint: Element,
  color: string,
): Element {
  const extensions =
    document.findChild(waypoint, COLOR_EXTENSION.extensions) ??
    document.appendChild(waypoint, document.createElement(COLOR_EXTENSION.extensions));

  const container = document.createElement(COLOR_EXTENSION.container);
  document.appendChild(container, document.createElement(COLOR_EXTENSION.color, color));
  return document.appendChild(extensions, container);
}
