import { parseGpx, renderGpx, type GpxDocument } from '@gpx-colorizer/gpx';
import { gpx, loadGpxFixture } from '@gpx-colorizer/test-utils';
import { describe, it, expect, vi } from 'vitest';

import {
  annotateWaypoints,
  appendColorExtension,
  UNNAMED_WAYPOINT,
} from '../annotator/waypoint-annotator.js';
import { DEFAULT_COLOR_RULES } from '../classifier/color-rules.js';

/**
 * Colors found under each waypoint, in document order
 */
function colorsOf(doc: GpxDocument): string[][] {
  return doc.waypoints().map((wpt) => {
    const extensions = doc.findChild(wpt, 'extensions');
    if (!extensions) return [];
    return doc
      .findChildren(extensions, 'gpx')
      .map((container) => doc.childText(container, 'color') ?? '');
  });
}

describe('Waypoint Annotator', () => {
  describe('scenario', () => {
    it('colors matching waypoints and leaves the rest untouched', () => {
      const doc = parseGpx(
        gpx().waypoints('Trailhead Parking', 'Granite Peak', "Bob's House").build(),
      );

      const result = annotateWaypoints(doc, DEFAULT_COLOR_RULES);

      expect(result.processedCount).toBe(2);
      expect(result.totalWaypoints).toBe(3);
      expect(colorsOf(doc)).toEqual([['#FF737373'], ['#FF3C8C3C'], []]);
      expect(doc.findChild(doc.waypoints()[2]!, 'extensions')).toBeNull();
    });

    it('returns the same document instance', () => {
      const doc = parseGpx(gpx().waypoint('Lake View').build());
      expect(annotateWaypoints(doc, DEFAULT_COLOR_RULES).document).toBe(doc);
    });
  });

  describe('extension shape', () => {
    it('appends extensions > gpx > color at the end of the waypoint', () => {
      const doc = parseGpx(gpx().waypoint('Granite Peak').build());
      annotateWaypoints(doc, DEFAULT_COLOR_RULES);

      const output = renderGpx(doc);
      expect(output).toContain(
        '<name>Granite Peak</name>\n  <extensions><gpx><color>#FF3C8C3C</color></gpx></extensions></wpt>',
      );
    });

    it('reuses an existing extensions element and keeps its children', () => {
      const doc = parseGpx(
        gpx().waypoint({ name: 'Upper Falls', extensions: '<note>scramble</note>' }).build(),
      );
      annotateWaypoints(doc, DEFAULT_COLOR_RULES);

      const wpt = doc.waypoints()[0]!;
      expect(doc.findChildren(wpt, 'extensions')).toHaveLength(1);
      const extensions = doc.findChild(wpt, 'extensions')!;
      expect(doc.childText(extensions, 'note')).toBe('scramble');
      expect(doc.findChildren(extensions, 'gpx')).toHaveLength(1);
      expect(extensions.lastChild).toBe(doc.findChild(extensions, 'gpx'));
    });

    it('appendColorExtension creates extensions when missing', () => {
      const doc = parseGpx(gpx().waypoint('Anything').build());
      const wpt = doc.waypoints()[0]!;

      const container = appendColorExtension(doc, wpt, '#FF9B24B2');

      expect(container.localName).toBe('gpx');
      expect(doc.childText(container, 'color')).toBe('#FF9B24B2');
      expect(container.parentNode).toBe(doc.findChild(wpt, 'extensions'));
    });
  });

  describe('unnamed waypoints', () => {
    it('skips waypoints without a name or with an empty name', () => {
      const doc = parseGpx(gpx().waypoint({}).waypoint({ name: '' }).waypoint('Lake').build());

      const result = annotateWaypoints(doc, DEFAULT_COLOR_RULES);

      expect(result.processedCount).toBe(1);
      expect(colorsOf(doc)).toEqual([[], [], ['#FF249CF2']]);
      expect(result.colorings.slice(0, 2)).toEqual([
        { index: 0, name: UNNAMED_WAYPOINT },
        { index: 1, name: UNNAMED_WAYPOINT },
      ]);
    });
  });

  describe('non-matching content', () => {
    it('leaves a document without matches unchanged', () => {
      const source = loadGpxFixture('no-matches.gpx');
      const doc = parseGpx(source);
      const before = renderGpx(doc);

      const result = annotateWaypoints(doc, DEFAULT_COLOR_RULES);

      expect(result.processedCount).toBe(0);
      expect(renderGpx(doc)).toBe(before);
    });

    it('does not color route points, tracks or metadata', () => {
      const doc = parseGpx(
        gpx()
          .metadata('Lake weekend')
          .route('Camp route', [{ lat: 47, lon: -121, name: 'Creek crossing' }])
          .track('Peak track', [{ lat: 47, lon: -121 }])
          .build(),
      );

      const result = annotateWaypoints(doc, DEFAULT_COLOR_RULES);

      expect(result.totalWaypoints).toBe(0);
      expect(result.processedCount).toBe(0);
      expect(renderGpx(doc)).not.toContain('<color>');
    });
  });

  describe('hike fixture', () => {
    it('colors the expected waypoints', () => {
      const doc = parseGpx(loadGpxFixture('hike.gpx'));

      const result = annotateWaypoints(doc, DEFAULT_COLOR_RULES);

      expect(result.processedCount).toBe(3);
      expect(result.totalWaypoints).toBe(6);
      expect(result.colorings).toEqual([
        { index: 0, name: 'Trailhead Parking', keyword: 'trailhead', color: '#FF737373' },
        { index: 1, name: 'Granite Peak', keyword: 'peak', color: '#FF3C8C3C' },
        { index: 2, name: "Bob's House" },
        { index: 3, name: 'Upper Falls', keyword: 'fall', color: '#FF249CF2' },
        { index: 4, name: UNNAMED_WAYPOINT },
        { index: 5, name: UNNAMED_WAYPOINT },
      ]);
    });

    it('counts exactly the waypoints that matched', () => {
      const doc = parseGpx(loadGpxFixture('hike.gpx'));
      const result = annotateWaypoints(doc, DEFAULT_COLOR_RULES);

      expect(result.processedCount).toBe(result.colorings.filter((c) => c.color).length);
    });
  });

  describe('determinism', () => {
    it('gives identical output for independent copies of the same input', () => {
      const source = loadGpxFixture('hike.gpx');
      const first = parseGpx(source);
      const second = parseGpx(source);

      annotateWaypoints(first, DEFAULT_COLOR_RULES);
      annotateWaypoints(second, DEFAULT_COLOR_RULES);

      expect(renderGpx(first)).toBe(renderGpx(second));
    });
  });

  describe('onWaypoint', () => {
    it('reports every waypoint in document order', () => {
      const doc = parseGpx(gpx().waypoints('Camp One', 'Old Mill').build());
      const onWaypoint = vi.fn();

      annotateWaypoints(doc, DEFAULT_COLOR_RULES, { onWaypoint });

      expect(onWaypoint).toHaveBeenCalledTimes(2);
      expect(onWaypoint).toHaveBeenNthCalledWith(1, {
        index: 0,
        name: 'Camp One',
        keyword: 'camp',
        color: '#FF804633',
      });
      expect(onWaypoint).toHaveBeenNthCalledWith(2, { index: 1, name: 'Old Mill' });
    });
  });

  describe('repeated annotation', () => {
    // Known property: color subtrees accumulate instead of being replaced
    it('appends a second color subtree when run on an already colored document', () => {
      const doc = parseGpx(gpx().waypoint('Granite Peak').build());

      annotateWaypoints(doc, DEFAULT_COLOR_RULES);
      const colored = parseGpx(renderGpx(doc));
      const result = annotateWaypoints(colored, DEFAULT_COLOR_RULES);

      expect(result.processedCount).toBe(1);
      expect(colorsOf(colored)).toEqual([['#FF3C8C3C', '#FF3C8C3C']]);
    });
  });
});
