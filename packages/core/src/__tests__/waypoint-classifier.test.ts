import { describe, it, expect } from 'vitest';

import {
  DEFAULT_COLOR_RULES,
  COLOR_PALETTE,
  classifyWaypointName,
  findMatchingRule,
  isArgbColor,
  getPaletteName,
  type ColorRules,
} from '../classifier/index.js';

describe('Waypoint Classifier', () => {
  describe('DEFAULT_COLOR_RULES', () => {
    it('holds fifteen rules in match order', () => {
      expect(DEFAULT_COLOR_RULES.map((r) => r.keyword)).toEqual([
        'camp',
        'water',
        'creek',
        'stream',
        'pond',
        'pool',
        'lake',
        'fall',
        'trailhead',
        'parking',
        'viewpoint',
        'peak',
        'ranger',
        'office',
        'restroom',
      ]);
    });

    it('uses well-formed ARGB codes with lowercase keywords', () => {
      for (const rule of DEFAULT_COLOR_RULES) {
        expect(isArgbColor(rule.color)).toBe(true);
        expect(rule.keyword).toBe(rule.keyword.toLowerCase());
      }
    });
  });

  describe('classifyWaypointName', () => {
    it('matches case-insensitively', () => {
      expect(classifyWaypointName('Lake View', DEFAULT_COLOR_RULES)).toBe('#FF249CF2');
      expect(classifyWaypointName('LAKE VIEW', DEFAULT_COLOR_RULES)).toBe('#FF249CF2');
      expect(classifyWaypointName('lake view', DEFAULT_COLOR_RULES)).toBe('#FF249CF2');
    });

    it('matches keywords inside longer words', () => {
      expect(classifyWaypointName('Carpool Lot', DEFAULT_COLOR_RULES)).toBe('#FF249CF2');
      expect(classifyWaypointName('Waterfall', DEFAULT_COLOR_RULES)).toBe('#FF249CF2');
      expect(classifyWaypointName('Campground', DEFAULT_COLOR_RULES)).toBe('#FF804633');
    });

    it('applies the earlier rule when several keywords occur', () => {
      expect(classifyWaypointName('Trailhead Parking', DEFAULT_COLOR_RULES)).toBe('#FF737373');
      // camp precedes lake
      expect(classifyWaypointName('Lake Camp', DEFAULT_COLOR_RULES)).toBe('#FF804633');
      // pool precedes peak
      expect(classifyWaypointName('Peak Pool', DEFAULT_COLOR_RULES)).toBe('#FF249CF2');
    });

    it('returns undefined when no keyword occurs', () => {
      expect(classifyWaypointName("Bob's House", DEFAULT_COLOR_RULES)).toBeUndefined();
      expect(classifyWaypointName('Old Mill', DEFAULT_COLOR_RULES)).toBeUndefined();
    });

    it('returns undefined for empty or missing names', () => {
      expect(classifyWaypointName('', DEFAULT_COLOR_RULES)).toBeUndefined();
      expect(classifyWaypointName(undefined, DEFAULT_COLOR_RULES)).toBeUndefined();
    });

    it('uses an injected table in its own order', () => {
      const rules: ColorRules = [
        { keyword: 'peak', color: COLOR_PALETTE.purple },
        { keyword: 'granite', color: COLOR_PALETTE.orange },
      ];
      expect(classifyWaypointName('Granite Peak', rules)).toBe('#FF9B24B2');
      expect(classifyWaypointName('Granite Ridge', rules)).toBe('#FFFF9600');
      expect(classifyWaypointName('Granite Peak', [...rules].reverse())).toBe('#FFFF9600');
    });

    it('folds keyword case as well as name case', () => {
      const rules: ColorRules = [{ keyword: 'Hut', color: COLOR_PALETTE.brown }];
      expect(classifyWaypointName('Alpine HUT', rules)).toBe('#FF804633');
    });

    it('returns undefined for an empty table', () => {
      expect(classifyWaypointName('Lake View', [])).toBeUndefined();
    });
  });

  describe('findMatchingRule', () => {
    it('returns the whole matching rule', () => {
      expect(findMatchingRule('Granite Peak', DEFAULT_COLOR_RULES)).toEqual({
        keyword: 'peak',
        color: '#FF3C8C3C',
      });
    });

    it('returns the same rule object from the table', () => {
      const rule = findMatchingRule('Ranger Station', DEFAULT_COLOR_RULES);
      expect(rule).toBe(DEFAULT_COLOR_RULES[12]);
    });
  });

  describe('isArgbColor', () => {
    it('accepts eight hex digits after a hash', () => {
      expect(isArgbColor('#FF249CF2')).toBe(true);
      expect(isArgbColor('#ff249cf2')).toBe(true);
    });

    it('rejects other shapes', () => {
      expect(isArgbColor('#249CF2')).toBe(false);
      expect(isArgbColor('FF249CF2')).toBe(false);
      expect(isArgbColor('#FF249CF2A')).toBe(false);
      expect(isArgbColor('#GG249CF2')).toBe(false);
    });
  });

  describe('getPaletteName', () => {
    it('names palette colors regardless of case', () => {
      expect(getPaletteName('#FF3C8C3C')).toBe('green');
      expect(getPaletteName('#ff249cf2')).toBe('blue');
    });

    it('returns undefined for colors outside the palette', () => {
      expect(getPaletteName('#FF000000')).toBeUndefined();
    });
  });
});
