import { gpx, listGpxFixtures, loadGpxFixture } from '@gpx-colorizer/test-utils';
import { describe, it, expect } from 'vitest';

import { parseGpx, GpxParseError, GPX_NAMESPACE } from '../index.js';

const HEAD =
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  `<gpx version="1.1" creator="test" xmlns="${GPX_NAMESPACE}">\n`;

function parseFailure(xml: string): GpxParseError {
  try {
    parseGpx(xml);
  } catch (error) {
    if (error instanceof GpxParseError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected parseGpx to throw');
}

describe('GPX Parser', () => {
  describe('well-formed input', () => {
    it('parses a document with waypoints', () => {
      const doc = parseGpx(gpx().waypoints('Granite Peak', "Bob's House").build());

      expect(doc.root?.localName).toBe('gpx');
      expect(doc.root?.namespaceURI).toBe(GPX_NAMESPACE);
      expect(doc.waypoints()).toHaveLength(2);
    });

    it('parses a document without an XML declaration', () => {
      const doc = parseGpx(gpx().withoutDeclaration().waypoint('Lake View').build());
      expect(doc.waypoints()).toHaveLength(1);
    });

    it('ignores a leading byte-order mark', () => {
      const doc = parseGpx(`\uFEFF${gpx().waypoint('Lake View').build()}`);
      expect(doc.waypoints()).toHaveLength(1);
    });

    it('parses every fixture except the malformed one', () => {
      const wellFormed = listGpxFixtures().filter((name) => name !== 'malformed.gpx');

      expect(wellFormed).toEqual(['hike.gpx', 'no-matches.gpx']);
      for (const name of wellFormed) {
        expect(parseGpx(loadGpxFixture(name)).root?.localName).toBe('gpx');
      }
    });

    it('parses the hike fixture', () => {
      const doc = parseGpx(loadGpxFixture('hike.gpx'));
      expect(doc.waypoints()).toHaveLength(6);
    });

    it('decodes entities in names', () => {
      const doc = parseGpx(gpx().waypoint('Camp & Creek').build());
      const [waypoint] = doc.waypoints();

      expect(waypoint).toBeDefined();
      expect(doc.childText(waypoint!, 'name')).toBe('Camp & Creek');
    });

    it('reads a creator attribute containing quotes and ampersands', () => {
      const doc = parseGpx(gpx().withCreator('Trail "Notes" & Co').waypoint('Lake View').build());
      expect(doc.root?.getAttribute('creator')).toBe('Trail "Notes" & Co');
    });

    it('accepts character references', () => {
      const doc = parseGpx(`${HEAD}<wpt lat="1" lon="2"><name>Caf&#233; &#xE9;</name></wpt>\n</gpx>\n`);
      const [waypoint] = doc.waypoints();

      expect(doc.childText(waypoint!, 'name')).toBe('Café é');
    });

    it('accepts markup characters inside comments and CDATA sections', () => {
      const doc = parseGpx(
        `${HEAD}<!-- a & b < c -->\n` +
          '<wpt lat="1" lon="2"><name><![CDATA[Camp & <Creek>]]></name></wpt>\n</gpx>\n',
      );
      const [waypoint] = doc.waypoints();

      expect(doc.childText(waypoint!, 'name')).toBe('Camp & <Creek>');
    });
  });

  describe('malformed input', () => {
    it('throws GpxParseError for an empty document', () => {
      expect(() => parseGpx('')).toThrow(GpxParseError);
      expect(() => parseGpx('   \n  ')).toThrow(GpxParseError);
    });

    it('reports the empty document reason', () => {
      const error = parseFailure('');
      expect(error.reason).toBe('empty document');
      expect(error.message).toBe('Failed to parse GPX: document is empty');
    });

    it('throws GpxParseError for the malformed fixture', () => {
      expect(() => parseGpx(loadGpxFixture('malformed.gpx'))).toThrow(GpxParseError);
    });

    it('includes a reason and a message prefix', () => {
      const error = parseFailure(loadGpxFixture('malformed.gpx'));
      expect(error.name).toBe('GpxParseError');
      expect(error.reason.length).toBeGreaterThan(0);
      expect(error.message).toBe(`Failed to parse GPX: ${error.reason}`);
    });

    it('throws GpxParseError for text without a root element', () => {
      expect(() => parseGpx('just some words')).toThrow(GpxParseError);
      expect(parseFailure('just some words').reason).toBe('text outside the root element');
    });

    it('rejects a mismatched end tag with its location', () => {
      const error = parseFailure(`${HEAD}<wpt lat="1" lon="2"><name>Granite Peak</wpt></gpx>\n`);

      expect(error.reason).toBe('mismatched end tag: expected </name> but found </wpt>');
      expect(error.line).toBe(3);
      expect(error.column).toBe(40);
    });

    it('rejects an unescaped ampersand in text', () => {
      const error = parseFailure(
        `${HEAD}<wpt lat="1" lon="2"><name>Camp & Creek</name></wpt>\n</gpx>\n`,
      );

      expect(error.reason).toBe("unescaped '&' (write it as &amp;)");
      expect(error.line).toBe(3);
      expect(error.column).toBe(33);
    });

    it('rejects an unescaped ampersand in an attribute value', () => {
      const error = parseFailure(`<gpx creator="A & B" xmlns="${GPX_NAMESPACE}"></gpx>`);

      expect(error.reason).toBe("unescaped '&' (write it as &amp;)");
      expect(error.line).toBe(1);
      expect(error.column).toBe(17);
    });

    it('reports a truncated document as an unexpected end', () => {
      const error = parseFailure(`${HEAD}<wpt lat="1" lon="2"><name>Granite Peak</name>`);

      expect(error.reason).toBe('unexpected end of document: <wpt> is not closed');
      expect(error.message).toBe('Failed to parse GPX: unexpected end of document: <wpt> is not closed');
      expect(error.line).toBe(3);
      expect(error.column).toBe(47);
    });

    it('reports a document cut inside a tag as an unexpected end', () => {
      expect(parseFailure(`${HEAD}<wpt lat="1`).reason).toBe('unexpected end of document');
    });

    it('rejects a second root element', () => {
      const error = parseFailure(`${HEAD}</gpx>\n<gpx/>\n`);
      expect(error.reason).toBe('element <gpx> after the root element');
    });

    it('rejects an end tag with nothing open', () => {
      expect(parseFailure('</gpx>').reason).toBe('unexpected end tag </gpx>');
    });
  });
});
