/**
 * Fluent builder for GPX test documents
 */

/**
 * GPX 1.1 namespace (inlined to keep test-utils free of package dependencies)
 */
export const GPX_NAMESPACE = 'http://www.topografix.com/GPX/1/1';

/**
 * Options for a single waypoint
 */
export interface WaypointSpec {
  /** Waypoint name; undefined omits the <name> element entirely */
  name?: string;
  lat?: number;
  lon?: number;
  /** Elevation in meters */
  ele?: number;
  /** Raw XML placed inside an <extensions> element */
  extensions?: string;
}

/**
 * A track or route point
 */
export interface PointSpec {
  lat: number;
  lon: number;
  ele?: number;
}

/**
 * Escape text for use inside an XML element or a double-quoted attribute
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Fluent builder for creating GPX documents as text
 */
export class GpxBuilder {
  private readonly body: string[] = [];
  private creator = 'gpx-colorizer-tests';
  private declaration = true;
  private waypointCount = 0;

  /**
   * Set the creator attribute of the root element
   */
  withCreator(creator: string): this {
    this.creator = creator;
    return this;
  }

  /**
   * Omit the leading XML declaration
   */
  withoutDeclaration(): this {
    this.declaration = false;
    return this;
  }

  /**
   * Add a <metadata> block with a name
   */
  metadata(name: string): this {
    this.body.push(`  <metadata>\n    <name>${escapeXml(name)}</name>\n  </metadata>`);
    return this;
  }

  /**
   * Add a waypoint by name, or with full options
   */
  waypoint(spec: string | WaypointSpec = {}): this {
    const wpt = typeof spec === 'string' ? { name: spec } : spec;
    const index = this.waypointCount++;
    const lat = wpt.lat ?? 47 + index / 100;
    const lon = wpt.lon ?? -121 - index / 100;

    const lines = [`  <wpt lat="${lat}" lon="${lon}">`];
    if (wpt.ele !== undefined) {
      lines.push(`    <ele>${wpt.ele}</ele>`);
    }
    if (wpt.name !== undefined) {
      lines.push(`    <name>${escapeXml(wpt.name)}</name>`);
    }
    if (wpt.extensions !== undefined) {
      lines.push(`    <extensions>${wpt.extensions}</extensions>`);
    }
    lines.push('  </wpt>');

    this.body.push(lines.join('\n'));
    return this;
  }

  /**
   * Add several named waypoints
   */
  waypoints(...names: string[]): this {
    for (const name of names) {
      this.waypoint(name);
    }
    return this;
  }

  /**
   * Add a route with named route points
   */
  route(name: string, points: Array<PointSpec & { name?: string }>): this {
    const lines = ['  <rte>', `    <name>${escapeXml(name)}</name>`];
    for (const point of points) {
      const pointName = point.name !== undefined ? `<name>${escapeXml(point.name)}</name>` : '';
      lines.push(`    <rtept lat="${point.lat}" lon="${point.lon}">${pointName}</rtept>`);
    }
    lines.push('  </rte>');
    this.body.push(lines.join('\n'));
    return this;
  }

  /**
   * Add a single-segment track
   */
  track(name: string, points: PointSpec[]): this {
    const lines = ['  <trk>', `    <name>${escapeXml(name)}</name>`, '    <trkseg>'];
    for (const point of points) {
      const ele = point.ele !== undefined ? `<ele>${point.ele}</ele>` : '';
      lines.push(`      <trkpt lat="${point.lat}" lon="${point.lon}">${ele}</trkpt>`);
    }
    lines.push('    </trkseg>', '  </trk>');
    this.body.push(lines.join('\n'));
    return this;
  }

  /**
   * Build the GPX text
   */
  build(): string {
    const lines: string[] = [];
    if (this.declaration) {
      lines.push('<?xml version="1.0" encoding="UTF-8"?>');
    }
    lines.push(
      `<gpx version="1.1" creator="${escapeXml(this.creator)}" xmlns="${GPX_NAMESPACE}">`,
      ...this.body,
      '</gpx>',
    );
    return `${lines.join('\n')}\n`;
  }
}

/**
 * Create a new GpxBuilder
 */
export function gpx(): GpxBuilder {
  return new GpxBuilder();
}
