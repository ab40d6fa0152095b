/**
 * KML Driver Tests
 */

import { describe, expect, it } from 'vitest';
import { parseKml } from '../../../drivers/kml.js';
import { captureError } from '../../utils/assertions.js';

const KML = `<?xml version="1.0" encoding="UTF-8"?>
<kml xmlns="http://www.opengis.net/kml/2.2">
  <Document>
    <Placemark>
      <name>Monas</name>
      <Point><coordinates>106.8272,-6.1754,0</coordinates></Point>
    </Placemark>
    <Placemark>
      <name>Route</name>
      <LineString><coordinates>106.80,-6.20 106.85,-6.18</coordinates></LineString>
    </Placemark>
  </Document>
</kml>`;

describe('parseKml', () => {
  it('converts placemarks and declares WGS84', () => {
    const raw = parseKml(KML);

    expect(raw.declaredCrs).toEqual({ type: 'name', value: 'EPSG:4326' });
    expect(raw.features).toHaveLength(2);
    expect(raw.features[0]?.properties['name']).toBe('Monas');
    expect(raw.features[0]?.geometry).toEqual({ type: 'Point', coordinates: [106.8272, -6.1754, 0] });
    expect(raw.features[1]?.geometry).toEqual({
      type: 'LineString',
      coordinates: [
        [106.8, -6.2],
        [106.85, -6.18],
      ],
    });
  });

  it('rejects a document whose root is not <kml>', () => {
    expect(() => parseKml('<?xml version="1.0"?><gpx></gpx>')).toThrow('Expected a <kml> document, found <gpx>');
  });

  it('rejects a mismatched end tag', () => {
    const text =
      '<kml><Document><Placemark><name>A</name><Point><coordinates>106.8,-6.2</coordinates></Point>' +
      '</Placemark></Documnt></kml>';

    expect(captureError(() => parseKml(text))).toMatchObject({ kind: 'DatasetUnreadable' });
  });

  it('rejects malformed XML as DatasetUnreadable', () => {
    expect(captureError(() => parseKml('<kml><Document><Placemark></kml>'))).toMatchObject({
      kind: 'DatasetUnreadable',
    });
  });
});
