/**
 * Shapefile Driver Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { encodingFromCodePage, readShapefile } from '../../../drivers/shapefile.js';
import {
  SAMPLE_FIELDS,
  SAMPLE_POINTS,
  WGS84_PRJ,
  buildPointShapefile,
  createTempDir,
  removeTempDir,
  shapefileEntries,
  type ShapefileBundle,
} from '../../utils/fixtures.js';

describe('readShapefile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function writeBundle(
    base: string,
    bundle: ShapefileBundle,
    extras: { prj?: string; cpg?: string } = {}
  ): Promise<string> {
    for (const [name, content] of Object.entries(shapefileEntries(base, bundle, extras))) {
      await writeFile(join(dir, name), content);
    }
    return join(dir, `${base}.shp`);
  }

  it('reads points and DBF attributes', async () => {
    const path = await writeBundle('places', buildPointShapefile(SAMPLE_POINTS, SAMPLE_FIELDS));

    const raw = await readShapefile(path);

    expect(raw.declaredCrs).toBeNull();
    expect(raw.features).toEqual([
      { properties: { name: 'Alpha', pop: 120 }, geometry: { type: 'Point', coordinates: [106.8, -6.2] } },
      { properties: { name: 'Beta', pop: 45 }, geometry: { type: 'Point', coordinates: [107.6, -6.9] } },
    ]);
  });

  it('declares the .prj WKT', async () => {
    const path = await writeBundle('places', buildPointShapefile(SAMPLE_POINTS, SAMPLE_FIELDS), { prj: WGS84_PRJ });

    expect((await readShapefile(path)).declaredCrs).toEqual({ type: 'wkt', value: WGS84_PRJ });
  });

  it('decodes DBF text with the .cpg encoding', async () => {
    const points = [{ x: 1, y: 2, attributes: { name: 'Café', pop: 1 } }];
    const path = await writeBundle('utf', buildPointShapefile(points, SAMPLE_FIELDS, 'utf8'), { cpg: 'UTF-8' });

    const raw = await readShapefile(path);

    expect(raw.features[0]?.properties['name']).toBe('Café');
  });

  it('decodes DBF text as windows-1252 without a .cpg', async () => {
    const points = [{ x: 1, y: 2, attributes: { name: 'Café', pop: 1 } }];
    const path = await writeBundle('latin', buildPointShapefile(points, SAMPLE_FIELDS, 'latin1'));

    const raw = await readShapefile(path);

    expect(raw.features[0]?.properties['name']).toBe('Café');
  });

  it('fails with DatasetUnreadable when the .shx is missing', async () => {
    const bundle = buildPointShapefile(SAMPLE_POINTS, SAMPLE_FIELDS);
    await writeFile(join(dir, 'lonely.shp'), bundle.shp);
    await writeFile(join(dir, 'lonely.dbf'), bundle.dbf);

    await expect(readShapefile(join(dir, 'lonely.shp'))).rejects.toMatchObject({
      kind: 'DatasetUnreadable',
      message: 'Shapefile "lonely.shp" is missing companion file(s): .shx',
    });
  });

  it('does not borrow companions from another base name', async () => {
    const bundle = buildPointShapefile(SAMPLE_POINTS, SAMPLE_FIELDS);
    await writeFile(join(dir, 'roads.shp'), bundle.shp);
    await writeFile(join(dir, 'rivers.shx'), bundle.shx);
    await writeFile(join(dir, 'rivers.dbf'), bundle.dbf);

    await expect(readShapefile(join(dir, 'roads.shp'))).rejects.toMatchObject({
      message: 'Shapefile "roads.shp" is missing companion file(s): .shx, .dbf',
    });
  });

  it('matches companion extensions case-insensitively', async () => {
    const bundle = buildPointShapefile(SAMPLE_POINTS, SAMPLE_FIELDS);
    await writeFile(join(dir, 'mixed.shp'), bundle.shp);
    await writeFile(join(dir, 'mixed.SHX'), bundle.shx);
    await writeFile(join(dir, 'mixed.Dbf'), bundle.dbf);

    expect((await readShapefile(join(dir, 'mixed.shp'))).features).toHaveLength(2);
  });
});

describe('encodingFromCodePage', () => {
  it.each([
    ['UTF-8', 'utf-8'],
    ['utf8', 'utf-8'],
    ['ANSI 1252', 'windows-1252'],
    ['1251', 'windows-1251'],
    ['CP1250', 'windows-1250'],
    ['ISO-8859-1', 'windows-1252'],
    ['gibberish-encoding', 'windows-1252'],
  ])('maps %s to %s', (codePage, expected) => {
    expect(encodingFromCodePage(codePage)).toBe(expected);
  });
});
