/**
 * GpxArtifactReader Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { GpxArtifactReader, GPX_LAYER_NAMES } from '../../../reader/gpx-reader.js';
import { MemoryFileStore } from '../../../storage/memory-store.js';
import { fixture } from '../../utils/fake-runner.js';

const PATH = '/vsimem/artifact.gpx';

const NO_TEXT = { cmt: null, desc: null, src: null, sym: null, type: null };

describe('GpxArtifactReader', () => {
  let store: MemoryFileStore;
  let reader: GpxArtifactReader;

  beforeEach(() => {
    store = new MemoryFileStore();
    reader = new GpxArtifactReader(store);
  });

  async function openFixture(name: string) {
    store.writeFileSync(PATH, fixture(name));
    const dataset = await reader.open(PATH);
    if (dataset === null) throw new Error(`fixture ${name} did not open`);
    return dataset;
  }

  test('exposes all five layers in order', async () => {
    const dataset = await openFixture('full.gpx');
    expect(dataset.layerNames).toEqual([...GPX_LAYER_NAMES]);
  });

  test('reads waypoints and skips points without numeric coordinates', async () => {
    const dataset = await openFixture('full.gpx');
    const layer = dataset.getLayerByName('waypoints');

    expect(layer?.featureCount).toBe(1);
    expect(layer?.features.features[0]).toEqual({
      type: 'Feature',
      geometry: { type: 'Point', coordinates: [-122.65, 45.5] },
      properties: { name: 'Trailhead', ...NO_TEXT, ele: null, time: null },
    });
  });

  test('reads elevation, time and symbol of a waypoint', async () => {
    const dataset = await openFixture('waypoints-only.gpx');
    const layer = dataset.getLayerByName('waypoints');

    expect(layer?.featureCount).toBe(2);
    expect(layer?.features.features[0]).toEqual({
      type: 'Feature',
      geometry: { type: 'Point', coordinates: [-122.65, 45.5, 12.5] },
      properties: {
        name: 'Trailhead',
        ...NO_TEXT,
        sym: 'Flag, Blue',
        ele: 12.5,
        time: '2024-05-01T10:00:00Z',
      },
    });
  });

  test('builds routes and numbered route points', async () => {
    const dataset = await openFixture('full.gpx');

    const routes = dataset.getLayerByName('routes');
    expect(routes?.featureCount).toBe(1);
    expect(routes?.features.features[0]?.geometry).toEqual({
      type: 'LineString',
      coordinates: [
        [-122.65, 45.5],
        [-122.63, 45.52],
      ],
    });
    expect(routes?.features.features[0]?.properties).toEqual({ name: 'Loop', ...NO_TEXT });

    const points = dataset.getLayerByName('route_points');
    expect(points?.featureCount).toBe(2);
    expect(points?.features.features.map((f) => f.properties)).toEqual([
      { route_fid: 0, route_point_id: 0, name: 'Start', ...NO_TEXT, ele: null, time: null },
      { route_fid: 0, route_point_id: 1, name: 'Turn', ...NO_TEXT, ele: null, time: null },
    ]);
  });

  test('builds one line per track segment', async () => {
    const dataset = await openFixture('full.gpx');

    const tracks = dataset.getLayerByName('tracks');
    expect(tracks?.featureCount).toBe(1);
    expect(tracks?.features.features[0]).toEqual({
      type: 'Feature',
      geometry: {
        type: 'MultiLineString',
        coordinates: [
          [
            [-122.65, 45.5, 10],
            [-122.649, 45.501, 11],
          ],
          [[-122.648, 45.502]],
        ],
      },
      properties: { name: 'Morning ride', ...NO_TEXT, type: 'cycling' },
    });
  });

  test('numbers track points by track, segment and position', async () => {
    const dataset = await openFixture('full.gpx');
    const points = dataset.getLayerByName('track_points');

    expect(points?.featureCount).toBe(3);
    expect(
      points?.features.features.map((f) => [
        f.properties?.track_fid,
        f.properties?.track_seg_id,
        f.properties?.track_seg_point_id,
        f.properties?.ele,
        f.properties?.time,
      ])
    ).toEqual([
      [0, 0, 0, 10, '2024-05-01T07:00:00Z'],
      [0, 0, 1, 11, '2024-05-01T07:00:10Z'],
      [0, 1, 0, null, null],
    ]);
  });

  test('reports empty layers with a zero count', async () => {
    const dataset = await openFixture('waypoints-only.gpx');
    expect(dataset.getLayerByName('tracks')?.featureCount).toBe(0);
    expect(dataset.getLayerByName('no_such_layer')).toBeNull();
  });

  test('returns null for a missing, empty or non-GPX artifact', async () => {
    expect(await reader.open(PATH)).toBeNull();

    store.writeFileSync(PATH, '');
    expect(await reader.open(PATH)).toBeNull();

    store.writeFileSync(PATH, '<?xml version="1.0"?><kml><Document/></kml>');
    expect(await reader.open(PATH)).toBeNull();
  });

  test('a closed dataset exposes nothing', async () => {
    const dataset = await openFixture('full.gpx');
    dataset.close();

    expect(dataset.closed).toBe(true);
    expect(dataset.layerNames).toEqual([]);
    expect(dataset.getLayerByName('waypoints')).toBeNull();
  });
});
