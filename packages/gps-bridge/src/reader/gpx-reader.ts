/**
 * GPX Artifact Reader
 *
 * Opens GPX 1.1 output and exposes the five layers the converter's format
 * maps to:
 *
 * - waypoints:    Point per <wpt>
 * - routes:       LineString per <rte>
 * - route_points: Point per <rtept>, with route_fid / route_point_id
 * - tracks:       MultiLineString per <trk>, one line per <trkseg>
 * - track_points: Point per <trkpt>, with track_fid / track_seg_id / track_seg_point_id
 *
 * Coordinates are [lon, lat] or [lon, lat, ele]. Points without a numeric
 * lat/lon are skipped.
 */

import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { Feature, GeoJsonProperties, Geometry, Position } from 'geojson';
import type { LayerCollection, LayerName } from '../core/types.js';
import type { FileStore } from '../storage/file-store.js';
import { createLogger } from '../core/utils/logger.js';
import type { ArtifactDataset, ArtifactLayer, ArtifactReader } from './types.js';

const log = createLogger({ module: 'gpx-reader' });

export const GPX_LAYER_NAMES: readonly LayerName[] = [
  'waypoints',
  'routes',
  'route_points',
  'tracks',
  'track_points',
];

const TEXT_FIELDS = ['name', 'cmt', 'desc', 'src', 'sym', 'type'] as const;

type Props = Record<string, string | number | null>;

function childText($el: Cheerio<Element>, tag: string): string | null {
  const child = $el.children(tag).first();
  return child.length > 0 ? child.text().trim() : null;
}

function childNumber($el: Cheerio<Element>, tag: string): number | null {
  const text = childText($el, tag);
  if (text === null || text.length === 0) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function descriptiveProps($el: Cheerio<Element>): Props {
  const props: Props = {};
  for (const field of TEXT_FIELDS) {
    props[field] = childText($el, field);
  }
  return props;
}

function pointProps($el: Cheerio<Element>): Props {
  return {
    ...descriptiveProps($el),
    ele: childNumber($el, 'ele'),
    time: childText($el, 'time'),
  };
}

function position($el: Cheerio<Element>): Position | null {
  const lat = Number($el.attr('lat'));
  const lon = Number($el.attr('lon'));
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    return null;
  }
  const ele = childNumber($el, 'ele');
  return ele === null ? [lon, lat] : [lon, lat, ele];
}

function feature(geometry: Geometry, properties: GeoJsonProperties): Feature<Geometry, GeoJsonProperties> {
  return { type: 'Feature', geometry, properties };
}

function collection(features: Feature<Geometry, GeoJsonProperties>[]): LayerCollection {
  return { type: 'FeatureCollection', features };
}

/**
 * Build all five layers from a parsed document
 */
export function buildGpxLayers($: CheerioAPI): Map<LayerName, LayerCollection> {
  const waypoints: Feature<Geometry, GeoJsonProperties>[] = [];
  const routes: Feature<Geometry, GeoJsonProperties>[] = [];
  const routePoints: Feature<Geometry, GeoJsonProperties>[] = [];
  const tracks: Feature<Geometry, GeoJsonProperties>[] = [];
  const trackPoints: Feature<Geometry, GeoJsonProperties>[] = [];

  const root = $('gpx').first();

  for (const wpt of root.children('wpt').toArray()) {
    const $wpt = $(wpt);
    const coords = position($wpt);
    if (coords === null) continue;
    waypoints.push(feature({ type: 'Point', coordinates: coords }, pointProps($wpt)));
  }

  root.children('rte').toArray().forEach((rte, routeFid) => {
    const $rte = $(rte);
    const line: Position[] = [];
    $rte.children('rtept').toArray().forEach((rtept, routePointId) => {
      const $rtept = $(rtept);
      const coords = position($rtept);
      if (coords === null) return;
      line.push(coords);
      routePoints.push(
        feature(
          { type: 'Point', coordinates: coords },
          { route_fid: routeFid, route_point_id: routePointId, ...pointProps($rtept) }
        )
      );
    });
    routes.push(feature({ type: 'LineString', coordinates: line }, descriptiveProps($rte)));
  });

  root.children('trk').toArray().forEach((trk, trackFid) => {
    const $trk = $(trk);
    const lines: Position[][] = [];
    $trk.children('trkseg').toArray().forEach((seg, segId) => {
      const line: Position[] = [];
      $(seg).children('trkpt').toArray().forEach((trkpt, pointId) => {
        const $trkpt = $(trkpt);
        const coords = position($trkpt);
        if (coords === null) return;
        line.push(coords);
        trackPoints.push(
          feature(
            { type: 'Point', coordinates: coords },
            {
              track_fid: trackFid,
              track_seg_id: segId,
              track_seg_point_id: pointId,
              ...pointProps($trkpt),
            }
          )
        );
      });
      lines.push(line);
    });
    tracks.push(feature({ type: 'MultiLineString', coordinates: lines }, descriptiveProps($trk)));
  });

  return new Map<LayerName, LayerCollection>([
    ['waypoints', collection(waypoints)],
    ['routes', collection(routes)],
    ['route_points', collection(routePoints)],
    ['tracks', collection(tracks)],
    ['track_points', collection(trackPoints)],
  ]);
}

class GpxDataset implements ArtifactDataset {
  private isClosed = false;

  constructor(private readonly layers: Map<LayerName, LayerCollection>) {}

  get layerNames(): readonly string[] {
    return this.isClosed ? [] : [...this.layers.keys()];
  }

  get closed(): boolean {
    return this.isClosed;
  }

  getLayerByName(name: string): ArtifactLayer | null {
    if (this.isClosed) return null;
    for (const [layerName, features] of this.layers) {
      if (layerName === name) {
        return { name: layerName, featureCount: features.features.length, features };
      }
    }
    return null;
  }

  close(): void {
    this.isClosed = true;
  }
}

export class GpxArtifactReader implements ArtifactReader {
  constructor(private readonly store: FileStore) {}

  async open(path: string): Promise<ArtifactDataset | null> {
    const stat = await this.store.stat(path);
    if (stat === null || stat.size === 0) {
      log.debug('Artifact missing or empty', { path });
      return null;
    }

    const xml = (await this.store.readFile(path)).toString('utf8');
    const $ = load(xml, { xml: true });
    if ($('gpx').length === 0) {
      log.debug('Artifact has no <gpx> root', { path });
      return null;
    }

    return new GpxDataset(buildGpxLayers($));
  }
}
