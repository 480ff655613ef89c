import type { CategorySelection, ConvertedLayer, LayerName, LayerSet } from '../core/types.js';
import type { ArtifactDataset } from '../reader/types.js';

/**
 * Layers contributed by each category, in output order
 */
export const CATEGORY_LAYERS: ReadonlyArray<{
  readonly category: keyof CategorySelection;
  readonly layers: readonly LayerName[];
}> = [
  { category: 'waypoints', layers: ['waypoints'] },
  { category: 'routes', layers: ['routes', 'route_points'] },
  { category: 'tracks', layers: ['tracks', 'track_points'] },
];

/**
 * Select the requested, non-empty layers of an opened artifact
 */
export function extractLayers(dataset: ArtifactDataset, categories: CategorySelection): LayerSet {
  const selected: ConvertedLayer[] = [];

  for (const { category, layers } of CATEGORY_LAYERS) {
    if (!categories[category]) continue;

    for (const name of layers) {
      const layer = dataset.getLayerByName(name);
      if (layer !== null && layer.featureCount !== 0) {
        selected.push({ name, featureCount: layer.featureCount, features: layer.features });
      }
    }
  }

  return selected;
}
