/**
 * Artifact reader contract
 *
 * The bridge only needs named layers with feature counts; any reader that
 * can open the converter's output format can stand in.
 */

import type { LayerCollection } from '../core/types.js';

export interface ArtifactLayer {
  readonly name: string;
  readonly featureCount: number;
  readonly features: LayerCollection;
}

export interface ArtifactDataset {
  readonly layerNames: readonly string[];
  readonly closed: boolean;
  /** Null when the layer does not exist or the dataset is closed */
  getLayerByName(name: string): ArtifactLayer | null;
  close(): void;
}

export interface ArtifactReader {
  /** Resolves to null when the artifact is not a dataset this reader understands */
  open(path: string): Promise<ArtifactDataset | null>;
}
