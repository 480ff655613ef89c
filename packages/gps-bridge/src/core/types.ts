/**
 * Core types for the conversion bridge
 *
 * TYPE SAFETY: every record that crosses a component boundary is readonly.
 */

import type { FeatureCollection, Geometry, GeoJsonProperties } from 'geojson';

// ============================================================================
// Requests
// ============================================================================

/**
 * Feature categories the converter can be asked to emit
 */
export type FeatureCategory = 'waypoints' | 'routes' | 'tracks';

export const FEATURE_CATEGORIES: readonly FeatureCategory[] = ['waypoints', 'routes', 'tracks'];

export interface CategorySelection {
  readonly waypoints: boolean;
  readonly routes: boolean;
  readonly tracks: boolean;
}

export const ALL_CATEGORIES: CategorySelection = Object.freeze({
  waypoints: true,
  routes: true,
  tracks: true,
});

/**
 * A parsed, validated conversion request
 */
export interface ConversionRequest {
  /** Path handed to the converter (file, device or port name) */
  readonly sourcePath: string;
  /** Converter input driver, possibly carrying `,option=value` suffixes */
  readonly driver: string;
  /** True when the caller restricted categories with `features=` */
  readonly explicitFeatures: boolean;
  readonly categories: CategorySelection;
}

/**
 * Out-of-band open options, equivalent to the embedded datasource syntax
 */
export interface OpenOptions {
  readonly filename?: string;
  readonly driver?: string;
}

// ============================================================================
// Sources and invocations
// ============================================================================

export type SourceKind = 'special' | 'regular';

export type InvocationMode = 'piped' | 'direct';

/**
 * Argument vector handed to the converter, program name first
 */
export type ProcessInvocation = readonly string[];

/**
 * Result of a single converter attempt
 */
export interface ConversionOutcome {
  readonly success: boolean;
  /** Null when the process never reported a status (spawn error, timeout, abort) */
  readonly exitCode: number | null;
  /** Captured standard-error text */
  readonly diagnostic: string;
  readonly mode: InvocationMode;
  readonly durationMs: number;
}

// ============================================================================
// Layers
// ============================================================================

export type LayerName = 'waypoints' | 'routes' | 'route_points' | 'tracks' | 'track_points';

export type LayerCollection = FeatureCollection<Geometry, GeoJsonProperties>;

export interface ConvertedLayer {
  readonly name: LayerName;
  readonly featureCount: number;
  readonly features: LayerCollection;
}

export type LayerSet = readonly ConvertedLayer[];
