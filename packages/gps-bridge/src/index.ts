/**
 * gps-bridge
 *
 * Opens GPS device and vendor formats through the GPSBabel converter and
 * exposes the result as GeoJSON layers.
 *
 * @example
 * ```typescript
 * import { ConversionBridge, loadConfigFromEnv } from 'gps-bridge';
 *
 * const bridge = new ConversionBridge({ config: loadConfigFromEnv() });
 * const result = await bridge.open('GPSBABEL:garmin:features=waypoints:/data/track.gdb');
 * if (result.success) {
 *   for (const layer of result.data) console.log(layer.name, layer.featureCount);
 * }
 * await bridge.close();
 * ```
 */

export * from './core/types.js';
export * from './core/errors.js';
export * from './core/config.js';
export { createLogger, logger, Logger, type LogLevel, type LogMetadata } from './core/utils/logger.js';

export * from './security/driver-name.js';
export * from './request/parse-request.js';
export * from './source/classify.js';
export * from './invocation/build-invocation.js';

export * from './storage/file-store.js';
export { NodeFileStore } from './storage/node-store.js';
export { MemoryFileStore } from './storage/memory-store.js';
export { RoutedFileStore } from './storage/routed-store.js';
export { TempArtifactManager, type TempArtifactOptions } from './temp/temp-artifact.js';

export * from './process/process-runner.js';
export * from './process/process-bridge.js';
export * from './retry/retry-policy.js';

export * from './reader/types.js';
export { GpxArtifactReader, GPX_LAYER_NAMES, buildGpxLayers } from './reader/gpx-reader.js';
export * from './layers/extract-layers.js';

export * from './bridge/conversion-bridge.js';
