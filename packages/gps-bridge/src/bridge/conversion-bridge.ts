/**
 * Conversion Bridge
 *
 * Opens a vendor/device source through the external converter and exposes
 * the result as GeoJSON layers.
 *
 * FLOW:
 * 1. Parse and validate the datasource (nothing is spawned on failure)
 * 2. Classify the source: special paths go straight to the converter,
 *    regular files are streamed through standard input
 * 3. Retry once in direct mode when the converter refuses piped input
 * 4. Open the artifact and keep the requested, non-empty layers
 *
 * The bridge owns its temp artifact and the opened dataset. `close()` (or a
 * new open) releases both; failed opens release them before returning.
 */

import type { Readable } from 'node:stream';
import {
  bridgeError,
  BridgeOpenError,
  fail,
  ok,
  type BridgeError,
  type Result,
} from '../core/errors.js';
import { DEFAULT_CONFIG, type BridgeConfig } from '../core/config.js';
import type {
  ConversionOutcome,
  ConversionRequest,
  ConvertedLayer,
  LayerSet,
  OpenOptions,
  SourceKind,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { buildInvocation, STDIN_TOKEN, type InvocationOptions } from '../invocation/build-invocation.js';
import { extractLayers } from '../layers/extract-layers.js';
import { ProcessBridge } from '../process/process-bridge.js';
import type { ProcessRunner } from '../process/process-runner.js';
import { GpxArtifactReader } from '../reader/gpx-reader.js';
import type { ArtifactDataset, ArtifactReader } from '../reader/types.js';
import { parseConversionRequest } from '../request/parse-request.js';
import {
  afterRetry,
  classifyAttempt,
  isPipingUnsupported,
  type TerminalState,
} from '../retry/retry-policy.js';
import { isValidDriverName } from '../security/driver-name.js';
import { classifySource } from '../source/classify.js';
import type { FileStore } from '../storage/file-store.js';
import { RoutedFileStore } from '../storage/routed-store.js';
import { TempArtifactManager } from '../temp/temp-artifact.js';

const log = createLogger({ module: 'bridge' });

export type OpenResult = Result<LayerSet>;

export interface ConversionBridgeOptions {
  readonly config?: BridgeConfig;
  readonly store?: FileStore;
  readonly runner?: ProcessRunner;
  readonly reader?: ArtifactReader;
}

/**
 * Per-call controls at the process boundary
 */
export interface AttemptControl {
  /** Overrides `converter.timeoutMs` for this open */
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export type BridgeOpenOptions = OpenOptions & AttemptControl;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConversionBridge {
  readonly config: BridgeConfig;
  private readonly store: FileStore;
  private readonly reader: ArtifactReader;
  private readonly temp: TempArtifactManager;
  private readonly process: ProcessBridge;

  private dataset: ArtifactDataset | null = null;
  private layerSet: LayerSet = [];
  private openedRequest: ConversionRequest | null = null;

  constructor(options: ConversionBridgeOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.store = options.store ?? new RoutedFileStore();
    this.reader = options.reader ?? new GpxArtifactReader(this.store);
    this.temp = new TempArtifactManager(
      { useTempFile: this.config.temp.useTempFile, directory: this.config.temp.directory },
      this.store
    );
    this.process = new ProcessBridge(this.store, options.runner, this.config.converter.timeoutMs);
  }

  // ==========================================================================
  // Open / close
  // ==========================================================================

  /**
   * Open a datasource string, with optional out-of-band driver/filename
   */
  async open(datasource: string, options: BridgeOpenOptions = {}): Promise<OpenResult> {
    await this.close();

    const parsed = parseConversionRequest(datasource, {
      filename: options.filename,
      driver: options.driver,
    });
    if (!parsed.success) {
      return this.failed(parsed.error);
    }

    return this.openRequest(parsed.data, options);
  }

  /**
   * Like `open()`, but throws BridgeOpenError on failure
   */
  async openOrThrow(datasource: string, options: BridgeOpenOptions = {}): Promise<LayerSet> {
    const result = await this.open(datasource, options);
    if (!result.success) {
      throw new BridgeOpenError(result.error);
    }
    return result.data;
  }

  /**
   * Open an already-parsed request
   */
  async openRequest(request: ConversionRequest, control: AttemptControl = {}): Promise<OpenResult> {
    await this.close();

    if (!isValidDriverName(request.driver)) {
      return this.failed(
        bridgeError('InvalidDriverName', `Invalid GPSBabel driver name: ${JSON.stringify(request.driver)}`)
      );
    }

    const sourceKind = classifySource(request.sourcePath);
    const outputPath = this.temp.allocate();

    try {
      let converted: TerminalState;
      try {
        converted = await this.convert(request, sourceKind, outputPath, control);
      } catch (error) {
        return this.failed(bridgeError('ConversionFailed', errorMessage(error)));
      }
      if (!converted.success) {
        return this.failed(converted.error);
      }

      let dataset: ArtifactDataset | null;
      try {
        dataset = await this.reader.open(outputPath);
      } catch (error) {
        return this.failed(
          bridgeError('ArtifactUnreadable', `Cannot open converted output: ${errorMessage(error)}`)
        );
      }
      if (dataset === null) {
        return this.failed(
          bridgeError('ArtifactUnreadable', 'Converter output is not a readable GPX document', {
            diagnostic: converted.outcome.diagnostic,
            exitCode: converted.outcome.exitCode,
          })
        );
      }

      const layers = extractLayers(dataset, request.categories);
      if (layers.length === 0) {
        dataset.close();
        return this.failed(
          bridgeError('EmptyResult', 'Conversion produced no features in the requested categories', {
            diagnostic: converted.outcome.diagnostic,
            exitCode: converted.outcome.exitCode,
          })
        );
      }

      this.dataset = dataset;
      this.layerSet = layers;
      this.openedRequest = request;

      log.info('Opened converted source', {
        source: request.sourcePath,
        driver: request.driver,
        mode: converted.outcome.mode,
        layers: layers.map((layer) => `${layer.name}:${layer.featureCount}`),
      });
      return ok(layers);
    } finally {
      if (this.dataset === null) {
        await this.temp.release();
      }
    }
  }

  /**
   * Release the opened dataset and remove the temp artifact. Idempotent.
   */
  async close(): Promise<void> {
    if (this.dataset !== null) {
      this.dataset.close();
      this.dataset = null;
    }
    this.layerSet = [];
    this.openedRequest = null;
    await this.temp.release();
  }

  // ==========================================================================
  // Layer access
  // ==========================================================================

  get layers(): LayerSet {
    return this.layerSet;
  }

  get layerCount(): number {
    return this.layerSet.length;
  }

  get request(): ConversionRequest | null {
    return this.openedRequest;
  }

  /** Path of the live temp artifact, while a dataset is open */
  get artifactPath(): string | null {
    return this.temp.path;
  }

  getLayer(index: number): ConvertedLayer | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.layerSet.length) {
      return null;
    }
    return this.layerSet[index];
  }

  getLayerByName(name: string): ConvertedLayer | null {
    return this.layerSet.find((layer) => layer.name === name) ?? null;
  }

  // ==========================================================================
  // Conversion
  // ==========================================================================

  private invocationOptions(): InvocationOptions {
    return {
      program: this.config.converter.program,
      outputFormat: this.config.converter.outputFormat,
    };
  }

  private async convert(
    request: ConversionRequest,
    sourceKind: SourceKind,
    outputPath: string,
    control: AttemptControl
  ): Promise<TerminalState> {
    let first: ConversionOutcome;

    if (sourceKind === 'special') {
      first = await this.runDirect(request, outputPath, control);
    } else {
      let source: Readable;
      try {
        source = await this.store.openRead(request.sourcePath);
      } catch (error) {
        return {
          state: 'Terminal',
          success: false,
          error: bridgeError(
            'SourceUnreadable',
            `Cannot open file ${request.sourcePath}: ${errorMessage(error)}`
          ),
        };
      }

      try {
        first = await this.process.run(buildInvocation(request, STDIN_TOKEN, this.invocationOptions()), {
          mode: 'piped',
          stdin: source,
          outputPath,
          quiet: true,
          ...control,
        });
      } finally {
        source.destroy();
      }
    }

    const next = classifyAttempt({
      outcome: first,
      sourceKind,
      driver: request.driver,
      sourceIsRealFile:
        !first.success && isPipingUnsupported(first.diagnostic)
          ? await this.isRealFile(request.sourcePath)
          : false,
    });

    if (next.state !== 'RetryingDirect') {
      return next;
    }

    log.info('Converter refused piped input, retrying with the source path', {
      source: request.sourcePath,
      driver: request.driver,
    });
    return afterRetry(await this.runDirect(request, outputPath, control));
  }

  private runDirect(
    request: ConversionRequest,
    outputPath: string,
    control: AttemptControl
  ): Promise<ConversionOutcome> {
    return this.process.run(buildInvocation(request, request.sourcePath, this.invocationOptions()), {
      mode: 'direct',
      outputPath,
      ...control,
    });
  }

  private async isRealFile(path: string): Promise<boolean> {
    if (this.store.isVirtual(path)) {
      return false;
    }
    return (await this.store.stat(path)) !== null;
  }

  private failed(error: BridgeError): OpenResult {
    const meta = { kind: error.kind, exitCode: error.exitCode, diagnostic: error.diagnostic };
    if (error.kind === 'InvalidDriverName') {
      log.error(error.message, meta);
    } else {
      log.warn(error.message, meta);
    }
    return fail(error);
  }
}
