/**
 * CLI Command Tests
 *
 * Commands run through createProgram() with a context whose bridges use a
 * RecordingRunner, so no converter is needed.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConversionBridge } from '../../../bridge/conversion-bridge.js';
import type { BridgeConfig } from '../../../core/config.js';
import { createProgram, type CLIContext, type ExitCode } from '../../../cli/index.js';
import { formatCsv, formatTable, LAYER_COLUMNS } from '../../../cli/lib/output.js';
import { MemoryFileStore } from '../../../storage/memory-store.js';
import { RoutedFileStore } from '../../../storage/routed-store.js';
import { fixture, RecordingRunner, type ScriptedAttempt } from '../../utils/fake-runner.js';

interface Harness {
  readonly ctx: CLIContext;
  readonly stdout: string[];
  readonly stderr: string[];
  readonly exitCodes: ExitCode[];
  readonly configs: BridgeConfig[];
  readonly runner: RecordingRunner;
  run(...args: string[]): Promise<void>;
}

function harness(script: readonly ScriptedAttempt[], env: NodeJS.ProcessEnv = {}): Harness {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const exitCodes: ExitCode[] = [];
  const configs: BridgeConfig[] = [];
  const runner = new RecordingRunner(script);

  const ctx: CLIContext = {
    env,
    createBridge: (config) => {
      configs.push(config);
      return new ConversionBridge({ config, store: new RoutedFileStore(new MemoryFileStore()), runner });
    },
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    setExitCode: (code) => exitCodes.push(code),
  };

  return {
    ctx,
    stdout,
    stderr,
    exitCodes,
    configs,
    runner,
    run: async (...args) => {
      await createProgram(ctx).exitOverride().parseAsync(['node', 'gps-bridge', ...args]);
    },
  };
}

function layerNames(document: unknown): string[] {
  if (typeof document !== 'object' || document === null || !('layers' in document)) return [];
  const { layers } = document;
  return typeof layers === 'object' && layers !== null ? Object.keys(layers) : [];
}

describe('gps-bridge CLI', () => {
  let dir: string;
  let source: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gps-bridge-cli-'));
    source = join(dir, 'track.gdb');
    writeFileSync(source, 'GDB-BYTES');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('info', () => {
    test('prints a layer table', async () => {
      const h = harness([{ exitCode: 0, stdout: fixture('waypoints-only.gpx') }]);
      await h.run('info', `GPSBABEL:garmin:${source}`);

      expect(h.stdout).toEqual([
        [
          '# | Layer     | Geometry | Features',
          ['-', '-'.repeat(9), '-'.repeat(8), '-'.repeat(8)].join('-+-'),
          '0 | waypoints | Point    |        2',
        ].join('\n'),
      ]);
      expect(h.exitCodes).toEqual([0]);
    });

    test('prints JSON summaries', async () => {
      const h = harness([{ exitCode: 0, stdout: fixture('full.gpx') }]);
      await h.run('info', `GPSBABEL:gdb:features=routes:${source}`, '--format', 'json');

      expect(JSON.parse(h.stdout[0] ?? '')).toEqual([
        { index: 0, name: 'routes', featureCount: 1, geometry: 'LineString' },
        { index: 1, name: 'route_points', featureCount: 2, geometry: 'Point' },
      ]);
    });

    test('accepts the driver as an option', async () => {
      const h = harness([{ exitCode: 0, stdout: fixture('waypoints-only.gpx') }]);
      await h.run('info', source, '--driver', 'gdb');

      expect(h.runner.calls[0]?.argv.slice(0, 5)).toEqual(['gpsbabel', '-i', 'gdb', '-f', '-']);
      expect(h.exitCodes).toEqual([0]);
    });

    test('reports an open failure with exit code 2', async () => {
      const h = harness([{ exitCode: 1, stderr: 'garmin: no device' }]);
      await h.run('info', 'GPSBABEL:garmin:usb:');

      expect(h.stderr).toEqual(['ConversionFailed: garmin: no device\n  exit status: 1']);
      expect(h.stdout).toEqual([]);
      expect(h.exitCodes).toEqual([2]);
    });

    test('rejects an unknown format with exit code 3', async () => {
      const h = harness([]);
      await h.run('info', 'GPSBABEL:garmin:usb:', '--format', 'xml');

      expect(h.stderr).toEqual(['Error: Unknown format xml']);
      expect(h.exitCodes).toEqual([3]);
      expect(h.configs).toHaveLength(0);
    });
  });

  describe('configuration', () => {
    test('rejects a malformed timeout option', async () => {
      const h = harness([]);
      await h.run('info', 'GPSBABEL:garmin:usb:', '--timeout', 'soon');

      expect(h.stderr).toEqual(['Error: --timeout must be a non-negative integer, got soon']);
      expect(h.exitCodes).toEqual([3]);
      expect(h.configs).toHaveLength(0);
    });

    test('rejects a malformed environment', async () => {
      const h = harness([], { GPSBABEL_TIMEOUT_MS: '-5' });
      await h.run('info', 'GPSBABEL:garmin:usb:');

      expect(h.stderr).toEqual([
        'Error: Invalid environment: GPSBABEL_TIMEOUT_MS must be a non-negative integer',
      ]);
      expect(h.exitCodes).toEqual([3]);
    });

    test('combines environment and options', async () => {
      const h = harness([{ exitCode: 0, stdout: fixture('waypoints-only.gpx') }], {
        GPSBABEL_PATH: '/opt/gpsbabel/bin/gpsbabel',
        GPSBABEL_TIMEOUT_MS: '1000',
        GPSBABEL_TMPDIR: dir,
      });
      await h.run('info', 'GPSBABEL:garmin:usb:', '--use-tempfile', '--timeout', '250');

      expect(h.configs).toEqual([
        {
          converter: { program: '/opt/gpsbabel/bin/gpsbabel', outputFormat: 'gpx,gpxver=1.1', timeoutMs: 250 },
          temp: { useTempFile: true, directory: dir },
        },
      ]);
      expect(h.runner.calls[0]?.argv[0]).toBe('/opt/gpsbabel/bin/gpsbabel');
      expect(h.runner.calls[0]?.timeoutMs).toBe(250);
    });
  });

  describe('convert', () => {
    test('writes GeoJSON layers to stdout', async () => {
      const h = harness([{ exitCode: 0, stdout: fixture('full.gpx') }]);
      await h.run('convert', `GPSBABEL:gdb:features=tracks:${source}`);

      const document: unknown = JSON.parse(h.stdout[0] ?? '');
      expect(document).toMatchObject({
        layers: {
          tracks: { type: 'FeatureCollection', features: [{ geometry: { type: 'MultiLineString' } }] },
          track_points: { type: 'FeatureCollection' },
        },
      });
      expect(layerNames(document)).toEqual(['tracks', 'track_points']);
      expect(h.exitCodes).toEqual([0]);
    });

    test('writes GeoJSON layers to a file', async () => {
      const output = join(dir, 'out.json');
      const h = harness([{ exitCode: 0, stdout: fixture('waypoints-only.gpx') }]);
      await h.run('convert', `GPSBABEL:garmin:${source}`, '-o', output);

      const written: unknown = JSON.parse(readFileSync(output, 'utf8'));
      expect(written).toMatchObject({
        layers: { waypoints: { type: 'FeatureCollection' } },
      });
      expect(h.stdout).toEqual([]);
      expect(h.stderr).toEqual([`Wrote 1 layer(s), 2 feature(s) to ${output}`]);
      expect(h.exitCodes).toEqual([0]);
    });

    test('reports a missing memory source with exit code 2', async () => {
      const h = harness([]);
      await h.run('convert', 'GPSBABEL:gdb:/vsimem/missing.gdb');

      expect(h.exitCodes).toEqual([2]);
      expect(h.stderr[0]?.startsWith('SourceUnreadable: Cannot open file /vsimem/missing.gdb')).toBe(true);
    });
  });
});

describe('output formatting', () => {
  test('formatTable reports an empty set', () => {
    expect(formatTable([], LAYER_COLUMNS)).toBe('No layers.');
  });

  test('formatCsv quotes cells that need it', () => {
    expect(
      formatCsv([{ index: 0, name: 'a,b', geometry: 'say "hi"', featureCount: 1 }], LAYER_COLUMNS)
    ).toBe('#,Layer,Geometry,Features\n0,"a,b","say ""hi""",1');
  });
});
