/**
 * Output Formatting for CLI Commands
 *
 * @module cli/lib/output
 */

import type { LayerSet } from '../../core/types.js';

export type OutputFormat = 'table' | 'json' | 'csv';

export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
}

export interface LayerSummary extends Record<string, unknown> {
  readonly index: number;
  readonly name: string;
  readonly featureCount: number;
  readonly geometry: string;
}

export const LAYER_COLUMNS: readonly TableColumn[] = [
  { key: 'index', header: '#', align: 'right' },
  { key: 'name', header: 'Layer' },
  { key: 'geometry', header: 'Geometry' },
  { key: 'featureCount', header: 'Features', align: 'right' },
];

export function summarizeLayers(layers: LayerSet): LayerSummary[] {
  return layers.map((layer, index) => ({
    index,
    name: layer.name,
    featureCount: layer.featureCount,
    geometry: layer.features.features[0]?.geometry?.type ?? '-',
  }));
}

function cell(value: unknown): string {
  return String(value ?? '');
}

/**
 * Format rows as a fixed-width table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No layers.';
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => cell(row[col.key]).length))
  );

  const pad = (value: string, i: number): string =>
    columns[i].align === 'right' ? value.padStart(widths[i]) : value.padEnd(widths[i]);

  const headerRow = columns.map((col, i) => pad(col.header, i)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((col, i) => pad(cell(row[col.key]), i)).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');
  const dataRows = data.map((row) =>
    columns.map((col) => escapeCSV(cell(row[col.key]))).join(',')
  );
  return [headerRow, ...dataRows].join('\n');
}

export function formatOutput<T extends Record<string, unknown>>(
  data: readonly T[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return JSON.stringify(data, null, 2);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
    default:
      return formatTable(data, columns);
  }
}
