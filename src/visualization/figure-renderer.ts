/**
 * FigureJsonRenderer — renders a chart spec into a plotly-style figure
 * description. It produces the canonical form only; the raster is empty, so
 * critiques of its output are text-only.
 *
 * Rows are expected as an array of records keyed by column name.
 */

import { TabularPayload } from '../domain/artifact';
import { ChartSpec, DEFAULT_CHART_TITLE, RenderedChart, Renderer } from './chart-spec';

type Row = Record<string, unknown>;

interface Trace {
  type: 'scatter' | 'bar';
  mode?: 'lines';
  name: string;
  x: unknown[];
  y: number[];
}

const PALETTES: Record<string, string[]> = {
  corporate: ['#1f3b73', '#4f7cac', '#9db4c0', '#c2a878', '#5c5c5c'],
};

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rowsOf(table: TabularPayload): Row[] {
  return Array.isArray(table.rows) ? table.rows.filter(isRow) : [];
}

/** Exact name, then case-insensitive, then substring. */
export function resolveColumn(columns: readonly string[], target: string): string | undefined {
  const lower = target.toLowerCase();
  return (
    columns.find((c) => c === target) ??
    columns.find((c) => c.toLowerCase() === lower) ??
    columns.find((c) => c.toLowerCase().includes(lower))
  );
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export class FigureJsonRenderer implements Renderer {
  render(table: TabularPayload, spec: ChartSpec): RenderedChart {
    const rows = rowsOf(table);
    const yColumns = spec.y.length > 0 ? spec.y : defaultYColumns(table.columns);
    const xColumn = spec.x && table.columns.includes(spec.x) ? spec.x : undefined;

    const traces: Trace[] = [];
    for (const target of yColumns) {
      const column = resolveColumn(table.columns, target);
      if (!column) continue;
      const x: unknown[] = [];
      const y: number[] = [];
      rows.forEach((row, index) => {
        const value = toNumber(row[column]);
        if (value === null) return;
        x.push(xColumn ? row[xColumn] : index);
        y.push(value);
      });
      if (y.length === 0) continue;
      traces.push(
        spec.type === 'line'
          ? { type: 'scatter', mode: 'lines', name: target, x, y }
          : { type: 'bar', name: target, x, y },
      );
    }

    const annotations: unknown[] = spec.annotations.map((a) => ({ ...a, showarrow: false }));
    if (traces.length === 0) {
      annotations.push({
        text: 'No data available for requested columns',
        showarrow: false,
        xref: 'paper',
        yref: 'paper',
        x: 0.5,
        y: 0.5,
      });
    }

    const layout: Record<string, unknown> = {
      title: spec.title ?? DEFAULT_CHART_TITLE,
      annotations,
      xaxis: spec.xaxisTitle ? { title: spec.xaxisTitle } : {},
      yaxis: spec.yaxisTitle ? { title: spec.yaxisTitle, tickformat: '.2f' } : { tickformat: '.2f' },
    };
    if (spec.showLegend !== undefined) {
      layout.showlegend = spec.showLegend;
    }
    if (spec.paletteHint && PALETTES[spec.paletteHint]) {
      layout.colorway = PALETTES[spec.paletteHint];
    }

    return { canonical: JSON.stringify({ data: traces, layout }), raster: new Uint8Array(0) };
  }
}

function defaultYColumns(columns: readonly string[]): string[] {
  const close = resolveColumn(columns, 'Close');
  if (close) return ['Close'];
  return columns.length > 0 ? [columns[0]] : [];
}
