/**
 * Chart specification and renderer contract.
 */

import { TabularPayload } from '../domain/artifact';

export type ChartType = 'line' | 'bar';

export interface ChartAnnotation {
  text: string;
  xref: 'paper' | 'x';
  yref: 'paper' | 'y';
  x: number | string;
  y: number | string;
}

export interface ChartSpec {
  type: ChartType;
  /** Column for the x axis; the row position when unset. */
  x?: string;
  /** Columns to plot, one trace each. */
  y: string[];
  title?: string;
  xaxisTitle?: string;
  yaxisTitle?: string;
  paletteHint?: string;
  showLegend?: boolean;
  annotations: ChartAnnotation[];
  /** Every feedback text applied so far, verbatim. */
  notes: string[];
}

export const DEFAULT_CHART_TITLE = 'Generated Chart';

/** Fill in the list fields a partial spec may omit. */
export function createChartSpec(partial: Partial<ChartSpec> = {}): ChartSpec {
  return {
    ...partial,
    type: partial.type ?? 'line',
    y: [...(partial.y ?? [])],
    annotations: (partial.annotations ?? []).map((a) => ({ ...a })),
    notes: [...(partial.notes ?? [])],
  };
}

export function cloneChartSpec(spec: ChartSpec): ChartSpec {
  return createChartSpec(spec);
}

/** A rendered chart: a canonical serialized form plus raster bytes (PNG). */
export interface RenderedChart {
  canonical: string;
  raster: Uint8Array;
}

/** Rendering result as seen by the refinement loop; a failed render is degraded, not thrown. */
export interface RenderOutcome extends RenderedChart {
  error?: string;
}

/** Deterministic given (table, spec). May throw; callers degrade the failure. */
export interface Renderer {
  render(table: TabularPayload, spec: ChartSpec): RenderedChart | Promise<RenderedChart>;
}
