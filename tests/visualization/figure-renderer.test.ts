import { FigureJsonRenderer, resolveColumn } from '../../src/visualization/figure-renderer';
import { createChartSpec } from '../../src/visualization/chart-spec';
import { priceTable } from '../helpers/fakes';

describe('resolveColumn', () => {
  const columns = ['Date', 'Adj Close', 'Volume'];

  test('exact, then case-insensitive, then substring', () => {
    expect(resolveColumn(columns, 'Volume')).toBe('Volume');
    expect(resolveColumn(columns, 'volume')).toBe('Volume');
    expect(resolveColumn(columns, 'close')).toBe('Adj Close');
    expect(resolveColumn(columns, 'Open')).toBeUndefined();
  });
});

describe('FigureJsonRenderer', () => {
  const renderer = new FigureJsonRenderer();

  test('defaults to a Close line over the x column, skipping non-numeric values', () => {
    const rendered = renderer.render(priceTable(), createChartSpec({ x: 'Date' }));

    expect(rendered.raster).toHaveLength(0);
    expect(JSON.parse(rendered.canonical)).toEqual({
      data: [{ type: 'scatter', mode: 'lines', name: 'Close', x: ['2024-01-02', '2024-01-03'], y: [10, 11.5] }],
      layout: { title: 'Generated Chart', annotations: [], xaxis: {}, yaxis: { tickformat: '.2f' } },
    });
  });

  test('bar charts carry titles, legend and palette', () => {
    const spec = createChartSpec({
      type: 'bar',
      y: ['volume'],
      title: 'Volume',
      xaxisTitle: 'Day',
      yaxisTitle: 'Shares',
      paletteHint: 'corporate',
      showLegend: true,
    });
    const figure = JSON.parse(renderer.render(priceTable(), spec).canonical);

    expect(figure.data).toEqual([{ type: 'bar', name: 'volume', x: [0, 1, 2], y: [100, 120, 90] }]);
    expect(figure.layout).toEqual({
      title: 'Volume',
      annotations: [],
      xaxis: { title: 'Day' },
      yaxis: { title: 'Shares', tickformat: '.2f' },
      showlegend: true,
      colorway: ['#1f3b73', '#4f7cac', '#9db4c0', '#c2a878', '#5c5c5c'],
    });
  });

  test('unknown columns produce an empty-data annotation', () => {
    const figure = JSON.parse(renderer.render(priceTable(), createChartSpec({ y: ['Open'] })).canonical);
    expect(figure.data).toEqual([]);
    expect(figure.layout.annotations).toEqual([
      { text: 'No data available for requested columns', showarrow: false, xref: 'paper', yref: 'paper', x: 0.5, y: 0.5 },
    ]);
  });

  test('is deterministic for the same table and spec', () => {
    const spec = createChartSpec({ y: ['Close'], annotations: [{ text: 'Key event', xref: 'paper', yref: 'paper', x: 0.95, y: 0.95 }] });
    expect(renderer.render(priceTable(), spec).canonical).toBe(renderer.render(priceTable(), spec).canonical);
  });
});
