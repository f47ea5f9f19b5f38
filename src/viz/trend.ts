import * as d3 from 'd3';
import { axisLabel, formatNumber } from '../stats';
import type { IndicatorKey, TrendSlice } from '../types';
import { escapeXml, type ChartSize, DEFAULT_SIZE } from './svg';

export interface TrendPoint {
  year: number;
  value: number;
  x: number;
  y: number;
}

export interface TrendSeries {
  state: string;
  color: string;
  points: TrendPoint[];
  path: string;
}

export interface TrendChartSpec {
  title: string;
  xLabel: string;
  yLabel: string;
  size: ChartSize;
  series: TrendSeries[];
  xDomain: [number, number];
  yDomain: [number, number];
}

export interface TrendChartParams {
  indicator: IndicatorKey;
  size?: ChartSize;
}

const margin = { top: 60, right: 20, bottom: 40, left: 60 };

/**
 * One line per state across all years. Relies on the slice being grouped by state
 * with ascending years inside each group.
 */
export function buildTrendChart(slice: TrendSlice, { indicator, size = DEFAULT_SIZE }: TrendChartParams): TrendChartSpec | null {
  if (slice.length === 0) {
    return null;
  }
  const label = axisLabel(indicator);
  const plotWidth = size.width - margin.left - margin.right;
  const plotHeight = size.height - margin.top - margin.bottom;

  const [minYear, maxYear] = d3.extent(slice, (d) => d.year);
  const [minValue, maxValue] = d3.extent(slice, (d) => d.value);
  const xScale = d3
    .scaleLinear()
    .domain([minYear ?? 0, maxYear ?? 0])
    .range([margin.left, margin.left + plotWidth]);
  const yScale = d3
    .scaleLinear()
    .domain([minValue ?? 0, maxValue ?? 0])
    .nice()
    .range([margin.top + plotHeight, margin.top]);
  const line = d3
    .line<TrendPoint>()
    .x((p) => p.x)
    .y((p) => p.y);

  const grouped = d3.group(slice, (d) => d.state);
  const series = Array.from(grouped, ([state, rows], i): TrendSeries => {
    const points = rows.map((d) => ({ year: d.year, value: d.value, x: xScale(d.year), y: yScale(d.value) }));
    return {
      state,
      color: d3.schemeTableau10[i % d3.schemeTableau10.length],
      points,
      path: line(points) ?? ''
    };
  });

  const [y0, y1] = yScale.domain();
  return {
    title: `${label} Trends Over Time`,
    xLabel: 'Year',
    yLabel: label,
    size,
    series,
    xDomain: [minYear ?? 0, maxYear ?? 0],
    yDomain: [y0, y1]
  };
}

export function trendChartToSvg(spec: TrendChartSpec): string {
  const { width, height } = spec.size;
  const body = spec.series
    .map((s) => {
      const markers = s.points
        .map(
          (p) =>
            `<circle cx="${p.x}" cy="${p.y}" r="3" fill="${s.color}"><title>${escapeXml(s.state)} ${p.year}: ${formatNumber(p.value)}</title></circle>`
        )
        .join('');
      return `  <g class="series" data-state="${escapeXml(s.state)}"><path d="${s.path}" fill="none" stroke="${s.color}" stroke-width="2"/>${markers}</g>`;
    })
    .join('\n');
  const legend = spec.series
    .map((s, i) => `<text x="${margin.left + i * 110}" y="44" fill="${s.color}">${escapeXml(s.state)}</text>`)
    .join('');
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}">`,
    `  <text class="chart-title" x="${width / 2}" y="24" text-anchor="middle">${escapeXml(spec.title)}</text>`,
    `  <g class="legend">${legend}</g>`,
    body,
    `  <text class="axis-label" x="${width / 2}" y="${height - 8}" text-anchor="middle">${escapeXml(spec.xLabel)}</text>`,
    '</svg>'
  ].join('\n');
}
