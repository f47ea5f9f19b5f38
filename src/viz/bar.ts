import * as d3 from 'd3';
import { axisLabel, formatNumber } from '../stats';
import type { CurrentSlice, IndicatorKey, Region } from '../types';
import { escapeXml, type ChartSize, DEFAULT_SIZE } from './svg';

export interface BarDatum {
  state: string;
  value: number;
  region: Region;
  rank: number;
  x: number;
  y: number;
  width: number;
  height: number;
  color: string;
}

export interface BarChartSpec {
  title: string;
  xLabel: string;
  yLabel: string;
  size: ChartSize;
  /** Ascending by value; the largest bar is drawn on top. */
  bars: BarDatum[];
  xDomain: [number, number];
}

export interface BarChartParams {
  indicator: IndicatorKey;
  year: number;
  size?: ChartSize;
}

const margin = { top: 40, right: 20, bottom: 40, left: 140 };

/**
 * Horizontal bar comparison of the selected states for one year. Returns `null` for
 * an empty slice.
 */
export function buildBarChart(slice: CurrentSlice, { indicator, year, size = DEFAULT_SIZE }: BarChartParams): BarChartSpec | null {
  if (slice.length === 0) {
    return null;
  }
  const label = axisLabel(indicator);
  const sorted = d3.sort(slice, (d) => d.value);
  const plotWidth = size.width - margin.left - margin.right;
  const plotHeight = size.height - margin.top - margin.bottom;

  const [min, max] = d3.extent(sorted, (d) => d.value);
  const low = min ?? 0;
  const high = max ?? 0;
  // An all-zero slice would collapse the domain and map every bar to mid-range.
  const xScale = d3.scaleLinear().domain([0, high > 0 ? high : 1]).nice().range([0, plotWidth]);
  const yScale = d3
    .scaleBand<string>()
    .domain(sorted.map((d) => d.state).reverse())
    .range([0, plotHeight])
    .padding(0.15);
  const color = d3.scaleSequential(d3.interpolateBlues).domain([low, high]);

  const bars = sorted.map((d) => ({
    state: d.state,
    value: d.value,
    region: d.region,
    rank: d.rank,
    x: margin.left,
    y: margin.top + (yScale(d.state) ?? 0),
    width: xScale(d.value),
    height: yScale.bandwidth(),
    color: color(d.value)
  }));

  const [d0, d1] = xScale.domain();
  return {
    title: `${label} Comparison - ${year}`,
    xLabel: label,
    yLabel: 'State',
    size,
    bars,
    xDomain: [d0, d1]
  };
}

export function barChartToSvg(spec: BarChartSpec): string {
  const { width, height } = spec.size;
  const rects = spec.bars
    .map(
      (bar) =>
        `  <g class="bar"><rect x="${bar.x}" y="${bar.y}" width="${bar.width}" height="${bar.height}" fill="${bar.color}"><title>${escapeXml(bar.state)}: ${formatNumber(bar.value)}</title></rect>` +
        `<text class="bar-label" x="${bar.x - 6}" y="${bar.y + bar.height / 2}" text-anchor="end" dominant-baseline="middle">${escapeXml(bar.state)}</text></g>`
    )
    .join('\n');
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}">`,
    `  <text class="chart-title" x="${width / 2}" y="24" text-anchor="middle">${escapeXml(spec.title)}</text>`,
    rects,
    `  <text class="axis-label" x="${margin.left + (width - margin.left - margin.right) / 2}" y="${height - 8}" text-anchor="middle">${escapeXml(spec.xLabel)}</text>`,
    '</svg>'
  ].join('\n');
}
