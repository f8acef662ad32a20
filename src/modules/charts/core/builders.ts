/**
 * Chart builders
 *
 * Bind table columns to chart marks. A builder never throws: an empty table
 * or a column the table does not have yields the `no_data` result instead.
 */

import { CANONICAL_FEATURE_ID_KEY } from '../../regions/core/types.js';
import { findUnmatchedRegions } from '../../regions/core/normalize.js';
import {
  hasColumn,
  isEmptyTable,
  toNumber,
  type CellValue,
  type DataTable,
} from '../../../common/types/table.js';

import { formatColorbarTitle, formatFieldLabel } from './labels.js';
import {
  chartOk,
  noData,
  type AxisSpec,
  type BarChartSpec,
  type ChartResult,
  type ChoroplethSpec,
  type GeoViewport,
  type LineChartSpec,
  type PieChartSpec,
  type PieTextInfo,
  type ScatterChartSpec,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const NO_MAP_DATA_MESSAGE = 'No data available for the map.';
export const NO_CHART_DATA_MESSAGE = 'No data available for the chart.';

export const DEFAULT_COLOR_SCALE = 'Viridis';
export const MAP_HEIGHT = 600;
export const CHART_HEIGHT = 400;
export const DEFAULT_PIE_HOLE = 0.4;

/** Viewport framing the Indian subcontinent */
export const INDIA_GEO_VIEWPORT: GeoViewport = {
  featureIdKey: CANONICAL_FEATURE_ID_KEY,
  locationMode: 'geojson-id',
  projection: {
    type: 'conic conformal',
    parallels: [12.47, 35.17],
    rotation: { lat: 24, lon: 80 },
  },
  lonRange: [68, 98],
  latRange: [6, 38],
  visible: false,
};

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Checks the table can back a chart; returns the no_data result when it cannot.
 */
const checkBindable = (
  table: DataTable,
  fields: readonly string[],
  emptyMessage: string
): { status: 'no_data'; message: string } | null => {
  if (isEmptyTable(table)) {
    return noData(emptyMessage);
  }

  const missing = fields.filter((field) => !hasColumn(table, field));
  if (missing.length > 0) {
    return noData(`${emptyMessage} Missing column(s): ${missing.join(', ')}.`);
  }

  return null;
};

const column = (table: DataTable, field: string): CellValue[] =>
  table.rows.map((row) => row[field] ?? null);

const numericColumn = (table: DataTable, field: string): (number | null)[] =>
  table.rows.map((row) => toNumber(row[field]));

const textColumn = (table: DataTable, field: string): string[] =>
  table.rows.map((row) => {
    const value = row[field];
    return value === undefined || value === null ? '' : String(value);
  });

const axis = (field: string, title?: string, tickFormat?: string): AxisSpec => ({
  field,
  title: title ?? formatFieldLabel(field),
  ...(tickFormat !== undefined && { tickFormat }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Choropleth
// ─────────────────────────────────────────────────────────────────────────────

export interface ChoroplethOptions {
  valueField: string;
  title: string;
  /** Column holding canonical region keys. Default: 'State' */
  locationField?: string;
  colorScale?: string;
  /** Unit shown in the colorbar title, e.g. '₹M' */
  valueSuffix?: string;
  /** Canonical keys of the geo reference; used to report unmatched locations */
  geoKeys?: ReadonlySet<string>;
}

export const buildChoropleth = (
  table: DataTable,
  options: ChoroplethOptions
): ChartResult<ChoroplethSpec> => {
  const { valueField, title } = options;
  const locationField = options.locationField ?? 'State';

  const unavailable = checkBindable(table, [locationField, valueField], NO_MAP_DATA_MESSAGE);
  if (unavailable !== null) return unavailable;

  const locations: string[] = [];
  const values: (number | null)[] = [];

  for (const row of table.rows) {
    const location = row[locationField];
    if (typeof location !== 'string' || location === '') continue;

    locations.push(location);
    values.push(toNumber(row[valueField]));
  }

  if (locations.length === 0) {
    return noData(NO_MAP_DATA_MESSAGE);
  }

  return chartOk({
    kind: 'choropleth',
    title,
    height: MAP_HEIGHT,
    margin: { r: 0, t: 50, l: 0, b: 0 },
    geo: INDIA_GEO_VIEWPORT,
    locationField,
    valueField,
    locations,
    values,
    colorScale: options.colorScale ?? DEFAULT_COLOR_SCALE,
    colorbarTitle: formatColorbarTitle(valueField, options.valueSuffix ?? ''),
    border: { color: 'white', width: 1.5 },
    unmatchedLocations:
      options.geoKeys !== undefined ? findUnmatchedRegions(locations, options.geoKeys) : [],
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Pie
// ─────────────────────────────────────────────────────────────────────────────

export interface PieChartOptions {
  valueField: string;
  labelField: string;
  title: string;
  hole?: number;
  textInfo?: PieTextInfo;
  /** Offset applied to every slice */
  pull?: number;
  colorSequence?: string;
}

export const buildPieChart = (
  table: DataTable,
  options: PieChartOptions
): ChartResult<PieChartSpec> => {
  const { valueField, labelField, title } = options;

  const unavailable = checkBindable(table, [valueField, labelField], NO_CHART_DATA_MESSAGE);
  if (unavailable !== null) return unavailable;

  const labels = textColumn(table, labelField);

  return chartOk({
    kind: 'pie',
    title,
    height: CHART_HEIGHT,
    labelField,
    valueField,
    labels,
    values: numericColumn(table, valueField),
    hole: options.hole ?? DEFAULT_PIE_HOLE,
    ...(options.textInfo !== undefined && { textInfo: options.textInfo }),
    ...(options.pull !== undefined && { pull: labels.map(() => options.pull ?? 0) }),
    ...(options.colorSequence !== undefined && { colorSequence: options.colorSequence }),
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Bar
// ─────────────────────────────────────────────────────────────────────────────

export interface BarChartOptions {
  xField: string;
  yField: string;
  title: string;
  /** Default: true */
  showValues?: boolean;
}

export const buildBarChart = (
  table: DataTable,
  options: BarChartOptions
): ChartResult<BarChartSpec> => {
  const { xField, yField, title } = options;

  const unavailable = checkBindable(table, [xField, yField], NO_CHART_DATA_MESSAGE);
  if (unavailable !== null) return unavailable;

  return chartOk({
    kind: 'bar',
    title,
    height: CHART_HEIGHT,
    x: axis(xField),
    y: axis(yField),
    xValues: column(table, xField),
    yValues: numericColumn(table, yField),
    showValues: options.showValues ?? true,
    colorField: xField,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Line
// ─────────────────────────────────────────────────────────────────────────────

export interface LineChartOptions {
  xField: string;
  yField: string;
  title: string;
  xTitle?: string;
  yTitle?: string;
  /** Number format of the y axis ticks, e.g. '.2e' */
  yTickFormat?: string;
  height?: number;
}

export const buildLineChart = (
  table: DataTable,
  options: LineChartOptions
): ChartResult<LineChartSpec> => {
  const { xField, yField, title } = options;

  const unavailable = checkBindable(table, [xField, yField], NO_CHART_DATA_MESSAGE);
  if (unavailable !== null) return unavailable;

  return chartOk({
    kind: 'line',
    title,
    ...(options.height !== undefined && { height: options.height }),
    x: axis(xField, options.xTitle),
    y: axis(yField, options.yTitle, options.yTickFormat),
    xValues: column(table, xField),
    yValues: numericColumn(table, yField),
    markers: true,
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Scatter
// ─────────────────────────────────────────────────────────────────────────────

export interface ScatterChartOptions {
  xField: string;
  yField: string;
  /** Column labelling each point */
  textField: string;
  title: string;
}

export const buildScatterChart = (
  table: DataTable,
  options: ScatterChartOptions
): ChartResult<ScatterChartSpec> => {
  const { xField, yField, textField, title } = options;

  const unavailable = checkBindable(table, [xField, yField, textField], NO_CHART_DATA_MESSAGE);
  if (unavailable !== null) return unavailable;

  return chartOk({
    kind: 'scatter',
    title,
    x: axis(xField),
    y: axis(yField),
    xValues: numericColumn(table, xField),
    yValues: numericColumn(table, yField),
    textField,
    text: textColumn(table, textField),
  });
};
