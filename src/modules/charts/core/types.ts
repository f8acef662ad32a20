/**
 * Charts Module - Core Types
 *
 * Abstract chart specifications. They carry the data already bound to
 * marks plus the presentation settings; any plotting front end can render them.
 */

import type { CellValue } from '../../../common/types/table.js';

export type ChartKind = 'choropleth' | 'pie' | 'bar' | 'line' | 'scatter';

export interface AxisSpec {
  field: string;
  title: string;
  tickFormat?: string;
}

export interface ChartMargin {
  r: number;
  t: number;
  l: number;
  b: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Choropleth
// ─────────────────────────────────────────────────────────────────────────────

export interface MapProjection {
  type: 'conic conformal';
  parallels: [number, number];
  rotation: { lat: number; lon: number };
}

export interface GeoViewport {
  /** Property path joining locations to GeoJSON features */
  featureIdKey: string;
  locationMode: 'geojson-id';
  projection: MapProjection;
  lonRange: [number, number];
  latRange: [number, number];
  /** Base map (coastlines, frames) hidden; only the features are drawn */
  visible: false;
}

export interface ChoroplethSpec {
  kind: 'choropleth';
  title: string;
  height: number;
  margin: ChartMargin;
  geo: GeoViewport;
  locationField: string;
  valueField: string;
  locations: string[];
  values: (number | null)[];
  colorScale: string;
  colorbarTitle: string;
  border: { color: string; width: number };
  /** Locations without a matching feature; they stay in the data and render unfilled */
  unmatchedLocations: string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Cartesian & pie
// ─────────────────────────────────────────────────────────────────────────────

export type PieTextInfo = 'percent' | 'label' | 'value' | 'percent+label' | 'label+value';

export interface PieChartSpec {
  kind: 'pie';
  title: string;
  height: number;
  labelField: string;
  valueField: string;
  labels: string[];
  values: (number | null)[];
  hole: number;
  textInfo?: PieTextInfo;
  /** Per-slice offset, aligned with labels */
  pull?: number[];
  colorSequence?: string;
}

export interface BarChartSpec {
  kind: 'bar';
  title: string;
  height: number;
  x: AxisSpec;
  y: AxisSpec;
  xValues: CellValue[];
  yValues: (number | null)[];
  /** Value labels drawn on the bars */
  showValues: boolean;
  /** Bars are colored per category of this field */
  colorField: string;
}

export interface LineChartSpec {
  kind: 'line';
  title: string;
  height?: number;
  x: AxisSpec;
  y: AxisSpec;
  xValues: CellValue[];
  yValues: (number | null)[];
  markers: boolean;
}

export interface ScatterChartSpec {
  kind: 'scatter';
  title: string;
  height?: number;
  x: AxisSpec;
  y: AxisSpec;
  xValues: (number | null)[];
  yValues: (number | null)[];
  textField: string;
  text: string[];
}

export type ChartSpec =
  | ChoroplethSpec
  | PieChartSpec
  | BarChartSpec
  | LineChartSpec
  | ScatterChartSpec;

/**
 * Either a renderable chart or the "no data" placeholder shown in its place.
 */
export type ChartResult<T extends ChartSpec = ChartSpec> =
  | { status: 'ok'; chart: T }
  | { status: 'no_data'; message: string };

export const chartOk = <T extends ChartSpec>(chart: T): ChartResult<T> => ({
  status: 'ok',
  chart,
});

export const noData = (message: string): { status: 'no_data'; message: string } => ({
  status: 'no_data',
  message,
});
