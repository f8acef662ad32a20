/**
 * Charts Module - Public API
 */

export {
  chartOk,
  noData,
  type ChartKind,
  type ChartSpec,
  type ChartResult,
  type AxisSpec,
  type ChartMargin,
  type MapProjection,
  type GeoViewport,
  type ChoroplethSpec,
  type PieChartSpec,
  type PieTextInfo,
  type BarChartSpec,
  type LineChartSpec,
  type ScatterChartSpec,
} from './core/types.js';

export { formatFieldLabel, formatColorbarTitle } from './core/labels.js';

export {
  NO_MAP_DATA_MESSAGE,
  NO_CHART_DATA_MESSAGE,
  DEFAULT_COLOR_SCALE,
  MAP_HEIGHT,
  CHART_HEIGHT,
  DEFAULT_PIE_HOLE,
  INDIA_GEO_VIEWPORT,
  buildChoropleth,
  buildPieChart,
  buildBarChart,
  buildLineChart,
  buildScatterChart,
  type ChoroplethOptions,
  type PieChartOptions,
  type BarChartOptions,
  type LineChartOptions,
  type ScatterChartOptions,
} from './core/builders.js';
