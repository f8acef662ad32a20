import { formatPeriod, YEAR_COLUMN } from '../../../../common/types/period.js';
import { selectPeriod } from '../../../analytics/core/periods.js';
import { topN, withRatio } from '../../../analytics/core/table-ops.js';
import {
  buildBarChart,
  buildChoropleth,
  buildLineChart,
  buildScatterChart,
} from '../../../charts/core/builders.js';
import { REGION_COLUMN } from '../../../datasets/core/types.js';

import { AMOUNT_MILLIONS, TOP_N, stateAmountsInMillions, yearlyTotals } from './shared.js';

import type { CaseStudyDefinition } from '../types.js';

const DATASET = 'map_transaction';

export const marketExpansion: CaseStudyDefinition = {
  title: 'Market Expansion Strategy',
  objective:
    'Identify states with highest market potential based on transaction and growth metrics.',
  primaryDataset: DATASET,
  datasets: [DATASET],
  requiredForPeriod: [DATASET],
  emptyNotice: 'No transaction mapping data available.',

  build({ period, geoKeys, table }) {
    const all = table(DATASET);
    const byState = stateAmountsInMillions(selectPeriod(all, period), 'Transaction_amount', [
      'Transaction_count',
    ]);
    const summary = withRatio(byState, {
      numerator: 'Transaction_amount',
      denominator: 'Transaction_count',
      as: 'Growth_Score',
      guard: 'zero-fill',
    });

    return [
      {
        id: 'state-heatmap',
        heading: 'Market Penetration Heatmap',
        chart: buildChoropleth(summary, {
          valueField: AMOUNT_MILLIONS,
          title: `Market Penetration - ${formatPeriod(period)}`,
          colorScale: 'Reds',
          valueSuffix: '₹M',
          geoKeys,
        }),
      },
      {
        id: 'growth-potential',
        heading: 'Growth Potential',
        chart: buildBarChart(topN(summary, { by: 'Growth_Score', n: TOP_N }), {
          xField: REGION_COLUMN,
          yField: 'Growth_Score',
          title: 'Top 10 Growth Potential States',
        }),
      },
      {
        id: 'high-density',
        heading: 'High-Density States',
        chart: buildBarChart(topN(summary, { by: 'Transaction_count', n: TOP_N }), {
          xField: REGION_COLUMN,
          yField: 'Transaction_count',
          title: 'Top States by Transaction Density',
        }),
      },
      {
        id: 'yearly-volume',
        heading: 'Yearly Volume Trend',
        chart: buildLineChart(yearlyTotals(all, 'Transaction_amount'), {
          xField: YEAR_COLUMN,
          yField: 'Transaction_amount',
          title: 'Yearly Market Volume Trend',
        }),
      },
      {
        id: 'count-vs-amount',
        heading: 'Correlation Scatter',
        chart: buildScatterChart(summary, {
          xField: 'Transaction_count',
          yField: 'Transaction_amount',
          textField: REGION_COLUMN,
          title: 'Correlation: Count vs Amount',
        }),
      },
    ];
  },
};
