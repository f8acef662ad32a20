import { formatPeriod, YEAR_COLUMN } from '../../../../common/types/period.js';
import { selectPeriod } from '../../../analytics/core/periods.js';
import { topN, withRatio } from '../../../analytics/core/table-ops.js';
import {
  buildBarChart,
  buildChoropleth,
  buildLineChart,
  buildPieChart,
} from '../../../charts/core/builders.js';
import { REGION_COLUMN } from '../../../datasets/core/types.js';

import {
  AMOUNT_MILLIONS,
  TOP_N,
  stateAmountsInMillions,
  sumBy,
  sumByState,
  yearlyTotals,
} from './shared.js';

import type { CaseStudyDefinition } from '../types.js';

const DATASET = 'aggregated_transaction';

export const transactionDynamics: CaseStudyDefinition = {
  title: 'Transaction Dynamics Analysis',
  objective:
    'Explore how transaction count, amount, and type vary across time and states for strategic planning.',
  primaryDataset: DATASET,
  datasets: [DATASET],
  requiredForPeriod: [DATASET],
  emptyNotice: 'No transaction data for selected period.',

  build({ period, geoKeys, table }) {
    const all = table(DATASET);
    const selected = selectPeriod(all, period);
    const byState = stateAmountsInMillions(selected, 'Transaction_amount');

    const totals = sumByState(selected, ['Transaction_amount', 'Transaction_count']);
    const averageValue = withRatio(totals, {
      numerator: 'Transaction_amount',
      denominator: 'Transaction_count',
      as: 'Avg_Value',
      guard: 'skip',
    });

    return [
      {
        id: 'state-heatmap',
        heading: 'State-wise Transaction Heatmap',
        chart: buildChoropleth(byState, {
          valueField: AMOUNT_MILLIONS,
          title: `Transaction Heatmap - ${formatPeriod(period)}`,
          colorScale: 'Blues',
          valueSuffix: '₹M',
          geoKeys,
        }),
      },
      {
        id: 'top-states',
        heading: 'Top 10 States by Transaction Amount',
        chart: buildBarChart(topN(byState, { by: 'Transaction_amount', n: TOP_N }), {
          xField: REGION_COLUMN,
          yField: AMOUNT_MILLIONS,
          title: 'Top 10 States (₹M)',
        }),
      },
      {
        id: 'payment-types',
        heading: 'Payment Type Distribution',
        chart: buildPieChart(sumBy(selected, 'Transaction_type', 'Transaction_count'), {
          valueField: 'Transaction_count',
          labelField: 'Transaction_type',
          title: 'Transaction Count by Type',
        }),
      },
      {
        id: 'yearly-growth',
        heading: 'Yearly Growth Trend',
        chart: buildLineChart(yearlyTotals(all, 'Transaction_amount'), {
          xField: YEAR_COLUMN,
          yField: 'Transaction_amount',
          title: 'Yearly Transaction Growth',
        }),
      },
      {
        id: 'average-value',
        heading: 'Average Transaction Value per Transaction',
        chart: buildBarChart(topN(averageValue, { by: 'Avg_Value', n: TOP_N }), {
          xField: REGION_COLUMN,
          yField: 'Avg_Value',
          title: 'Top 10 Avg Transaction Value (₹)',
        }),
      },
    ];
  },
};
