import { formatPeriod, QUARTER_COLUMN, YEAR_COLUMN } from '../../../../common/types/period.js';
import { selectPeriod, selectYear } from '../../../analytics/core/periods.js';
import { aggregate, topN, withRatio } from '../../../analytics/core/table-ops.js';
import { buildBarChart, buildChoropleth, buildLineChart } from '../../../charts/core/builders.js';
import { REGION_COLUMN } from '../../../datasets/core/types.js';

import { AMOUNT_MILLIONS, TOP_N, stateAmountsInMillions, sumBy, yearlyTotals } from './shared.js';

import type { CaseStudyDefinition } from '../types.js';

const DATASET = 'aggregated_insurance';

export const insuranceMarket: CaseStudyDefinition = {
  title: 'Insurance Market Analysis',
  objective: 'Track the growth and penetration of insurance transactions across India.',
  primaryDataset: DATASET,
  datasets: [DATASET],
  requiredForPeriod: [DATASET],
  emptyNotice: 'No insurance data available.',

  build({ period, geoKeys, table }) {
    const all = table(DATASET);
    const selected = selectPeriod(all, period);
    const byState = stateAmountsInMillions(selected, 'Insurance_amount');
    const quarterly = sumBy(selectYear(all, period.year), QUARTER_COLUMN, 'Insurance_amount');

    // Mean of per-row policy values, not total amount over total count
    const policyValues = withRatio(selected, {
      numerator: 'Insurance_amount',
      denominator: 'Insurance_count',
      as: 'Avg_Policy_Value',
      guard: 'add-one',
    });
    const averagePolicy = aggregate(policyValues, {
      groupBy: [REGION_COLUMN],
      measures: [{ field: 'Avg_Policy_Value', fn: 'mean' }],
    });

    return [
      {
        id: 'state-heatmap',
        heading: 'State-wise Insurance Heatmap',
        chart: buildChoropleth(byState, {
          valueField: AMOUNT_MILLIONS,
          title: `Insurance - ${formatPeriod(period)}`,
          colorScale: 'Oranges',
          valueSuffix: '₹M',
          geoKeys,
        }),
      },
      {
        id: 'top-states',
        heading: 'Top 10 States by Insurance Amount',
        chart: buildBarChart(topN(byState, { by: 'Insurance_amount', n: TOP_N }), {
          xField: REGION_COLUMN,
          yField: AMOUNT_MILLIONS,
          title: 'Top States by Insurance (₹M)',
        }),
      },
      {
        id: 'quarterly-growth',
        heading: 'Quarterly Insurance Growth',
        chart: buildLineChart(quarterly, {
          xField: QUARTER_COLUMN,
          yField: 'Insurance_amount',
          title: 'Quarterly Insurance Growth',
        }),
      },
      {
        id: 'average-policy-value',
        heading: 'Average Insurance per Policy',
        chart: buildBarChart(topN(averagePolicy, { by: 'Avg_Policy_Value', n: TOP_N }), {
          xField: REGION_COLUMN,
          yField: 'Avg_Policy_Value',
          title: 'Average Policy Value by State',
        }),
      },
      {
        id: 'yearly-growth',
        heading: 'Year-on-Year Comparison',
        chart: buildLineChart(yearlyTotals(all, 'Insurance_amount'), {
          xField: YEAR_COLUMN,
          yField: 'Insurance_amount',
          title: 'Year-on-Year Insurance Growth',
        }),
      },
    ];
  },
};
