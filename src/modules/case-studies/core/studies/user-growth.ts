import { formatPeriod, QUARTER_COLUMN } from '../../../../common/types/period.js';
import { selectPeriod, selectYear } from '../../../analytics/core/periods.js';
import { scaleColumn, topN, withRatio } from '../../../analytics/core/table-ops.js';
import {
  buildBarChart,
  buildChoropleth,
  buildLineChart,
  buildScatterChart,
} from '../../../charts/core/builders.js';
import { REGION_COLUMN } from '../../../datasets/core/types.js';

import { TOP_N, sumBy, sumByState } from './shared.js';

import type { CaseStudyDefinition } from '../types.js';

const DATASET = 'map_user';

export const userGrowth: CaseStudyDefinition = {
  title: 'User Growth Analysis',
  objective:
    'Explore how user registration and engagement evolve across states and quarters.',
  primaryDataset: DATASET,
  datasets: [DATASET],
  requiredForPeriod: [DATASET],
  emptyNotice: 'No user data available.',

  build({ period, geoKeys, table }) {
    const all = table(DATASET);
    const selected = selectPeriod(all, period);
    const quarterly = sumBy(selectYear(all, period.year), QUARTER_COLUMN, 'RegisteredUsers');
    const topDistricts = topN(sumBy(selected, 'District', 'RegisteredUsers'), {
      by: 'RegisteredUsers',
      n: TOP_N,
    });

    const byState = withRatio(
      scaleColumn(
        sumByState(selected, ['RegisteredUsers', 'AppOpens']),
        'RegisteredUsers',
        'Users_K',
        1e3
      ),
      {
        numerator: 'AppOpens',
        denominator: 'RegisteredUsers',
        as: 'Engagement_Rate',
        guard: 'add-one',
      }
    );

    return [
      {
        id: 'state-heatmap',
        heading: 'User Distribution Heatmap',
        chart: buildChoropleth(byState, {
          valueField: 'Users_K',
          title: `Registered Users - ${formatPeriod(period)}`,
          colorScale: 'Purples',
          valueSuffix: 'K Users',
          geoKeys,
        }),
      },
      {
        id: 'engagement-rate',
        heading: 'Engagement Rate',
        chart: buildBarChart(topN(byState, { by: 'Engagement_Rate', n: TOP_N }), {
          xField: REGION_COLUMN,
          yField: 'Engagement_Rate',
          title: 'Top 10 States by Engagement Rate',
        }),
      },
      {
        id: 'quarterly-growth',
        heading: 'Quarterly Growth',
        chart: buildLineChart(quarterly, {
          xField: QUARTER_COLUMN,
          yField: 'RegisteredUsers',
          title: 'Quarterly User Growth',
        }),
      },
      {
        id: 'top-districts',
        heading: 'Top Districts by Users',
        chart: buildBarChart(topDistricts, {
          xField: 'District',
          yField: 'RegisteredUsers',
          title: 'Top Districts by Registered Users',
        }),
      },
      {
        id: 'users-vs-app-opens',
        heading: 'Correlation Scatter',
        chart: buildScatterChart(byState, {
          xField: 'RegisteredUsers',
          yField: 'AppOpens',
          textField: REGION_COLUMN,
          title: 'Correlation: App Opens vs Registered Users',
        }),
      },
    ];
  },
};
