import { formatPeriod } from '../../../../common/types/period.js';
import { selectPeriod } from '../../../analytics/core/periods.js';
import { topN } from '../../../analytics/core/table-ops.js';
import { buildBarChart, buildPieChart } from '../../../charts/core/builders.js';
import { REGION_COLUMN } from '../../../datasets/core/types.js';

import { TOP_N, sumBy } from './shared.js';

import type { CaseStudyDefinition } from '../types.js';

export const deviceEngagement: CaseStudyDefinition = {
  title: 'Device Usage & User Engagement',
  objective:
    'Analyze user engagement based on device brands and app usage patterns across regions.',
  primaryDataset: 'aggregated_user',
  datasets: ['aggregated_user', 'map_user'],
  requiredForPeriod: ['aggregated_user', 'map_user'],
  emptyNotice: 'No user data available for the selected period.',

  build({ period, table }) {
    const label = formatPeriod(period);
    const users = selectPeriod(table('aggregated_user'), period);
    const usage = selectPeriod(table('map_user'), period);

    const brands = topN(sumBy(users, 'Brands', 'Transaction_count'), {
      by: 'Transaction_count',
      n: TOP_N,
    });
    const appOpens = topN(sumBy(usage, REGION_COLUMN, 'AppOpens'), { by: 'AppOpens', n: TOP_N });
    const share = topN(sumBy(users, REGION_COLUMN, 'Transaction_count'), {
      by: 'Transaction_count',
      n: TOP_N,
    });

    return [
      {
        id: 'top-brands',
        heading: 'Top 10 Device Brands by Transaction Count',
        chart: buildBarChart(brands, {
          xField: 'Brands',
          yField: 'Transaction_count',
          title: `Top 10 Device Brands - ${label}`,
        }),
      },
      {
        id: 'top-states-app-opens',
        heading: 'Top 10 States by App Opens',
        chart: buildBarChart(appOpens, {
          xField: REGION_COLUMN,
          yField: 'AppOpens',
          title: `Top 10 States by App Opens - ${label}`,
        }),
      },
      {
        id: 'state-usage-share',
        heading: 'Share of Device Usage by State',
        chart: buildPieChart(share, {
          valueField: 'Transaction_count',
          labelField: REGION_COLUMN,
          title: `Top 10 States by Share of Total Device Usage - ${label}`,
          hole: 0.3,
          textInfo: 'percent+label',
          pull: 0.05,
          colorSequence: 'Set3',
        }),
      },
    ];
  },
};
