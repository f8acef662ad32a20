/**
 * Get Dashboard Use Case
 *
 * Headline totals, a heatmap of the latest transaction period and the
 * quarterly transaction trend.
 */

import {
  formatPeriod,
  QUARTER_COLUMN,
  YEAR_COLUMN,
} from '../../../../common/types/period.js';
import { latestPeriod, selectPeriod } from '../../../analytics/core/periods.js';
import { aggregate, deriveColumn, sumColumn } from '../../../analytics/core/table-ops.js';
import {
  NO_MAP_DATA_MESSAGE,
  buildChoropleth,
  buildLineChart,
} from '../../../charts/core/builders.js';
import { noData } from '../../../charts/core/types.js';
import { AMOUNT_MILLIONS, stateAmountsInMillions } from '../studies/shared.js';

import type { CaseStudyDeps } from '../ports.js';
import type { Dashboard, QuickStat, QuickStatId } from '../types.js';

const PERIOD_COLUMN = 'Period';

const quickStat = (
  id: QuickStatId,
  label: string,
  value: number,
  scale: { divisor: number; prefix?: string; unit: string }
): QuickStat => ({
  id,
  label,
  value,
  display: `${scale.prefix ?? ''}${(value / scale.divisor).toFixed(1)}${scale.unit}`,
});

export async function getDashboard(deps: CaseStudyDeps): Promise<Dashboard> {
  const [transactions, users, insurance, geo] = await Promise.all([
    deps.tableLoader.load('aggregated_transaction'),
    deps.tableLoader.load('top_user'),
    deps.tableLoader.load('aggregated_insurance'),
    deps.geoReference.get(),
  ]);

  const tx = transactions.table;

  const stats: QuickStat[] = [
    quickStat('total-transactions', 'Total Transactions', sumColumn(tx, 'Transaction_count'), {
      divisor: 1e9,
      unit: 'B',
    }),
    quickStat('total-amount', 'Total Amount', sumColumn(tx, 'Transaction_amount'), {
      divisor: 1e12,
      prefix: '₹',
      unit: 'T',
    }),
    quickStat('registered-users', 'Registered Users', sumColumn(users.table, 'Registered_Users'), {
      divisor: 1e6,
      unit: 'M',
    }),
    quickStat(
      'insurance-amount',
      'Insurance Amount',
      sumColumn(insurance.table, 'Insurance_amount'),
      { divisor: 1e9, prefix: '₹', unit: 'B' }
    ),
  ];

  const period = latestPeriod(tx);

  const heatmap =
    period === null
      ? noData(NO_MAP_DATA_MESSAGE)
      : buildChoropleth(
          stateAmountsInMillions(selectPeriod(tx, period), 'Transaction_amount', [
            'Transaction_count',
          ]),
          {
            valueField: AMOUNT_MILLIONS,
            title: `Transaction Amount - ${formatPeriod(period)}`,
            colorScale: 'Viridis',
            valueSuffix: '₹M',
            geoKeys: geo.keys,
          }
        );

  const quarterly = deriveColumn(
    aggregate(tx, {
      groupBy: [YEAR_COLUMN, QUARTER_COLUMN],
      measures: [{ field: 'Transaction_amount', fn: 'sum' }],
    }),
    PERIOD_COLUMN,
    (row) => `${String(row[YEAR_COLUMN])} Q${String(row[QUARTER_COLUMN])}`
  );

  const trend = buildLineChart(quarterly, {
    xField: PERIOD_COLUMN,
    yField: 'Transaction_amount',
    title: 'Transaction Amount Over Time',
    xTitle: 'Time Period',
    yTitle: 'Transaction Amount (₹)',
    yTickFormat: '.2e',
    height: 600,
  });

  const notices = [transactions, users, insurance].flatMap((loaded) =>
    loaded.notice !== undefined ? [loaded.notice] : []
  );

  return {
    stats,
    period,
    panels: [
      { id: 'transaction-heatmap', heading: 'Transaction Heatmap', chart: heatmap },
      { id: 'transaction-trend', heading: 'Transaction Trend', chart: trend },
    ],
    notices,
  };
}
