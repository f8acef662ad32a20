import { describe, it, expect } from 'vitest';

import {
  INDIA_GEO_VIEWPORT,
  buildBarChart,
  buildChoropleth,
  buildLineChart,
  buildPieChart,
  buildScatterChart,
} from '@/modules/charts/index.js';

import { expectChart, makeTable } from '../../fixtures/builders.js';

const stateAmounts = makeTable([
  { State: 'maharashtra', Amount_M: 12.5 },
  { State: '', Amount_M: 1 },
  { State: 'ladakh', Amount_M: '3' },
]);

describe('buildChoropleth', () => {
  it('binds locations and values, skipping unmapped regions', () => {
    const chart = expectChart(
      buildChoropleth(stateAmounts, {
        valueField: 'Amount_M',
        title: 'Transaction Heatmap - 2023 Q4',
        colorScale: 'Blues',
        valueSuffix: '₹M',
      })
    );

    expect(chart.kind).toBe('choropleth');
    expect(chart.locations).toEqual(['maharashtra', 'ladakh']);
    expect(chart.values).toEqual([12.5, 3]);
    expect(chart.colorScale).toBe('Blues');
    expect(chart.colorbarTitle).toBe('Amount M (₹M)');
    expect(chart.unmatchedLocations).toEqual([]);
  });

  it('uses the fixed map layout', () => {
    const chart = expectChart(buildChoropleth(stateAmounts, { valueField: 'Amount_M', title: 'Map' }));

    expect(chart.height).toBe(600);
    expect(chart.margin).toEqual({ r: 0, t: 50, l: 0, b: 0 });
    expect(chart.border).toEqual({ color: 'white', width: 1.5 });
    expect(chart.colorScale).toBe('Viridis');
    expect(chart.colorbarTitle).toBe('Amount M');
    expect(chart.geo).toEqual(INDIA_GEO_VIEWPORT);
    expect(chart.geo.featureIdKey).toBe('properties.State_Name');
    expect(chart.geo.projection).toEqual({
      type: 'conic conformal',
      parallels: [12.47, 35.17],
      rotation: { lat: 24, lon: 80 },
    });
    expect(chart.geo.lonRange).toEqual([68, 98]);
    expect(chart.geo.latRange).toEqual([6, 38]);
  });

  it('lists locations missing from the geo reference', () => {
    const chart = expectChart(
      buildChoropleth(stateAmounts, {
        valueField: 'Amount_M',
        title: 'Map',
        geoKeys: new Set(['maharashtra']),
      })
    );

    expect(chart.locations).toEqual(['maharashtra', 'ladakh']);
    expect(chart.unmatchedLocations).toEqual(['ladakh']);
  });

  it('returns no_data for an empty table', () => {
    expect(buildChoropleth(makeTable([]), { valueField: 'Amount_M', title: 'Map' })).toEqual({
      status: 'no_data',
      message: 'No data available for the map.',
    });
  });

  it('returns no_data when every region is unmapped', () => {
    const table = makeTable([{ State: '', Amount_M: 1 }]);

    expect(buildChoropleth(table, { valueField: 'Amount_M', title: 'Map' })).toEqual({
      status: 'no_data',
      message: 'No data available for the map.',
    });
  });

  it('names missing columns', () => {
    expect(buildChoropleth(stateAmounts, { valueField: 'Users_K', title: 'Map' })).toEqual({
      status: 'no_data',
      message: 'No data available for the map. Missing column(s): Users_K.',
    });
  });
});

describe('buildPieChart', () => {
  const table = makeTable([
    { Transaction_type: 'Recharge & bill payments', Transaction_count: 40 },
    { Transaction_type: 'Merchant payments', Transaction_count: 60 },
  ]);

  it('defaults the hole and omits optional settings', () => {
    const chart = expectChart(
      buildPieChart(table, {
        valueField: 'Transaction_count',
        labelField: 'Transaction_type',
        title: 'Transaction Count by Type',
      })
    );

    expect(chart).toEqual({
      kind: 'pie',
      title: 'Transaction Count by Type',
      height: 400,
      labelField: 'Transaction_type',
      valueField: 'Transaction_count',
      labels: ['Recharge & bill payments', 'Merchant payments'],
      values: [40, 60],
      hole: 0.4,
    });
  });

  it('repeats the pull for every slice', () => {
    const chart = expectChart(
      buildPieChart(table, {
        valueField: 'Transaction_count',
        labelField: 'Transaction_type',
        title: 'Share',
        hole: 0.3,
        textInfo: 'percent+label',
        pull: 0.05,
        colorSequence: 'Set3',
      })
    );

    expect(chart.hole).toBe(0.3);
    expect(chart.textInfo).toBe('percent+label');
    expect(chart.pull).toEqual([0.05, 0.05]);
    expect(chart.colorSequence).toBe('Set3');
  });
});

describe('buildBarChart', () => {
  it('labels axes from field names and colors by category', () => {
    const chart = expectChart(
      buildBarChart(stateAmounts, { xField: 'State', yField: 'Amount_M', title: 'Top 10 States (₹M)' })
    );

    expect(chart.x).toEqual({ field: 'State', title: 'State' });
    expect(chart.y).toEqual({ field: 'Amount_M', title: 'Amount M' });
    expect(chart.xValues).toEqual(['maharashtra', '', 'ladakh']);
    expect(chart.yValues).toEqual([12.5, 1, 3]);
    expect(chart.showValues).toBe(true);
    expect(chart.colorField).toBe('State');
    expect(chart.height).toBe(400);
  });

  it('returns no_data for a missing column', () => {
    const result = buildBarChart(stateAmounts, { xField: 'Brands', yField: 'Count', title: 'Brands' });

    expect(result).toEqual({
      status: 'no_data',
      message: 'No data available for the chart. Missing column(s): Brands, Count.',
    });
  });
});

describe('buildLineChart', () => {
  const table = makeTable([
    { Period: '2023 Q1', Transaction_amount: 1e9 },
    { Period: '2023 Q2', Transaction_amount: 2e9 },
  ]);

  it('uses explicit axis titles and tick format', () => {
    const chart = expectChart(
      buildLineChart(table, {
        xField: 'Period',
        yField: 'Transaction_amount',
        title: 'Transaction Amount Over Time',
        xTitle: 'Time Period',
        yTitle: 'Transaction Amount (₹)',
        yTickFormat: '.2e',
        height: 600,
      })
    );

    expect(chart.x).toEqual({ field: 'Period', title: 'Time Period' });
    expect(chart.y).toEqual({ field: 'Transaction_amount', title: 'Transaction Amount (₹)', tickFormat: '.2e' });
    expect(chart.height).toBe(600);
    expect(chart.markers).toBe(true);
    expect(chart.xValues).toEqual(['2023 Q1', '2023 Q2']);
  });

  it('derives axis titles when none are given', () => {
    const chart = expectChart(
      buildLineChart(table, { xField: 'Period', yField: 'Transaction_amount', title: 'Trend' })
    );

    expect(chart.y.title).toBe('Transaction Amount');
    expect(chart.height).toBeUndefined();
  });
});

describe('buildScatterChart', () => {
  it('labels each point', () => {
    const table = makeTable([
      { District: 'pune district', Transaction_count: 10, Transaction_amount: 500 },
      { District: 'thane district', Transaction_count: null, Transaction_amount: 200 },
    ]);

    const chart = expectChart(
      buildScatterChart(table, {
        xField: 'Transaction_count',
        yField: 'Transaction_amount',
        textField: 'District',
        title: 'Transaction Count vs Amount',
      })
    );

    expect(chart.xValues).toEqual([10, null]);
    expect(chart.yValues).toEqual([500, 200]);
    expect(chart.text).toEqual(['pune district', 'thane district']);
  });
});
