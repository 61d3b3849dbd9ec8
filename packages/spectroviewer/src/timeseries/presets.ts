/**
 * Series presets for the standard station charts.
 */

import {
  chronological,
  type HourlyAggregate,
  type Measurement,
  type RowOrder,
} from "@noisescope/acoustics";

import type { TimeSeriesChartOptions } from "./chart.js";
import type { SeriesConfig, SeriesData } from "./layer.js";

/** Score above which the anomaly chart draws its threshold line */
export const ANOMALY_CHART_THRESHOLD = 2.5;

/**
 * Pull one field out of time-stamped records, oldest first
 */
export function toSeriesData<T extends { timestamp: number }>(
  rows: readonly T[],
  pick: (row: T) => number | null
): SeriesData {
  const times = new Float64Array(rows.length);
  const values: (number | null)[] = new Array(rows.length);
  rows.forEach((row, i) => {
    times[i] = row.timestamp;
    values[i] = pick(row);
  });
  return { times, values };
}

/** Mean level with max and L90 around it */
export function levelSeries(rows: readonly Measurement[], order: RowOrder): SeriesConfig[] {
  const sorted = chronological(rows, order);
  return [
    {
      id: "level-max",
      label: "Max dB",
      data: toSeriesData(sorted, (r) => r.levels.max),
      color: { stroke: "rgba(239, 68, 68, 0.7)", strokeWidth: 1 },
    },
    {
      id: "level-mean",
      label: "Mean dB",
      data: toSeriesData(sorted, (r) => r.levels.mean),
      mode: "filled",
      color: { stroke: "#3b82f6", fill: "rgba(59, 130, 246, 0.2)" },
    },
    {
      id: "level-l90",
      label: "L90 dB",
      data: toSeriesData(sorted, (r) => r.levels.l90),
      color: { stroke: "rgba(148, 163, 184, 0.8)", strokeWidth: 1 },
    },
  ];
}

export function anomalySeries(rows: readonly Measurement[], order: RowOrder): SeriesConfig[] {
  return [
    {
      id: "anomaly-score",
      label: "Anomaly score",
      data: toSeriesData(chronological(rows, order), (r) => r.anomalyScore),
      mode: "markers",
      color: { stroke: "#f59e0b", fill: "#f59e0b" },
    },
  ];
}

/** Chart options that go with `anomalySeries` */
export const ANOMALY_CHART_OPTIONS: TimeSeriesChartOptions = {
  yMin: 0,
  ySuggestedMax: 5,
  threshold: { value: ANOMALY_CHART_THRESHOLD, color: "rgba(239, 68, 68, 0.8)", dash: [6, 4] },
};

export function centroidSeries(rows: readonly Measurement[], order: RowOrder): SeriesConfig[] {
  return [
    {
      id: "spectral-centroid",
      label: "Spectral centroid (Hz)",
      data: toSeriesData(chronological(rows, order), (r) => r.spectralCentroid),
      color: { stroke: "#a855f7" },
    },
  ];
}

/** Hourly mean and max as step functions; aggregates are already ascending */
export function hourlySeries(aggregates: readonly HourlyAggregate[]): SeriesConfig[] {
  const buckets = aggregates.map((a) => ({ ...a, timestamp: a.hourStart }));
  return [
    {
      id: "hourly-max",
      label: "Hourly max dB",
      data: toSeriesData(buckets, (a) => a.maxLevel),
      mode: "stepped",
      color: { stroke: "rgba(239, 68, 68, 0.7)", strokeWidth: 1 },
    },
    {
      id: "hourly-mean",
      label: "Hourly mean dB",
      data: toSeriesData(buckets, (a) => a.meanLevel),
      mode: "stepped",
      color: { stroke: "#10b981" },
    },
  ];
}
