import { hourlyAggregates } from "@noisescope/acoustics";
import { describe, expect, it } from "vitest";

import {
  ANOMALY_CHART_OPTIONS,
  ANOMALY_CHART_THRESHOLD,
  anomalySeries,
  centroidSeries,
  hourlySeries,
  levelSeries,
} from "../src/index";
import { makeMeasurement } from "./recording";

const HOUR = 3_600_000;

const newestFirst = [
  makeMeasurement("3", 2 * HOUR, { levels: { mean: -40, max: -30, l90: -50 }, anomalyScore: 3.1 }),
  makeMeasurement("2", HOUR, { levels: { mean: -45, max: -35 }, spectralCentroid: 900 }),
  makeMeasurement("1", 0, { levels: { mean: -50, max: -42, l90: -60 }, anomalyScore: 0.4, spectralCentroid: 1200 }),
];

describe("chart presets", () => {
  it("builds level series oldest-first", () => {
    const series = levelSeries(newestFirst, "newest-first");

    expect(series.map((s) => s.id)).toEqual(["level-max", "level-mean", "level-l90"]);
    const [max, mean, l90] = series;
    expect(Array.from(mean?.data.times ?? [])).toEqual([0, HOUR, 2 * HOUR]);
    expect(mean?.data.values).toEqual([-50, -45, -40]);
    expect(mean?.mode).toBe("filled");
    expect(max?.data.values).toEqual([-42, -35, -30]);
    expect(l90?.data.values).toEqual([-60, null, -50]);
  });

  it("keeps unscored rows as gaps in the anomaly series", () => {
    const [scores] = anomalySeries(newestFirst, "newest-first");

    expect(scores?.mode).toBe("markers");
    expect(scores?.data.values).toEqual([0.4, null, 3.1]);
    expect(ANOMALY_CHART_OPTIONS.threshold?.value).toBe(ANOMALY_CHART_THRESHOLD);
    expect(ANOMALY_CHART_THRESHOLD).toBe(2.5);
  });

  it("plots the spectral centroid", () => {
    const [centroid] = centroidSeries(newestFirst, "newest-first");
    expect(centroid?.data.values).toEqual([1200, 900, null]);
  });

  it("steps hourly aggregates at the start of each hour", () => {
    const rows = [
      makeMeasurement("a", 10 * 60_000, { levels: { mean: -50, max: -40 } }),
      makeMeasurement("b", 20 * 60_000, { levels: { mean: -40, max: -30 } }),
      makeMeasurement("c", HOUR + 5 * 60_000, { levels: { mean: -60, max: -55 } }),
    ];
    const [max, mean] = hourlySeries(hourlyAggregates(rows));

    expect(Array.from(mean?.data.times ?? [])).toEqual([0, HOUR]);
    expect(mean?.data.values).toEqual([-45, -60]);
    expect(max?.data.values).toEqual([-30, -55]);
    expect(mean?.mode).toBe("stepped");
  });
});
