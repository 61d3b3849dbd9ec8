import { describe, expect, it } from "vitest";

import { bandGrid, chronological, spectrogramGrid, THREE_BAND, weeklyGrid, weeklyProfile } from "../src/index";
import { makeMeasurement } from "./measurements";

describe("heatmap grids", () => {
    it("reorders newest-first input to oldest-first columns", () => {
        expect(chronological([3, 2, 1], "newest-first")).toEqual([1, 2, 3]);
        expect(chronological([1, 2, 3], "oldest-first")).toEqual([1, 2, 3]);
    });

    it("lays bands out with the lowest frequency in row 0", () => {
        const rows = [
            makeMeasurement("new", 2000, { bands: { band_low_db: -50, band_mid_db: -45, band_high_db: null } }),
            makeMeasurement("old", 1000, { bands: { band_low_db: -60, band_mid_db: -55, band_high_db: -52 } }),
        ];
        const grid = bandGrid({ bandSet: THREE_BAND, rows }, { order: "newest-first" });

        expect(grid.rowCount).toBe(3);
        expect(grid.rowLabels).toEqual(["Low", "Mid", "High"]);
        expect(grid.columns.map((c) => c.id)).toEqual(["old", "new"]);
        expect(Array.from(grid.columns[0]?.values ?? [])).toEqual([-60, -55, -52]);
        expect(Array.from(grid.columns[1]?.values ?? [])).toEqual([-50, -45, null]);
    });

    it("emits one column per snapshot and keeps gaps for missing spectrograms", () => {
        const spectrogram = {
            geometry: { snapshots: 2, bins: 3 },
            data: [new Float32Array([-50, -60, -70]), new Float32Array([-40, -50, -60])],
            issues: [],
        };
        const rows = [makeMeasurement("a", 1000, { spectrogram }), makeMeasurement("b", 2000)];
        const grid = spectrogramGrid(rows, { order: "oldest-first" });

        expect(grid.columns).toHaveLength(4);
        expect(grid.columns.map((c) => c.id)).toEqual(["a", "a", "b", "b"]);
        expect(Array.from(grid.columns[1]?.values ?? [])).toEqual([-40, -50, -60]);
        expect(Array.from(grid.columns[2]?.values ?? [])).toEqual([null, null, null]);
        expect(grid.rowCount).toBe(3);
        expect(grid.rowLabels).toEqual(["0", "8.0k", "16.0k"]);
    });

    it("puts Sunday in the top row of the weekly grid", () => {
        const profile = weeklyProfile([makeMeasurement("a", Date.UTC(2024, 0, 7, 3, 0), { levels: { mean: -40 } })]);
        const grid = weeklyGrid(profile);

        expect(grid.columns).toHaveLength(24);
        expect(grid.columns[3]?.id).toBe("hour-03");
        expect(grid.rowLabels).toEqual(["Sat", "Fri", "Thu", "Wed", "Tue", "Mon", "Sun"]);
        expect(grid.columns[3]?.values[6]).toBe(-40);
        expect(grid.columns[3]?.values[0]).toBeNull();
    });
});
