/**
 * Builders that lay measurements out as heatmap grids.
 *
 * A grid is a list of columns, left to right. Each column holds one value
 * per row in ascending frequency order (row 0 = lowest), which the renderer
 * draws bottom-up. Builders that take measurements require the caller to
 * state the input order and always emit columns oldest-to-newest.
 */

import { ascendingBands, type BandSet } from "../bands/bandSets";
import { binFrequencies, DEFAULT_GEOMETRY } from "../codec/quantize";
import type { WeeklyProfile } from "../stats/window";
import type { Measurement, RowOrder, SpectrogramGeometry } from "../types";

export type HeatmapColumn = {
    /** Identifier dispatched when the column is selected. */
    id: string;
    /** Epoch ms, or `null` for non-temporal columns. */
    timestamp: number | null;
    values: ArrayLike<number | null>;
};

export type HeatmapGrid = {
    columns: HeatmapColumn[];
    rowCount: number;
    /** One label per row, ascending (row 0 first). */
    rowLabels: string[];
};

/** Return rows oldest-first given the order they arrived in. */
export function chronological<T>(rows: readonly T[], order: RowOrder): T[] {
    return order === "newest-first" ? [...rows].reverse() : [...rows];
}

export type BandGridOptions = {
    order: RowOrder;
};

/** One column per measurement over the batch's band set. */
export function bandGrid(
    batch: { bandSet: BandSet; rows: readonly Measurement[] },
    options: BandGridOptions
): HeatmapGrid {
    const bands = ascendingBands(batch.bandSet);
    const columns = chronological(batch.rows, options.order).map((row) => ({
        id: row.id,
        timestamp: row.timestamp,
        values: bands.map((band) => row.bands[band.key] ?? null),
    }));

    return {
        columns,
        rowCount: bands.length,
        rowLabels: bands.map((b) => b.label),
    };
}

export type SpectrogramGridOptions = {
    order: RowOrder;
    /** Geometry for rows without a spectrogram; defaults to the first decoded one. */
    geometry?: SpectrogramGeometry;
    sampleRate?: number;
};

function formatHz(hz: number): string {
    return hz >= 1000 ? `${(hz / 1000).toFixed(1)}k` : `${hz}`;
}

/**
 * One column per spectrum snapshot.
 *
 * Every measurement contributes `snapshots` columns carrying its id, so a
 * click anywhere within its span selects it. Measurements without a
 * spectrogram contribute empty columns to keep time spacing even.
 */
export function spectrogramGrid(rows: readonly Measurement[], options: SpectrogramGridOptions): HeatmapGrid {
    const ordered = chronological(rows, options.order);
    const geometry =
        options.geometry ??
        ordered.find((r) => r.spectrogram !== null)?.spectrogram?.geometry ??
        DEFAULT_GEOMETRY;
    const { snapshots, bins } = geometry;
    const empty: (number | null)[] = new Array<number | null>(bins).fill(null);

    const columns: HeatmapColumn[] = [];
    for (const row of ordered) {
        const spec = row.spectrogram;
        for (let s = 0; s < snapshots; s++) {
            const data = spec && spec.geometry.bins === bins ? spec.data[s] : undefined;
            columns.push({ id: row.id, timestamp: row.timestamp, values: data ?? empty });
        }
    }

    return {
        columns,
        rowCount: bins,
        rowLabels: binFrequencies(bins, options.sampleRate).map(formatHz),
    };
}

const DAY_LABELS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

/**
 * 24 hour columns x 7 day rows. Rows ascend Saturday..Sunday so that Sunday
 * is drawn at the top.
 */
export function weeklyGrid(profile: WeeklyProfile): HeatmapGrid {
    const days = [6, 5, 4, 3, 2, 1, 0];
    const columns: HeatmapColumn[] = [];
    for (let hour = 0; hour < 24; hour++) {
        columns.push({
            id: `hour-${String(hour).padStart(2, "0")}`,
            timestamp: null,
            values: days.map((day) => profile[day]?.[hour] ?? null),
        });
    }
    return {
        columns,
        rowCount: days.length,
        rowLabels: days.map((day) => DAY_LABELS[day] ?? ""),
    };
}
