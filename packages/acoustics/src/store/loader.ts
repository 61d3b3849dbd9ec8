import { normalize, type NormalizedBatch, type NormalizeOptions } from "../adapter/normalize";
import { decodeSpectrogramBlob } from "../codec/blob";
import { DEFAULT_QUANTIZATION } from "../codec/quantize";
import { DEFAULT_ANOMALY_THRESHOLD } from "../stats/window";
import type { DecodedSpectrogram, Measurement, QuantizationRange, TimeWindow } from "../types";
import { RequestSequencer } from "./sequencer";
import type { MeasurementStore } from "./types";

export type MeasurementLoaderOptions = {
    quantization?: Partial<QuantizationRange>;
};

export type LoadWindowOptions = {
    maxPoints?: number;
    limit?: number;
};

/**
 * Fetches batches from a {@link MeasurementStore} and hands back fully
 * decoded, normalized measurements.
 *
 * Window and detail loads are sequenced separately: starting a new load of
 * one kind makes any outstanding load of the same kind resolve to `null`.
 */
export class MeasurementLoader {
    private readonly store: MeasurementStore;
    private readonly quantization: QuantizationRange;
    private readonly windowSequence = new RequestSequencer();
    private readonly detailSequence = new RequestSequencer();

    constructor(store: MeasurementStore, options: MeasurementLoaderOptions = {}) {
        this.store = store;
        this.quantization = { ...DEFAULT_QUANTIZATION, ...options.quantization };
    }

    private normalizeOptions(maxPoints?: number): NormalizeOptions {
        return { maxPoints, quantization: this.quantization };
    }

    /**
     * Load one time window, oldest-first.
     *
     * Resolves to `null` when a later `loadWindow` call (or `cancel`)
     * superseded this one before the store answered.
     */
    async loadWindow(window: TimeWindow, options: LoadWindowOptions = {}): Promise<NormalizedBatch | null> {
        const token = this.windowSequence.next();
        const raw = await this.store.queryMeasurements({
            start: window.start,
            end: window.end,
            limit: options.limit,
            order: "asc",
        });

        if (!this.windowSequence.isCurrent(token)) {
            console.debug("@noisescope/acoustics: discarding stale window response");
            return null;
        }
        return normalize(raw, this.normalizeOptions(options.maxPoints));
    }

    /** Rows scoring strictly above `threshold`, highest score first. */
    async loadAnomalies(threshold: number = DEFAULT_ANOMALY_THRESHOLD, limit?: number): Promise<Measurement[]> {
        const raw = await this.store.queryMeasurements({ minAnomalyScore: threshold, limit, order: "desc" });
        const { rows } = normalize(raw, this.normalizeOptions());
        return rows
            .filter((row) => row.anomalyScore !== null && row.anomalyScore > threshold)
            .sort((a, b) => (b.anomalyScore ?? 0) - (a.anomalyScore ?? 0));
    }

    /** One measurement with its spectrogram decoded, fetching the blob separately when the row omits it. */
    async loadDetail(id: string): Promise<Measurement | null> {
        const token = this.detailSequence.next();
        const raw = await this.store.getMeasurement(id);
        if (!raw) return null;

        const [row] = normalize([raw], this.normalizeOptions()).rows;
        if (!row) return null;

        if (row.spectrogram === null) {
            row.spectrogram = await this.fetchSpectrogram(row.id);
        }

        if (!this.detailSequence.isCurrent(token)) {
            console.debug(`@noisescope/acoustics: discarding stale detail response for ${id}`);
            return null;
        }
        return row;
    }

    /** A spectrogram that cannot be fetched or decoded leaves the row without one. */
    private async fetchSpectrogram(id: string): Promise<DecodedSpectrogram | null> {
        try {
            const payload = await this.store.getSpectrogram(id);
            return payload ? decodeSpectrogramBlob(payload.blob, payload.geometry, this.quantization) : null;
        } catch (err) {
            console.warn(`@noisescope/acoustics: dropping spectrogram for ${id}`, err);
            return null;
        }
    }

    /** Set a row's annotation. Blank text clears it. */
    async annotate(id: string, text: string | null): Promise<boolean> {
        const trimmed = text?.trim() ?? "";
        return this.store.setAnnotation(id, trimmed.length > 0 ? trimmed : null);
    }

    /** Make every outstanding load resolve to `null`. */
    cancel(): void {
        this.windowSequence.cancel();
        this.detailSequence.cancel();
    }
}
