import type { RawMeasurementRow, SpectrogramGeometry } from "../types";

export type MeasurementQuery = {
    /** Epoch ms, inclusive. */
    start?: number;
    /** Epoch ms, inclusive. */
    end?: number;
    /** Only rows whose anomaly score is strictly greater. */
    minAnomalyScore?: number;
    id?: string;
    limit?: number;
    /** Store order; defaults to oldest-first. */
    order?: "asc" | "desc";
};

export type SpectrogramPayload = {
    /** Encoded bytes, compressed or raw. */
    blob: Uint8Array;
    geometry: SpectrogramGeometry;
};

/**
 * Measurement store as seen by this library. Persistence, schema and the
 * capture daemon that fills it live elsewhere.
 */
export interface MeasurementStore {
    queryMeasurements(query: MeasurementQuery): Promise<RawMeasurementRow[]>;
    getMeasurement(id: string): Promise<RawMeasurementRow | null>;
    getSpectrogram(id: string): Promise<SpectrogramPayload | null>;
    /** Set or clear (`null`) the annotation of exactly one row. */
    setAnnotation(id: string, annotation: string | null): Promise<boolean>;
}

export class MeasurementStoreError extends Error {
    readonly status?: number;

    constructor(message: string, status?: number) {
        super(message);
        this.name = "MeasurementStoreError";
        this.status = status;
    }
}
