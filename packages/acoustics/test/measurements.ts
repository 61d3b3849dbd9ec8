import type { Measurement } from "../src/index";

type MeasurementOverrides = Omit<Partial<Measurement>, "id" | "timestamp" | "levels"> & {
    levels?: Partial<Measurement["levels"]>;
};

/** Build a canonical measurement with every optional field absent. */
export function makeMeasurement(id: string, timestamp: number, overrides: MeasurementOverrides = {}): Measurement {
    const { levels, ...rest } = overrides;
    return {
        id,
        timestamp,
        bands: {},
        spectralCentroid: null,
        spectralFlatness: null,
        dominantFrequency: null,
        silencePercent: null,
        anomalyScore: null,
        annotation: null,
        spectrogram: null,
        ...rest,
        levels: { mean: null, max: null, min: null, l10: null, l50: null, l90: null, ...levels },
    };
}
