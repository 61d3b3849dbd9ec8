/**
 * MeasurementStore backed by the monitoring station's JSON API.
 *
 * Actions: `measurements`, `anomalies`, `measurement`, `spectrogram_blob`,
 * `annotate`. Times on the wire are unix seconds.
 */

import { z } from "zod";

import type { RawMeasurementRow } from "../types";
import {
    MeasurementStoreError,
    type MeasurementQuery,
    type MeasurementStore,
    type SpectrogramPayload,
} from "./types";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMeasurementStoreOptions = {
    fetch?: FetchLike;
};

const rowSchema = z.record(z.string(), z.unknown());

const rowsEnvelopeSchema = z.object({
    data: z.array(rowSchema),
});

const annotateEnvelopeSchema = z.object({
    success: z.boolean(),
});

const geometryHeader = z.coerce.number().int().positive();

function toUnixSeconds(ms: number): string {
    return String(Math.floor(ms / 1000));
}

export class HttpMeasurementStore implements MeasurementStore {
    private readonly baseUrl: string;
    private readonly fetchImpl: FetchLike;

    constructor(baseUrl: string, options: HttpMeasurementStoreOptions = {}) {
        this.baseUrl = baseUrl;
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    }

    private url(action: string, params: Record<string, string | undefined> = {}): string {
        const search = new URLSearchParams({ action });
        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined) search.set(key, value);
        }
        return `${this.baseUrl}?${search.toString()}`;
    }

    private async request(url: string, init?: RequestInit): Promise<Response> {
        let response: Response;
        try {
            response = await this.fetchImpl(url, init);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new MeasurementStoreError(`@noisescope/acoustics: store unreachable: ${message}`);
        }
        return response;
    }

    private async json<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        if (!response.ok) {
            throw new MeasurementStoreError(
                `@noisescope/acoustics: store responded ${response.status}`,
                response.status
            );
        }
        let body: unknown;
        try {
            body = await response.json();
        } catch {
            throw new MeasurementStoreError("@noisescope/acoustics: store returned invalid JSON", response.status);
        }
        const parsed = schema.safeParse(body);
        if (!parsed.success) {
            throw new MeasurementStoreError(
                `@noisescope/acoustics: unexpected store response: ${parsed.error.issues[0]?.message ?? "invalid"}`,
                response.status
            );
        }
        return parsed.data;
    }

    async queryMeasurements(query: MeasurementQuery): Promise<RawMeasurementRow[]> {
        if (query.id !== undefined) {
            const row = await this.getMeasurement(query.id);
            return row ? [row] : [];
        }

        const params = {
            start: query.start !== undefined ? toUnixSeconds(query.start) : undefined,
            end: query.end !== undefined ? toUnixSeconds(query.end) : undefined,
            limit: query.limit !== undefined ? String(query.limit) : undefined,
            order: query.order,
        };

        const url =
            query.minAnomalyScore !== undefined
                ? this.url("anomalies", { ...params, threshold: String(query.minAnomalyScore) })
                : this.url("measurements", params);

        const envelope = await this.json(await this.request(url), rowsEnvelopeSchema);
        return envelope.data;
    }

    async getMeasurement(id: string): Promise<RawMeasurementRow | null> {
        const response = await this.request(this.url("measurement", { id }));
        if (response.status === 404) return null;
        return this.json(response, rowSchema);
    }

    async getSpectrogram(id: string): Promise<SpectrogramPayload | null> {
        const response = await this.request(this.url("spectrogram_blob", { id }));
        if (response.status === 404 || response.status === 204) return null;
        if (!response.ok) {
            throw new MeasurementStoreError(
                `@noisescope/acoustics: store responded ${response.status}`,
                response.status
            );
        }

        const snapshots = geometryHeader.safeParse(response.headers.get("x-spectrogram-snapshots"));
        const bins = geometryHeader.safeParse(response.headers.get("x-spectrogram-bins"));
        if (!snapshots.success || !bins.success) {
            throw new MeasurementStoreError(
                "@noisescope/acoustics: spectrogram response is missing its geometry headers",
                response.status
            );
        }

        const blob = new Uint8Array(await response.arrayBuffer());
        if (blob.length === 0) return null;
        return { blob, geometry: { snapshots: snapshots.data, bins: bins.data } };
    }

    async setAnnotation(id: string, annotation: string | null): Promise<boolean> {
        const response = await this.request(this.url("annotate"), {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({ id, annotation }),
        });
        const envelope = await this.json(response, annotateEnvelopeSchema);
        return envelope.success;
    }
}
