export const DEFAULT_MAX_POINTS = 200;

export type DownsampleResult<T> = {
    rows: T[];
    /** Keep every `stride`-th row. 1 means no downsampling. */
    stride: number;
    /** Row count before downsampling. */
    total: number;
};

/**
 * Uniform-stride downsampling.
 *
 * Keeps rows whose index is a multiple of `ceil(total / maxPoints)`, so the
 * first row is always kept and order is preserved.
 */
export function downsampleUniform<T>(rows: readonly T[], maxPoints: number = DEFAULT_MAX_POINTS): DownsampleResult<T> {
    const total = rows.length;
    if (!Number.isFinite(maxPoints) || maxPoints < 1) {
        throw new Error("@noisescope/acoustics: maxPoints must be a positive number");
    }

    const stride = Math.max(1, Math.ceil(total / Math.floor(maxPoints)));
    if (stride === 1) return { rows: [...rows], stride, total };

    const out: T[] = [];
    for (let i = 0; i < total; i += stride) {
        const row = rows[i];
        if (row !== undefined) out.push(row);
    }
    return { rows: out, stride, total };
}
