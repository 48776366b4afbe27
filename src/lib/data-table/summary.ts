import { type SbfDocument } from '../sbf/document';

/** Number of bins for histogram. */
const NUM_BINS = 16;

/** Unicode block characters for histogram visualization (lowest to highest). */
const BARS = '▁▂▃▄▅▆▇█';

/**
 * Statistical summary for a single column.
 */
type ColumnStats = {
    /** Minimum value (excluding NaN/Inf). */
    min: number;
    /** Maximum value (excluding NaN/Inf). */
    max: number;
    /** Middle finite value, or the mean of the two middle values. */
    median: number;
    /** Arithmetic mean of the finite values. */
    mean: number;
    /** Population standard deviation of the finite values. */
    stdDev: number;
    /** Count of NaN values. */
    nanCount: number;
    /** Count of Infinity values. */
    infCount: number;
    /** Text histogram of the value distribution. */
    histogram: string;
};

/**
 * Statistical summary for a point cloud.
 */
type SummaryData = {
    /** Summary format version. */
    version: number;
    /** Number of points. */
    rowCount: number;
    /** Header global shift, x, y, z. */
    globalShift: [number, number, number];
    /** Per-column statistics keyed by column name, coordinates first. */
    columns: Record<string, ColumnStats>;
};

const PRECISION = 6;

const round = (value: number): number => {
    if (!Number.isFinite(value)) return value;
    return Math.round(value * Math.pow(10, PRECISION)) / Math.pow(10, PRECISION);
};

/**
 * Finds the k-th smallest value of a range in linear average time. The range
 * is partially reordered.
 *
 * @param arr - Values to search.
 * @param k - 0-based rank of the wanted value.
 * @param left - First index of the range.
 * @param right - Last index of the range (inclusive).
 * @returns The k-th smallest value.
 */
const quickSelect = (arr: Float64Array, k: number, left: number, right: number): number => {
    while (left < right) {
        // median-of-three pivot
        const mid = (left + right) >>> 1;
        if (arr[mid] < arr[left]) {
            const t = arr[left]; arr[left] = arr[mid]; arr[mid] = t;
        }
        if (arr[right] < arr[left]) {
            const t = arr[left]; arr[left] = arr[right]; arr[right] = t;
        }
        if (arr[right] < arr[mid]) {
            const t = arr[mid]; arr[mid] = arr[right]; arr[right] = t;
        }

        const pivot = arr[mid];
        let i = left;
        let j = right;

        while (i <= j) {
            while (arr[i] < pivot) i++;
            while (arr[j] > pivot) j--;
            if (i <= j) {
                const t = arr[i]; arr[i] = arr[j]; arr[j] = t;
                i++;
                j--;
            }
        }

        if (k <= j) {
            right = j;
        } else if (k >= i) {
            left = i;
        } else {
            break;
        }
    }
    return arr[k];
};

/**
 * Statistics over the finite values of a column. NaN and infinite values are
 * only counted; a column without finite values gets NaN statistics and an
 * empty histogram.
 */
const computeColumnStats = (data: ArrayLike<number>): ColumnStats => {
    const len = data.length;

    // first pass: min/max/sum over finite values, count NaN/Inf
    let nanCount = 0;
    let infCount = 0;
    let validCount = 0;
    let min = Infinity;
    let max = -Infinity;
    let sum = 0;

    for (let i = 0; i < len; i++) {
        const v = data[i];
        if (Number.isNaN(v)) {
            nanCount++;
        } else if (!Number.isFinite(v)) {
            infCount++;
        } else {
            validCount++;
            if (v < min) min = v;
            if (v > max) max = v;
            sum += v;
        }
    }

    if (validCount === 0) {
        return {
            min: NaN,
            max: NaN,
            median: NaN,
            mean: NaN,
            stdDev: NaN,
            nanCount,
            infCount,
            histogram: ' '.repeat(NUM_BINS)
        };
    }

    const mean = sum / validCount;

    // second pass: collect finite values, stdDev and histogram
    const validValues = new Float64Array(validCount);
    const bins = new Uint32Array(NUM_BINS);
    const range = max - min;
    let sumSquaredDiff = 0;
    let idx = 0;

    for (let i = 0; i < len; i++) {
        const v = data[i];
        if (Number.isFinite(v)) {
            validValues[idx++] = v;
            const diff = v - mean;
            sumSquaredDiff += diff * diff;

            // a constant column lands in the middle bin
            if (range > 0) {
                bins[Math.min(NUM_BINS - 1, Math.floor((v - min) / range * NUM_BINS))]++;
            } else {
                bins[NUM_BINS >>> 1]++;
            }
        }
    }

    const stdDev = Math.sqrt(sumSquaredDiff / validCount);

    // bar height relative to the fullest bin
    let maxBin = 0;
    for (let i = 0; i < NUM_BINS; i++) {
        if (bins[i] > maxBin) maxBin = bins[i];
    }
    let histogram = '';
    for (let i = 0; i < NUM_BINS; i++) {
        histogram += bins[i] === 0 ? ' ' : BARS[Math.floor(bins[i] / maxBin * (BARS.length - 1))];
    }

    const mid = validCount >>> 1;
    let median: number;

    if (validCount % 2 === 0) {
        const lower = quickSelect(validValues, mid - 1, 0, validCount - 1);
        const upper = quickSelect(validValues, mid, 0, validCount - 1);
        median = (lower + upper) / 2;
    } else {
        median = quickSelect(validValues, mid, 0, validCount - 1);
    }

    return {
        min: round(min),
        max: round(max),
        median: round(median),
        mean: round(mean),
        stdDev: round(stdDev),
        nanCount,
        infCount,
        histogram
    };
};

const coordinate = (points: Float64Array, axis: number) => {
    const result = new Float64Array(points.length / 3);
    for (let i = 0; i < result.length; ++i) {
        result[i] = points[i * 3 + axis];
    }
    return result;
};

/**
 * Computes statistics for the true coordinates and every scalar field of a
 * point cloud.
 *
 * @param document - The point cloud to analyze.
 * @returns Summary data with per-column statistics.
 *
 * @example
 * ```ts
 * const summary = computeSummary(document);
 * console.log(summary.rowCount);
 * console.log(summary.columns.z.mean);
 * console.log(summary.columns.intensity.nanCount);
 * ```
 */
const computeSummary = (document: SbfDocument): SummaryData => {
    const columns: Record<string, ColumnStats> = {};

    ['x', 'y', 'z'].forEach((name, axis) => {
        columns[name] = computeColumnStats(coordinate(document.points, axis));
    });

    for (const column of document.scalarFields) {
        // a field may shadow a coordinate name; keep both apart
        const key = columns[column.name] ? `sf:${column.name}` : column.name;
        columns[key] = computeColumnStats(column.data);
    }

    const shift = document.globalShift;

    return {
        version: 1,
        rowCount: document.numPoints,
        globalShift: [shift.x, shift.y, shift.z],
        columns
    };
};

export { computeSummary, type ColumnStats, type SummaryData };
