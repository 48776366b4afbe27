import { Vec3 } from 'playcanvas';

// Coordinates are kept as double precision in memory and as float32 residuals
// on disk. true = stored + localShift + globalShift.

/**
 * Rebuilds true coordinates from a payload matrix.
 *
 * @param matrix - Row-major payload matrix, coordinates in the first three columns.
 * @param numFields - Number of scalar-field columns following the coordinates.
 * @param localShift - Shift stored in the payload preamble.
 * @param globalShift - Shift declared in the header.
 * @returns Row-major `N × 3` true coordinates.
 */
const composeCoordinates = (matrix: Float32Array, numFields: number, localShift: Vec3, globalShift: Vec3): Float64Array => {
    const stride = 3 + numFields;
    const numPoints = matrix.length / stride;
    const points = new Float64Array(numPoints * 3);

    for (let i = 0; i < numPoints; ++i) {
        const src = i * stride;
        const dst = i * 3;
        points[dst] = matrix[src] + localShift.x + globalShift.x;
        points[dst + 1] = matrix[src + 1] + localShift.y + globalShift.y;
        points[dst + 2] = matrix[src + 2] + localShift.z + globalShift.z;
    }

    return points;
};

/**
 * Picks the local shift for writing: the centroid of the cloud once the global
 * shift is removed, so that stored residuals are small and centered on zero.
 * Rows holding a NaN or infinite coordinate do not take part.
 *
 * @param points - Row-major `N × 3` true coordinates.
 * @param globalShift - Shift declared in the header.
 * @returns The local shift, or the zero vector when no row is finite.
 */
const computeLocalShift = (points: Float64Array, globalShift: Vec3): Vec3 => {
    let sx = 0;
    let sy = 0;
    let sz = 0;
    let count = 0;
    for (let i = 0; i < points.length; i += 3) {
        const x = points[i];
        const y = points[i + 1];
        const z = points[i + 2];
        if (Number.isFinite(x) && Number.isFinite(y) && Number.isFinite(z)) {
            sx += x;
            sy += y;
            sz += z;
            count++;
        }
    }

    if (count === 0) {
        return new Vec3();
    }

    return new Vec3(
        sx / count - globalShift.x,
        sy / count - globalShift.y,
        sz / count - globalShift.z
    );
};

/**
 * Writes float32 coordinate residuals into the first three columns of a
 * payload matrix. The subtraction is done in double precision and only the
 * result is narrowed.
 *
 * @param points - Row-major `N × 3` true coordinates.
 * @param localShift - Shift that will be stored in the payload preamble.
 * @param globalShift - Shift declared in the header.
 * @param matrix - Row-major payload matrix to fill.
 * @param numFields - Number of scalar-field columns following the coordinates.
 */
const decomposeCoordinates = (points: Float64Array, localShift: Vec3, globalShift: Vec3, matrix: Float32Array, numFields: number) => {
    const stride = 3 + numFields;
    const numPoints = points.length / 3;

    for (let i = 0; i < numPoints; ++i) {
        const src = i * 3;
        const dst = i * stride;
        matrix[dst] = Math.fround(points[src] - globalShift.x - localShift.x);
        matrix[dst + 1] = Math.fround(points[src + 1] - globalShift.y - localShift.y);
        matrix[dst + 2] = Math.fround(points[src + 2] - globalShift.z - localShift.z);
    }
};

export { composeCoordinates, computeLocalShift, decomposeCoordinates };
