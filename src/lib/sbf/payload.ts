import { Vec3 } from 'playcanvas';

import { PayloadHeaderMismatchError, PayloadMalformedError, PayloadTruncatedError } from '../errors';

// 0-1 flag, 2-9 point count, 10-11 field count, 12-35 xyz shift, 36-63 reserved
const PREAMBLE_SIZE = 64;
const FLAG = 0x2a;
const MAX_FIELDS = 0xffff;

/**
 * Decoded contents of an `.sbf.data` file.
 */
type SbfPayload = {
    localShift: Vec3;
    numPoints: number;
    numFields: number;

    /** Row-major `numPoints × (3 + numFields)` matrix: x, y, z, then the fields. */
    matrix: Float32Array;
};

/**
 * Byte size of a payload holding the given number of points and fields.
 *
 * @param numPoints - Number of rows.
 * @param numFields - Number of scalar fields per row.
 * @returns The total size in bytes, preamble included.
 */
const payloadSize = (numPoints: number, numFields: number) => {
    return PREAMBLE_SIZE + numPoints * (3 + numFields) * 4;
};

/**
 * Decodes an `.sbf.data` payload and checks it against the counts its header
 * declares.
 *
 * @param bytes - The payload file contents.
 * @param declaredPoints - `Points` from the header.
 * @param declaredFields - `SFCount` from the header.
 * @returns The local shift and the stored float32 matrix.
 */
const readPayload = (bytes: Uint8Array, declaredPoints: number, declaredFields: number): SbfPayload => {
    if (bytes.byteLength < PREAMBLE_SIZE) {
        throw new PayloadTruncatedError(PREAMBLE_SIZE, bytes.byteLength);
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

    if (view.getUint8(0) !== FLAG || view.getUint8(1) !== FLAG) {
        throw new PayloadMalformedError('missing 0x2A2A format flag');
    }

    const storedPoints = view.getBigUint64(2, false);
    if (storedPoints > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new PayloadMalformedError(`point count ${storedPoints} is out of range`);
    }
    const numPoints = Number(storedPoints);
    const numFields = view.getUint16(10, false);

    if (numPoints !== declaredPoints) {
        throw new PayloadHeaderMismatchError('Points', declaredPoints, numPoints);
    }
    if (numFields !== declaredFields) {
        throw new PayloadHeaderMismatchError('SFCount', declaredFields, numFields);
    }

    const expectedSize = payloadSize(numPoints, numFields);
    if (bytes.byteLength < expectedSize) {
        throw new PayloadTruncatedError(expectedSize, bytes.byteLength);
    }

    const localShift = new Vec3(
        view.getFloat64(12, false),
        view.getFloat64(20, false),
        view.getFloat64(28, false)
    );

    // values are big-endian on disk regardless of the host, so no typed array view
    const matrix = new Float32Array(numPoints * (3 + numFields));
    for (let i = 0, offset = PREAMBLE_SIZE; i < matrix.length; ++i, offset += 4) {
        matrix[i] = view.getFloat32(offset, false);
    }

    return { localShift, numPoints, numFields, matrix };
};

/**
 * Encodes an `.sbf.data` payload.
 *
 * @param localShift - Shift added to every stored coordinate on read.
 * @param matrix - Row-major matrix of `3 + numFields` float32 values per point.
 * @param numFields - Number of scalar fields per row.
 * @returns The payload file contents.
 */
const writePayload = (localShift: Vec3, matrix: Float32Array, numFields: number): Uint8Array => {
    if (!Number.isInteger(numFields) || numFields < 0 || numFields > MAX_FIELDS) {
        throw new PayloadMalformedError(`scalar field count ${numFields} is out of range`);
    }

    const stride = 3 + numFields;
    if (matrix.length % stride !== 0) {
        throw new PayloadMalformedError(`matrix length ${matrix.length} is not a multiple of ${stride}`);
    }

    const numPoints = matrix.length / stride;
    const bytes = new Uint8Array(payloadSize(numPoints, numFields));
    const view = new DataView(bytes.buffer);

    view.setUint8(0, FLAG);
    view.setUint8(1, FLAG);
    view.setBigUint64(2, BigInt(numPoints), false);
    view.setUint16(10, numFields, false);
    view.setFloat64(12, localShift.x, false);
    view.setFloat64(20, localShift.y, false);
    view.setFloat64(28, localShift.z, false);

    for (let i = 0, offset = PREAMBLE_SIZE; i < matrix.length; ++i, offset += 4) {
        view.setFloat32(offset, matrix[i], false);
    }

    return bytes;
};

export { readPayload, writePayload, payloadSize, PREAMBLE_SIZE, type SbfPayload };
