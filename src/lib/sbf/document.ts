import { Vec3 } from 'playcanvas';

import { Column, DataTable } from '../data-table/data-table';
import {
    type HeaderEntry,
    type HeaderSection,
    type SbfHeaderView,
    parseHeader,
    serializeHeader
} from './header';
import { readPayload, writePayload } from './payload';
import { addField, indexOfField, removeField, renameField } from './scalar-fields';
import { composeCoordinates, computeLocalShift, decomposeCoordinates } from './shift';

/**
 * A named scalar field supplied when building a document from arrays.
 */
type FieldInit = {
    name: string;
    data: ArrayLike<number>;
};

/**
 * Read-only view of a scalar field. `data` is the live column.
 */
type ScalarField = {
    readonly name: string;
    readonly data: Float32Array;
};

/**
 * In-memory arrays a document can be assembled from.
 */
type SbfDocumentInit = {
    /** Row-major x, y, z true coordinates. */
    points: ArrayLike<number>;
    /** Scalar fields in column order. */
    fields?: FieldInit[];
    /** Header global shift. Defaults to zero. */
    globalShift?: Vec3;
};

/**
 * The encoded form of a document: the `.sbf` header text and the
 * `.sbf.data` payload bytes.
 */
type SbfFiles = {
    headerText: string;
    payloadBytes: Uint8Array;
};

const copyEntries = (entries: HeaderEntry[]): HeaderEntry[] => entries.map(([k, v]) => [k, v]);

/**
 * A point cloud in SBF form: true (unshifted) coordinates in double
 * precision, named float32 scalar fields and the shifts used to store them.
 *
 * The header is never stored as such. `Points`, `SFCount` and `SF1..SFN` are
 * derived from the arrays whenever the document is saved, so header and body
 * cannot drift apart.
 *
 * @example
 * ```ts
 * const doc = SbfDocument.fromArrays({
 *     points: [350000.12, 6700000.5, 12.3, 350000.98, 6700001.25, 12.9],
 *     fields: [{ name: 'intensity', data: [120, 87] }]
 * });
 * doc.addField('classification', [2, 6]);
 * const { headerText, payloadBytes } = doc.save();
 * ```
 */
class SbfDocument {
    /** Row-major `N × 3` true coordinates. */
    readonly points: Float64Array;

    // only edited through addField / removeField / renameField
    private readonly fields: DataTable;

    globalShift: Vec3;

    /** Shift stored in the payload by the last read or save. */
    localShift: Vec3;

    private extraEntries: HeaderEntry[];
    private otherSections: HeaderSection[];

    private constructor(
        points: Float64Array,
        fields: DataTable,
        globalShift: Vec3,
        localShift: Vec3,
        extraEntries: HeaderEntry[] = [],
        otherSections: HeaderSection[] = []
    ) {
        this.points = points;
        this.fields = fields;
        this.globalShift = globalShift;
        this.localShift = localShift;
        this.extraEntries = extraEntries;
        this.otherSections = otherSections;
    }

    /**
     * Decodes a document from the contents of an `.sbf` / `.sbf.data` pair.
     *
     * @param headerText - Contents of the `.sbf` file.
     * @param payloadBytes - Contents of the `.sbf.data` file.
     * @returns The decoded document, with true coordinates.
     */
    static open(headerText: string, payloadBytes: Uint8Array): SbfDocument {
        const header = parseHeader(headerText);
        const payload = readPayload(payloadBytes, header.points, header.fieldNames.length);
        const { numPoints, numFields, matrix, localShift } = payload;

        const points = composeCoordinates(matrix, numFields, localShift, header.globalShift);

        const stride = 3 + numFields;
        const columns = header.fieldNames.map((name, f) => {
            const data = new Float32Array(numPoints);
            for (let i = 0; i < numPoints; ++i) {
                data[i] = matrix[i * stride + 3 + f];
            }
            return new Column(name, data);
        });

        return new SbfDocument(
            points,
            new DataTable(columns, numPoints),
            header.globalShift,
            localShift,
            header.extraEntries,
            header.otherSections
        );
    }

    /**
     * Assembles a document from in-memory arrays. All data is copied.
     *
     * @param init - Coordinates, fields and global shift.
     * @returns The new document.
     */
    static fromArrays(init: SbfDocumentInit): SbfDocument {
        if (init.points.length % 3 !== 0) {
            throw new Error(`points must hold x, y, z triples, got ${init.points.length} values`);
        }

        const points = Float64Array.from(init.points);
        const fields = new DataTable([], points.length / 3);
        for (const field of init.fields ?? []) {
            addField(fields, field.name, field.data);
        }

        const globalShift = init.globalShift ? init.globalShift.clone() : new Vec3();
        return new SbfDocument(points, fields, globalShift, new Vec3());
    }

    get numPoints() {
        return this.points.length / 3;
    }

    get numFields() {
        return this.fields.numColumns;
    }

    get fieldNames() {
        return this.fields.columnNames;
    }

    /**
     * The scalar fields in payload column order.
     */
    get scalarFields(): readonly ScalarField[] {
        return this.fields.columns.map(column => Object.freeze({ name: column.name, data: column.data }));
    }

    /**
     * The header as it would be written now.
     */
    get header(): SbfHeaderView {
        return {
            points: this.numPoints,
            fieldNames: this.fieldNames,
            globalShift: this.globalShift.clone()
        };
    }

    // scalar fields

    indexOf(name: string): number {
        return indexOfField(this.fields, name);
    }

    /**
     * @returns The live values of the field. Writes to it change the document.
     */
    getField(name: string): Float32Array {
        return this.fields.getColumn(this.indexOf(name)).data;
    }

    addField(name: string, data: ArrayLike<number>): this {
        addField(this.fields, name, data);
        return this;
    }

    removeField(name: string): this {
        removeField(this.fields, name);
        return this;
    }

    renameField(name: string, newName: string): this {
        renameField(this.fields, name, newName);
        return this;
    }

    // coordinates

    /**
     * Changes the header global shift. True coordinates are unchanged; only the
     * stored residuals will differ on the next save.
     */
    setGlobalShift(shift: Vec3): this {
        this.globalShift = shift.clone();
        return this;
    }

    /**
     * Removes the global shift from the coordinates themselves, leaving them in
     * the shifted frame with a zero global shift.
     */
    dropGlobalShift(): this {
        this.translate(new Vec3(-this.globalShift.x, -this.globalShift.y, -this.globalShift.z));
        this.globalShift = new Vec3();
        return this;
    }

    translate(offset: Vec3): this {
        const { points } = this;
        for (let i = 0; i < points.length; i += 3) {
            points[i] += offset.x;
            points[i + 1] += offset.y;
            points[i + 2] += offset.z;
        }
        return this;
    }

    // general

    /**
     * @returns A new document holding the given rows, in the given order.
     */
    selectRows(indices: Uint32Array | number[]): SbfDocument {
        const points = new Float64Array(indices.length * 3);
        for (let i = 0; i < indices.length; ++i) {
            const src = indices[i] * 3;
            points[i * 3] = this.points[src];
            points[i * 3 + 1] = this.points[src + 1];
            points[i * 3 + 2] = this.points[src + 2];
        }

        return new SbfDocument(
            points,
            this.fields.permuteRows(indices),
            this.globalShift.clone(),
            this.localShift.clone(),
            copyEntries(this.extraEntries),
            this.otherSections.map(s => ({ name: s.name, entries: copyEntries(s.entries) }))
        );
    }

    clone(): SbfDocument {
        return new SbfDocument(
            this.points.slice(),
            this.fields.clone(),
            this.globalShift.clone(),
            this.localShift.clone(),
            copyEntries(this.extraEntries),
            this.otherSections.map(s => ({ name: s.name, entries: copyEntries(s.entries) }))
        );
    }

    /**
     * Encodes the document. Counts and field keys come from the current arrays
     * and the local shift is recomputed as the centroid of the cloud.
     *
     * @returns The header text and payload bytes.
     */
    save(): SbfFiles {
        const { numPoints, numFields, globalShift } = this;
        const stride = 3 + numFields;

        const localShift = computeLocalShift(this.points, globalShift);
        const matrix = new Float32Array(numPoints * stride);

        decomposeCoordinates(this.points, localShift, globalShift, matrix, numFields);

        for (let f = 0; f < numFields; ++f) {
            const data = this.fields.getColumn(f).data;
            for (let i = 0; i < numPoints; ++i) {
                matrix[i * stride + 3 + f] = data[i];
            }
        }

        const payloadBytes = writePayload(localShift, matrix, numFields);
        const headerText = serializeHeader({
            points: numPoints,
            fieldNames: this.fieldNames,
            globalShift,
            extraEntries: this.extraEntries,
            otherSections: this.otherSections
        });

        this.localShift = localShift;

        return { headerText, payloadBytes };
    }
}

export { SbfDocument, type SbfDocumentInit, type FieldInit, type ScalarField, type SbfFiles };
