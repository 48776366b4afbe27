import { SbfDocument, type FieldInit } from './sbf/document';

/**
 * Concatenates the rows of several point clouds.
 *
 * The result carries the union of all scalar fields, in the order they are
 * first seen; points of a cloud that lacks a field get `NaN` for it. The
 * global shift of the first cloud is kept.
 *
 * @param documents - The point clouds to combine.
 * @returns A new document, or the only input when there is just one.
 */
const combine = (documents: SbfDocument[]): SbfDocument => {
    if (documents.length === 0) {
        throw new Error('nothing to combine');
    }

    if (documents.length === 1) {
        // nothing to combine
        return documents[0];
    }

    const totalRows = documents.reduce((sum, document) => sum + document.numPoints, 0);

    const points = new Float64Array(totalRows * 3);
    const fields = new Map<string, Float32Array>();

    for (const document of documents) {
        for (const name of document.fieldNames) {
            if (!fields.has(name)) {
                fields.set(name, new Float32Array(totalRows).fill(NaN));
            }
        }
    }

    let rowOffset = 0;
    for (const document of documents) {
        points.set(document.points, rowOffset * 3);

        for (const column of document.scalarFields) {
            fields.get(column.name)?.set(column.data, rowOffset);
        }

        rowOffset += document.numPoints;
    }

    const fieldInits: FieldInit[] = [];
    fields.forEach((data, name) => fieldInits.push({ name, data }));

    return SbfDocument.fromArrays({
        points,
        fields: fieldInits,
        globalShift: documents[0].globalShift
    });
};

export { combine };
