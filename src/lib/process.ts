import { Vec3 } from 'playcanvas';

import { type ScalarField, type SbfDocument } from './sbf/document';
import { logger } from './utils/logger';

type Translate = {
    kind: 'translate';
    value: Vec3;
};

type FilterNaN = {
    kind: 'filterNaN';
};

type FilterByValue = {
    kind: 'filterByValue';
    columnName: string;
    comparator: 'lt' | 'lte' | 'gt' | 'gte' | 'eq' | 'neq';
    value: number;
};

type FilterBox = {
    kind: 'filterBox';
    min: Vec3;
    max: Vec3;
};

type AddIndex = {
    kind: 'addIndex';
    /** Name of the new field. Defaults to `index`. */
    name?: string;
};

type RemoveField = {
    kind: 'removeField';
    name: string;
};

type RemoveAllFields = {
    kind: 'removeAllFields';
};

type RenameField = {
    kind: 'renameField';
    name: string;
    newName: string;
};

type SetGlobalShift = {
    kind: 'setGlobalShift';
    value: Vec3;
};

type DropGlobalShift = {
    kind: 'dropGlobalShift';
};

type ProcessAction =
    Translate |
    FilterNaN |
    FilterByValue |
    FilterBox |
    AddIndex |
    RemoveField |
    RemoveAllFields |
    RenameField |
    SetGlobalShift |
    DropGlobalShift;

const comparators = {
    lt: (a: number, b: number) => a < b,
    lte: (a: number, b: number) => a <= b,
    gt: (a: number, b: number) => a > b,
    gte: (a: number, b: number) => a >= b,
    eq: (a: number, b: number) => a === b,
    neq: (a: number, b: number) => a !== b
};

// keep the rows for which predicate returns true
const filter = (document: SbfDocument, predicate: (row: number) => boolean) => {
    const indices: number[] = [];
    for (let i = 0; i < document.numPoints; ++i) {
        if (predicate(i)) {
            indices.push(i);
        }
    }
    return indices.length === document.numPoints ? document : document.selectRows(indices);
};

const isFiniteRow = (points: Float64Array, fields: readonly ScalarField[], row: number) => {
    if (!Number.isFinite(points[row * 3]) || !Number.isFinite(points[row * 3 + 1]) || !Number.isFinite(points[row * 3 + 2])) {
        return false;
    }
    return fields.every(f => Number.isFinite(f.data[row]));
};

/**
 * Applies processing actions to a point cloud, in order.
 *
 * Field and shift actions modify the document in place. Filters return a new
 * document holding the surviving rows, so always use the returned value.
 *
 * @param document - The point cloud to process.
 * @param processActions - Actions to apply.
 * @returns The processed point cloud.
 *
 * @example
 * ```ts
 * const result = processDocument(document, [
 *     { kind: 'filterByValue', columnName: 'classification', comparator: 'eq', value: 2 },
 *     { kind: 'removeField', name: 'classification' },
 *     { kind: 'addIndex' }
 * ]);
 * ```
 */
const processDocument = (document: SbfDocument, processActions: ProcessAction[]): SbfDocument => {
    let result = document;

    logger.progress.begin(processActions.length);

    for (const processAction of processActions) {
        switch (processAction.kind) {
            case 'translate':
                result.translate(processAction.value);
                break;
            case 'filterNaN': {
                const { points, scalarFields } = result;
                result = filter(result, row => isFiniteRow(points, scalarFields, row));
                break;
            }
            case 'filterByValue': {
                const { columnName, comparator, value } = processAction;
                const data = result.getField(columnName);
                const compare = comparators[comparator];
                result = filter(result, row => compare(data[row], value));
                break;
            }
            case 'filterBox': {
                const { min, max } = processAction;
                const { points } = result;
                result = filter(result, (row) => {
                    const x = points[row * 3];
                    const y = points[row * 3 + 1];
                    const z = points[row * 3 + 2];
                    return x >= min.x && x <= max.x && y >= min.y && y <= max.y && z >= min.z && z <= max.z;
                });
                break;
            }
            case 'addIndex': {
                const index = new Float32Array(result.numPoints);
                for (let i = 0; i < index.length; ++i) {
                    index[i] = i;
                }
                result.addField(processAction.name ?? 'index', index);
                break;
            }
            case 'removeField':
                result.removeField(processAction.name);
                break;
            case 'removeAllFields':
                for (const name of result.fieldNames) {
                    result.removeField(name);
                }
                break;
            case 'renameField':
                result.renameField(processAction.name, processAction.newName);
                break;
            case 'setGlobalShift':
                result.setGlobalShift(processAction.value);
                break;
            case 'dropGlobalShift':
                result.dropGlobalShift();
                break;
        }

        logger.progress.step(processAction.kind);
    }

    return result;
};

export { type ProcessAction, processDocument };
