import { Column, DataTable } from '../data-table/data-table';
import {
    DuplicateFieldNameError,
    FieldLengthMismatchError,
    FieldNotFoundError,
    InvalidFieldNameError
} from '../errors';

// Scalar-field bookkeeping. The table's column order is the payload column
// order; header SF<k> keys are derived from it when the header is written, so
// nothing here patches keys.

const validateFieldName = (name: string) => {
    if (!name || name !== name.trim() || /[\r\n]/.test(name)) {
        throw new InvalidFieldNameError(name);
    }
};

const toFloat32 = (data: ArrayLike<number>): Float32Array => {
    return data instanceof Float32Array ? data.slice() : Float32Array.from(data);
};

/**
 * @returns The 0-based index of the field, not counting the coordinate columns.
 * @throws FieldNotFoundError if there is no field with that name.
 */
const indexOfField = (fields: DataTable, name: string): number => {
    const index = fields.getColumnIndex(name);
    if (index === -1) {
        throw new FieldNotFoundError(name, fields.columnNames);
    }
    return index;
};

/**
 * Appends a field as the last column. The values are copied as float32.
 */
const addField = (fields: DataTable, name: string, data: ArrayLike<number>) => {
    validateFieldName(name);
    if (fields.hasColumn(name)) {
        throw new DuplicateFieldNameError(name);
    }
    if (data.length !== fields.numRows) {
        throw new FieldLengthMismatchError(name, fields.numRows, data.length);
    }
    fields.addColumn(new Column(name, toFloat32(data)));
};

/**
 * Deletes a field. Later fields move down by one index.
 */
const removeField = (fields: DataTable, name: string) => {
    indexOfField(fields, name);
    fields.removeColumn(name);
};

/**
 * Renames a field in place. Its index does not change.
 */
const renameField = (fields: DataTable, name: string, newName: string) => {
    const index = indexOfField(fields, name);
    if (newName === name) {
        return;
    }
    validateFieldName(newName);
    if (fields.hasColumn(newName)) {
        throw new DuplicateFieldNameError(newName);
    }
    fields.getColumn(index).name = newName;
};

export { indexOfField, addField, removeField, renameField, validateFieldName, toFloat32 };
