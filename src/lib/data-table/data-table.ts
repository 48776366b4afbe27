/**
 * A named column of single-precision values.
 *
 * @example
 * ```ts
 * const intensity = new Column('intensity', new Float32Array([12, 40, 7]));
 * console.log(intensity.name);        // 'intensity'
 * console.log(intensity.data.length); // 3
 * ```
 */
class Column {
    name: string;
    data: Float32Array;

    constructor(name: string, data: Float32Array) {
        this.name = name;
        this.data = data;
    }

    clone(): Column {
        return new Column(this.name, this.data.slice());
    }
}

/**
 * An ordered table of scalar-field columns sharing the same row count.
 *
 * Column order is significant: it is the order in which the fields are stored
 * in an SBF payload. Unlike a plain array of columns the table knows its row
 * count even when it holds no columns at all, which is the common case of a
 * cloud with coordinates only.
 *
 * @example
 * ```ts
 * const table = new DataTable([
 *     new Column('intensity', new Float32Array([0, 1, 2])),
 *     new Column('classification', new Float32Array([2, 2, 6]))
 * ]);
 * console.log(table.numRows);    // 3
 * console.log(table.numColumns); // 2
 * ```
 */
class DataTable {
    columns: Column[];

    private rowCount: number;

    /**
     * @param columns - The columns of the table, all of the same length.
     * @param numRows - Row count. Required when `columns` is empty, checked otherwise.
     */
    constructor(columns: Column[], numRows?: number) {
        if (columns.length === 0 && numRows === undefined) {
            throw new Error('DataTable without columns requires an explicit row count');
        }

        const rows = numRows ?? columns[0].data.length;

        // check all columns have the same lengths
        for (let i = 0; i < columns.length; i++) {
            if (columns[i].data.length !== rows) {
                throw new Error(`Column '${columns[i].name}' has inconsistent number of rows: expected ${rows}, got ${columns[i].data.length}`);
            }
        }

        this.columns = columns;
        this.rowCount = rows;
    }

    // rows

    get numRows() {
        return this.rowCount;
    }

    // columns

    get numColumns() {
        return this.columns.length;
    }

    get columnNames() {
        return this.columns.map(column => column.name);
    }

    getColumn(index: number): Column {
        return this.columns[index];
    }

    getColumnIndex(name: string): number {
        return this.columns.findIndex(column => column.name === name);
    }

    getColumnByName(name: string): Column | undefined {
        return this.columns.find(column => column.name === name);
    }

    hasColumn(name: string): boolean {
        return this.columns.some(column => column.name === name);
    }

    addColumn(column: Column) {
        if (column.data.length !== this.numRows) {
            throw new Error(`Column '${column.name}' has inconsistent number of rows: expected ${this.numRows}, got ${column.data.length}`);
        }
        this.columns.push(column);
    }

    removeColumn(name: string) {
        const index = this.getColumnIndex(name);
        if (index === -1) {
            return false;
        }
        this.columns.splice(index, 1);
        return true;
    }

    // general

    clone(): DataTable {
        return new DataTable(this.columns.map(c => c.clone()), this.numRows);
    }

    // return a new table containing the rows referenced in indices
    permuteRows(indices: Uint32Array | number[]): DataTable {
        const result = new DataTable(this.columns.map((c) => {
            return new Column(c.name, new Float32Array(indices.length));
        }), indices.length);

        for (let i = 0; i < this.numColumns; ++i) {
            const src = this.getColumn(i).data;
            const dst = result.getColumn(i).data;
            for (let j = 0; j < indices.length; j++) {
                dst[j] = src[indices[j]];
            }
        }
        return result;
    }
}

export { Column, DataTable };
