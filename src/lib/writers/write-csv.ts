import { type FileSystem } from '../io/write';
import { type SbfDocument } from '../sbf/document';

type WriteCSVOptions = {
    filename: string;
    document: SbfDocument;
};

/**
 * Writes a point cloud to a CSV text file.
 *
 * Coordinates are written unshifted, followed by every scalar field.
 *
 * @param options - Options including filename and document to write.
 * @param fs - File system for writing the output file.
 * @ignore
 */
const writeCsv = async (options: WriteCSVOptions, fs: FileSystem) => {
    const { filename, document } = options;

    const { points, numPoints } = document;
    const columns = document.scalarFields.map(f => f.data);

    const textEncoder = new TextEncoder();

    const writer = await fs.createWriter(filename);

    // write header
    await writer.write(textEncoder.encode(`${['x', 'y', 'z', ...document.fieldNames].join(',')}\n`));

    // write rows
    for (let i = 0; i < numPoints; ++i) {
        let row = `${points[i * 3]},${points[i * 3 + 1]},${points[i * 3 + 2]}`;
        for (let c = 0; c < columns.length; ++c) {
            row += `,${columns[c][i]}`;
        }
        await writer.write(textEncoder.encode(`${row}\n`));
    }

    await writer.close();
};

export { writeCsv };
