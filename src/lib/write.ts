import { dirname } from 'pathe';

import { type FileSystem } from './io/write';
import { type SbfDocument } from './sbf/document';
import { logger } from './utils/logger';
import { writeCsv } from './writers/write-csv';
import { writeSbf } from './writers/write-sbf';
import { writeSummary } from './writers/write-summary';

/**
 * Supported output file formats.
 *
 * - `sbf` - SBF header and `.sbf.data` payload
 * - `csv` - CSV text with unshifted coordinates
 * - `summary-json` - per-column statistics as JSON
 * - `summary-md` - per-column statistics as a Markdown table
 */
type OutputFormat = 'sbf' | 'csv' | 'summary-json' | 'summary-md';

/**
 * Options for writing a point cloud file.
 */
type WriteOptions = {
    /** Path to the output file. */
    filename: string;
    /** The format to write. */
    outputFormat: OutputFormat;
    /** The point cloud to write. */
    document: SbfDocument;
};

/**
 * Determines the output format based on file extension.
 *
 * @param filename - The filename to analyze.
 * @returns The detected output format.
 * @throws Error if the file extension is not recognized.
 *
 * @example
 * ```ts
 * const format = getOutputFormat('cloud.sbf');     // returns 'sbf'
 * const format2 = getOutputFormat('stats.md');     // returns 'summary-md'
 * ```
 */
const getOutputFormat = (filename: string): OutputFormat => {
    const lowerFilename = filename.toLowerCase();

    if (lowerFilename.endsWith('.sbf')) {
        return 'sbf';
    } else if (lowerFilename.endsWith('.csv')) {
        return 'csv';
    } else if (lowerFilename.endsWith('.json')) {
        return 'summary-json';
    } else if (lowerFilename.endsWith('.md')) {
        return 'summary-md';
    }

    throw new Error(`Unsupported output file type: ${filename}`);
};

/**
 * Writes a point cloud to a file in the specified format. The parent
 * directory is created first.
 *
 * @param writeOptions - Options specifying the data and format to write.
 * @param fs - File system abstraction for writing files.
 *
 * @example
 * ```ts
 * const fs = new MemoryFileSystem();
 * await writeFile({
 *     filename: 'out/cloud.sbf',
 *     outputFormat: getOutputFormat('out/cloud.sbf'),
 *     document
 * }, fs);
 * ```
 */
const writeFile = async (writeOptions: WriteOptions, fs: FileSystem) => {
    const { filename, outputFormat, document } = writeOptions;

    logger.log(`writing '${filename}'...`);

    const dir = dirname(filename);
    if (dir && dir !== '.') {
        await fs.mkdir(dir);
    }

    switch (outputFormat) {
        case 'sbf':
            await writeSbf({ filename, document }, fs);
            break;
        case 'csv':
            await writeCsv({ filename, document }, fs);
            break;
        case 'summary-json':
        case 'summary-md':
            await writeSummary({
                filename,
                document,
                format: outputFormat === 'summary-json' ? 'json' : 'md'
            }, fs);
            break;
    }
};

export { getOutputFormat, writeFile, type OutputFormat, type WriteOptions };
