import { type ReadFileSystem } from './io/read';
import { readSbf } from './readers/read-sbf';
import { type SbfDocument } from './sbf/document';
import { logger } from './utils/logger';

/**
 * Supported input file formats.
 *
 * - `sbf` - SBF header with its `.sbf.data` payload
 */
type InputFormat = 'sbf';

/**
 * Determines the input format based on file extension.
 *
 * @param filename - The filename to analyze.
 * @returns The detected input format.
 * @throws Error if the file extension is not recognized.
 */
const getInputFormat = (filename: string): InputFormat => {
    const lowerFilename = filename.toLowerCase();

    if (lowerFilename.endsWith('.sbf')) {
        return 'sbf';
    } else if (lowerFilename.endsWith('.sbf.data')) {
        throw new Error(`Pass the .sbf header, not its payload: ${filename}`);
    }

    throw new Error(`Unsupported input file type: ${filename}`);
};

/**
 * Options for reading a point cloud file.
 */
type ReadFileOptions = {
    /** Path to the input file. */
    filename: string;
    /** The format of the input file. */
    inputFormat: InputFormat;
    /** File system abstraction for reading files. */
    fileSystem: ReadFileSystem;
};

/**
 * Reads a point cloud file.
 *
 * @param readFileOptions - Options specifying the file to read and how to read it.
 * @returns Promise resolving to the decoded document.
 *
 * @example
 * ```ts
 * const filename = 'survey.sbf';
 * const document = await readFile({
 *     filename,
 *     inputFormat: getInputFormat(filename),
 *     fileSystem: new NodeReadFileSystem()
 * });
 * ```
 */
const readFile = async (readFileOptions: ReadFileOptions): Promise<SbfDocument> => {
    const { filename, inputFormat, fileSystem } = readFileOptions;

    logger.log(`reading '${filename}'...`);

    switch (inputFormat) {
        case 'sbf':
            return await readSbf(fileSystem, filename);
    }
};

export { readFile, getInputFormat, type InputFormat, type ReadFileOptions };
