import { readFile, type ReadFileSystem } from '../io/read';
import { SbfDocument } from '../sbf/document';
import { decodeHeader } from '../sbf/header';
import { logger } from '../utils/logger';

/**
 * Returns the name of the payload file that accompanies an `.sbf` header.
 *
 * @param filename - Path of the `.sbf` header file.
 * @returns The path of the `.sbf.data` payload file.
 */
const payloadFilename = (filename: string) => `${filename}.data`;

/**
 * Reads an SBF point cloud: the `.sbf` header and its `.sbf.data` payload.
 *
 * @param fileSystem - File system to read from.
 * @param filename - Path of the `.sbf` header file.
 * @returns Promise resolving to the decoded document.
 * @throws FileNotFoundError if either file is missing.
 */
const readSbf = async (fileSystem: ReadFileSystem, filename: string): Promise<SbfDocument> => {
    const headerText = decodeHeader(await readFile(fileSystem, filename));
    const payloadBytes = await readFile(fileSystem, payloadFilename(filename));

    const document = SbfDocument.open(headerText, payloadBytes);

    logger.debug(`'${filename}': ${document.numPoints} points, fields [${document.fieldNames.join(', ')}]`);

    return document;
};

export { readSbf, payloadFilename };
