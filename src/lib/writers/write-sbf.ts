import { type FileSystem, writeFile } from '../io/write';
import { payloadFilename } from '../readers/read-sbf';
import { type SbfDocument } from '../sbf/document';

type WriteSbfOptions = {
    filename: string;
    document: SbfDocument;
};

/**
 * Writes a document as an `.sbf` header and its `.sbf.data` payload.
 *
 * The payload is written first so that a header never refers to a payload
 * that failed to be written.
 *
 * @param options - Options including filename and document to write.
 * @param fs - File system for writing the output files.
 * @ignore
 */
const writeSbf = async (options: WriteSbfOptions, fs: FileSystem) => {
    const { filename, document } = options;

    const { headerText, payloadBytes } = document.save();

    await writeFile(fs, payloadFilename(filename), payloadBytes);
    await writeFile(fs, filename, headerText);
};

export { writeSbf, type WriteSbfOptions };
