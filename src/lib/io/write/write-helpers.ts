import { type FileSystem } from './file-system';

// write a whole file in one go
const writeFile = async (fs: FileSystem, filename: string, data: Uint8Array | string) => {
    const writer = await fs.createWriter(filename);
    await writer.write(data instanceof Uint8Array ? data : new TextEncoder().encode(data));
    await writer.close();
};

export { writeFile };
