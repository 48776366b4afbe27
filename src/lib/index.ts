// SBF codec
export { SbfDocument } from './sbf/document';
export type { SbfDocumentInit, FieldInit, ScalarField, SbfFiles } from './sbf/document';
export { decodeHeader, parseHeader, serializeHeader, parseGlobalShift } from './sbf/header';
export type { SbfHeader, SbfHeaderView } from './sbf/header';
export { readPayload, writePayload, payloadSize } from './sbf/payload';
export type { SbfPayload } from './sbf/payload';
export { composeCoordinates, computeLocalShift, decomposeCoordinates } from './sbf/shift';

// Errors
export {
    SbfError,
    HeaderMalformedError,
    GlobalShiftMalformedError,
    PayloadMalformedError,
    PayloadTruncatedError,
    PayloadHeaderMismatchError,
    FieldNotFoundError,
    DuplicateFieldNameError,
    InvalidFieldNameError,
    FieldLengthMismatchError,
    FileNotFoundError,
    IoError
} from './errors';
export type { SbfErrorCode } from './errors';

// Data table
export { Column, DataTable } from './data-table/data-table';
export { computeSummary } from './data-table/summary';
export type { ColumnStats, SummaryData } from './data-table/summary';

// High-level read/write
export { readFile, getInputFormat } from './read';
export type { InputFormat, ReadFileOptions } from './read';
export { writeFile, getOutputFormat } from './write';
export type { OutputFormat, WriteOptions } from './write';

// Processing
export { processDocument } from './process';
export type { ProcessAction } from './process';
export { combine } from './combine';
export { loadFeatures, resolveFieldName, fieldNameConvention } from './features';
export type { Features, LoadFeaturesOptions } from './features';

// File system abstractions
export { ReadStream, MemoryReadFileSystem } from './io/read';
export type { ReadSource, ReadFileSystem, ProgressCallback } from './io/read';
export { MemoryFileSystem } from './io/write';
export type { FileSystem, Writer } from './io/write';

// Individual readers and writers
export { readSbf, payloadFilename } from './readers/read-sbf';
export { writeSbf } from './writers/write-sbf';
export { writeCsv } from './writers/write-csv';
export { writeSummary } from './writers/write-summary';

// Types
export type { Options } from './types';

// Logger
export { logger } from './utils/logger';
export type { Logger, LogLevel, ProgressNode } from './utils/logger';
