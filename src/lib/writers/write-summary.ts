import { computeSummary, type SummaryData } from '../data-table/summary';
import { type FileSystem, writeFile } from '../io/write';
import { type SbfDocument } from '../sbf/document';

type WriteSummaryOptions = {
    filename: string;
    document: SbfDocument;
    format: 'json' | 'md';
};

// JSON has no NaN or Infinity: such statistics are written as null
const formatJson = (summary: SummaryData): string => {
    return `${JSON.stringify(summary, null, 2)}\n`;
};

const formatMarkdown = (summary: SummaryData): string => {
    const lines: string[] = [];

    lines.push('# Summary');
    lines.push('');
    lines.push(`**Point Count:** ${summary.rowCount}`);
    lines.push('');
    lines.push(`**Global Shift:** ${summary.globalShift.join(', ')}`);
    lines.push('');

    lines.push('| Column | min | max | median | mean | stdDev | nanCount | infCount | histogram |');
    lines.push('|--------|-----|-----|--------|------|--------|----------|----------|-----------|');

    for (const [name, stats] of Object.entries(summary.columns)) {
        const row = [
            name,
            stats.min,
            stats.max,
            stats.median,
            stats.mean,
            stats.stdDev,
            stats.nanCount,
            stats.infCount,
            `\`${stats.histogram}\``
        ];
        lines.push(`| ${row.join(' | ')} |`);
    }

    return `${lines.join('\n')}\n`;
};

/**
 * Writes per-column statistics of a point cloud as JSON or Markdown.
 *
 * Statistics that are not finite (a column holding only NaN values) appear as
 * `null` in JSON and as `NaN` in Markdown.
 *
 * @param options - Options including filename, document and format.
 * @param fs - File system for writing the output file.
 * @ignore
 */
const writeSummary = async (options: WriteSummaryOptions, fs: FileSystem) => {
    const { filename, document, format } = options;

    const summary = computeSummary(document);

    await writeFile(fs, filename, format === 'json' ? formatJson(summary) : formatMarkdown(summary));
};

export { writeSummary, formatMarkdown };
