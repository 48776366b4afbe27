import { Vec3 } from 'playcanvas';

import { GlobalShiftMalformedError, HeaderMalformedError } from '../errors';

const SBF_SECTION = 'SBF';

type HeaderEntry = [key: string, value: string];

type HeaderSection = {
    name: string;
    entries: HeaderEntry[];
};

/**
 * Parsed contents of an `.sbf` header file. Only the load-bearing keys are
 * interpreted; everything else is carried along untouched.
 */
type SbfHeader = {
    points: number;
    fieldNames: string[];
    globalShift: Vec3;

    /** Unrecognized keys of the `[SBF]` section, in file order. */
    extraEntries: HeaderEntry[];

    /** Sections other than `[SBF]`, in file order. */
    otherSections: HeaderSection[];
};

/**
 * The part of a header that collaborators may rely on.
 */
type SbfHeaderView = {
    readonly points: number;
    readonly fieldNames: readonly string[];
    readonly globalShift: Vec3;
};

const number = '[+-]?(?:\\d+\\.?\\d*|\\.\\d+)(?:[eE][+-]?\\d+)?';
const globalShiftPattern = new RegExp(`^\\s*(${number})\\s*,\\s*(${number})\\s*,\\s*(${number})\\s*$`);
const fieldKeyPattern = /^SF([1-9]\d*)$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

// per-field keys written by other tools (SF1s, SF2p, ...). their numbering
// goes stale as soon as a field is removed, so they are not written back.
const fieldAuxKeyPattern = /^SF\d+\D/;

/**
 * Decodes the bytes of an `.sbf` header file.
 *
 * @throws HeaderMalformedError if the bytes are not valid UTF-8.
 */
const decodeHeader = (bytes: Uint8Array): string => {
    try {
        return utf8.decode(bytes);
    } catch {
        throw new HeaderMalformedError('not valid UTF-8 text');
    }
};

const parseGlobalShift = (value: string): Vec3 => {
    const match = globalShiftPattern.exec(value);
    if (!match) {
        throw new GlobalShiftMalformedError(value);
    }
    const values = [Number(match[1]), Number(match[2]), Number(match[3])];
    if (!values.every(Number.isFinite)) {
        throw new GlobalShiftMalformedError(value);
    }
    return new Vec3(values[0], values[1], values[2]);
};

const formatGlobalShift = (shift: Vec3) => {
    // String() gives the shortest decimal that round-trips to the same double
    return [shift.x, shift.y, shift.z].map(v => String(v)).join(', ');
};

const parseCount = (entries: Map<string, string>, key: string): number => {
    const value = entries.get(key);
    if (value === undefined) {
        throw new HeaderMalformedError(`missing '${key}' key`);
    }
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(Number(value))) {
        throw new HeaderMalformedError(`'${key}' is not a non-negative integer: '${value}'`);
    }
    return Number(value);
};

// split the text into sections of key/value entries
const tokenize = (text: string): HeaderSection[] => {
    const sections: HeaderSection[] = [];
    let current: HeaderSection | undefined;

    const lines = text.split('\n');
    for (let i = 0; i < lines.length; ++i) {
        const line = lines[i].replace(/\r$/, '').trim();

        if (!line) {
            continue;
        }

        if (line.startsWith('[')) {
            if (!line.endsWith(']') || line.length < 3) {
                throw new HeaderMalformedError(`invalid section line ${i + 1}: '${line}'`);
            }
            const name = line.slice(1, -1).trim();
            if (sections.some(s => s.name === name)) {
                throw new HeaderMalformedError(`duplicate section '[${name}]'`);
            }
            current = { name, entries: [] };
            sections.push(current);
            continue;
        }

        const eq = line.indexOf('=');
        if (eq === -1) {
            throw new HeaderMalformedError(`expected 'key=value' on line ${i + 1}: '${line}'`);
        }
        if (!current) {
            throw new HeaderMalformedError(`key outside of a section on line ${i + 1}`);
        }

        const key = line.slice(0, eq).trim();
        const value = line.slice(eq + 1).trim();
        if (!key) {
            throw new HeaderMalformedError(`empty key on line ${i + 1}`);
        }
        if (current.entries.some(([k]) => k === key)) {
            throw new HeaderMalformedError(`duplicate key '${key}' in section '[${current.name}]'`);
        }
        current.entries.push([key, value]);
    }

    return sections;
};

/**
 * Parses the text of an `.sbf` header file.
 *
 * Keys are case-sensitive. `SF<k>` keys may appear in any order; their number
 * defines the column order. `GlobalShift` is optional and must be a literal
 * `x, y, z` triple when present.
 *
 * @param text - The header file contents.
 * @returns The parsed header.
 * @throws HeaderMalformedError if the structure or the counts are invalid.
 * @throws GlobalShiftMalformedError if `GlobalShift` is not a numeric triple.
 */
const parseHeader = (text: string): SbfHeader => {
    const sections = tokenize(text);

    const sbf = sections.find(s => s.name === SBF_SECTION);
    if (!sbf) {
        throw new HeaderMalformedError(`no [${SBF_SECTION}] section`);
    }

    const entries = new Map(sbf.entries);
    const points = parseCount(entries, 'Points');
    const fieldCount = parseCount(entries, 'SFCount');

    const globalShiftText = entries.get('GlobalShift');
    const globalShift = globalShiftText === undefined ? new Vec3() : parseGlobalShift(globalShiftText);

    const fieldNames: string[] = new Array(fieldCount);
    const extraEntries: HeaderEntry[] = [];
    let seen = 0;

    for (const [key, value] of sbf.entries) {
        const match = fieldKeyPattern.exec(key);
        if (match) {
            const index = Number(match[1]);
            if (index > fieldCount) {
                throw new HeaderMalformedError(`'${key}' is beyond SFCount=${fieldCount}`);
            }
            fieldNames[index - 1] = value;
            seen++;
        } else if (key !== 'Points' && key !== 'SFCount' && key !== 'GlobalShift') {
            extraEntries.push([key, value]);
        }
    }

    // keys are unique and bounded, so a full count means 1..SFCount are all present
    if (seen !== fieldCount) {
        throw new HeaderMalformedError(`expected keys SF1..SF${fieldCount}, found ${seen}`);
    }

    if (new Set(fieldNames).size !== fieldNames.length) {
        throw new HeaderMalformedError('duplicate scalar field names');
    }

    return {
        points,
        fieldNames,
        globalShift,
        extraEntries,
        otherSections: sections.filter(s => s !== sbf)
    };
};

/**
 * Serializes a header. `SF1..SFN` are numbered from the order of `fieldNames`.
 *
 * @param header - The header to write.
 * @returns The header file contents, ending with a newline.
 */
const serializeHeader = (header: SbfHeader): string => {
    const lines = [
        `[${SBF_SECTION}]`,
        `Points=${header.points}`,
        `SFCount=${header.fieldNames.length}`,
        `GlobalShift=${formatGlobalShift(header.globalShift)}`
    ];

    header.fieldNames.forEach((name, i) => {
        lines.push(`SF${i + 1}=${name}`);
    });

    for (const [key, value] of header.extraEntries) {
        if (!fieldAuxKeyPattern.test(key)) {
            lines.push(`${key}=${value}`);
        }
    }

    for (const section of header.otherSections) {
        lines.push('', `[${section.name}]`);
        for (const [key, value] of section.entries) {
            lines.push(`${key}=${value}`);
        }
    }

    return `${lines.join('\n')}\n`;
};

export {
    decodeHeader,
    parseHeader,
    serializeHeader,
    parseGlobalShift,
    type SbfHeader,
    type SbfHeaderView,
    type HeaderEntry,
    type HeaderSection
};
