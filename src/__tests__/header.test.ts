import { Vec3 } from 'playcanvas';
import { describe, it, expect } from 'vitest';

import { GlobalShiftMalformedError, HeaderMalformedError } from '../lib/errors';
import { decodeHeader, parseGlobalShift, parseHeader, serializeHeader } from '../lib/sbf/header';

const xyz = (v: Vec3) => [v.x, v.y, v.z];

describe('parseHeader', () => {
    it('reads counts, field names and the global shift', () => {
        const header = parseHeader([
            '[SBF]',
            'Points=2',
            'SFCount=2',
            'GlobalShift=-300000, -5000000, 0',
            'SF1=intensity',
            'SF2=classification',
            ''
        ].join('\n'));

        expect(header.points).toBe(2);
        expect(header.fieldNames).toEqual(['intensity', 'classification']);
        expect(xyz(header.globalShift)).toEqual([-300000, -5000000, 0]);
        expect(header.extraEntries).toEqual([]);
        expect(header.otherSections).toEqual([]);
    });

    it('orders fields by their key number, not by line order', () => {
        const header = parseHeader('[SBF]\nPoints=0\nSFCount=3\nSF3=c\nSF1=a\nSF2=b\n');
        expect(header.fieldNames).toEqual(['a', 'b', 'c']);
    });

    it('defaults a missing global shift to zero', () => {
        const header = parseHeader('[SBF]\nPoints=5\nSFCount=0\n');
        expect(xyz(header.globalShift)).toEqual([0, 0, 0]);
    });

    it('accepts CRLF line endings and blank lines', () => {
        const header = parseHeader('\r\n[SBF]\r\nPoints=1\r\n\r\nSFCount=1\r\nSF1=z_ref\r\n');
        expect(header.points).toBe(1);
        expect(header.fieldNames).toEqual(['z_ref']);
    });

    it('keeps unknown keys and sections', () => {
        const header = parseHeader('[SBF]\nPoints=1\nSFCount=0\nCreator=scanner\n\n[Meta]\nsite=quarry\n');
        expect(header.extraEntries).toEqual([['Creator', 'scanner']]);
        expect(header.otherSections).toEqual([{ name: 'Meta', entries: [['site', 'quarry']] }]);
    });

    it('never evaluates the global shift', () => {
        const text = '[SBF]\nPoints=0\nSFCount=0\nGlobalShift = os.system("x")\n';
        expect(() => parseHeader(text)).toThrow(GlobalShiftMalformedError);
        expect(() => parseHeader(text)).toThrow('malformed GlobalShift \'os.system("x")\'');
    });

    it('rejects a header without an [SBF] section', () => {
        expect(() => parseHeader('[Other]\nPoints=1\n')).toThrow(HeaderMalformedError);
    });

    it('rejects missing and non-numeric counts', () => {
        expect(() => parseHeader('[SBF]\nSFCount=0\n')).toThrow('malformed sbf header: missing \'Points\' key');
        expect(() => parseHeader('[SBF]\nPoints=abc\nSFCount=0\n')).toThrow(HeaderMalformedError);
        expect(() => parseHeader('[SBF]\nPoints=-1\nSFCount=0\n')).toThrow(HeaderMalformedError);
    });

    it('rejects field keys that do not match SFCount', () => {
        expect(() => parseHeader('[SBF]\nPoints=1\nSFCount=2\nSF1=a\n')).toThrow('malformed sbf header: expected keys SF1..SF2, found 1');
        expect(() => parseHeader('[SBF]\nPoints=1\nSFCount=1\nSF1=a\nSF2=b\n')).toThrow('malformed sbf header: \'SF2\' is beyond SFCount=1');
    });

    it('rejects duplicate keys and duplicate field names', () => {
        expect(() => parseHeader('[SBF]\nPoints=1\nPoints=2\nSFCount=0\n')).toThrow(HeaderMalformedError);
        expect(() => parseHeader('[SBF]\nPoints=1\nSFCount=2\nSF1=a\nSF2=a\n')).toThrow('malformed sbf header: duplicate scalar field names');
    });

    it('rejects lines that are neither sections nor entries', () => {
        expect(() => parseHeader('[SBF]\nPoints=1\nSFCount=0\njunk\n')).toThrow('malformed sbf header: expected \'key=value\' on line 4: \'junk\'');
        expect(() => parseHeader('Points=1\n[SBF]\n')).toThrow('malformed sbf header: key outside of a section on line 1');
    });
});

describe('parseGlobalShift', () => {
    it('parses signed, fractional and exponent values', () => {
        expect(xyz(parseGlobalShift('-1.5e3,+.25 , 7'))).toEqual([-1500, 0.25, 7]);
    });

    it('rejects values that overflow to infinity', () => {
        expect(() => parseGlobalShift('1e999, 0, 0')).toThrow(GlobalShiftMalformedError);
        expect(() => parseHeader('[SBF]\nPoints=0\nSFCount=0\nGlobalShift=0, -1e400, 0\n')).toThrow('malformed GlobalShift \'0, -1e400, 0\'');
    });

    it('rejects anything but three numbers', () => {
        expect(() => parseGlobalShift('1, 2')).toThrow(GlobalShiftMalformedError);
        expect(() => parseGlobalShift('1, 2, 3, 4')).toThrow(GlobalShiftMalformedError);
        expect(() => parseGlobalShift('[1, 2, 3]')).toThrow(GlobalShiftMalformedError);
        expect(() => parseGlobalShift('1, 2, 3 + 4')).toThrow(GlobalShiftMalformedError);
    });
});

describe('decodeHeader', () => {
    it('decodes UTF-8 text', () => {
        expect(decodeHeader(new TextEncoder().encode('[SBF]\nSF1=höhe\n'))).toBe('[SBF]\nSF1=höhe\n');
    });

    it('rejects bytes that are not UTF-8', () => {
        expect(() => decodeHeader(new Uint8Array([0x5b, 0xff, 0x5d]))).toThrow(HeaderMalformedError);
        expect(() => decodeHeader(new Uint8Array([0x5b, 0xff, 0x5d]))).toThrow('malformed sbf header: not valid UTF-8 text');
    });
});

describe('serializeHeader', () => {
    it('writes the load-bearing keys first and renumbers fields', () => {
        const text = serializeHeader({
            points: 3,
            fieldNames: ['a', 'b'],
            globalShift: new Vec3(-300000.5, 0, 12),
            extraEntries: [['SF1s', '0'], ['Comment', 'x']],
            otherSections: [{ name: 'Extra', entries: [['k', 'v']] }]
        });

        expect(text).toBe([
            '[SBF]',
            'Points=3',
            'SFCount=2',
            'GlobalShift=-300000.5, 0, 12',
            'SF1=a',
            'SF2=b',
            'Comment=x',
            '',
            '[Extra]',
            'k=v',
            ''
        ].join('\n'));
    });

    it('reproduces a canonical header', () => {
        const text = '[SBF]\nPoints=1\nSFCount=1\nGlobalShift=1, 2, 3\nSF1=intensity\nCreator=tool\n';
        expect(serializeHeader(parseHeader(text))).toBe(text);
    });
});
