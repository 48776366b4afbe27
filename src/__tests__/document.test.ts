import { Vec3 } from 'playcanvas';
import { describe, it, expect, vi } from 'vitest';

import {
    DuplicateFieldNameError,
    FieldLengthMismatchError,
    FieldNotFoundError,
    InvalidFieldNameError,
    PayloadHeaderMismatchError,
    PayloadMalformedError
} from '../lib/errors';
import { SbfDocument } from '../lib/sbf/document';
import { writePayload } from '../lib/sbf/payload';

vi.mock('../lib/sbf/payload', async (importOriginal) => {
    const actual = await importOriginal<typeof import('../lib/sbf/payload')>();
    return { ...actual, writePayload: vi.fn(actual.writePayload) };
});

const xyz = (v: Vec3) => [v.x, v.y, v.z];

const makeDocument = () => SbfDocument.fromArrays({
    points: [0, 0, 0, 1, 2, 3],
    fields: [
        { name: 'intensity', data: [10, 20] },
        { name: 'classification', data: [2, 6] },
        { name: 'gps_time', data: [0.25, 0.5] }
    ]
});

const reopen = (document: SbfDocument) => {
    const { headerText, payloadBytes } = document.save();
    return SbfDocument.open(headerText, payloadBytes);
};

describe('SbfDocument', () => {
    describe('save and open', () => {
        it('derives the header from the arrays', () => {
            const { headerText, payloadBytes } = makeDocument().save();

            expect(headerText).toBe([
                '[SBF]',
                'Points=2',
                'SFCount=3',
                'GlobalShift=0, 0, 0',
                'SF1=intensity',
                'SF2=classification',
                'SF3=gps_time',
                ''
            ].join('\n'));
            expect(payloadBytes.length).toBe(64 + 2 * 6 * 4);
        });

        it('stores residuals around the centroid', () => {
            const document = makeDocument();
            document.save();
            expect(xyz(document.localShift)).toEqual([0.5, 1, 1.5]);
        });

        it('restores points and fields', () => {
            const document = reopen(makeDocument());

            expect(document.numPoints).toBe(2);
            expect(document.fieldNames).toEqual(['intensity', 'classification', 'gps_time']);
            expect(Array.from(document.points)).toEqual([0, 0, 0, 1, 2, 3]);
            expect(Array.from(document.getField('classification'))).toEqual([2, 6]);
            expect(Array.from(document.getField('gps_time'))).toEqual([0.25, 0.5]);
        });

        it('keeps sub-millimetre precision far from the origin', () => {
            const points = [350000.123, 6700000.456, 12.789, 350001.987, 6700001.321, 13.5];
            const document = reopen(SbfDocument.fromArrays({ points }));

            points.forEach((value, i) => {
                expect(document.points[i]).toBeCloseTo(value, 5);
            });
        });

        it('recovers millimetre steps at a ten million offset', () => {
            const points: number[] = [];
            for (let i = 0; i < 10; ++i) {
                points.push(10000000 + i * 0.001, 10000000 - i * 0.001, 10000000);
            }
            const document = reopen(SbfDocument.fromArrays({ points }));

            points.forEach((value, i) => {
                expect(Math.abs(document.points[i] - value)).toBeLessThan(1e-4);
            });
        });

        it('reconstructs coordinates exactly through both shifts', () => {
            const document = reopen(SbfDocument.fromArrays({
                points: [10000000.25, 0, 0, 10000001.75, 0, 0],
                globalShift: new Vec3(-10000000, 0, 0)
            }));

            expect(xyz(document.globalShift)).toEqual([-10000000, 0, 0]);
            expect(xyz(document.localShift)).toEqual([20000001, 0, 0]);
            expect(Array.from(document.points)).toEqual([10000000.25, 0, 0, 10000001.75, 0, 0]);
        });

        it('keeps finite points when some coordinates are NaN', () => {
            const document = reopen(SbfDocument.fromArrays({ points: [1, 2, 3, 4, 5, 6, NaN, 0, 0] }));
            expect(Array.from(document.points)).toEqual([1, 2, 3, 4, 5, 6, NaN, 0, 0]);
        });

        it('keeps finite coordinates next to an infinite one', () => {
            const document = SbfDocument.fromArrays({ points: [1, 2, 3, Infinity, 5, 6] });
            const reopened = reopen(document);

            expect(xyz(document.localShift)).toEqual([1, 2, 3]);
            expect(Array.from(reopened.points)).toEqual([1, 2, 3, Infinity, 5, 6]);
        });

        it('uses a zero local shift when no point is finite', () => {
            const document = SbfDocument.fromArrays({ points: [NaN, 1, 1] });
            const reopened = reopen(document);

            expect(xyz(document.localShift)).toEqual([0, 0, 0]);
            expect(Array.from(reopened.points)).toEqual([NaN, 1, 1]);
        });

        it('leaves the local shift alone when encoding fails', () => {
            const document = SbfDocument.fromArrays({ points: [0, 0, 0, 2, 2, 2] });

            vi.mocked(writePayload).mockImplementationOnce(() => {
                throw new PayloadMalformedError('scalar field count 65536 is out of range');
            });

            expect(() => document.save()).toThrow(PayloadMalformedError);
            expect(xyz(document.localShift)).toEqual([0, 0, 0]);

            document.save();
            expect(xyz(document.localShift)).toEqual([1, 1, 1]);
        });

        it('round-trips an empty cloud', () => {
            const document = reopen(SbfDocument.fromArrays({ points: [], fields: [{ name: 'a', data: [] }] }));
            expect(document.numPoints).toBe(0);
            expect(document.fieldNames).toEqual(['a']);
        });

        it('keeps unknown header entries but drops stale per-field keys', () => {
            const headerText = '[SBF]\nPoints=1\nSFCount=1\nGlobalShift=0, 0, 0\nSF1=a\nSF1s=0.5\nCreator=tool\n\n[Meta]\nk=v\n';
            const document = SbfDocument.open(headerText, writePayload(new Vec3(), new Float32Array([0, 0, 0, 5]), 1));

            document.removeField('a');

            expect(document.save().headerText).toBe('[SBF]\nPoints=1\nSFCount=0\nGlobalShift=0, 0, 0\nCreator=tool\n\n[Meta]\nk=v\n');
        });

        it('rejects a payload with fewer rows than the header declares', () => {
            const payloadBytes = writePayload(new Vec3(), new Float32Array(99 * 3), 0);
            expect(() => SbfDocument.open('[SBF]\nPoints=100\nSFCount=0\n', payloadBytes)).toThrow(PayloadHeaderMismatchError);
        });
    });

    describe('fromArrays', () => {
        it('copies its inputs', () => {
            const points = new Float64Array([1, 2, 3]);
            const data = new Float32Array([4]);
            const shift = new Vec3(5, 6, 7);
            const document = SbfDocument.fromArrays({ points, fields: [{ name: 'a', data }], globalShift: shift });

            points[0] = 100;
            data[0] = 100;
            shift.x = 100;

            expect(document.points[0]).toBe(1);
            expect(document.getField('a')[0]).toBe(4);
            expect(document.globalShift.x).toBe(5);
        });

        it('requires whole coordinate triples', () => {
            expect(() => SbfDocument.fromArrays({ points: [1, 2, 3, 4] })).toThrow('points must hold x, y, z triples, got 4 values');
        });
    });

    describe('scalar fields', () => {
        it('appends new fields as the last column', () => {
            const document = makeDocument().addField('index', [0, 1]);

            expect(document.fieldNames).toEqual(['intensity', 'classification', 'gps_time', 'index']);
            expect(document.indexOf('index')).toBe(3);
            expect(document.header.fieldNames).toEqual(['intensity', 'classification', 'gps_time', 'index']);
        });

        it('undoes an added field by removing it', () => {
            const document = makeDocument();
            const before = document.save();

            document.addField('tmp', [1, 2]).removeField('tmp');
            const after = document.save();

            expect(after.headerText).toBe(before.headerText);
            expect(after.payloadBytes).toEqual(before.payloadBytes);
        });

        it('shifts later fields down when one is removed', () => {
            const document = reopen(makeDocument().removeField('classification'));

            expect(document.fieldNames).toEqual(['intensity', 'gps_time']);
            expect(document.indexOf('gps_time')).toBe(1);
            expect(Array.from(document.getField('gps_time'))).toEqual([0.25, 0.5]);
        });

        it('renames a field without moving it', () => {
            const document = makeDocument().renameField('classification', 'class');

            expect(document.fieldNames).toEqual(['intensity', 'class', 'gps_time']);
            expect(document.indexOf('class')).toBe(1);
            expect(Array.from(document.getField('class'))).toEqual([2, 6]);
            expect(() => document.indexOf('classification')).toThrow(FieldNotFoundError);
        });

        it('treats renaming a field to its own name as a no-op', () => {
            const document = makeDocument().renameField('intensity', 'intensity');
            expect(document.fieldNames).toEqual(['intensity', 'classification', 'gps_time']);
        });

        it('reports missing fields with the available names', () => {
            const document = makeDocument();

            expect(() => document.removeField('red')).toThrow(FieldNotFoundError);
            expect(() => document.getField('red')).toThrow('scalar field \'red\' not found');

            let error: unknown;
            try {
                document.indexOf('red');
            } catch (err) {
                error = err;
            }
            expect(error instanceof FieldNotFoundError && error.available).toEqual(['intensity', 'classification', 'gps_time']);
        });

        it('leaves the document unchanged when an edit fails', () => {
            const document = makeDocument();

            expect(() => document.addField('intensity', [1, 2])).toThrow(DuplicateFieldNameError);
            expect(() => document.addField('red', [1, 2, 3])).toThrow(FieldLengthMismatchError);
            expect(() => document.addField(' red', [1, 2])).toThrow(InvalidFieldNameError);
            expect(() => document.addField('', [1, 2])).toThrow(InvalidFieldNameError);
            expect(() => document.renameField('intensity', 'gps_time')).toThrow(DuplicateFieldNameError);
            expect(() => document.renameField('intensity', 'a\nb')).toThrow(InvalidFieldNameError);
            expect(() => document.renameField('red', 'green')).toThrow(FieldNotFoundError);

            expect(document.fieldNames).toEqual(['intensity', 'classification', 'gps_time']);
            expect(Array.from(document.getField('intensity'))).toEqual([10, 20]);
        });

        it('lists fields as read-only name and data pairs', () => {
            const document = makeDocument();
            const fields = document.scalarFields;

            expect(fields.map(f => f.name)).toEqual(['intensity', 'classification', 'gps_time']);
            expect(Array.from(fields[1].data)).toEqual([2, 6]);
            expect(fields.every(f => Object.isFrozen(f))).toBe(true);

            document.renameField('intensity', 'amplitude');
            expect(fields[0].name).toBe('intensity');
            expect(document.scalarFields[0].name).toBe('amplitude');
        });

        it('exposes live field values', () => {
            const document = makeDocument();
            document.getField('intensity')[1] = 99;
            expect(Array.from(reopen(document).getField('intensity'))).toEqual([10, 99]);
        });
    });

    describe('shifts', () => {
        it('keeps true coordinates when the global shift changes', () => {
            const document = SbfDocument.fromArrays({ points: [101, 202, 3] }).setGlobalShift(new Vec3(100, 200, 0));
            const reopened = reopen(document);

            expect(document.save().headerText).toContain('GlobalShift=100, 200, 0\n');
            expect(xyz(reopened.localShift)).toEqual([1, 2, 3]);
            expect(Array.from(reopened.points)).toEqual([101, 202, 3]);
        });

        it('moves points into the shifted frame when the global shift is dropped', () => {
            const document = SbfDocument.fromArrays({
                points: [101, 202, 3],
                globalShift: new Vec3(100, 200, 0)
            }).dropGlobalShift();

            expect(Array.from(document.points)).toEqual([1, 2, 3]);
            expect(xyz(document.globalShift)).toEqual([0, 0, 0]);
        });

        it('translates every point', () => {
            const document = makeDocument().translate(new Vec3(1, -1, 0.5));
            expect(Array.from(document.points)).toEqual([1, -1, 0.5, 2, 1, 3.5]);
        });

        it('returns a copy of the global shift from the header view', () => {
            const document = SbfDocument.fromArrays({ points: [], globalShift: new Vec3(1, 2, 3) });
            const { header } = document;

            header.globalShift.x = 50;

            expect(header.points).toBe(0);
            expect(document.globalShift.x).toBe(1);
        });
    });

    describe('selectRows', () => {
        it('builds a new document from the given rows', () => {
            const document = makeDocument();
            const selected = document.selectRows([1]);

            expect(Array.from(selected.points)).toEqual([1, 2, 3]);
            expect(Array.from(selected.getField('intensity'))).toEqual([20]);
            expect(document.numPoints).toBe(2);
        });
    });

    describe('clone', () => {
        it('shares no data with the original', () => {
            const document = makeDocument();
            const copy = document.clone();

            copy.translate(new Vec3(1, 1, 1)).removeField('intensity');

            expect(Array.from(document.points)).toEqual([0, 0, 0, 1, 2, 3]);
            expect(document.fieldNames).toEqual(['intensity', 'classification', 'gps_time']);
        });
    });
});
