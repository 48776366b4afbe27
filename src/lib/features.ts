import { FieldNotFoundError } from './errors';
import { type SbfDocument } from './sbf/document';

/**
 * Lower-cased names used by feature definitions, mapped to the field names
 * found in point clouds.
 */
const fieldNameConvention: Readonly<Record<string, string>> = {
    gpstime: 'gps_time',
    numberofreturns: 'number_of_returns',
    returnnumber: 'return_number',
    scananglerank: 'scan_angle_rank',
    pointsourceid: 'point_source_id'
};

type LoadFeaturesOptions = {
    /** Also return the `classification` field as labels. */
    labels?: boolean;
};

type Features = {
    /** Field names, as stored in the document, in request order. */
    names: string[];
    /** Field values, one array per name. */
    features: Float32Array[];
    labels?: Float32Array;
};

/**
 * Resolves a requested feature name to a field of the document. The lookup
 * is case-insensitive after the convention table is applied.
 *
 * @param fieldNames - Field names of the document.
 * @param requested - The name as written in the feature definition.
 * @returns The exact stored field name.
 */
const resolveFieldName = (fieldNames: readonly string[], requested: string): string => {
    const lower = requested.toLowerCase();
    const normalized = fieldNameConvention[lower] ?? lower;

    const exact = fieldNames.find(name => name === normalized);
    if (exact !== undefined) {
        return exact;
    }

    const match = fieldNames.find(name => name.toLowerCase() === normalized);
    if (match === undefined) {
        throw new FieldNotFoundError(requested, [...fieldNames]);
    }
    return match;
};

/**
 * Selects named scalar fields of a point cloud, for example the features
 * computed for a classifier.
 *
 * @param document - Point cloud holding the fields.
 * @param featureNames - Requested fields, in the order they are wanted.
 * @param options - Whether to return labels too.
 * @returns The selected fields (live arrays, not copies).
 *
 * @example
 * ```ts
 * const { names, features, labels } = loadFeatures(document, ['GPSTime', 'Intensity'], { labels: true });
 * // names: ['gps_time', 'intensity']
 * ```
 */
const loadFeatures = (document: SbfDocument, featureNames: string[], options: LoadFeaturesOptions = {}): Features => {
    const names = featureNames.map(name => resolveFieldName(document.fieldNames, name));

    const result: Features = {
        names,
        features: names.map(name => document.getField(name))
    };

    if (options.labels) {
        result.labels = document.getField(resolveFieldName(document.fieldNames, 'classification'));
    }

    return result;
};

export { loadFeatures, resolveFieldName, fieldNameConvention, type Features, type LoadFeaturesOptions };
