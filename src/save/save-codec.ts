import * as zlib from 'zlib';
import * as yaml from 'js-yaml';
import { ERROR_MESSAGES, FormatError, describeError } from '../errors';
import { SaveDocument, isRecord, isSaveDocument } from './save-data';

export type StagingFormat = 'json' | 'yaml';

export const STAGING_FORMATS: readonly StagingFormat[] = ['json', 'yaml'];

export function isStagingFormat(value: string): value is StagingFormat {
    return STAGING_FORMATS.some(format => format === value);
}

function toSaveDocument(parsed: unknown): SaveDocument {
    if (!isSaveDocument(parsed)) {
        throw new FormatError(ERROR_MESSAGES.MISSING_HERO);
    }
    return parsed;
}

/**
 * Decompress and parse a raw save file
 */
export function decodeSave(bytes: Buffer): SaveDocument {
    let text: string;
    try {
        text = zlib.gunzipSync(bytes).toString('utf8');
    } catch (error) {
        throw new FormatError(`${ERROR_MESSAGES.DECOMPRESSION_FAILED}: ${describeError(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new FormatError(`${ERROR_MESSAGES.PARSE_FAILED}: ${describeError(error)}`, { cause: error });
    }

    return toSaveDocument(parsed);
}

/**
 * Serialize and compress a document back to save file bytes
 */
export function encodeSave(doc: SaveDocument): Buffer {
    // Level 9 matches what the game writes
    return zlib.gzipSync(Buffer.from(JSON.stringify(doc), 'utf8'), { level: 9 });
}

/**
 * Structural equality over JSON values. Numbers compare with `===`, so -0 and 0
 * match while NaN never matches anything.
 */
function sameJsonValue(a: unknown, b: unknown): boolean {
    if (Array.isArray(a) || Array.isArray(b)) {
        return Array.isArray(a)
            && Array.isArray(b)
            && a.length === b.length
            && a.every((entry, i) => sameJsonValue(entry, b[i]));
    }
    if (isRecord(a) || isRecord(b)) {
        if (!isRecord(a) || !isRecord(b)) {
            return false;
        }
        const keys = Object.keys(a);
        return keys.length === Object.keys(b).length
            && keys.every(key => Object.prototype.hasOwnProperty.call(b, key) && sameJsonValue(a[key], b[key]));
    }
    return a === b;
}

/**
 * Encode, then decode the output again and check nothing was lost on the way.
 */
export function encodeVerifiedSave(doc: SaveDocument): Buffer {
    const encoded = encodeSave(doc);

    let roundTripped: SaveDocument;
    try {
        roundTripped = decodeSave(encoded);
    } catch (error) {
        throw new FormatError(ERROR_MESSAGES.VERIFICATION_FAILED, { cause: error });
    }

    // NaN, Infinity and undefined fields do not survive JSON
    if (!sameJsonValue(roundTripped, doc)) {
        throw new FormatError(ERROR_MESSAGES.VERIFICATION_FAILED);
    }

    return encoded;
}

/**
 * Render a document as a human-readable staging file body
 */
export function formatStagingText(doc: SaveDocument, format: StagingFormat = 'json'): string {
    if (format === 'yaml') {
        return yaml.dump(doc, {
            schema: yaml.JSON_SCHEMA,
            indent: 2,
            lineWidth: -1,
            noRefs: true,
            sortKeys: false
        });
    }
    return `${JSON.stringify(doc, null, 2)}\n`;
}

/**
 * Parse a staging file body written by formatStagingText
 */
export function parseStagingText(text: string, format: StagingFormat = 'json'): SaveDocument {
    let parsed: unknown;
    try {
        parsed = format === 'yaml'
            ? yaml.load(text, { schema: yaml.JSON_SCHEMA })
            : JSON.parse(text);
    } catch (error) {
        throw new FormatError(`${ERROR_MESSAGES.STAGING_PARSE_FAILED}: ${describeError(error)}`, { cause: error });
    }

    return toSaveDocument(parsed);
}
