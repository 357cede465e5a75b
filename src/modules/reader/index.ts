import fs from 'fs';
import { TextDecoder } from 'util';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DecodeResult, LineCount, ReadResult, StudyRecord, UndecodablePolicy } from '../../types';
import { CsvParseError, DecodeError, InputFileNotFoundError } from '../../utils/errors';

export interface DecodeOptions {
    encodings: readonly string[];
    onUndecodable: UndecodablePolicy;
}

export interface ReaderOptions extends DecodeOptions {
    delimiter: string;
}

const UTF8_SIG = 'utf-8-sig';

const RowSchema = z.record(z.string(), z.string());
const RowsSchema = z.array(RowSchema);

/**
 * Maps a configured label to one TextDecoder understands.
 * `utf-8-sig` is plain UTF-8: the decoder already drops a leading byte-order mark.
 */
export const resolveEncoding = (label: string): string =>
    label.trim().toLowerCase() === UTF8_SIG ? 'utf-8' : label.trim();

export const isSupportedEncoding = (label: string): boolean => {
    try {
        new TextDecoder(resolveEncoding(label));
        return true;
    } catch {
        return false;
    }
};

const decodeStrict = (bytes: Uint8Array, label: string): string | null => {
    try {
        return new TextDecoder(resolveEncoding(label), { fatal: true }).decode(bytes);
    } catch {
        return null;
    }
};

const stripBom = (text: string): string => (text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);

/**
 * Tries each encoding in order with strict decoding. When none fits, either substitutes
 * U+FFFD using the first encoding (`lossy: true`) or throws, depending on the policy.
 */
export const decodeBuffer = (bytes: Uint8Array, options: DecodeOptions, filePath = '<buffer>'): DecodeResult => {
    for (const encoding of options.encodings) {
        const text = decodeStrict(bytes, encoding);
        if (text !== null) {
            return { text: stripBom(text), encoding, lossy: false };
        }
    }

    if (options.onUndecodable === UndecodablePolicy.FAIL || options.encodings.length === 0) {
        throw new DecodeError(filePath, options.encodings);
    }

    const fallback = options.encodings[0];
    const text = new TextDecoder(resolveEncoding(fallback)).decode(bytes);
    return { text: stripBom(text), encoding: fallback, lossy: true };
};

export const readDecoded = (filePath: string, options: DecodeOptions): DecodeResult => {
    if (!fs.existsSync(filePath)) {
        throw new InputFileNotFoundError(filePath);
    }
    return decodeBuffer(fs.readFileSync(filePath), options, filePath);
};

export const parseStudies = (text: string, delimiter: string, filePath = '<text>'): StudyRecord[] => {
    let rows: unknown;
    try {
        rows = parse(text, {
            columns: true,
            delimiter,
            bom: true,
            skip_empty_lines: true,
            relax_column_count: true
        });
    } catch (e) {
        throw new CsvParseError(filePath, e instanceof Error ? e.message : String(e));
    }

    const parsed = RowsSchema.safeParse(rows);
    if (!parsed.success) {
        throw new CsvParseError(filePath, parsed.error.issues[0]?.message ?? 'unexpected row shape');
    }
    return parsed.data;
};

export const readStudies = (filePath: string, options: ReaderOptions): ReadResult => {
    const decoded = readDecoded(filePath, options);
    return {
        records: parseStudies(decoded.text, options.delimiter, filePath),
        encoding: decoded.encoding,
        lossy: decoded.lossy
    };
};

/**
 * Counts physical lines. A last line without a trailing newline still counts.
 */
export const countTextLines = (text: string): number => {
    if (text.length === 0) return 0;
    const pieces = text.split(/\r\n|\r|\n/).length;
    return /(\r\n|\r|\n)$/.test(text) ? pieces - 1 : pieces;
};

export const countLines = (filePath: string, options: DecodeOptions): LineCount => {
    const decoded = readDecoded(filePath, options);
    const lines = countTextLines(decoded.text);
    return { lines, dataRows: Math.max(0, lines - 1), encoding: decoded.encoding };
};
