import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    countLines,
    countTextLines,
    decodeBuffer,
    isSupportedEncoding,
    parseStudies,
    readStudies,
    resolveEncoding
} from '../../src/modules/reader';
import { UndecodablePolicy } from '../../src/types';
import { CsvParseError, DecodeError, InputFileNotFoundError } from '../../src/utils/errors';

const ENCODINGS = ['utf-8', 'latin1', 'iso-8859-1', 'cp1252', 'utf-8-sig'];
const options = { encodings: ENCODINGS, onUndecodable: UndecodablePolicy.REPLACE, delimiter: ',' };

describe('decodeBuffer', () => {
    it('decodes UTF-8 with accented characters using the first encoding', () => {
        const result = decodeBuffer(Buffer.from('Category\nPsicología\n', 'utf8'), options);

        expect(result).toEqual({ text: 'Category\nPsicología\n', encoding: 'utf-8', lossy: false });
    });

    it('falls back to latin1 when the bytes are not valid UTF-8', () => {
        const result = decodeBuffer(Buffer.from('Psicología', 'latin1'), options);

        expect(result.text).toBe('Psicología');
        expect(result.encoding).toBe('latin1');
        expect(result.lossy).toBe(false);
    });

    it('drops a leading byte-order mark', () => {
        const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('a,b\n')]);

        expect(decodeBuffer(bytes, options).text).toBe('a,b\n');
    });

    it('throws when no encoding fits and the policy is fail', () => {
        const bytes = Buffer.from([0x41, 0xff, 0x42]);

        expect(() => decodeBuffer(bytes, { encodings: ['utf-8'], onUndecodable: UndecodablePolicy.FAIL }, 'in.csv'))
            .toThrow(DecodeError);
    });

    it('replaces undecodable bytes and flags the result when the policy is replace', () => {
        const bytes = Buffer.from([0x41, 0xff, 0x42]);

        const result = decodeBuffer(bytes, { encodings: ['utf-8'], onUndecodable: UndecodablePolicy.REPLACE });

        expect(result).toEqual({ text: 'A\uFFFDB', encoding: 'utf-8', lossy: true });
    });
});

describe('encoding labels', () => {
    it('treats utf-8-sig as utf-8', () => {
        expect(resolveEncoding('UTF-8-SIG')).toBe('utf-8');
        expect(resolveEncoding('cp1252')).toBe('cp1252');
    });

    it('recognises the labels the decoder supports', () => {
        for (const label of ENCODINGS) {
            expect(isSupportedEncoding(label)).toBe(true);
        }
        expect(isSupportedEncoding('klingon-8')).toBe(false);
    });
});

describe('parseStudies', () => {
    it('maps rows to header-keyed records', () => {
        const records = parseStudies('Category,Subcategory,Title\nAI,NLP,Paper one\n\nAI,,"Quoted, title"\nBio\n', ',');

        expect(records).toHaveLength(3);
        expect(records[0]).toEqual({ Category: 'AI', Subcategory: 'NLP', Title: 'Paper one' });
        expect(records[1]).toEqual({ Category: 'AI', Subcategory: '', Title: 'Quoted, title' });
        expect(records[2].Category).toBe('Bio');
        expect(records[2].Subcategory).toBeUndefined();
    });

    it('honours a custom delimiter', () => {
        expect(parseStudies('Category;Subcategory\nAI;NLP\n', ';')).toEqual([{ Category: 'AI', Subcategory: 'NLP' }]);
    });

    it('returns no records for a header-only or empty text', () => {
        expect(parseStudies('Category,Subcategory\n', ',')).toEqual([]);
        expect(parseStudies('', ',')).toEqual([]);
    });

    it('wraps parser failures', () => {
        expect(() => parseStudies('a,b\n"x,y\n', ',', 'broken.csv')).toThrow(CsvParseError);
    });
});

describe('countTextLines', () => {
    it('counts physical lines with or without a trailing newline', () => {
        expect(countTextLines('')).toBe(0);
        expect(countTextLines('\n')).toBe(1);
        expect(countTextLines('a\nb')).toBe(2);
        expect(countTextLines('a\nb\n')).toBe(2);
        expect(countTextLines('a\r\nb\r\n')).toBe(2);
    });
});

describe('file access', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reader-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reads studies from disk and reports the encoding used', () => {
        const file = path.join(dir, 'studies.csv');
        fs.writeFileSync(file, Buffer.from('Category,Subcategory\nEducación,Básica\n', 'latin1'));

        const result = readStudies(file, options);

        expect(result.records).toEqual([{ Category: 'Educación', Subcategory: 'Básica' }]);
        expect(result.encoding).toBe('latin1');
        expect(result.lossy).toBe(false);
    });

    it('throws InputFileNotFoundError for a missing file', () => {
        const file = path.join(dir, 'missing.csv');

        expect(() => readStudies(file, options)).toThrow(InputFileNotFoundError);
        expect(() => readStudies(file, options)).toThrow(`El archivo '${file}' no existe.`);
    });

    it('counts lines and data rows', () => {
        const file = path.join(dir, 'studies.csv');
        fs.writeFileSync(file, 'Category\nAI\nBio\n');

        expect(countLines(file, options)).toEqual({ lines: 3, dataRows: 2, encoding: 'utf-8' });
    });

    it('reports zero data rows for an empty file', () => {
        const file = path.join(dir, 'empty.csv');
        fs.writeFileSync(file, '');

        expect(countLines(file, options)).toEqual({ lines: 0, dataRows: 0, encoding: 'utf-8' });
    });
});
