import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, mergeConfig, validateConfig } from '../../src/config';
import { UndecodablePolicy } from '../../src/types';
import { ConfigurationError } from '../../src/utils/errors';

describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    const writeYaml = (content: string) => {
        const file = path.join(dir, 'custom.yaml');
        fs.writeFileSync(file, content);
        return file;
    };

    it('loads the bundled defaults', () => {
        const config = loadConfig({ env: {} });

        expect(config.input.path).toBe('data/este_TCIM_195_scored_final.csv');
        expect(config.input.encodings).toEqual(['utf-8', 'latin1', 'iso-8859-1', 'cp1252', 'utf-8-sig']);
        expect(config.input.on_undecodable).toBe(UndecodablePolicy.REPLACE);
        expect(config.fields.category).toBe('Category');
        expect(config.fields.suitability).toBe('TCIM_suitability_level');
        expect(config.placeholders.category).toBe('Sin categoría');
        expect(config.placeholders.subcategory).toBe('Sin subcategoría');
        expect(config.suitability_levels.map(level => level.name)).toEqual(['High', 'Moderate', 'Low', 'Not applicable']);
        expect(config.output.chart).toEqual({ path: 'grafico_categorias.png', format: 'png', width: 1200, height: 600, scale: 3 });
    });

    it('returns a fresh object on every call', () => {
        const first = loadConfig({ env: {} });
        const second = loadConfig({ env: {} });

        expect(second).toEqual(first);
        expect(second).not.toBe(first);
        expect(second.input).not.toBe(first.input);
    });

    it('merges a user file over the defaults', () => {
        const file = writeYaml('input:\n  path: otros.csv\nfields:\n  suitability: null\n');

        const config = loadConfig({ configPath: file, env: {} });

        expect(config.input.path).toBe('otros.csv');
        expect(config.input.delimiter).toBe(',');
        expect(config.fields.suitability).toBeNull();
        expect(config.fields.category).toBe('Category');
    });

    it('applies environment overrides last', () => {
        const file = writeYaml('input:\n  path: otros.csv\n');

        const config = loadConfig({ configPath: file, env: { STUDY_GROUPER_INPUT: 'env.csv', LOG_LEVEL: 'debug' } });

        expect(config.input.path).toBe('env.csv');
        expect(config.logging.level).toBe('debug');
    });

    it('rejects an unsupported encoding label', () => {
        const file = writeYaml('input:\n  encodings: [klingon-8]\n');

        expect(() => loadConfig({ configPath: file, env: {} })).toThrow(ConfigurationError);
        expect(() => loadConfig({ configPath: file, env: {} })).toThrow('input.encodings.0');
    });

    it('rejects a blank field name', () => {
        const file = writeYaml('fields:\n  category: "  "\n');

        expect(() => loadConfig({ configPath: file, env: {} })).toThrow(ConfigurationError);
        expect(() => loadConfig({ configPath: file, env: {} })).toThrow('fields.category');
    });

    it('rejects a non-positive chart size or scale', () => {
        const width = writeYaml('output:\n  chart:\n    width: 0\n');

        expect(() => loadConfig({ configPath: width, env: {} })).toThrow(ConfigurationError);
        expect(() => loadConfig({ configPath: width, env: {} })).toThrow('output.chart.width');

        const scale = writeYaml('output:\n  chart:\n    scale: 0\n');

        expect(() => loadConfig({ configPath: scale, env: {} })).toThrow('output.chart.scale');
    });

    it('rejects malformed YAML and missing files', () => {
        const file = writeYaml('input: [unclosed\n');

        expect(() => loadConfig({ configPath: file, env: {} })).toThrow(ConfigurationError);
        expect(() => loadConfig({ configPath: path.join(dir, 'nope.yaml'), env: {} })).toThrow(ConfigurationError);
    });

    it('rejects a file that is not a mapping', () => {
        const file = writeYaml('- just\n- a list\n');

        expect(() => loadConfig({ configPath: file, env: {} })).toThrow('must contain a mapping');
    });
});

describe('mergeConfig', () => {
    it('merges nested objects and replaces arrays', () => {
        expect(mergeConfig({ a: [1, 2], b: { c: 1, d: 2 } }, { a: [3], b: { d: 5 } })).toEqual({ a: [3], b: { c: 1, d: 5 } });
    });
});

describe('validateConfig', () => {
    it('lists every failing path', () => {
        expect(() => validateConfig({})).toThrow(/^Invalid configuration: input: Required/);
    });
});
