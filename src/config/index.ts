import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import dotenv from 'dotenv';
import { z } from 'zod';
import { isSupportedEncoding } from '../modules/reader';
import { UndecodablePolicy } from '../types';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../src/config/default.yaml');

const EncodingLabel = z.string().min(1).refine(isSupportedEncoding, (label) => ({
    message: `Unsupported encoding '${label}'`
}));

const FieldName = z.string().trim().min(1);

const ConfigSchema = z.object({
    input: z.object({
        path: z.string().min(1),
        delimiter: z.string().length(1),
        encodings: z.array(EncodingLabel).min(1),
        on_undecodable: z.nativeEnum(UndecodablePolicy)
    }),
    fields: z.object({
        category: FieldName,
        subcategory: FieldName,
        // null turns off the suitability dimension
        suitability: FieldName.nullable(),
        title: FieldName,
        author: FieldName,
        year: FieldName
    }),
    placeholders: z.object({
        category: z.string().min(1),
        subcategory: z.string().min(1),
        suitability: z.string().min(1),
        title: z.string().min(1),
        author: z.string().min(1),
        year: z.string().min(1),
        detail_subcategory: z.string().min(1),
        detail_suitability: z.string().min(1)
    }),
    suitability_levels: z.array(z.object({
        name: z.string().min(1),
        color: z.string().min(1)
    })).min(1),
    output: z.object({
        chart: z.object({
            path: z.string().min(1),
            format: z.enum(['png', 'svg']),
            width: z.number().int().positive(),
            height: z.number().int().positive(),
            scale: z.number().positive()
        }),
        interactive: z.object({
            path: z.string().min(1),
            plotly_cdn: z.string().url()
        }),
        export: z.object({
            path: z.string().min(1)
        })
    }),
    logging: z.object({
        level: z.enum(['error', 'warn', 'info', 'debug']),
        directory: z.string()
    })
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface LoadConfigOptions {
    configPath?: string;
    env?: NodeJS.ProcessEnv;
}

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Merges `override` into `base`. Nested objects merge key by key; arrays and scalars replace.
 */
export const mergeConfig = (base: PlainObject, override: PlainObject): PlainObject => {
    const merged: PlainObject = { ...base };
    for (const [key, value] of Object.entries(override)) {
        const current = merged[key];
        merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeConfig(current, value) : value;
    }
    return merged;
};

const readYaml = (filePath: string): PlainObject => {
    if (!fs.existsSync(filePath)) {
        throw new ConfigurationError(`Config file not found: ${filePath}`);
    }
    let parsed: unknown;
    try {
        parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Config file ${filePath} is not valid YAML: ${reason}`);
    }
    if (parsed === undefined || parsed === null) return {};
    if (!isPlainObject(parsed)) {
        throw new ConfigurationError(`Config file ${filePath} must contain a mapping`);
    }
    return parsed;
};

const applyEnv = (raw: PlainObject, env: NodeJS.ProcessEnv): PlainObject => {
    const overrides: PlainObject = {};
    if (env.STUDY_GROUPER_INPUT) {
        overrides.input = { path: env.STUDY_GROUPER_INPUT };
    }
    if (env.LOG_LEVEL) {
        overrides.logging = { level: env.LOG_LEVEL };
    }
    return mergeConfig(raw, overrides);
};

export const validateConfig = (raw: unknown): AppConfig => {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${issues}`);
    }
    return result.data;
};

/**
 * Builds the run configuration: bundled defaults, then the user file, then environment overrides.
 * Returns a fresh object on every call.
 */
export const loadConfig = (options: LoadConfigOptions = {}): AppConfig => {
    let raw = readYaml(DEFAULT_CONFIG_PATH);
    if (options.configPath) {
        raw = mergeConfig(raw, readYaml(options.configPath));
    }
    return validateConfig(applyEnv(raw, options.env ?? process.env));
};
