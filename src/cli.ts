#!/usr/bin/env node
import { Command } from 'commander';
import path from 'path';
import { AppConfig, loadConfig } from './config';
import { logger as defaultLogger } from './modules/observability';
import { Pipeline, PipelineDeps } from './pipeline';
import { AppError } from './utils/errors';

interface CommonOptions {
    input?: string;
    config?: string;
}

interface OutputOptions extends CommonOptions {
    output?: string;
}

interface SummaryCliOptions extends OutputOptions {
    chart: boolean;
}

const resolveOutput = (output?: string) => (output ? path.resolve(output) : undefined);

/**
 * Builds the command tree. Pipeline dependencies are passed through to every command.
 * A failed command logs the error and sets a non-zero exit code.
 */
export const buildProgram = (deps: PipelineDeps = {}): Command => {
    const logger = deps.logger ?? defaultLogger;

    const prepare = (options: CommonOptions): AppConfig => {
        const config = loadConfig({ configPath: options.config ? path.resolve(options.config) : undefined });
        logger.configure({ level: config.logging.level, directory: config.logging.directory || undefined });
        if (options.input) {
            return { ...config, input: { ...config.input, path: path.resolve(options.input) } };
        }
        return config;
    };

    const fail = (e: unknown) => {
        if (e instanceof AppError) {
            logger.error(e.message, { code: e.code, ...e.context });
        } else {
            logger.error('Fatal Error', { error: e instanceof Error ? e.stack ?? e.message : String(e) });
        }
        process.exitCode = 1;
    };

    const program = new Command();

    program
        .name('study-grouper')
        .description('Group and count studies from a CSV file by category and subcategory')
        .version('1.0.0');

    program
        .command('summary')
        .description('Print counts per category and subcategory and save a bar chart')
        .option('-i, --input <path>', 'Input CSV file path')
        .option('-c, --config <path>', 'Path to custom config YAML')
        .option('-o, --output <path>', 'Chart output path; a .png or .svg extension picks the format')
        .option('--no-chart', 'Skip the bar chart')
        .action(async (options: SummaryCliOptions) => {
            try {
                const config = prepare(options);
                await Pipeline.summary(config, { chart: options.chart, chartPath: resolveOutput(options.output) }, deps);
            } catch (e) {
                fail(e);
            }
        });

    program
        .command('interactive')
        .description('Generate the interactive HTML chart with drill-down by category')
        .option('-i, --input <path>', 'Input CSV file path')
        .option('-c, --config <path>', 'Path to custom config YAML')
        .option('-o, --output <path>', 'HTML output path')
        .action(async (options: OutputOptions) => {
            try {
                const config = prepare(options);
                await Pipeline.interactive(config, resolveOutput(options.output), deps);
            } catch (e) {
                fail(e);
            }
        });

    program
        .command('export')
        .description('Write ranked category and subcategory counts to CSV')
        .option('-i, --input <path>', 'Input CSV file path')
        .option('-c, --config <path>', 'Path to custom config YAML')
        .option('-o, --output <path>', 'CSV output path')
        .action(async (options: OutputOptions) => {
            try {
                const config = prepare(options);
                await Pipeline.export(config, resolveOutput(options.output), deps);
            } catch (e) {
                fail(e);
            }
        });

    program
        .command('count-lines')
        .description('Count the lines of the input file')
        .option('-i, --input <path>', 'Input CSV file path')
        .option('-c, --config <path>', 'Path to custom config YAML')
        .action((options: CommonOptions) => {
            try {
                Pipeline.countLines(prepare(options), deps);
            } catch (e) {
                fail(e);
            }
        });

    return program;
};

if (require.main === module) {
    buildProgram().parseAsync(process.argv).catch((e: unknown) => {
        defaultLogger.error('Fatal Error', { error: e instanceof Error ? e.stack ?? e.message : String(e) });
        process.exitCode = 1;
    });
}
