import path from 'path';
import { AppConfig } from '../config';
import { Aggregator, AggregatorConfig } from '../modules/aggregator';
import { ConsoleReport } from '../modules/console-report';
import { CountExporter } from '../modules/exporter';
import { InteractiveChart } from '../modules/interactive';
import { logger as defaultLogger, Logger, RunStats } from '../modules/observability';
import { countLines, readStudies } from '../modules/reader';
import { ChartOptions, Rasterizer, StaticChart } from '../modules/static-chart';
import { Aggregate, LineCount, ReadResult } from '../types';

export const EMPTY_INPUT_MESSAGE = 'El archivo no contiene datos.';

export interface PipelineDeps {
    logger?: Logger;
    // user-facing output; logs go through the logger
    write?: (line: string) => void;
    loadRasterizer?: () => Promise<Rasterizer>;
}

export interface PipelineResult {
    aggregate: Aggregate | null;
    files: string[];
    stats: ReturnType<RunStats['getSummary']>;
}

export interface SummaryOptions {
    chart: boolean;
    chartPath?: string;
}

const aggregatorConfig = (config: AppConfig, withSuitability: boolean): AggregatorConfig => ({
    fields: {
        category: config.fields.category,
        subcategory: config.fields.subcategory,
        suitability: withSuitability ? config.fields.suitability : null
    },
    placeholders: config.placeholders
});

/**
 * An explicit chart path with a .png or .svg extension overrides the configured format.
 */
export const chartOptionsFor = (config: AppConfig, chartPath?: string): ChartOptions => {
    if (!chartPath) return config.output.chart;
    const ext = path.extname(chartPath).slice(1).toLowerCase();
    const format = ext === 'png' || ext === 'svg' ? ext : config.output.chart.format;
    return { ...config.output.chart, path: chartPath, format };
};

type Stage = (aggregate: Aggregate, write: (line: string) => void) => Promise<string[]>;

export class Pipeline {

    static load(config: AppConfig, log: Logger, stats: RunStats): ReadResult {
        const inputPath = config.input.path;
        log.info(`Reading ${inputPath}`);
        const result = readStudies(inputPath, {
            encodings: config.input.encodings,
            onUndecodable: config.input.on_undecodable,
            delimiter: config.input.delimiter
        });
        if (result.lossy) {
            log.warn(`No configured encoding decodes ${inputPath} cleanly; undecodable bytes were replaced`, {
                encoding: result.encoding
            });
        }
        log.info(`Read ${result.records.length} rows`, { encoding: result.encoding });
        stats.recordRead(result);
        return result;
    }

    /**
     * Read, aggregate, then hand the aggregate to one output stage.
     * Reading finishes before the stage starts, so a fatal read error leaves no files behind.
     */
    private static async run(config: AppConfig, withSuitability: boolean, stage: Stage, deps: PipelineDeps): Promise<PipelineResult> {
        const log = deps.logger ?? defaultLogger;
        const write = deps.write ?? console.log;
        const stats = new RunStats();

        const { records } = this.load(config, log, stats);
        if (records.length === 0) {
            write(EMPTY_INPUT_MESSAGE);
            return { aggregate: null, files: [], stats: stats.getSummary() };
        }

        const aggregate = Aggregator.aggregate(records, aggregatorConfig(config, withSuitability));
        stats.recordAggregate(aggregate);

        const files = await stage(aggregate, write);
        stats.recordOutputs(files);

        const summary = stats.getSummary();
        log.info('Run finished', summary);
        return { aggregate, files, stats: summary };
    }

    static summary(config: AppConfig, options: SummaryOptions, deps: PipelineDeps = {}): Promise<PipelineResult> {
        return this.run(config, false, async (aggregate, write) => {
            ConsoleReport.print(aggregate, write);
            if (!options.chart) return [];

            const files = await StaticChart.write(aggregate, chartOptionsFor(config, options.chartPath), {
                loadRasterizer: deps.loadRasterizer,
                logger: deps.logger
            });
            for (const file of files) {
                write(`📊 Gráfico guardado como '${file}'`);
            }
            return files;
        }, deps);
    }

    static interactive(config: AppConfig, outputPath: string | undefined, deps: PipelineDeps = {}): Promise<PipelineResult> {
        return this.run(config, config.fields.suitability !== null, async (aggregate, write) => {
            const file = InteractiveChart.write(aggregate, config, outputPath ?? config.output.interactive.path);
            write(`✅ Interactive HTML chart generated: '${file}'`);
            write('   Open the file in your browser and click on the bars to view subcategory details and the studies table.');
            return [file];
        }, deps);
    }

    static export(config: AppConfig, outputPath: string | undefined, deps: PipelineDeps = {}): Promise<PipelineResult> {
        return this.run(config, false, async (aggregate, write) => {
            const file = await CountExporter.write(aggregate, outputPath ?? config.output.export.path);
            write(`💾 Conteos exportados a '${file}'`);
            return [file];
        }, deps);
    }

    static countLines(config: AppConfig, deps: PipelineDeps = {}): LineCount {
        const write = deps.write ?? console.log;
        const inputPath = config.input.path;
        const result = countLines(inputPath, {
            encodings: config.input.encodings,
            onUndecodable: config.input.on_undecodable
        });
        write(`El archivo '${inputPath}' contiene ${result.lines} líneas en total.`);
        write(`(Incluyendo la línea de encabezado: ${result.dataRows} filas de datos)`);
        return result;
    }
}
