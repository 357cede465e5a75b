import fs from 'fs';
import path from 'path';
import ejs from 'ejs';
import { Aggregator } from '../aggregator';
import { AppConfig } from '../../config';
import { Aggregate, CategoryDrilldown, StudyDetail, StudyRecord } from '../../types';

export const TEMPLATE_PATH = path.resolve(__dirname, '../../../templates/interactive.ejs');

const FONT = 'Segoe UI, Tahoma, Geneva, Verdana, sans-serif';
const INK = '#2c3e50';
const UNLISTED_LEVEL_COLOR = '#bdc3c7';

export type InteractiveConfig = Pick<AppConfig, 'fields' | 'placeholders' | 'suitability_levels'> & {
    output: { interactive: AppConfig['output']['interactive'] };
};

export type BarTrace = {
    type: 'bar';
    name: string;
    x: string[];
    y: number[];
    marker: { color: string; line: { color: string; width: number }; opacity: number };
    text: string[];
    textposition: 'inside';
    textfont: { size: number; color: string; family: string };
    hovertemplate: string;
};

export type TotalsTrace = {
    type: 'scatter';
    mode: 'text';
    x: string[];
    y: number[];
    text: string[];
    textfont: { size: number; color: string; family: string };
    showlegend: false;
    hoverinfo: 'skip';
};

export type Figure = {
    data: Array<BarTrace | TotalsTrace>;
    layout: Record<string, unknown>;
};

/**
 * JSON that can sit inside a <script> element.
 */
export const toScriptJson = (value: unknown): string =>
    JSON.stringify(value)
        .replace(/</g, '\\u003c')
        .replace(/>/g, '\\u003e')
        .replace(/&/g, '\\u0026')
        .replace(/\u2028/g, '\\u2028')
        .replace(/\u2029/g, '\\u2029');

const axis = (title: string) => ({
    title: { text: title, font: { size: 15, color: INK, family: FONT } },
    tickfont: { size: 12, color: '#34495e', family: FONT },
    gridcolor: '#ecf0f1',
    gridwidth: 1,
    linecolor: '#bdc3c7',
    linewidth: 1,
    showgrid: true
});

const barTrace = (name: string, color: string, x: string[], y: number[]): BarTrace => ({
    type: 'bar',
    name,
    x,
    y,
    marker: { color, line: { color: INK, width: 1 }, opacity: 0.85 },
    text: y.map(count => (count > 0 ? `<b>${count}</b>` : '')),
    textposition: 'inside',
    textfont: { size: 11, color: 'white', family: FONT },
    hovertemplate: `<b>${name}</b><br>Category: %{x}<br>Count: %{y}<br><extra></extra>`
});

export class InteractiveChart {

    /**
     * Configured levels first, then any other observed level in first-seen order.
     */
    static levels(aggregate: Aggregate, config: InteractiveConfig): Array<{ name: string; color: string }> {
        const levels = config.suitability_levels.map(level => ({ ...level }));
        const known = new Set(levels.map(level => level.name));
        for (const table of aggregate.suitability?.values() ?? []) {
            for (const label of table.keys()) {
                if (!known.has(label)) {
                    known.add(label);
                    levels.push({ name: label, color: UNLISTED_LEVEL_COLOR });
                }
            }
        }
        return levels;
    }

    static buildFigure(aggregate: Aggregate, config: InteractiveConfig): Figure {
        const ranked = Aggregator.rank(aggregate.categories);
        const names = ranked.map(entry => entry.label);
        const totals = ranked.map(entry => entry.count);
        const total = totals.reduce((sum, count) => sum + count, 0);
        const max = Math.max(0, ...totals);

        const bars: BarTrace[] = aggregate.suitability
            ? this.levels(aggregate, config).map(level => barTrace(
                level.name,
                level.color,
                names,
                names.map(category => aggregate.suitability?.get(category)?.get(level.name) ?? 0)
            ))
            : [barTrace('Studies', '#3498db', names, totals)];

        const totalsTrace: TotalsTrace = {
            type: 'scatter',
            mode: 'text',
            x: names,
            // one shared height so short bars get readable labels too
            y: names.map(() => max * 1.25),
            text: totals.map(count => `<b>${count}</b><br><b>(${Aggregator.formatPercentage(count, total)}%)</b>`),
            textfont: { size: 16, color: '#1a252f', family: FONT },
            showlegend: false,
            hoverinfo: 'skip'
        };

        return {
            data: [...bars, totalsTrace],
            layout: {
                title: {
                    text: 'Distribution of Studies by Category',
                    x: 0.5,
                    xanchor: 'center',
                    font: { size: 22, color: INK, family: FONT }
                },
                xaxis: { ...axis('Categories'), type: 'category', tickangle: -45 },
                yaxis: { ...axis('Number of Studies'), range: [0, max * 1.35] },
                plot_bgcolor: '#ffffff',
                paper_bgcolor: '#ffffff',
                height: 650,
                margin: { b: 120, l: 80, r: 40, t: 180, pad: 20 },
                hovermode: 'closest',
                barmode: 'stack',
                legend: { orientation: 'h', yanchor: 'bottom', y: 1.12, xanchor: 'right', x: 1, font: { size: 12, family: FONT } },
                hoverlabel: { bgcolor: INK, font: { size: 12, family: FONT, color: 'white' } },
                font: { family: FONT }
            }
        };
    }

    static toDetail(record: StudyRecord, config: InteractiveConfig): StudyDetail {
        const { fields, placeholders } = config;
        return {
            title: Aggregator.normalizeText(record[fields.title], placeholders.title),
            author: Aggregator.normalizeText(record[fields.author], placeholders.author),
            year: Aggregator.normalizeText(record[fields.year], placeholders.year),
            subcategory: Aggregator.normalizeText(record[fields.subcategory], placeholders.detail_subcategory),
            suitability: fields.suitability
                ? Aggregator.normalizeText(record[fields.suitability], placeholders.detail_suitability)
                : placeholders.detail_suitability
        };
    }

    static buildDrilldown(aggregate: Aggregate, config: InteractiveConfig): Record<string, CategoryDrilldown> {
        return Object.fromEntries(Aggregator.rank(aggregate.categories).map(({ label, count }): [string, CategoryDrilldown] => [
            label,
            {
                subcategories: Aggregator.rank(aggregate.subcategories.get(label)),
                total: count,
                studies: (aggregate.recordsByCategory.get(label) ?? []).map(record => this.toDetail(record, config))
            }
        ]));
    }

    static suitabilityHeading(config: InteractiveConfig): string {
        return (config.fields.suitability ?? 'Suitability level').replace(/_/g, ' ');
    }

    static renderPage(aggregate: Aggregate, config: InteractiveConfig, templatePath = TEMPLATE_PATH): string {
        const template = fs.readFileSync(templatePath, 'utf-8');
        return ejs.render(template, {
            total: aggregate.total,
            plotlyCdn: config.output.interactive.plotly_cdn,
            suitabilityHeading: this.suitabilityHeading(config),
            figureJson: toScriptJson(this.buildFigure(aggregate, config)),
            drilldownJson: toScriptJson(this.buildDrilldown(aggregate, config))
        });
    }

    static write(aggregate: Aggregate, config: InteractiveConfig, outputPath = config.output.interactive.path): string {
        const html = this.renderPage(aggregate, config);
        const dir = path.dirname(outputPath);
        fs.mkdirSync(dir, { recursive: true });
        fs.writeFileSync(outputPath, html, 'utf-8');
        return outputPath;
    }
}
