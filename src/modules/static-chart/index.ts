import fs from 'fs';
import path from 'path';
import { JSDOM } from 'jsdom';
import { Aggregator } from '../aggregator';
import { logger as defaultLogger, Logger } from '../observability';
import { Aggregate } from '../../types';
import { AppError, OptionalDependencyError } from '../../utils/errors';

const SVG_NS = 'http://www.w3.org/2000/svg';
const FONT_FAMILY = 'DejaVu Sans, Arial, sans-serif';

const MARGIN = { top: 70, right: 30, bottom: 170, left: 80 };
// headroom above the tallest bar for its two-line value label
const HEADROOM = 1.18;

export const CHART_TEXT = {
    title: 'Distribución de Estudios por Categoría',
    xLabel: 'Categorías',
    yLabel: 'Número de Estudios'
};

export interface ChartOptions {
    path: string;
    format: 'png' | 'svg';
    width: number;
    height: number;
    scale: number;
}

export type Rasterizer = (svg: string, options: { density: number }) => Promise<Buffer>;

export interface ChartDeps {
    loadRasterizer?: () => Promise<Rasterizer>;
    logger?: Logger;
}

const fmt = (n: number): string => String(Number(n.toFixed(2)));

/**
 * Tick spacing of 1, 2 or 5 times a power of ten giving about `count` ticks up to `max`.
 */
export const tickStep = (max: number, count = 5): number => {
    if (max <= 0) return 1;
    const raw = max / count;
    const power = Math.pow(10, Math.floor(Math.log10(raw)));
    const ratio = raw / power;
    const nice = ratio <= 1 ? 1 : ratio <= 2 ? 2 : ratio <= 5 ? 5 : 10;
    return Math.max(1, nice * power);
};

export const loadSharpRasterizer = async (): Promise<Rasterizer> => {
    try {
        const { default: sharp } = await import('sharp');
        return (svg, { density }) => sharp(Buffer.from(svg), { density }).png().toBuffer();
    } catch (e) {
        throw new OptionalDependencyError('sharp', e);
    }
};

export class StaticChart {

    /**
     * Bar chart of ranked category counts, as a standalone SVG document.
     */
    static renderSvg(aggregate: Aggregate, options: Pick<ChartOptions, 'width' | 'height'>): string {
        const { width, height } = options;
        const dom = new JSDOM('');
        const document = dom.window.document;

        const el = (name: string, attrs: Record<string, string | number>, text?: string) => {
            const node = document.createElementNS(SVG_NS, name);
            for (const [key, value] of Object.entries(attrs)) {
                node.setAttribute(key, typeof value === 'number' ? fmt(value) : value);
            }
            if (text !== undefined) node.textContent = text;
            return node;
        };

        const ranked = Aggregator.rank(aggregate.categories);
        const total = ranked.reduce((sum, entry) => sum + entry.count, 0);
        const max = ranked.reduce((m, entry) => Math.max(m, entry.count), 0);

        const innerWidth = width - MARGIN.left - MARGIN.right;
        const innerHeight = height - MARGIN.top - MARGIN.bottom;
        const step = tickStep(max * HEADROOM);
        const yMax = Math.max(step, Math.ceil((max * HEADROOM) / step) * step);
        const baseline = MARGIN.top + innerHeight;
        const y = (value: number) => baseline - (value / yMax) * innerHeight;

        const svg = el('svg', { width, height, viewBox: `0 0 ${width} ${height}`, 'font-family': FONT_FAMILY });
        svg.appendChild(el('rect', { x: 0, y: 0, width, height, fill: '#ffffff' }));

        const grid = el('g', { class: 'grid' });
        for (let tick = 0; tick <= yMax; tick += step) {
            grid.appendChild(el('line', {
                x1: MARGIN.left, x2: MARGIN.left + innerWidth, y1: y(tick), y2: y(tick),
                stroke: '#b0b0b0', 'stroke-opacity': 0.3, 'stroke-dasharray': '6 4'
            }));
            grid.appendChild(el('text', {
                x: MARGIN.left - 8, y: y(tick), 'text-anchor': 'end', 'dominant-baseline': 'middle', 'font-size': 11
            }, String(tick)));
        }
        svg.appendChild(grid);

        const band = ranked.length ? innerWidth / ranked.length : innerWidth;
        const barWidth = band * 0.8;
        const bars = el('g', { class: 'bars' });
        const labels = el('g', { class: 'labels' });
        ranked.forEach(({ label, count }, index) => {
            const center = MARGIN.left + band * index + band / 2;
            bars.appendChild(el('rect', {
                class: 'bar', x: center - barWidth / 2, y: y(count), width: barWidth, height: baseline - y(count),
                fill: 'steelblue', stroke: 'navy', 'fill-opacity': 0.7
            }));

            const value = el('text', {
                class: 'value', x: center, y: y(count) - 22, 'text-anchor': 'middle', 'font-size': 9, 'font-weight': 'bold'
            });
            value.appendChild(el('tspan', { x: center, dy: 0 }, String(count)));
            value.appendChild(el('tspan', { x: center, dy: 12 }, `(${Aggregator.formatPercentage(count, total)}%)`));
            labels.appendChild(value);

            labels.appendChild(el('text', {
                class: 'category', x: center, y: baseline + 14, 'text-anchor': 'end', 'font-size': 11,
                transform: `rotate(-45 ${fmt(center)} ${fmt(baseline + 14)})`
            }, label));
        });
        svg.appendChild(bars);
        svg.appendChild(labels);

        svg.appendChild(el('line', { x1: MARGIN.left, x2: MARGIN.left + innerWidth, y1: baseline, y2: baseline, stroke: '#333333' }));
        svg.appendChild(el('line', { x1: MARGIN.left, x2: MARGIN.left, y1: MARGIN.top, y2: baseline, stroke: '#333333' }));

        svg.appendChild(el('text', {
            class: 'title', x: width / 2, y: MARGIN.top / 2, 'text-anchor': 'middle', 'font-size': 14, 'font-weight': 'bold'
        }, CHART_TEXT.title));
        svg.appendChild(el('text', {
            class: 'x-label', x: MARGIN.left + innerWidth / 2, y: height - 12, 'text-anchor': 'middle', 'font-size': 12, 'font-weight': 'bold'
        }, CHART_TEXT.xLabel));
        svg.appendChild(el('text', {
            class: 'y-label', x: 0, y: 0, 'text-anchor': 'middle', 'font-size': 12, 'font-weight': 'bold',
            transform: `translate(20 ${fmt(MARGIN.top + innerHeight / 2)}) rotate(-90)`
        }, CHART_TEXT.yLabel));

        const xml = new dom.window.XMLSerializer().serializeToString(svg);
        dom.window.close();
        return `<?xml version="1.0" encoding="UTF-8"?>\n${xml}\n`;
    }

    /**
     * Writes the SVG, then the PNG when requested. A non-fatal rasteriser error only skips the PNG.
     * Returns the files written.
     */
    static async write(aggregate: Aggregate, options: ChartOptions, deps: ChartDeps = {}): Promise<string[]> {
        const log = deps.logger ?? defaultLogger;
        const parsed = path.parse(options.path);
        const svgPath = path.join(parsed.dir, `${parsed.name}.svg`);
        const svg = this.renderSvg(aggregate, options);

        if (parsed.dir) fs.mkdirSync(parsed.dir, { recursive: true });
        fs.writeFileSync(svgPath, svg, 'utf-8');
        const written = [svgPath];

        if (options.format !== 'png') return written;

        let rasterize: Rasterizer;
        try {
            rasterize = await (deps.loadRasterizer ?? loadSharpRasterizer)();
        } catch (e) {
            if (e instanceof AppError && !e.fatal) {
                log.warn(`⚠️  ${e.message}. Skipping PNG chart.`, { code: e.code, ...e.context });
                return written;
            }
            throw e;
        }

        const pngPath = path.join(parsed.dir, `${parsed.name}.png`);
        fs.writeFileSync(pngPath, await rasterize(svg, { density: 72 * options.scale }));
        written.push(pngPath);
        return written;
    }
}
