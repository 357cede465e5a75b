import fs from 'fs';
import path from 'path';
import * as fastcsv from 'fast-csv';
import { Aggregator } from '../aggregator';
import { Aggregate, ExportRow } from '../../types';

export class CountExporter {

    /**
     * One row per (category, subcategory), categories ranked first, subcategories ranked within.
     */
    static buildRows(aggregate: Aggregate): ExportRow[] {
        const rows: ExportRow[] = [];
        for (const { label: category, count: categoryCount } of Aggregator.rank(aggregate.categories)) {
            for (const { label, count } of Aggregator.rank(aggregate.subcategories.get(category))) {
                rows.push({
                    category,
                    category_count: categoryCount,
                    subcategory: label,
                    subcategory_count: count,
                    category_pct: Aggregator.formatPercentage(categoryCount, aggregate.total),
                    subcategory_pct: Aggregator.formatPercentage(count, categoryCount)
                });
            }
        }
        return rows;
    }

    static async write(aggregate: Aggregate, outputPath: string): Promise<string> {
        const dir = path.dirname(outputPath);
        fs.mkdirSync(dir, { recursive: true });
        const rows = this.buildRows(aggregate);

        await new Promise<void>((resolve, reject) => {
            fastcsv.writeToPath(outputPath, rows, { headers: true })
                .on('error', reject)
                .on('finish', () => resolve());
        });
        return outputPath;
    }
}
