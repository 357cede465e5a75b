import { Aggregator } from '../aggregator';
import { Aggregate } from '../../types';

export class ConsoleReport {

    static buildSummary(aggregate: Aggregate): string[] {
        const { total, categories, subcategories } = aggregate;
        const ranked = Aggregator.rank(categories);
        const lines: string[] = ['', `Total de estudios analizados: ${total}`, ''];

        lines.push('Conteo por categoría:');
        for (const { label, count } of ranked) {
            lines.push(`- ${label}: ${count} (${Aggregator.formatPercentage(count, total)}%)`);
        }
        lines.push('');

        lines.push('Detalle por categoría y subcategoría:');
        for (const { label: category, count: categoryCount } of ranked) {
            lines.push('', `${category} (${categoryCount} estudios)`);
            for (const { label, count } of Aggregator.rank(subcategories.get(category))) {
                lines.push(`  • ${label}: ${count} (${Aggregator.formatPercentage(count, categoryCount)}%)`);
            }
        }
        lines.push('');

        return lines;
    }

    static print(aggregate: Aggregate, write: (line: string) => void = console.log) {
        for (const line of this.buildSummary(aggregate)) {
            write(line);
        }
    }
}
