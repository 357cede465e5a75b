import { Aggregate, CountTable, RankedEntry, StudyRecord, Substitutions } from '../../types';

export interface AggregatorConfig {
    fields: {
        category: string;
        subcategory: string;
        suitability: string | null;
    };
    placeholders: {
        category: string;
        subcategory: string;
        suitability: string;
    };
}

const increment = (table: Map<string, number>, label: string) => {
    table.set(label, (table.get(label) ?? 0) + 1);
};

const nested = <V>(outer: Map<string, V>, key: string, create: () => V): V => {
    let inner = outer.get(key);
    if (inner === undefined) {
        inner = create();
        outer.set(key, inner);
    }
    return inner;
};

export class Aggregator {

    static isBlank(value: string | null | undefined): boolean {
        return value === null || value === undefined || value.trim() === '';
    }

    static normalizeText(value: string | null | undefined, placeholder: string): string {
        if (value === null || value === undefined) return placeholder;
        const trimmed = value.trim();
        return trimmed ? trimmed : placeholder;
    }

    /**
     * Single pass over the records. Every record lands in exactly one category bucket and
     * one subcategory bucket of that category; only observed labels get buckets.
     */
    static aggregate(records: readonly StudyRecord[], config: AggregatorConfig): Aggregate {
        const { fields, placeholders } = config;
        const categories = new Map<string, number>();
        const subcategories = new Map<string, Map<string, number>>();
        const recordsByCategory = new Map<string, StudyRecord[]>();
        const suitability = fields.suitability ? new Map<string, Map<string, number>>() : undefined;
        const substitutions: Substitutions = { category: 0, subcategory: 0, suitability: 0 };

        for (const record of records) {
            const category = this.normalizeText(record[fields.category], placeholders.category);
            const subcategory = this.normalizeText(record[fields.subcategory], placeholders.subcategory);
            if (this.isBlank(record[fields.category])) substitutions.category++;
            if (this.isBlank(record[fields.subcategory])) substitutions.subcategory++;

            increment(categories, category);
            increment(nested(subcategories, category, () => new Map<string, number>()), subcategory);
            nested(recordsByCategory, category, (): StudyRecord[] => []).push(record);

            if (suitability && fields.suitability) {
                const level = this.normalizeText(record[fields.suitability], placeholders.suitability);
                if (this.isBlank(record[fields.suitability])) substitutions.suitability++;
                increment(nested(suitability, category, () => new Map<string, number>()), level);
            }
        }

        return {
            total: records.length,
            substitutions,
            categories,
            subcategories,
            recordsByCategory,
            ...(suitability ? { suitability } : {})
        };
    }

    /**
     * Descending count; equal counts keep first-seen order (Map insertion order + stable sort).
     */
    static rank(table: CountTable | undefined): RankedEntry[] {
        if (!table) return [];
        return Array.from(table, ([label, count], index) => ({ label, count, index }))
            .sort((a, b) => b.count - a.count || a.index - b.index)
            .map(({ label, count }) => ({ label, count }));
    }

    static percentage(part: number, whole: number): number {
        return whole ? (part / whole) * 100 : 0;
    }

    static formatPercentage(part: number, whole: number): string {
        return this.percentage(part, whole).toFixed(1);
    }
}
