export type StudyRecord = Readonly<Record<string, string | undefined>>;

export type CountTable = ReadonlyMap<string, number>;

// records whose value was absent or blank and took the placeholder
export type Substitutions = {
    category: number;
    subcategory: number;
    suitability: number;
};

export type Aggregate = {
    total: number;
    substitutions: Substitutions;
    categories: CountTable;
    subcategories: ReadonlyMap<string, CountTable>;
    recordsByCategory: ReadonlyMap<string, readonly StudyRecord[]>;
    suitability?: ReadonlyMap<string, CountTable>;
};

export type RankedEntry = {
    label: string;
    count: number;
};

export enum UndecodablePolicy {
    REPLACE = 'replace',
    FAIL = 'fail',
}

export type DecodeResult = {
    text: string;
    encoding: string;
    lossy: boolean;
};

export type ReadResult = {
    records: StudyRecord[];
    encoding: string;
    lossy: boolean;
};

export type LineCount = {
    lines: number;
    dataRows: number;
    encoding: string;
};

export type StudyDetail = {
    title: string;
    author: string;
    year: string;
    subcategory: string;
    suitability: string;
};

export type CategoryDrilldown = {
    subcategories: RankedEntry[];
    total: number;
    studies: StudyDetail[];
};

export type ExportRow = {
    category: string;
    category_count: number;
    subcategory: string;
    subcategory_count: number;
    category_pct: string;
    subcategory_pct: string;
};
