import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import Papa from 'papaparse';

type Cell = string | number | boolean | null;

export interface NumericSeries {
    column: string;
    min: number;
    max: number;
    mean: number;
    values: (number | null)[];
}

export interface ChartData {
    rowCount: number;
    columns: string[];
    numericColumns: string[];
    categoryColumn: string | null;
    categories: string[];
    series: NumericSeries[];
}

export const MAX_CHART_ROWS = 5000;

/**
 * Turns an uploaded CSV into chart-ready series. Rendering stays in the
 * browser; this only decides which columns are numeric and summarizes them.
 */
@Injectable()
export class AnalyticsService {
    private readonly logger = new Logger(AnalyticsService.name);

    parseCsv(csv: string): ChartData {
        const parsed = Papa.parse<Record<string, Cell>>(csv.trim(), {
            header: true,
            dynamicTyping: true,
            skipEmptyLines: true,
        });

        const rows = parsed.data.slice(0, MAX_CHART_ROWS);
        if (rows.length === 0) {
            const reason = parsed.errors[0]?.message ?? 'no data rows';
            throw new BadRequestException(`Could not read CSV: ${reason}`);
        }
        if (parsed.errors.length > 0) {
            this.logger.warn(`CSV parsed with ${parsed.errors.length} row errors; first: ${parsed.errors[0].message}`);
        }

        const columns = (parsed.meta.fields ?? []).filter(column => column.trim().length > 0);
        const numericColumns = columns.filter(column => this.isNumericColumn(rows, column));
        const categoryColumn = columns.find(column => !numericColumns.includes(column)) ?? null;

        const categories = rows.map((row, index) =>
            categoryColumn && row[categoryColumn] !== null && row[categoryColumn] !== undefined
                ? String(row[categoryColumn])
                : String(index + 1),
        );

        const series = numericColumns.map(column => this.summarize(rows, column));

        return {
            rowCount: rows.length,
            columns,
            numericColumns,
            categoryColumn,
            categories,
            series,
        };
    }

    // A column counts as numeric when every non-empty cell parsed to a finite number.
    private isNumericColumn(rows: Record<string, Cell>[], column: string): boolean {
        let seen = 0;
        for (const row of rows) {
            const cell = row[column];
            if (cell === null || cell === undefined || cell === '') continue;
            if (typeof cell !== 'number' || !Number.isFinite(cell)) return false;
            seen++;
        }
        return seen > 0;
    }

    private summarize(rows: Record<string, Cell>[], column: string): NumericSeries {
        const values = rows.map(row => {
            const cell = row[column];
            return typeof cell === 'number' ? cell : null;
        });
        const present = values.filter((value): value is number => value !== null);
        const total = present.reduce((sum, value) => sum + value, 0);
        return {
            column,
            min: Math.min(...present),
            max: Math.max(...present),
            mean: total / present.length,
            values,
        };
    }
}
