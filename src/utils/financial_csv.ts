import * as XLSX from 'xlsx';
import { ValidationError } from '../errors';
import { financialMetricsEngine } from '../engine/financial_metrics_engine';
import type { FinancialSeries, MonthlyRecord } from '../types/analysis_types';

const MONTH_NAMES = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

interface ColumnLayout {
    monthColumn: number;
    revenueColumn: number;
    firstDataRow: number;
}

function cellText(cell: unknown): string {
    if (cell === null || cell === undefined) return '';
    return String(cell).trim();
}

/**
 * "$12,500" → 12500. Empty or non-numeric text → NaN.
 */
export function parseRevenue(raw: string): number {
    const cleaned = raw.replace(/[$,\s]/g, '');
    if (cleaned === '') return Number.NaN;
    return Number(cleaned);
}

/**
 * Sort key for the month labels this parser recognises ("2024-01", "2024-01-15",
 * "01/2024", "Jan 2024", "January-2024"). Anything else → null.
 */
export function monthSortKey(label: string): number | null {
    const iso = /^(\d{4})-(\d{1,2})(?:-(\d{1,2}))?$/.exec(label);
    if (iso) return Date.UTC(Number(iso[1]), Number(iso[2]) - 1, iso[3] ? Number(iso[3]) : 1);

    const slashed = /^(\d{1,2})\/(\d{4})$/.exec(label);
    if (slashed) return Date.UTC(Number(slashed[2]), Number(slashed[1]) - 1, 1);

    const named = /^([A-Za-z]{3,9})[\s-]+(\d{4})$/.exec(label);
    if (named) {
        const month = MONTH_NAMES.indexOf(named[1].slice(0, 3).toLowerCase());
        if (month >= 0) return Date.UTC(Number(named[2]), month, 1);
    }

    return null;
}

function detectLayout(firstRow: string[]): ColumnLayout {
    const headers = firstRow.map(h => h.toLowerCase());
    const monthColumn = headers.indexOf('month');
    const revenueColumn = headers.indexOf('revenue');

    if (monthColumn >= 0 && revenueColumn >= 0) {
        return { monthColumn, revenueColumn, firstDataRow: 1 };
    }
    if (firstRow.length < 2) {
        throw new ValidationError('Financial data needs a month and a revenue column');
    }

    // Positional fallback; a first row whose revenue cell is numeric is data, not a header.
    const headerless = Number.isFinite(parseRevenue(firstRow[1]));
    return { monthColumn: 0, revenueColumn: 1, firstDataRow: headerless ? 0 : 1 };
}

/**
 * SheetJS sniffs the content for a format and can throw on text that only looks
 * like another one; any such failure is a malformed upload.
 */
function readRows(text: string): unknown[][] {
    let rows: unknown[][];
    try {
        const workbook = XLSX.read(text, { type: 'string', raw: true });
        const sheetName = workbook.SheetNames[0];
        const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
        rows = sheet ? XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false, defval: '' }) : [];
    } catch (error) {
        console.warn('[FinancialCsv] Unreadable upload:', error instanceof Error ? error.message : String(error));
        throw new ValidationError('Financial data is not a readable CSV file');
    }
    return rows;
}

/**
 * Parses an uploaded CSV into a revenue series. Rows are put in chronological
 * order when every month label is a recognisable date; otherwise file order is kept.
 * @throws ValidationError when the file is unreadable, has no usable rows or columns,
 * or holds a row with a missing label or a bad revenue
 */
export function parseFinancialCsv(text: string): FinancialSeries {
    if (text.trim() === '') {
        throw new ValidationError('Financial data file is empty');
    }

    const rows = readRows(text.replace(/^\uFEFF/, ''))
        .map(row => row.map(cellText))
        .filter(row => row.some(cell => cell !== ''));

    if (rows.length === 0) {
        throw new ValidationError('Financial data file is empty');
    }

    const layout = detectLayout(rows[0]);
    const series: MonthlyRecord[] = rows.slice(layout.firstDataRow).map(row => ({
        month: row[layout.monthColumn] ?? '',
        revenue: parseRevenue(row[layout.revenueColumn] ?? ''),
    }));

    if (series.length === 0) {
        throw new ValidationError('Financial data file has a header but no rows');
    }

    // Row numbers in validation errors count data rows in file order.
    financialMetricsEngine.validate(series);

    const keys = series.map(record => monthSortKey(record.month));
    if (keys.every((key): key is number => key !== null)) {
        const order = series.map((record, index) => ({ record, key: keys[index] }));
        order.sort((a, b) => a.key - b.key);
        return order.map(entry => entry.record);
    }

    return series;
}
