import {randomUUID} from 'node:crypto';

export const SEPARATOR = ',';

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Quote a text field when it holds the separator, a quote or a line break,
 * doubling any quotes inside it.
 */
export function escapeCsvField(field: string | undefined): string {
    if (!field) return '';
    return /[",\r\n]/.test(field)
        ? `"${field.replace(/"/g, '""')}"`
        : field;
}

export function toCsvLine(fields: readonly string[]): string {
    return fields.join(SEPARATOR) + '\n';
}

export function toCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
    return [header, ...rows].map(toCsvLine).join('');
}

export const formatMoney = (amount: number): string => amount.toFixed(2);

export const formatPercent = (rate: number): string => `${(rate * 100).toFixed(2)}%`;

// yyyy-MM-dd in local time, empty when unset
export function formatDate(date: Date | null): string {
    if (date === null) return '';
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

// yyyyMMdd_HHmmss in local time
export function formatTimestamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function reportFileName(prefix: string, orderId: string, generatedAt: Date): string {
    const safeOrderId = orderId.replace(/[^A-Za-z0-9._-]/g, '_');
    return `${prefix}_${safeOrderId}_${formatTimestamp(generatedAt)}_${randomUUID()}.csv`;
}
