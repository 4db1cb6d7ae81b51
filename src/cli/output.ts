/**
 * Command output rendering.
 *
 * Formats:
 *   tmpl   a table (or a custom {{field}} template, one line per item)
 *   json   one line of JSON
 *   jsonp  indented JSON
 */

import { ConfigKeys, isRecord, type ConfigStore } from '../config.js';

export type OutputFormat = 'tmpl' | 'json' | 'jsonp';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['tmpl', 'json', 'jsonp'];

export interface OutputOptions {
    format: OutputFormat;
    template?: string;
    /** Align table columns with spaces instead of separating them with tabs */
    templateTabs: boolean;
    /** Omit the header row */
    quiet: boolean;
}

export interface Column<T> {
    header: string;
    value(item: T): string;
}

function isOutputFormat(value: string): value is OutputFormat {
    return OUTPUT_FORMATS.some(format => format === value);
}

export function outputOptions(config: ConfigStore): OutputOptions {
    const format = config.getString(ConfigKeys.format).toLowerCase();
    return {
        format: isOutputFormat(format) ? format : 'tmpl',
        template: config.getString(ConfigKeys.template) || undefined,
        templateTabs: config.getBool(ConfigKeys.templateTabs),
        quiet: config.getBool(ConfigKeys.quiet),
    };
}

/**
 * Reads a dotted field path from a value; an empty string when absent
 */
export function fieldValue(value: unknown, path: string): string {
    let current: unknown = value;
    for (const part of path.split('.')) {
        if (!isRecord(current)) {
            return '';
        }
        current = current[part];
    }
    if (current === undefined || current === null) {
        return '';
    }
    return typeof current === 'object' ? JSON.stringify(current) : String(current);
}

const PLACEHOLDER = /\{\{\s*\.?([\w.]+)\s*\}\}/g;

export function renderTemplate(template: string, item: unknown): string {
    return template.replace(PLACEHOLDER, (_match, path: string) => fieldValue(item, path));
}

export function renderTable(rows: string[][], aligned: boolean): string {
    if (!aligned) {
        return rows.map(row => `${row.join('\t')}\n`).join('');
    }

    const widths: number[] = [];
    for (const row of rows) {
        row.forEach((cell, index) => {
            widths[index] = Math.max(widths[index] ?? 0, cell.length);
        });
    }
    return rows
        .map(row => {
            const cells = row.map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index])));
            return `${cells.join('  ')}\n`;
        })
        .join('');
}

export function renderOutput<T>(items: readonly T[], columns: readonly Column<T>[], options: OutputOptions): string {
    switch (options.format) {
        case 'json':
            return `${JSON.stringify(items)}\n`;
        case 'jsonp':
            return `${JSON.stringify(items, null, 2)}\n`;
        case 'tmpl': {
            if (options.template) {
                const template = options.template;
                return items.map(item => `${renderTemplate(template, item)}\n`).join('');
            }
            const rows = items.map(item => columns.map(column => column.value(item)));
            if (!options.quiet) {
                rows.unshift(columns.map(column => column.header));
            }
            return renderTable(rows, options.templateTabs);
        }
    }
}
