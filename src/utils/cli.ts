/**
 * CLI Formatting Utility
 *
 * Terminal output for the pairswap CLI using chalk, boxen, figures and
 * log-symbols. figures and log-symbols fall back to ASCII on terminals
 * without Unicode.
 */

import chalk from 'chalk';
import boxen, { Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';

// ==================== SYMBOLS ====================

export const sym = {
    success: logSymbols.success,
    error: logSymbols.error,
    warning: logSymbols.warning,
    info: logSymbols.info,

    arrow: figures.arrowRight,
    pointer: figures.pointer,
    bullet: figures.bullet,

    drop: '💧',
    swap: '💱',
    chart: '📊',
};

// ==================== COLORS ====================

export const c = {
    primary: chalk.cyan,
    success: chalk.green,
    error: chalk.red,
    warning: chalk.yellow,
    info: chalk.blue,

    bold: chalk.bold,
    dim: chalk.dim,

    heading: chalk.bold.cyan,
    label: chalk.gray,
    value: chalk.white,
    highlight: chalk.bold.yellow,
};

// ==================== BOXES ====================

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
};

export function box(content: string, title?: string, options?: BoxenOptions): string {
    return boxen(content, {
        ...defaultBoxStyle,
        title,
        titleAlignment: 'center',
        ...options,
    });
}

export function successBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'green',
        title: title || `${sym.success} Success`,
        titleAlignment: 'center',
    });
}

export function errorBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'red',
        title: title || `${sym.error} Error`,
        titleAlignment: 'center',
    });
}

/**
 * Label/value lines with labels padded to a common width
 */
export function rows(entries: Array<[string, string]>): string {
    const width = Math.max(0, ...entries.map(([label]) => label.length)) + 1;
    return entries
        .map(([label, value]) => `${c.label(`${label}:`.padEnd(width))} ${c.value(value)}`)
        .join('\n');
}

// ==================== MESSAGES ====================

export function success(msg: string): void {
    console.log(`${sym.success} ${c.success(msg)}`);
}

export function error(msg: string): void {
    console.log(`${sym.error} ${c.error(msg)}`);
}

export function info(msg: string): void {
    console.log(`${sym.info} ${c.info(msg)}`);
}

/**
 * Fixed-point rendering of a 1e18-scaled price
 */
export function formatScaled(value: bigint, scale: bigint, decimals: number = 6): string {
    const whole = value / scale;
    const fraction = ((value % scale) * 10n ** BigInt(decimals)) / scale;
    return `${whole}.${fraction.toString().padStart(decimals, '0')}`;
}
