/**
 * CLI Formatting Utility
 * Terminal output for the stackcfg commands, built on chalk, boxen and figures.
 * figures and log-symbols fall back to ASCII on terminals without Unicode.
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
    tick: figures.tick,
    cross: figures.cross,

    gear: '⚙️',
    globe: '🌐',
    package: '📦',
    file: '📄',
};

// ==================== COLORS ====================

export const c = {
    primary: chalk.cyan,
    secondary: chalk.gray,
    success: chalk.green,
    error: chalk.red,
    warning: chalk.yellow,
    info: chalk.blue,

    bold: chalk.bold,
    dim: chalk.dim,

    heading: chalk.bold.cyan,
    subheading: chalk.bold.white,
    label: chalk.gray,
    value: chalk.white,
    highlight: chalk.bold.yellow,
    muted: chalk.dim,
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
    return box(content, title || `${sym.success} Success`, { borderColor: 'green' });
}

export function errorBox(content: string, title?: string): string {
    return box(content, title || `${sym.error} Error`, { borderColor: 'red' });
}

export function warningBox(content: string, title?: string): string {
    return box(content, title || `${sym.warning} Warning`, { borderColor: 'yellow' });
}

export function infoBox(content: string, title?: string): string {
    return box(content, title || `${sym.info} Info`, { borderColor: 'blue' });
}

/**
 * One-line banner naming the command being run
 */
export function header(title: string, emoji: string = sym.gear): string {
    return boxen(c.heading(`${emoji} Node Stack · ${title}`), {
        padding: { top: 0, bottom: 0, left: 2, right: 2 },
        borderStyle: 'round',
        borderColor: 'cyan',
    });
}

// ==================== MESSAGES ====================

export function success(msg: string): void {
    console.log(`${sym.success} ${c.success(msg)}`);
}

export function error(msg: string): void {
    console.error(`${sym.error} ${c.error(msg)}`);
}

export function warn(msg: string): void {
    console.log(`${sym.warning} ${c.warning(msg)}`);
}

export function info(msg: string): void {
    console.log(`${sym.info} ${c.info(msg)}`);
}

export function keyValue(key: string, value: string, indent: number = 0): void {
    const pad = ' '.repeat(indent);
    console.log(`${pad}${c.label(key + ':')} ${c.value(value)}`);
}

export function divider(char: string = '─', length: number = 50): void {
    console.log(c.dim(char.repeat(length)));
}

export function newline(): void {
    console.log('');
}

export default {
    sym,
    c,
    box,
    successBox,
    errorBox,
    warningBox,
    infoBox,
    header,
    success,
    error,
    warn,
    info,
    keyValue,
    divider,
    newline,
};
