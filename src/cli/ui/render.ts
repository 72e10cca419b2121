import chalk from 'chalk';

/**
 * Render a section heading with an optional count
 */
export function renderHeading(icon: string, title: string, count?: number): void {
    const suffix = count === undefined ? '' : ` (${count})`;
    console.log(chalk.bold(`\n${icon} ${title}${suffix}\n`));
}

/**
 * Render a listed item: bold name, dim metadata, description below
 */
export function renderEntry(name: string, meta: string[], description?: string): void {
    const metaText = meta.length > 0 ? chalk.dim(` (${meta.join(', ')})`) : '';
    console.log(`  ${chalk.cyan.bold(name)}${metaText}`);
    if (description) {
        console.log(`    ${truncate(description, 100)}`);
    }
    console.log();
}

/**
 * Render aligned `key: value` rows, skipping empty values
 */
export function renderFields(fields: [string, string | undefined][]): void {
    const shown = fields.filter((field): field is [string, string] => field[1] !== undefined && field[1] !== '');
    const width = Math.max(0, ...shown.map(([key]) => key.length));
    for (const [key, value] of shown) {
        console.log(`  ${chalk.dim(key.padEnd(width))}  ${value}`);
    }
}

/**
 * Render a section separator
 */
export function renderSeparator(): void {
    console.log(chalk.dim('  ' + '─'.repeat(56)));
}

export function renderSuccess(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
}

/**
 * Render an empty-state message with an optional hint
 */
export function renderEmpty(message: string, hint?: string): void {
    console.log(chalk.dim(`\n${message}`));
    if (hint) console.log(chalk.dim(`${hint}\n`));
}

/**
 * Render an error result
 */
export function renderError(message: string): void {
    console.error(chalk.red.bold(`✗ ${message}`));
}

export function truncate(text: string, width: number): string {
    const single = text.replace(/\s+/g, ' ').trim();
    return single.length > width ? single.slice(0, width - 3) + '...' : single;
}
