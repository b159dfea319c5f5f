import chalk from 'chalk';
import Table from 'cli-table3';
import { ScreeningResult } from '../../domain/value-objects/ScreeningResult';
import { IndicatorDetails, IndicatorValue } from '../../domain/value-objects/IndicatorResult';

function formatValue(value: IndicatorValue): string {
    if (value === null) return 'n/a';
    if (typeof value === 'boolean') return String(value);
    return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function formatDetails(details: IndicatorDetails): string {
    return Object.entries(details)
        .map(([key, value]) => `${key}=${formatValue(value)}`)
        .join(', ');
}

export function renderResultTable(results: readonly ScreeningResult[]): string {
    const table = new Table({
        head: [
            chalk.magenta('Ticker'),
            chalk.magenta('As of'),
            chalk.magenta('Indicator'),
            chalk.magenta('Status'),
            chalk.magenta('Details')
        ],
        colWidths: [8, 12, 22, 8, 60],
        wordWrap: true,
        style: { head: [], border: ['gray'] }
    });

    for (const result of results) {
        const asOf = result.asOf.toISOString().substring(0, 10);
        for (const indicator of result.indicatorResults) {
            table.push([
                chalk.bold(result.ticker),
                asOf,
                indicator.name,
                indicator.passed ? chalk.green('PASS') : chalk.red('FAIL'),
                chalk.gray(formatDetails(indicator.details))
            ]);
        }
    }

    return table.toString();
}
