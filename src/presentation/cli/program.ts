import { Command } from 'commander';
import { runScreenCommand } from './ScreenCommand';
import { InvalidParameterError } from '../../domain/errors/ScreenerErrors';
import { ScreeningParameters } from '../../domain/types/IndicatorTypes';
import { ScreenerConfig } from '../../config/screener.config';

export interface ScreenOptions {
    csv?: string;
    period: string;
    interval: string;
    json: boolean;
    verbose: boolean;
    minBaseMonths?: number;
    lookbackDays?: number;
    maxVolatility?: number;
    breakoutBuffer?: number;
    volumeWindow?: number;
    volumeMultiple?: number;
}

export function parsePositiveInt(option: string): (value: string) => number {
    return (value: string) => {
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed <= 0) {
            throw new InvalidParameterError(option, `${option} must be a positive integer (got '${value}')`);
        }
        return parsed;
    };
}

export function parseNonNegativeNumber(option: string): (value: string) => number {
    return (value: string) => {
        const parsed = Number(value);
        if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
            throw new InvalidParameterError(option, `${option} must be a non-negative number (got '${value}')`);
        }
        return parsed;
    };
}

export function toScreeningParameters(options: ScreenOptions): ScreeningParameters {
    return {
        greenLine: { minBaseMonths: options.minBaseMonths },
        darvasBox: {
            lookbackDays: options.lookbackDays,
            maxVolatility: options.maxVolatility,
            breakoutBuffer: options.breakoutBuffer
        },
        checklist: {
            volumeWindow: options.volumeWindow,
            breakoutVolumeMultiple: options.volumeMultiple
        }
    };
}

export function buildProgram(): Command {
    const program = new Command();

    program
        .name('glossary-screener')
        .description('Screen tickers against Green Line, Darvas box, RWB and momentum setups')
        .version('1.0.0')
        .argument('[tickers...]', 'Ticker symbols to screen')
        .option('--csv <path>', 'Read price history from a CSV file instead of Yahoo')
        .option('--period <range>', 'History range requested from the data source', ScreenerConfig.history.period)
        .option('--interval <interval>', 'Bar interval requested from the data source', ScreenerConfig.history.interval)
        .option('--json', 'Print results as JSON', false)
        .option('--min-base-months <n>', 'Green Line: minimum base length in months', parsePositiveInt('--min-base-months'))
        .option('--lookback-days <n>', 'Darvas: box window in trading days', parsePositiveInt('--lookback-days'))
        .option('--max-volatility <x>', 'Darvas: maximum box range relative to its low', parseNonNegativeNumber('--max-volatility'))
        .option('--breakout-buffer <x>', 'Darvas: margin above the box high', parseNonNegativeNumber('--breakout-buffer'))
        .option('--volume-window <n>', 'Checklist: trailing volume window', parsePositiveInt('--volume-window'))
        .option('--volume-multiple <x>', 'Checklist: breakout volume multiple', parseNonNegativeNumber('--volume-multiple'))
        .option('-v, --verbose', 'Verbose output', false)
        .action(async (tickers: string[], options: ScreenOptions) => {
            process.exitCode = await runScreenCommand({
                tickers,
                csv: options.csv,
                period: options.period,
                interval: options.interval,
                json: options.json,
                verbose: options.verbose,
                parameters: toScreeningParameters(options)
            });
        });

    return program;
}
