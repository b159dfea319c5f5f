import path from 'path';
import { createContainer } from '../../config/inversify.config';
import { TYPES } from '../../config/types';
import { RunScreening } from '../../application/use-cases/RunScreening';
import { IDataSource } from '../../domain/interfaces/IDataSource';
import { ScreeningParameters } from '../../domain/types/IndicatorTypes';
import { ScreeningResult } from '../../domain/value-objects/ScreeningResult';
import { InvalidParameterError } from '../../domain/errors/ScreenerErrors';
import { serialiseResults } from '../formatters/ResultJsonSerializer';
import { renderResultTable } from '../formatters/ResultTableRenderer';
import { Logger, LogLevel } from '../../shared/logger/Logger';

export interface ScreenCommandArgs {
    tickers: string[];
    csv?: string;
    period?: string;
    interval?: string;
    json?: boolean;
    verbose?: boolean;
    parameters?: ScreeningParameters;
    // Replaces the CSV / Yahoo source
    dataSource?: IDataSource;
}

export function resolveTickers(tickers: string[], csv?: string): string[] {
    const cleaned = tickers.map(t => t.trim().toUpperCase()).filter(t => t.length > 0);
    if (cleaned.length > 0) return cleaned;
    if (csv) return [path.parse(csv).name.toUpperCase()];
    throw new InvalidParameterError('tickers', 'Provide at least one ticker or a --csv file');
}

/**
 * Screens every ticker in turn and prints the report.
 * Resolves to the process exit code: 1 when any ticker failed.
 */
export async function runScreenCommand(args: ScreenCommandArgs): Promise<number> {
    const logger = Logger.getInstance();

    if (args.json) {
        logger.setLogLevel(LogLevel.WARN);
    } else if (args.verbose) {
        logger.setLogLevel(LogLevel.DEBUG);
    }

    const tickers = resolveTickers(args.tickers, args.csv);
    const container = createContainer({ dataSource: args.dataSource, csvPath: args.csv });
    const screening = container.get<RunScreening>(TYPES.RunScreening);

    const results: ScreeningResult[] = [];
    let failures = 0;

    for (const ticker of tickers) {
        try {
            results.push(await screening.execute(ticker, {
                period: args.period,
                interval: args.interval,
                parameters: args.parameters
            }));
        } catch (error) {
            failures++;
            logger.error(`${ticker}: screening failed`, error);
        }
    }

    if (args.json) {
        console.log(serialiseResults(results));
    } else if (results.length > 0) {
        console.log(renderResultTable(results));
    }

    if (failures > 0) {
        logger.warn(`${failures}/${tickers.length} tickers failed`);
    }
    return failures > 0 ? 1 : 0;
}
