import { readFileSync } from 'fs';
import { parse } from 'csv-parse/sync';
import { IDataSource } from '../../../domain/interfaces/IDataSource';
import { PriceHistory } from '../../../domain/entities/PriceHistory';
import { Candle } from '../../../domain/entities/Candle';
import { DataSourceError } from '../../../domain/errors/ScreenerErrors';
import { CsvCandleMapper, CsvRow, REQUIRED_COLUMNS } from './CsvCandleMapper';
import { Logger } from '../../../shared/logger/Logger';

/**
 * Load a Yahoo Finance CSV export (Date, Open, High, Low, Close, Adj Close, Volume).
 * The first column is the session date.
 */
export function loadCsv(path: string): PriceHistory {
    let content: string;
    try {
        content = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new DataSourceError(`Cannot read CSV file ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    let rows: string[][];
    try {
        rows = parse(content, {
            skip_empty_lines: true,
            trim: true,
            relax_column_count: true
        });
    } catch (error) {
        throw new DataSourceError(`Malformed CSV file ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const header = rows.length > 0 ? rows[0] : [];
    const missing = REQUIRED_COLUMNS.filter(column => !header.includes(column));
    if (missing.length > 0) {
        throw new DataSourceError(`CSV file is missing required columns: ${[...missing].sort().join(', ')}`);
    }

    const records: CsvRow[] = rows.slice(1).map(values =>
        Object.fromEntries(header.map((name, i): [string, string] => [name, values[i] ?? '']))
    );

    const dateColumn = header[0];
    const candles = records
        .map(row => CsvCandleMapper.toDomain(row, dateColumn))
        .filter((candle): candle is Candle => candle !== null);

    if (candles.length === 0) {
        throw new DataSourceError(`No price history in ${path}`);
    }

    return new PriceHistory(candles);
}

/**
 * Serves one CSV file for every ticker. The file is read on first use.
 */
export class CsvDataSource implements IDataSource {
    private logger = Logger.getInstance();
    private history: PriceHistory | null = null;

    constructor(private readonly path: string) {}

    async getHistory(ticker: string): Promise<PriceHistory> {
        if (!this.history) {
            this.history = loadCsv(this.path);
            this.logger.debug(`[CSV] ${this.path}: ${this.history.length} bars`);
        }
        this.logger.debug(`[CSV] serving ${this.path} for ${ticker}`);
        return this.history;
    }
}
