import { ScreeningResult } from '../../domain/value-objects/ScreeningResult';
import { IndicatorValue } from '../../domain/value-objects/IndicatorResult';

// JSON has no Infinity; an infinite volume ratio is spelled out
export type SerialisedValue = IndicatorValue | 'Infinity' | '-Infinity';

export interface SerialisedIndicator {
    name: string;
    passed: boolean;
    details: Record<string, SerialisedValue>;
}

export interface SerialisedResult {
    ticker: string;
    as_of: string;
    indicators: SerialisedIndicator[];
}

function serialiseValue(value: IndicatorValue): SerialisedValue {
    if (typeof value !== 'number' || Number.isFinite(value)) return value;
    if (Number.isNaN(value)) return null;
    return value > 0 ? 'Infinity' : '-Infinity';
}

export function serialiseResult(result: ScreeningResult): SerialisedResult {
    return {
        ticker: result.ticker,
        as_of: result.asOf.toISOString(),
        indicators: result.indicatorResults.map(indicator => ({
            name: indicator.name,
            passed: indicator.passed,
            details: Object.fromEntries(
                Object.entries(indicator.details).map(([key, value]): [string, SerialisedValue] => [key, serialiseValue(value)])
            )
        }))
    };
}

export function serialiseResults(results: readonly ScreeningResult[]): string {
    return JSON.stringify(results.map(serialiseResult), null, 2);
}
