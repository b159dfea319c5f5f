import { IndicatorResult } from './IndicatorResult';

export class ScreeningResult {
    public readonly indicatorResults: readonly IndicatorResult[];

    constructor(
        public readonly ticker: string,
        public readonly asOf: Date,
        indicatorResults: readonly IndicatorResult[]
    ) {
        this.indicatorResults = Object.freeze([...indicatorResults]);
    }

    get passedIndicators(): Map<string, IndicatorResult> {
        return this.byName(r => r.passed);
    }

    get failedIndicators(): Map<string, IndicatorResult> {
        return this.byName(r => !r.passed);
    }

    private byName(predicate: (result: IndicatorResult) => boolean): Map<string, IndicatorResult> {
        return new Map(
            this.indicatorResults
                .filter(predicate)
                .map(r => [r.name, r] as const)
        );
    }
}
