export type IndicatorValue = number | boolean | null;

export type IndicatorDetails = Readonly<Record<string, IndicatorValue>>;

export class IndicatorResult {
    public readonly details: IndicatorDetails;

    constructor(
        public readonly name: string,
        public readonly passed: boolean,
        details: Record<string, IndicatorValue> = {}
    ) {
        this.details = Object.freeze({ ...details });
    }
}
