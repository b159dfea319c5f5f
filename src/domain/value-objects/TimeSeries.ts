export interface SeriesPoint {
    readonly timestamp: number;
    readonly value: number;
}

/**
 * Ordered, immutable (timestamp, value) pairs derived from a price history.
 */
export class TimeSeries {
    private readonly points: readonly SeriesPoint[];

    private constructor(points: SeriesPoint[]) {
        this.points = Object.freeze(points.map(p => Object.freeze({ timestamp: p.timestamp, value: p.value })));
    }

    static from(points: SeriesPoint[]): TimeSeries {
        return new TimeSeries(points);
    }

    static fromArrays(timestamps: readonly number[], values: readonly number[]): TimeSeries {
        if (timestamps.length !== values.length) {
            throw new RangeError(`timestamps (${timestamps.length}) and values (${values.length}) differ in length`);
        }
        return new TimeSeries(timestamps.map((timestamp, i) => ({ timestamp, value: values[i] })));
    }

    get length(): number {
        return this.points.length;
    }

    get isEmpty(): boolean {
        return this.points.length === 0;
    }

    at(index: number): SeriesPoint | undefined {
        const position = index < 0 ? this.points.length + index : index;
        return this.points[position];
    }

    last(): SeriesPoint | undefined {
        return this.at(-1);
    }

    values(): number[] {
        return this.points.map(p => p.value);
    }

    timestamps(): number[] {
        return this.points.map(p => p.timestamp);
    }

    toArray(): SeriesPoint[] {
        return [...this.points];
    }
}
