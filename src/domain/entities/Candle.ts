export class Candle {
    constructor(
        public readonly timestamp: number,
        public readonly open: number,
        public readonly high: number,
        public readonly low: number,
        public readonly close: number,
        public readonly adjClose: number,
        // Providers leave gaps in volume; closes are always present
        public readonly volume: number | null
    ) {}

    get date(): Date {
        return new Date(this.timestamp);
    }

    get hasVolume(): boolean {
        return this.volume !== null && Number.isFinite(this.volume);
    }
}
