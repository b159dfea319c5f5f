export enum Timeframe {
    DAILY = 'D',
    WEEKLY = 'W'
}
