export enum ResampleFrequency {
    MONTHLY = 'MONTHLY',
    // Weeks end on Friday
    WEEKLY = 'WEEKLY'
}
