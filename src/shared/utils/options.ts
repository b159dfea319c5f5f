/**
 * Overlay caller options on defaults. Keys explicitly set to undefined keep
 * the default.
 */
export function withDefaults<T extends object>(defaults: T, overrides: Partial<T> = {}): T {
    const defined = Object.fromEntries(
        Object.entries(overrides).filter(([, value]) => value !== undefined)
    );
    return { ...defaults, ...defined };
}
