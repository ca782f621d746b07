/**
 * Current time as Unix epoch seconds. Injected into services so expiry
 * boundaries can be exercised deterministically.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export function toIsoString(epochSeconds: number): string {
    return new Date(epochSeconds * 1000).toISOString();
}
