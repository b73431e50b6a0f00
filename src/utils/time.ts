export const isoNow = (): string => new Date().toISOString();

export const unixSeconds = (ms: number = Date.now()): number => Math.floor(ms / 1000);
