export const DEFAULT_SPAWN_INTERVAL_MS = 1000;

export interface SpawnScheduler {
    readonly intervalMs: number;
    /**
     * Number of spawns due at `now`. While disabled nothing accrues; the first enabled tick arms the
     * schedule one full interval ahead.
     */
    tick(now: number, enabled: boolean): number;
    nextSpawnAt(): number | null;
}

export const createSpawnScheduler = (intervalMs: number = DEFAULT_SPAWN_INTERVAL_MS): SpawnScheduler => {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
        throw new RangeError(`spawn interval must be positive (received ${intervalMs})`);
    }

    let nextAt: number | null = null;

    const tick = (now: number, enabled: boolean): number => {
        if (!enabled) {
            nextAt = null;
            return 0;
        }

        if (nextAt === null) {
            nextAt = now + intervalMs;
            return 0;
        }

        let due = 0;
        while (now >= nextAt) {
            due += 1;
            nextAt += intervalMs;
        }
        return due;
    };

    return {
        intervalMs,
        tick,
        nextSpawnAt: () => nextAt,
    };
};
