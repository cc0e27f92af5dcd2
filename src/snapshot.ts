import type { CacheEntry, EventMetadata, PosterListSnapshot, PosterRecord, ResolvedPoster, SnapshotSource } from "./types.ts";

export interface SnapshotHandle {
    current(): PosterListSnapshot | null;
    publish(next: PosterListSnapshot): void;
    liveIds(): ReadonlySet<string>;
}

/**
 * The one shared slot between the refresh scheduler and the render loop.
 * Publishing replaces the reference; a snapshot already handed out never changes.
 */
export function createSnapshotHandle(initial: PosterListSnapshot | null = null): SnapshotHandle {
    let current = initial;
    let ids: ReadonlySet<string> = idsOf(initial);

    return {
        current: () => current,
        publish(next) {
            if (current && next.version <= current.version) {
                throw new Error(`snapshot version ${next.version} does not follow ${current.version}`);
            }
            current = next;
            ids = idsOf(next);
        },
        liveIds: () => ids,
    };
}

const idsOf = (snapshot: PosterListSnapshot | null): ReadonlySet<string> =>
    new Set(snapshot ? snapshot.posters.map((poster) => poster.record.id) : []);

export type BuildSnapshotInput = {
    version: number;
    publishedAt: number;
    source: SnapshotSource;
    records: readonly PosterRecord[];
    lookup: (id: string) => CacheEntry | null;
    displayTimeSeconds?: number;
    event: EventMetadata | null;
};

/** Resolves records against the cache in feed order; records without a file are left out. */
export function buildSnapshot(input: BuildSnapshotInput): PosterListSnapshot {
    const posters: ResolvedPoster[] = [];
    for (const record of input.records) {
        const entry = input.lookup(record.id);
        if (!entry) continue;
        posters.push(Object.freeze({ record: Object.freeze({ ...record }), entry: Object.freeze({ ...entry }) }));
    }
    return Object.freeze({
        version: input.version,
        publishedAt: input.publishedAt,
        source: input.source,
        posters: Object.freeze(posters),
        displayTimeSeconds: input.displayTimeSeconds,
        event: input.event,
    });
}
