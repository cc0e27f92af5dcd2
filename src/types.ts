export type Orientation = "portrait" | "landscape";

export type Geometry = {
    width: number;
    height: number;
    orientation: Orientation;
};

export type PosterMetadata = Record<string, unknown>;

export type PosterRecord = {
    id: string;
    remoteUrl: string;
    title?: string;
    metadata: PosterMetadata;
    lastSeen: number;
    startsAt?: number;
    endsAt?: number;
};

export type CacheEntry = {
    id: string;
    localPath: string;
    byteSize: number;
    fetchedAt: number;
    geometry: Geometry;
    sourceUrl: string;
    digest: string;
};

export type EventMetadata = unknown;

export type PosterFeed = {
    records: PosterRecord[];
    displayTimeSeconds?: number;
};

export type ResolvedPoster = Readonly<{
    record: Readonly<PosterRecord>;
    entry: Readonly<CacheEntry>;
}>;

export type SnapshotSource = "remote" | "warm-start";

export type PosterListSnapshot = Readonly<{
    version: number;
    publishedAt: number;
    source: SnapshotSource;
    posters: readonly ResolvedPoster[];
    displayTimeSeconds?: number;
    event: EventMetadata | null;
}>;

export type EvictionReport = {
    evicted: string[];
    deferred: string[];
    grace: string[];
    retained: string[];
};

export type DisplayMode = "TIMED" | "MANUAL_MENU" | "MANUAL_PINNED";

export type MenuTarget = { kind: "poster"; posterId: string } | { kind: "timed" } | { kind: "exit" };

export type MenuItem = {
    label: string;
    target: MenuTarget;
};

export type InputEvent = { type: "secondary-click" } | { type: "select"; target: MenuTarget } | { type: "quit" };

export type Frame =
    | { kind: "placeholder"; message: string }
    | { kind: "poster"; mode: "TIMED" | "MANUAL_PINNED"; poster: ResolvedPoster }
    | { kind: "menu"; items: readonly MenuItem[] };

export type CycleStatus = "offline" | "fetch-failed" | "published" | "error";

export type CycleReport = {
    status: CycleStatus;
    startedAt: number;
    finishedAt: number;
    version?: number;
    posters?: number;
    downloaded?: number;
    failedDownloads?: string[];
    eviction?: EvictionReport;
    error?: string;
    errorKind?: string;
};

export type SchedulerStatus = {
    lastAttemptAt: number | null;
    lastReport: CycleReport | null;
    running: boolean;
    intervalMs: number;
};

export interface RefreshScheduler {
    runCycle(): Promise<CycleReport>;
    status(): SchedulerStatus;
    stop(): void;
    ready: Promise<CycleReport | null>;
}
