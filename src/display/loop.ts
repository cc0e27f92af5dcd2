import type { CacheStore } from "../cache.ts";
import { DecodeError, errorMessage, fail } from "../errors.ts";
import type { ImagePreparer, PreparedImage } from "../image.ts";
import type { Logger } from "../logger.ts";
import type { SnapshotHandle } from "../snapshot.ts";
import type { Frame, PosterListSnapshot, PosterRecord, ResolvedPoster } from "../types.ts";
import { EMPTY_MESSAGE, type DisplayController } from "./controller.ts";
import type { DisplaySurface } from "./surface.ts";

type Preparation = { status: "pending" } | { status: "ready"; image: PreparedImage } | { status: "failed" };

export type RenderLoopOptions = {
    controller: DisplayController;
    surface: DisplaySurface;
    snapshots: SnapshotHandle;
    cache: Pick<CacheStore, "readBytes">;
    prepare: ImagePreparer;
    fps: number;
    logger: Logger;
    now?: () => number;
    onExit?: () => void;
    /** Set to false to drive `tick` by hand. */
    autoStart?: boolean;
};

export interface RenderLoop {
    tick(): void;
    stop(): void;
    readonly stopped: boolean;
    /** Resolves once every preparation started so far has finished. */
    settled(): Promise<void>;
}

type WindowStatus = "upcoming" | "active" | "past";

const windowStatus = (record: PosterRecord, now: number): WindowStatus | undefined => {
    if (record.startsAt === undefined || record.endsAt === undefined) return undefined;
    if (now < record.startsAt) return "upcoming";
    if (now > record.endsAt) return "past";
    return "active";
};

const text = (value: unknown): string | undefined =>
    typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;

export const describePoster = ({ record }: ResolvedPoster, now: number) => ({
    posterId: record.id,
    title: record.title,
    topic: text(record.metadata.topic),
    presenter: text(record.metadata.main_presenter),
    institute: text(record.metadata.institute),
    window: windowStatus(record, now),
});

const preparationKey = (poster: ResolvedPoster) => `${poster.record.id}:${poster.entry.digest}`;

const frameKey = (frame: Frame, image: PreparedImage | null): string => {
    switch (frame.kind) {
        case "placeholder":
            return `placeholder:${frame.message}`;
        case "menu":
            return `menu:${JSON.stringify(frame.items)}`;
        case "poster":
            return `poster:${frame.mode}:${preparationKey(frame.poster)}:${image ? "ready" : "pending"}`;
    }
};

/**
 * Drives the controller at a fixed rate. A tick never waits on I/O: image
 * preparation is started in the background and shown on a later tick.
 */
export function startRenderLoop(options: RenderLoopOptions): RenderLoop {
    const { controller, surface, snapshots, cache, prepare, logger } = options;
    const now = options.now ?? Date.now;
    const intervalMs = Math.max(1, Math.round(1000 / options.fps));

    const preparations = new Map<string, Preparation>();
    const pending = new Set<Promise<void>>();
    let seenVersion: number | null = null;
    let lastKey: string | null = null;
    let lastPosterId: string | null = null;
    let stopped = false;
    let timer: ReturnType<typeof setInterval> | null = null;

    // Only records the failure; the next tick moves the controller past it.
    const markFailed = (key: string, poster: ResolvedPoster, err: unknown) => {
        if (preparations.get(key)?.status !== "pending") return;
        preparations.set(key, { status: "failed" });
        logger.warn({ err, posterId: poster.record.id }, "poster cannot be displayed, skipping it");
    };

    const hasFailed = (frame: Frame) =>
        frame.kind === "poster" && preparations.get(preparationKey(frame.poster))?.status === "failed";

    const startPreparing = (poster: ResolvedPoster) => {
        const key = preparationKey(poster);
        if (preparations.has(key)) return;
        preparations.set(key, { status: "pending" });

        const work = cache
            .readBytes(poster.record.id)
            .then((bytes) =>
                bytes ? prepare(bytes, surface.geometry) : fail(new DecodeError("poster file is missing from the cache")),
            )
            .then(
                (result) => {
                    if (!result.ok) {
                        markFailed(key, poster, result.error);
                    } else if (preparations.has(key)) {
                        preparations.set(key, { status: "ready", image: result.value });
                    }
                },
                (err: unknown) => markFailed(key, poster, new DecodeError(errorMessage(err), { cause: err })),
            )
            .finally(() => {
                pending.delete(work);
            });
        pending.add(work);
    };

    // Prepared images are held only for posters the current snapshot still lists.
    const prune = (snapshot: PosterListSnapshot) => {
        const keep = new Set(snapshot.posters.map(preparationKey));
        for (const key of preparations.keys()) {
            if (!keep.has(key)) preparations.delete(key);
        }
    };

    const show = (frame: Frame, image: PreparedImage | null, at: number) => {
        const key = frameKey(frame, image);
        if (key === lastKey) return;
        lastKey = key;
        surface.present({ frame, image });

        const posterId = frame.kind === "poster" ? frame.poster.record.id : null;
        if (frame.kind === "poster" && posterId !== lastPosterId) {
            logger.info({ ...describePoster(frame.poster, at), mode: frame.mode }, "showing poster");
        }
        lastPosterId = posterId;
    };

    const stop = () => {
        if (timer) clearInterval(timer);
        timer = null;
        stopped = true;
    };

    const tick = () => {
        if (stopped) return;
        const at = now();
        const snapshot = snapshots.current();
        if (snapshot && snapshot.version !== seenVersion) {
            seenVersion = snapshot.version;
            prune(snapshot);
        }

        let result = controller.step(at, snapshot, surface.pollEvents());
        if (result.terminate) {
            show(result.frame, null, at);
            stop();
            options.onExit?.();
            return;
        }

        // One pass over the list at most: when every poster has failed there is nothing to show.
        for (let attempts = snapshot?.posters.length ?? 0; attempts > 0 && hasFailed(result.frame); attempts -= 1) {
            if (result.frame.kind === "poster") controller.skip(result.frame.poster.record.id, at);
            result = controller.step(at, snapshot);
        }
        if (hasFailed(result.frame)) {
            show({ kind: "placeholder", message: EMPTY_MESSAGE }, null, at);
            return;
        }

        let image: PreparedImage | null = null;
        if (result.frame.kind === "poster") {
            startPreparing(result.frame.poster);
            const state = preparations.get(preparationKey(result.frame.poster));
            image = state?.status === "ready" ? state.image : null;
        }
        show(result.frame, image, at);
    };

    if (options.autoStart !== false) {
        timer = setInterval(tick, intervalMs);
        logger.info({ fps: options.fps, intervalMs }, "render loop started");
    }

    return {
        tick,
        stop,
        get stopped() {
            return stopped;
        },
        settled: async () => {
            while (pending.size > 0) {
                await Promise.all(pending);
            }
        },
    };
}
