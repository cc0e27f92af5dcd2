import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import sharp from "sharp";
import { buildSnapshot } from "../src/snapshot.ts";
import type { CacheEntry, PosterListSnapshot, PosterRecord } from "../src/types.ts";

export const silentLogger = pino({ level: "silent" });

export const makeTempDir = () => mkdtemp(path.join(os.tmpdir(), "poster-kiosk-"));

export const removeDir = (dir: string) => rm(dir, { recursive: true, force: true });

export const record = (id: string, extra: Partial<PosterRecord> = {}): PosterRecord => ({
    id,
    remoteUrl: `https://cdn.example/${id}.png`,
    metadata: {},
    lastSeen: 0,
    ...extra,
});

export const entryFor = (id: string): CacheEntry => ({
    id,
    localPath: `/cache/images/${id}.png`,
    byteSize: 1,
    fetchedAt: 0,
    geometry: { width: 100, height: 200, orientation: "portrait" },
    sourceUrl: `https://cdn.example/${id}.png`,
    digest: `digest-${id}`,
});

export const snapshotOf = (
    records: readonly PosterRecord[],
    options: { version?: number; displayTimeSeconds?: number } = {},
): PosterListSnapshot =>
    buildSnapshot({
        version: options.version ?? 1,
        publishedAt: 0,
        source: "remote",
        records,
        lookup: entryFor,
        displayTimeSeconds: options.displayTimeSeconds,
        event: null,
    });

export const solidPng = (width: number, height: number) =>
    sharp({ create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } } })
        .png()
        .toBuffer();
