import type { Hono } from "hono";
import type { dependency } from "../types/dependency.d.ts";
import type { Frame, InputEvent, MenuTarget } from "../types.ts";

type Body = Record<string, unknown>;

const isRecord = (value: unknown): value is Body => typeof value === "object" && value !== null && !Array.isArray(value);

const parseTarget = (value: unknown): MenuTarget | null => {
    if (!isRecord(value)) return null;
    switch (value.kind) {
        case "timed":
            return { kind: "timed" };
        case "exit":
            return { kind: "exit" };
        case "poster": {
            const id = value.posterId;
            if (typeof id === "number" && Number.isFinite(id)) return { kind: "poster", posterId: String(id) };
            if (typeof id === "string" && id.trim() !== "") return { kind: "poster", posterId: id.trim() };
            return null;
        }
        default:
            return null;
    }
};

export const parseInput = (body: unknown): InputEvent | null => {
    if (!isRecord(body)) return null;
    switch (body.type) {
        case "secondary-click":
            return { type: "secondary-click" };
        case "quit":
            return { type: "quit" };
        case "select": {
            const target = parseTarget(body.target);
            return target ? { type: "select", target } : null;
        }
        default:
            return null;
    }
};

const serializeFrame = (frame: Frame) => {
    if (frame.kind !== "poster") return frame;
    const { record } = frame.poster;
    return {
        kind: frame.kind,
        mode: frame.mode,
        poster: {
            id: record.id,
            title: record.title ?? null,
            startsAt: record.startsAt ?? null,
            endsAt: record.endsAt ?? null,
            metadata: record.metadata,
        },
    };
};

export function registerDisplay(app: Hono, deps: dependency) {
    app.get("/display/frame", (c) => {
        const latest = deps.surface.latest();
        if (!latest) {
            return c.json({ version: 0, mode: deps.controller.mode, frame: null, image: null });
        }
        const { image } = latest;
        return c.json({
            version: latest.version,
            presentedAt: latest.presentedAt,
            mode: deps.controller.mode,
            frame: serializeFrame(latest.frame),
            image: image
                ? { width: image.width, height: image.height, rotated: image.rotated, placement: image.placement }
                : null,
        });
    });

    app.get("/display/frame/image", (c) => {
        const image = deps.surface.latest()?.image;
        if (!image) {
            return c.json({ error: "no poster on screen" }, 404);
        }
        return c.body(new Uint8Array(image.data), 200, {
            "content-type": image.mimeType,
            "cache-control": "no-store",
        });
    });

    app.post("/display/input", async (c) => {
        const body = await c.req.json().catch(() => null);
        const input = parseInput(body);
        if (!input) {
            return c.json({ error: 'expected { type: "secondary-click" | "quit" } or { type: "select", target }' }, 400);
        }
        if (!deps.surface.pushInput(input)) {
            return c.json({ error: "display is shutting down" }, 503);
        }
        return c.json({ accepted: input.type }, 202);
    });
}
