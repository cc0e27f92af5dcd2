import type { PreparedImage } from "../image.ts";
import type { Logger } from "../logger.ts";
import type { Frame, Geometry, InputEvent } from "../types.ts";

/** What the render loop hands to a surface: the frame plus its pixels once they are ready. */
export type PresentedFrame = {
    frame: Frame;
    image: PreparedImage | null;
};

export interface DisplaySurface {
    readonly geometry: Geometry;
    /** Drains queued input; never blocks. */
    pollEvents(): InputEvent[];
    present(view: PresentedFrame): void;
    close(): void;
}

export type LatestFrame = PresentedFrame & {
    version: number;
    presentedAt: number;
};

/**
 * Surface for a browser in kiosk mode: keeps the last presented frame for the
 * HTTP routes to serve and queues input posted back by the page.
 */
export class HttpSurface implements DisplaySurface {
    readonly geometry: Geometry;
    private readonly logger?: Logger;
    private readonly now: () => number;
    private queue: InputEvent[] = [];
    private presented: LatestFrame | null = null;
    private closed = false;

    constructor(geometry: Geometry, options: { logger?: Logger; now?: () => number } = {}) {
        this.geometry = geometry;
        this.logger = options.logger;
        this.now = options.now ?? Date.now;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    pollEvents(): InputEvent[] {
        const events = this.queue;
        this.queue = [];
        return events;
    }

    /** Returns false once the surface is closed. */
    pushInput(event: InputEvent): boolean {
        if (this.closed) return false;
        this.queue.push(event);
        this.logger?.debug({ input: event.type }, "input queued");
        return true;
    }

    present(view: PresentedFrame): void {
        if (this.closed) return;
        this.presented = {
            ...view,
            version: (this.presented?.version ?? 0) + 1,
            presentedAt: this.now(),
        };
    }

    latest(): LatestFrame | null {
        return this.presented;
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.queue = [];
        this.logger?.info("display surface closed");
    }
}
