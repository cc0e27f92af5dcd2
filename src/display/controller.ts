import type { Logger } from "../logger.ts";
import type {
    DisplayMode,
    Frame,
    InputEvent,
    MenuItem,
    MenuTarget,
    PosterListSnapshot,
    ResolvedPoster,
} from "../types.ts";

export const WAITING_MESSAGE = "Waiting for posters...";
export const EMPTY_MESSAGE = "No posters available";
export const EXIT_MESSAGE = "Shutting down";
export const TIMED_LABEL = "Timed Poster";
export const EXIT_LABEL = "Exit";

export type DisplayControllerOptions = {
    displayTimeSeconds: number;
    /** Seconds before a pinned poster falls back to the rotation; 0 keeps it until an operator acts. */
    pinnedTimeoutSeconds?: number;
    /** Rotate only posters whose start/end window contains the current time. */
    scheduleWindow?: boolean;
    logger?: Logger;
};

export type StepResult = {
    mode: DisplayMode;
    frame: Frame;
    terminate: boolean;
};

type State =
    | { mode: "TIMED" }
    | { mode: "MANUAL_MENU" }
    | { mode: "MANUAL_PINNED"; posterId: string; pinnedAt: number };

// `index` is the position of `current` in the list it was last resolved
// against; a null `current` means "start at index + 1".
type Rotation = {
    current: string | null;
    index: number;
    slotStartedAt: number;
};

const posterLabel = (poster: ResolvedPoster) => poster.record.title ?? `Poster ${poster.record.id}`;

/**
 * Timed rotation versus operator override. Input edges are applied before the
 * frame is chosen, so every frame belongs to exactly one mode.
 */
export class DisplayController {
    private readonly displayTimeSeconds: number;
    private readonly pinnedTimeoutMs: number;
    private readonly scheduleWindow: boolean;
    private readonly logger?: Logger;

    private state: State = { mode: "TIMED" };
    private rotation: Rotation = { current: null, index: -1, slotStartedAt: 0 };
    // Poster on screen when the menu opened; the rotation resumes after it.
    private resumeAfter: string | null = null;
    private terminated = false;

    constructor(options: DisplayControllerOptions) {
        this.displayTimeSeconds = options.displayTimeSeconds;
        this.pinnedTimeoutMs = Math.max(0, options.pinnedTimeoutSeconds ?? 0) * 1000;
        this.scheduleWindow = options.scheduleWindow ?? false;
        this.logger = options.logger;
    }

    get mode(): DisplayMode {
        return this.state.mode;
    }

    get isTerminated(): boolean {
        return this.terminated;
    }

    step(now: number, snapshot: PosterListSnapshot | null, events: readonly InputEvent[] = []): StepResult {
        for (const event of events) {
            if (this.terminated) break;
            this.apply(event, now, snapshot);
        }
        if (this.terminated) {
            return { mode: this.state.mode, frame: { kind: "placeholder", message: EXIT_MESSAGE }, terminate: true };
        }
        const frame = this.render(now, snapshot);
        return { mode: this.state.mode, frame, terminate: false };
    }

    /** The poster could not be decoded: move past it. */
    skip(posterId: string, now: number): void {
        if (this.state.mode === "TIMED" && this.rotation.current === posterId) {
            this.logger?.debug({ posterId }, "skipping undecodable poster");
            this.rotation = { current: null, index: this.rotation.index, slotStartedAt: now };
            return;
        }
        if (this.state.mode === "MANUAL_PINNED" && this.state.posterId === posterId) {
            this.logger?.info({ posterId }, "pinned poster cannot be shown, returning to timed rotation");
            this.resumeTimed(this.resumeAfter, now, null);
        }
    }

    private apply(event: InputEvent, now: number, snapshot: PosterListSnapshot | null) {
        switch (event.type) {
            case "quit":
                this.logger?.info({ mode: this.state.mode }, "quit requested");
                this.terminated = true;
                return;
            case "secondary-click":
                if (this.state.mode === "TIMED") {
                    this.resumeAfter = this.rotation.current;
                    this.transition({ mode: "MANUAL_MENU" });
                } else if (this.state.mode === "MANUAL_PINNED") {
                    this.transition({ mode: "MANUAL_MENU" });
                }
                return;
            case "select":
                if (this.state.mode === "MANUAL_MENU") {
                    this.select(event.target, now, snapshot);
                }
                return;
        }
    }

    private select(target: MenuTarget, now: number, snapshot: PosterListSnapshot | null) {
        switch (target.kind) {
            case "poster": {
                const poster = snapshot?.posters.find((item) => item.record.id === target.posterId);
                if (!poster) {
                    this.logger?.debug({ posterId: target.posterId }, "ignoring selection of a poster that is not cached");
                    return;
                }
                this.transition({ mode: "MANUAL_PINNED", posterId: target.posterId, pinnedAt: now });
                return;
            }
            case "timed":
                this.resumeTimed(this.resumeAfter, now, snapshot);
                return;
            case "exit":
                this.logger?.info("exit selected from menu");
                this.terminated = true;
                return;
        }
    }

    private resumeTimed(after: string | null, now: number, snapshot: PosterListSnapshot | null) {
        const list = snapshot ? this.rotationList(snapshot, now) : [];
        const position = after ? list.findIndex((poster) => poster.record.id === after) : -1;
        this.rotation = {
            current: null,
            index: position >= 0 ? position : this.rotation.index,
            slotStartedAt: now,
        };
        this.resumeAfter = null;
        this.transition({ mode: "TIMED" });
    }

    private transition(next: State) {
        const from = this.state.mode;
        this.state = next;
        const posterId = next.mode === "MANUAL_PINNED" ? next.posterId : undefined;
        this.logger?.info({ from, to: next.mode, posterId }, "display mode changed");
    }

    private render(now: number, snapshot: PosterListSnapshot | null): Frame {
        if (this.state.mode === "MANUAL_MENU") {
            return { kind: "menu", items: this.menuItems(snapshot) };
        }

        if (this.state.mode === "MANUAL_PINNED") {
            const { posterId, pinnedAt } = this.state;
            const poster = snapshot?.posters.find((item) => item.record.id === posterId);
            if (!poster) {
                this.logger?.info({ posterId }, "pinned poster left the poster list, returning to timed rotation");
                this.resumeTimed(this.resumeAfter, now, snapshot);
            } else if (this.pinnedTimeoutMs > 0 && now - pinnedAt >= this.pinnedTimeoutMs) {
                this.logger?.info({ posterId }, "pinned poster timed out, returning to timed rotation");
                this.resumeTimed(this.resumeAfter, now, snapshot);
            } else {
                return { kind: "poster", mode: "MANUAL_PINNED", poster };
            }
        }

        return this.renderTimed(now, snapshot);
    }

    private renderTimed(now: number, snapshot: PosterListSnapshot | null): Frame {
        if (!snapshot) {
            return { kind: "placeholder", message: WAITING_MESSAGE };
        }
        const list = this.rotationList(snapshot, now);
        if (list.length === 0) {
            this.rotation = { current: null, index: -1, slotStartedAt: now };
            return { kind: "placeholder", message: EMPTY_MESSAGE };
        }

        const slotMs = (snapshot.displayTimeSeconds ?? this.displayTimeSeconds) * 1000;
        const { current, index, slotStartedAt } = this.rotation;
        const position = current === null ? -1 : list.findIndex((poster) => poster.record.id === current);

        let nextIndex: number;
        let nextStart: number;
        if (current === null) {
            nextIndex = (index + 1) % list.length;
            nextStart = now;
        } else if (position < 0) {
            // Refreshed away mid-slot: whatever moved into its place starts now.
            nextIndex = Math.max(0, index) % list.length;
            nextStart = now;
        } else if (now - slotStartedAt >= slotMs) {
            nextIndex = (position + 1) % list.length;
            nextStart = now - slotStartedAt >= 2 * slotMs ? now : slotStartedAt + slotMs;
        } else {
            nextIndex = position;
            nextStart = slotStartedAt;
        }

        const poster = list[nextIndex] ?? list[0];
        if (!poster) {
            return { kind: "placeholder", message: EMPTY_MESSAGE };
        }
        this.rotation = { current: poster.record.id, index: nextIndex, slotStartedAt: nextStart };
        return { kind: "poster", mode: "TIMED", poster };
    }

    private rotationList(snapshot: PosterListSnapshot, now: number): readonly ResolvedPoster[] {
        if (!this.scheduleWindow) return snapshot.posters;
        const active = snapshot.posters.filter(({ record }) => {
            if (record.startsAt === undefined || record.endsAt === undefined) return false;
            return record.startsAt <= now && now <= record.endsAt;
        });
        return active.length > 0 ? active : snapshot.posters;
    }

    private menuItems(snapshot: PosterListSnapshot | null): MenuItem[] {
        const posters: MenuItem[] = (snapshot?.posters ?? []).map((poster) => ({
            label: posterLabel(poster),
            target: { kind: "poster", posterId: poster.record.id },
        }));
        return [...posters, { label: TIMED_LABEL, target: { kind: "timed" } }, { label: EXIT_LABEL, target: { kind: "exit" } }];
    }
}
