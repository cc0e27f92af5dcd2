import type { DisplayController } from "../display/controller.ts";
import type { HttpSurface } from "../display/surface.ts";
import type { Logger } from "../logger.ts";
import type { SnapshotHandle } from "../snapshot.ts";
import type { RefreshScheduler } from "../types.ts";

type dependency = {
    scheduler: RefreshScheduler;
    snapshots: SnapshotHandle;
    controller: DisplayController;
    surface: HttpSurface;
    logger: Logger;
};

export type { dependency };
