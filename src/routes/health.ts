import type { Hono } from "hono";
import type { dependency } from "../types/dependency.d.ts";

export function registerHealth(app: Hono, deps: dependency) {
    app.get("/health", (c) => {
        const snapshot = deps.snapshots.current();
        return c.json({
            status: snapshot ? "ok" : "waiting",
            mode: deps.controller.mode,
            snapshot: snapshot
                ? {
                      version: snapshot.version,
                      source: snapshot.source,
                      posters: snapshot.posters.length,
                      publishedAt: snapshot.publishedAt,
                  }
                : null,
            scheduler: deps.scheduler.status(),
        });
    });
}
