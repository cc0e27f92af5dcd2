import type { Hono } from "hono";
import type { dependency } from "../types/dependency.d.ts";

export function registerRefresh(app: Hono, deps: dependency) {
    // Joins the running cycle if there is one.
    app.post("/refresh", async (c) => {
        const report = await deps.scheduler.runCycle();
        deps.logger.info({ status: report.status, version: report.version }, "manual refresh finished");
        return c.json(report);
    });
}
