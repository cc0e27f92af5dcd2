import "dotenv/config";
import { Hono } from "hono/quick";
import { serve } from "@hono/node-server";
import { createApiClient } from "./api/client.ts";
import { CacheStore } from "./cache.ts";
import { loadConfig, redactConfig, type AppConfig } from "./config.ts";
import { createConnectivityCheck } from "./connectivity.ts";
import { DisplayController } from "./display/controller.ts";
import { startRenderLoop } from "./display/loop.ts";
import { HttpSurface } from "./display/surface.ts";
import { createMirrorDocuments } from "./documents.ts";
import { startRefreshScheduler, warmStart } from "./engine.ts";
import { EXIT_CONFIG, FatalConfigError } from "./errors.ts";
import { inspectImage, prepareImage } from "./image.ts";
import { createLogger, logger as bootLogger } from "./logger.ts";
import { registerRoutes } from "./routes/index.ts";
import { createSnapshotHandle } from "./snapshot.ts";

const readConfig = (): AppConfig => {
    try {
        return loadConfig();
    } catch (err) {
        if (err instanceof FatalConfigError) {
            bootLogger.fatal({ err }, "invalid configuration");
            process.exit(EXIT_CONFIG);
        }
        throw err;
    }
};

const config = readConfig();
const logger = createLogger(config.logLevel);
logger.info({ config: redactConfig(config) }, "configuration loaded");

process.on("unhandledRejection", (reason) => {
    logger.fatal({ err: reason }, "unhandled rejection");
    process.exit(1);
});
process.on("uncaughtException", (err) => {
    logger.fatal({ err }, "uncaught exception");
    process.exit(1);
});

const cache = new CacheStore({
    dir: config.cache.dir,
    inspect: inspectImage,
    graceCycles: config.cache.graceCycles,
    logger: logger.child({ component: "cache" }),
});
await cache.open();

const documents = createMirrorDocuments(config.cache.dir, logger.child({ component: "documents" }));
const snapshots = createSnapshotHandle();
const schedulerLogger = logger.child({ component: "scheduler" });

await warmStart({ cache, documents, snapshots, logger: schedulerLogger });

const connectivity = createConnectivityCheck({
    url: config.connectivity.url,
    timeoutMs: config.connectivity.timeoutMs,
    logger: logger.child({ component: "connectivity" }),
});

const api = createApiClient({
    baseUrl: config.api.baseUrl,
    token: config.api.token,
    postersPath: config.api.postersPath,
    eventPath: config.api.eventPath,
    deviceId: config.display.deviceId,
    tokenParam: config.api.tokenParam,
    requestTimeoutMs: config.api.requestTimeoutMs,
    logger: logger.child({ component: "api" }),
});

const scheduler = startRefreshScheduler({
    connectivity,
    api,
    cache,
    documents,
    snapshots,
    intervalMs: config.cache.refreshSeconds * 1000,
    logger: schedulerLogger,
});

const displayLogger = logger.child({ component: "display" });
const controller = new DisplayController({
    displayTimeSeconds: config.display.displayTimeSeconds,
    pinnedTimeoutSeconds: config.display.pinnedTimeoutSeconds,
    scheduleWindow: config.display.scheduleWindow,
    logger: displayLogger,
});
const surface = new HttpSurface(config.display.geometry, { logger: displayLogger });

const loop = startRenderLoop({
    controller,
    surface,
    snapshots,
    cache,
    prepare: prepareImage,
    fps: config.display.fps,
    logger: displayLogger,
    onExit: () => shutdown("exit requested from display"),
});

const app = new Hono();
registerRoutes(app, { scheduler, snapshots, controller, surface, logger: logger.child({ component: "http" }) });

const server = serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, (info) => {
    logger.info({ url: `http://${info.address}:${info.port}` }, "server listening");
});

scheduler.ready
    .then((report) => logger.info({ status: report?.status ?? "skipped" }, "first refresh finished"))
    .catch((err) => logger.error({ err }, "first refresh failed"));

let shuttingDown = false;

function shutdown(reason: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ reason }, "shutting down");
    scheduler.stop();
    loop.stop();
    surface.close();
    server.close((err) => {
        if (err) {
            logger.error({ err }, "server close failed");
            process.exit(1);
        }
        process.exit(0);
    });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
