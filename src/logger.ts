import pino from "pino";

export type { Logger } from "pino";

export const createLogger = (level: string = process.env.LOG_LEVEL ?? "info") =>
    pino({
        level,
        messageKey: "message",
        formatters: {
            level(label) {
                return { level: label };
            },
        },
        serializers: {
            err: pino.stdSerializers.err,
        },
        base: {
            service: process.env.KIOSK_SERVICE ?? "poster-kiosk",
            env: process.env.NODE_ENV ?? "unknown",
            version: process.env.npm_package_version ?? "unknown",
        },
    });

export const logger = createLogger();
