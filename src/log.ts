import pino, { type Logger } from "pino";
import { getConfig } from "./config/index.js";

export function isTestEnv() {
    // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
    return !!(process.env.JEST_WORKER_ID || process.env.NODE_ENV === "test");
}

export function createLogger(scope?: string): Logger {
    const testRun = isTestEnv();
    const config = getConfig();
    const logger = pino({
        base: undefined,
        level: testRun ? "silent" : config.logLevel,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
        transport: config.pretty && !testRun ? {
            target: "pino-pretty",
            options: {
                translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
                colorize: false,
                ignore: "pid,hostname",
            },
        } : undefined,
    });
    return scope ? logger.child({ scope }) : logger;
}

/** Builds the logger on first use, so importing a module never reads config. */
export function scopedLogger(scope: string): () => Logger {
    let logger: Logger | undefined;
    return () => {
        if (!logger) logger = createLogger(scope);
        return logger;
    };
}
