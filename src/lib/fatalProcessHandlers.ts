import type { Logger } from 'pino';

export type FatalEvent =
    | { kind: 'uncaughtException'; error: Error; origin: NodeJS.UncaughtExceptionOrigin }
    | { kind: 'unhandledRejection'; reason: unknown };

export interface InstallFatalProcessHandlersOptions {
    logger: Logger;
    /**
     * Called after logging but before exiting the process.
     * Use for best-effort cleanup (close the HTTP server, flush logs).
     */
    onFatal: (event: FatalEvent) => Promise<void>;
    /**
     * If cleanup hangs, force exit after this timeout.
     */
    exitTimeoutMs?: number;
}

function toError(value: unknown): Error {
    if (value instanceof Error) return value;
    if (typeof value === 'string') return new Error(value);

    try {
        return new Error(JSON.stringify(value));
    } catch {
        return new Error(String(value));
    }
}

export function installFatalProcessHandlers(options: InstallFatalProcessHandlersOptions): void {
    const exitTimeoutMs = Math.max(options.exitTimeoutMs ?? 5000, 500);
    let handlingFatal = false;

    async function handleFatal(event: FatalEvent): Promise<void> {
        if (handlingFatal) {
            // Re-entered while cleaning up: exit rather than loop.
            process.exit(1);
            return;
        }
        handlingFatal = true;

        const forceExit = setTimeout(() => {
            options.logger.error(
                { event: 'fatal_force_exit', exitTimeoutMs },
                'Forced process exit after fatal error'
            );
            process.exit(1);
        }, exitTimeoutMs);
        forceExit.unref();

        try {
            if (event.kind === 'uncaughtException') {
                options.logger.error(
                    {
                        event: 'process_fatal',
                        kind: event.kind,
                        origin: event.origin,
                        err: event.error,
                    },
                    'Uncaught exception'
                );
            } else {
                options.logger.error(
                    {
                        event: 'process_fatal',
                        kind: event.kind,
                        err: toError(event.reason),
                    },
                    'Unhandled promise rejection'
                );
            }

            await options.onFatal(event);
        } catch (error) {
            options.logger.error(
                { event: 'fatal_handler_failed', err: error },
                'Fatal handler cleanup failed'
            );
        } finally {
            clearTimeout(forceExit);
            process.exit(1);
        }
    }

    process.once('uncaughtException', (error, origin) => {
        void handleFatal({ kind: 'uncaughtException', error, origin });
    });

    process.once('unhandledRejection', (reason) => {
        void handleFatal({ kind: 'unhandledRejection', reason });
    });
}
