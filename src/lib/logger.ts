import pino from 'pino';
import { once } from 'node:events';
import { getRequestContext } from './requestContext.js';

function getLogLevel(): string {
    // Allow standard LOG_LEVEL; default to info.
    return process.env.LOG_LEVEL?.trim() || 'info';
}

function parseBoolEnv(value: string | undefined): boolean {
    return (value ?? '').trim().toLowerCase() === 'true';
}

function getAxiomTransportOptions(): { dataset: string; token: string } | null {
    if (!parseBoolEnv(process.env.AXIOM_ENABLED)) return null;

    const dataset = process.env.AXIOM_DATASET?.trim() ?? '';
    const token = process.env.AXIOM_TOKEN?.trim() ?? '';

    if (!dataset || !token) return null;

    return { dataset, token };
}

const axiomOptions = getAxiomTransportOptions();
const transport = axiomOptions
    ? pino.transport<Record<string, unknown>>({
          targets: [
              // Keep JSON logs on stdout (systemd journal / containers).
              { target: 'pino/file', options: { destination: 1 } },
              { target: '@axiomhq/pino', options: axiomOptions },
          ],
      })
    : undefined;

const baseLoggerOptions: pino.LoggerOptions = {
    level: getLogLevel(),
    formatters: {
        level(label) {
            // Emit textual levels (`info`, `debug`, etc.) instead of numeric values.
            return { level: label };
        },
    },
    base: {
        service: 'branch-guard',
        env: process.env.APP_ENV ?? 'production',
    },
    // Attach requestId / deliveryId when running inside a request.
    mixin() {
        const ctx = getRequestContext();
        if (!ctx) return {};
        return ctx.deliveryId
            ? { requestId: ctx.requestId, deliveryId: ctx.deliveryId }
            : { requestId: ctx.requestId };
    },
    // Installation tokens, app JWTs and the webhook secret must never reach a log sink.
    redact: {
        paths: [
            'authorization',
            'Authorization',
            'headers.authorization',
            'headers.Authorization',
            'req.headers.authorization',
            'req.headers.Authorization',
            'token',
            '*.token',
            'jwt',
            '*.jwt',
            'privateKey',
            '*.privateKey',
            'webhookSecret',
            '*.webhookSecret',
            'secret',
            '*.secret',
        ],
        remove: true,
    },
    serializers: {
        err: pino.stdSerializers.err,
    },
};

export const logger = transport ? pino(baseLoggerOptions, transport) : pino(baseLoggerOptions);

if (parseBoolEnv(process.env.AXIOM_ENABLED) && !axiomOptions) {
    logger.warn(
        {
            event: 'axiom_transport_disabled',
            reason: 'missing_env',
            hasDataset: Boolean(process.env.AXIOM_DATASET?.trim()),
            hasToken: Boolean(process.env.AXIOM_TOKEN?.trim()),
        },
        'Axiom is enabled but not configured; shipping disabled'
    );
}

async function closeTransport(timeoutMs: number): Promise<void> {
    if (!transport) return;

    // `@axiomhq/pino` flushes on transport close.
    transport.end();

    await Promise.race([
        once(transport, 'close'),
        once(transport, 'finish'),
        new Promise<void>((resolve) => setTimeout(resolve, timeoutMs)),
    ]);
}

export async function shutdownLogger(options?: { timeoutMs?: number }): Promise<void> {
    const timeoutMs = options?.timeoutMs ?? 2000;

    try {
        logger.flush();
    } catch (error) {
        // flush isn't supported by every destination; the transport close below still runs.
        process.stderr.write(`logger flush failed: ${String(error)}\n`);
    }

    await closeTransport(timeoutMs);
}
