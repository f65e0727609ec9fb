/**
 * GitHub webhook intake.
 *
 * Every delivery is authenticated against the raw body before anything else looks at it;
 * only verified `create` events for a repository's default branch reach the business logic.
 */

import express, { Router } from 'express';

import type { DefaultBranchCreatedEvent } from '../github/events.js';
import { CreateEventPayloadSchema, toDefaultBranchCreatedEvent } from '../github/events.js';
import { MalformedSignatureError } from '../github/errors.js';
import {
    SIGNATURE_HEADER,
    verifyWebhookSignature,
    type SignatureVerdict,
} from '../github/webhookSignature.js';
import { asyncHandler } from '../lib/asyncHandler.js';
import { isDevEnv } from '../lib/env.js';
import { logger } from '../lib/logger.js';
import { setDeliveryId } from '../lib/requestContext.js';

export interface WebhookRouterDeps {
    webhookSecret: string;
    maxBodyBytes: number;
    /** Ceiling for the background work of one delivery; the signal aborts it when reached. */
    handlingTimeoutMs: number;
    onDefaultBranchCreated: (
        event: DefaultBranchCreatedEvent,
        signal: AbortSignal
    ) => Promise<unknown>;
}

type RejectionReason =
    | 'malformed_signature'
    | Exclude<SignatureVerdict, { verified: true }>['reason'];

type WebhookStats = {
    totalRequests: number;
    totalAccepted: number;
    totalRejected: number;
    totalIgnored: number;
    lastRejected: { at: string; reason: RejectionReason } | null;
    lastAccepted: { at: string; deliveryId: string | null; event: string } | null;
};

export function createWebhookRouter(deps: WebhookRouterDeps): Router {
    const router: Router = Router();

    const stats: WebhookStats = {
        totalRequests: 0,
        totalAccepted: 0,
        totalRejected: 0,
        totalIgnored: 0,
        lastRejected: null,
        lastAccepted: null,
    };

    function recordRejection(reason: RejectionReason): void {
        stats.totalRejected++;
        stats.lastRejected = { at: new Date().toISOString(), reason };
    }

    router.post(
        '/',
        // Keep the exact bytes: the signature covers them, not a re-serialized object.
        express.raw({ type: () => true, limit: deps.maxBodyBytes }),
        asyncHandler(async (req, res) => {
            stats.totalRequests++;

            const deliveryId = req.get('X-GitHub-Delivery') ?? null;
            if (deliveryId) setDeliveryId(deliveryId);

            // body-parser leaves `{}` when the request carries no body; an empty envelope
            // still goes through the verifier.
            const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

            let verdict: SignatureVerdict;
            try {
                verdict = verifyWebhookSignature({
                    payload: rawBody,
                    signatureHeader: req.get(SIGNATURE_HEADER),
                    secret: deps.webhookSecret,
                });
            } catch (error) {
                if (!(error instanceof MalformedSignatureError)) throw error;
                recordRejection('malformed_signature');
                logger.warn(
                    { event: 'webhook_rejected', reason: 'malformed_signature', err: error },
                    'Rejected GitHub webhook with malformed signature'
                );
                return res.status(401).json({ error: 'invalid payload signature' });
            }

            if (!verdict.verified) {
                recordRejection(verdict.reason);
                logger.warn(
                    { event: 'webhook_rejected', reason: verdict.reason },
                    'Rejected GitHub webhook'
                );
                return res.status(401).json({
                    error:
                        verdict.reason === 'missing_signature'
                            ? 'missing payload signature'
                            : 'invalid payload signature',
                });
            }

            const githubEvent = req.get('X-GitHub-Event');
            if (!githubEvent) {
                return res.status(400).json({ error: 'missing webhook event header' });
            }

            if (githubEvent === 'ping') {
                stats.totalIgnored++;
                return res.status(200).json({ info: 'pong' });
            }

            // Anything else the App is subscribed to is acknowledged and dropped.
            if (githubEvent !== 'create') {
                stats.totalIgnored++;
                logger.debug(
                    { event: 'webhook_ignored', githubEvent },
                    'Ignoring GitHub webhook event'
                );
                return res.status(200).json({ info: 'not listening to this webhook event' });
            }

            let json: unknown;
            try {
                json = JSON.parse(rawBody.toString('utf8'));
            } catch {
                return res.status(400).json({ error: 'malformed payload body' });
            }

            const parsed = CreateEventPayloadSchema.safeParse(json);
            if (!parsed.success) {
                logger.warn(
                    {
                        event: 'webhook_payload_invalid',
                        githubEvent,
                        issues: parsed.error.issues.map((i) => i.path.join('.')),
                    },
                    'GitHub webhook payload failed validation'
                );
                return res.status(400).json({ error: 'malformed payload body' });
            }

            const branchEvent = toDefaultBranchCreatedEvent(parsed.data);
            if (!branchEvent) {
                stats.totalIgnored++;
                logger.debug(
                    {
                        event: 'webhook_ignored',
                        githubEvent,
                        refType: parsed.data.ref_type,
                        ref: parsed.data.ref,
                    },
                    'Ignoring unrelated ref creation'
                );
                return res.status(200).json({ info: 'not listening to this ref creation event' });
            }

            stats.totalAccepted++;
            stats.lastAccepted = { at: new Date().toISOString(), deliveryId, event: githubEvent };

            logger.info(
                {
                    event: 'default_branch_created',
                    owner: branchEvent.owner,
                    repository: branchEvent.repository,
                    branch: branchEvent.branch,
                    creator: branchEvent.creator,
                },
                'Repository received its default branch'
            );

            // Acknowledge right away; GitHub times out deliveries after ten seconds.
            const handleStart = Date.now();
            const signal = AbortSignal.timeout(deps.handlingTimeoutMs);
            void deps
                .onDefaultBranchCreated(branchEvent, signal)
                .then(() => {
                    logger.info(
                        {
                            event: 'webhook_processed',
                            owner: branchEvent.owner,
                            repository: branchEvent.repository,
                            durationMs: Date.now() - handleStart,
                        },
                        'Processed default branch creation'
                    );
                })
                .catch((err: unknown) => {
                    logger.error(
                        {
                            event: 'webhook_processed',
                            owner: branchEvent.owner,
                            repository: branchEvent.repository,
                            durationMs: Date.now() - handleStart,
                            timedOut: signal.aborted,
                            err,
                        },
                        'Failed to protect default branch'
                    );
                });

            return res.status(202).json({
                info: 'protecting default branch and notifying its creator',
            });
        })
    );

    // Minimal diagnostics (dev only)
    if (isDevEnv()) {
        router.get('/status', (_req, res) => {
            res.json(stats);
        });
    }

    return router;
}
