import { z } from 'zod';

import type { DefaultBranchCreatedEvent } from '../github/events.js';
import type { GitHubClient } from '../github/githubClient.js';
import { logger } from '../lib/logger.js';

const CreatedIssueSchema = z.object({
    number: z.number().int(),
    html_url: z.string().url(),
});

export interface BranchProtectionResult {
    issueNumber: number;
    issueUrl: string;
}

export interface BranchProtectionServiceDeps {
    client: Pick<GitHubClient, 'put' | 'post'>;
    requiredApprovingReviewCount?: number;
}

function repoPath(owner: string, repository: string): string {
    return `repos/${encodeURIComponent(owner)}/${encodeURIComponent(repository)}`;
}

export function buildNotificationIssue(event: DefaultBranchCreatedEvent, reviewCount: number) {
    const branch = event.branch;
    const approvals = reviewCount === 1 ? 'one approving review' : `${reviewCount} approving reviews`;

    return {
        title: 'Default branch is now protected',
        body: [
            `@${event.creator}: [\`${branch}\`](../tree/${encodeURI(branch)}) is the default ` +
                'branch of this repository and has been protected automatically.',
            '',
            `Direct pushes to \`${branch}\` are no longer possible, administrators included. ` +
                `Open a pull request instead; it can be merged once it has ${approvals}.`,
            '',
            'The rules can be reviewed and extended under [Settings → Branches](../settings/branches). ' +
                'Feel free to close this issue once you have looked at them.',
        ].join('\n'),
    };
}

export function createBranchProtectionService(deps: BranchProtectionServiceDeps) {
    const reviewCount = Math.max(Math.floor(deps.requiredApprovingReviewCount ?? 1), 1);

    return {
        /**
         * Protects a freshly created default branch, then files an issue telling its creator.
         * Both calls are safe to repeat: the protection PUT replaces the whole rule set, and a
         * duplicate issue is the worst case for the POST.
         */
        async protectDefaultBranch(
            event: DefaultBranchCreatedEvent,
            signal?: AbortSignal
        ): Promise<BranchProtectionResult> {
            const repo = repoPath(event.owner, event.repository);

            await deps.client.put(
                `${repo}/branches/${encodeURIComponent(event.branch)}/protection`,
                {
                    required_status_checks: null,
                    enforce_admins: true,
                    required_pull_request_reviews: {
                        required_approving_review_count: reviewCount,
                    },
                    restrictions: null,
                },
                z.unknown(),
                signal
            );

            logger.info(
                {
                    event: 'branch_protected',
                    owner: event.owner,
                    repository: event.repository,
                    branch: event.branch,
                },
                'Protected default branch'
            );

            const issue = await deps.client.post(
                `${repo}/issues`,
                buildNotificationIssue(event, reviewCount),
                CreatedIssueSchema,
                signal
            );

            logger.info(
                {
                    event: 'protection_issue_created',
                    owner: event.owner,
                    repository: event.repository,
                    issueNumber: issue.number,
                    issueUrl: issue.html_url,
                },
                'Created issue about default branch protection'
            );

            return { issueNumber: issue.number, issueUrl: issue.html_url };
        },
    };
}

export type BranchProtectionService = ReturnType<typeof createBranchProtectionService>;
