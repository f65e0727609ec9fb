import { describe, expect, it, vi } from 'vitest';

import type { DefaultBranchCreatedEvent } from '../src/github/events.js';
import { ClientRequestError } from '../src/github/errors.js';
import {
    buildNotificationIssue,
    createBranchProtectionService,
} from '../src/services/branchProtectionService.js';

const EVENT: DefaultBranchCreatedEvent = {
    owner: 'acme',
    repository: 'widgets',
    branch: 'main',
    creator: 'octocat',
};

function setup(requiredApprovingReviewCount?: number) {
    const put = vi.fn().mockResolvedValue(undefined);
    const post = vi
        .fn()
        .mockResolvedValue({ number: 7, html_url: 'https://github.com/acme/widgets/issues/7' });
    const service = createBranchProtectionService({
        client: { put, post },
        requiredApprovingReviewCount,
    });
    return { put, post, service };
}

describe('createBranchProtectionService', () => {
    it('protects the branch and then opens an issue', async () => {
        const { put, post, service } = setup();

        const result = await service.protectDefaultBranch(EVENT);

        expect(result).toEqual({
            issueNumber: 7,
            issueUrl: 'https://github.com/acme/widgets/issues/7',
        });
        expect(put).toHaveBeenCalledWith(
            'repos/acme/widgets/branches/main/protection',
            {
                required_status_checks: null,
                enforce_admins: true,
                required_pull_request_reviews: { required_approving_review_count: 1 },
                restrictions: null,
            },
            expect.anything(),
            undefined
        );
        expect(post).toHaveBeenCalledWith(
            'repos/acme/widgets/issues',
            buildNotificationIssue(EVENT, 1),
            expect.anything(),
            undefined
        );
        expect(put.mock.invocationCallOrder[0]).toBeLessThan(post.mock.invocationCallOrder[0]);
    });

    it('uses the configured number of approvals', async () => {
        const { put, service } = setup(2);

        await service.protectDefaultBranch(EVENT);

        expect(put).toHaveBeenCalledWith(
            expect.any(String),
            expect.objectContaining({
                required_pull_request_reviews: { required_approving_review_count: 2 },
            }),
            expect.anything(),
            undefined
        );
    });

    it('escapes branch names with slashes', async () => {
        const { put, service } = setup();

        await service.protectDefaultBranch({ ...EVENT, branch: 'release/1.0' });

        expect(put.mock.calls[0][0]).toBe('repos/acme/widgets/branches/release%2F1.0/protection');
    });

    it('forwards the cancellation signal', async () => {
        const { put, post, service } = setup();
        const controller = new AbortController();

        await service.protectDefaultBranch(EVENT, controller.signal);

        expect(put.mock.calls[0][3]).toBe(controller.signal);
        expect(post.mock.calls[0][3]).toBe(controller.signal);
    });

    it('does not open an issue when protecting fails', async () => {
        const { put, post, service } = setup();
        const failure = new ClientRequestError(404, '{"message":"Not Found"}', 'not found');
        put.mockRejectedValueOnce(failure);

        await expect(service.protectDefaultBranch(EVENT)).rejects.toBe(failure);
        expect(post).not.toHaveBeenCalled();
    });
});

describe('buildNotificationIssue', () => {
    it('mentions the creator and the branch', () => {
        const issue = buildNotificationIssue(EVENT, 1);

        expect(issue.title).toBe('Default branch is now protected');
        expect(issue.body.split('\n')[0]).toBe(
            '@octocat: [`main`](../tree/main) is the default branch of this repository ' +
                'and has been protected automatically.'
        );
        expect(issue.body).toContain('once it has one approving review.');
    });

    it('pluralises the approval count', () => {
        expect(buildNotificationIssue(EVENT, 3).body).toContain('once it has 3 approving reviews.');
    });
});
