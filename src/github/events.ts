import { z } from 'zod';

const AccountSchema = z.object({
    login: z.string().min(1),
});

/**
 * The subset of a `create` webhook payload the service acts on.
 * @see https://docs.github.com/en/webhooks/webhook-events-and-payloads#create
 */
export const CreateEventPayloadSchema = z.object({
    ref: z.string().min(1),
    ref_type: z.enum(['branch', 'tag']),
    master_branch: z.string().min(1),
    repository: z.object({
        name: z.string().min(1),
        owner: AccountSchema,
    }),
    sender: AccountSchema,
});

export type CreateEventPayload = z.infer<typeof CreateEventPayloadSchema>;

export interface DefaultBranchCreatedEvent {
    owner: string;
    repository: string;
    branch: string;
    /** Login of the user whose push created the branch. */
    creator: string;
}

/**
 * Only the very first branch of a repository is also its default branch; later branch
 * creations and tags are not of interest.
 */
export function toDefaultBranchCreatedEvent(
    payload: CreateEventPayload
): DefaultBranchCreatedEvent | null {
    if (payload.ref_type !== 'branch') return null;
    if (payload.ref !== payload.master_branch) return null;

    return {
        owner: payload.repository.owner.login,
        repository: payload.repository.name,
        branch: payload.ref,
        creator: payload.sender.login,
    };
}
