import { AsyncLocalStorage } from 'node:async_hooks';

export interface RequestContext {
    requestId: string;
    /**
     * GitHub's `X-GitHub-Delivery` GUID, set once a webhook delivery is identified.
     */
    deliveryId?: string;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(context: RequestContext, fn: () => T): T {
    return requestContextStorage.run(context, fn);
}

export function getRequestContext(): RequestContext | undefined {
    return requestContextStorage.getStore();
}

export function setDeliveryId(deliveryId: string): void {
    const store = requestContextStorage.getStore();
    if (store) store.deliveryId = deliveryId;
}
