import { AsyncLocalStorage } from 'node:async_hooks';

export interface RequestScope {
    readonly requestId: string;
    readonly method: string;
    readonly path: string;
    readonly startedAt: number;
}

/**
 * Request Context Container
 * AsyncLocalStorage-backed so concurrent requests never see each other's scope.
 *
 * Only the request boundary (ingress middleware) calls run().
 */

const storage = new AsyncLocalStorage<RequestScope>();

export class RequestContext {
    public static run<T>(scope: RequestScope, fn: () => T): T {
        return storage.run(Object.freeze({ ...scope }), fn);
    }

    /**
     * Current scope, or undefined outside a request.
     */
    public static current(): RequestScope | undefined {
        return storage.getStore();
    }

    /**
     * Fails closed when called outside run().
     */
    public static get(): RequestScope {
        const scope = storage.getStore();
        if (!scope) {
            throw new Error('MISSING_REQUEST_CONTEXT: No request scope established');
        }
        return scope;
    }
}
