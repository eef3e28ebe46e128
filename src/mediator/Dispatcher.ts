import {DispatchRequest, RequestHandler, RequestKind, RequestResponse} from './requests';
import {HandlerInvocationError, NoHandlerRegisteredError} from './errors';

type HandlerRegistry = { [K in RequestKind]?: RequestHandler<K> };

/**
 * Routes a tagged request to the single handler registered for its kind.
 *
 * The registry is only touched synchronously, so lookups from concurrent
 * workflows never observe a half-applied registration.
 */
export class Dispatcher {
    private readonly handlers: HandlerRegistry = {};
    private readonly kinds = new Set<RequestKind>();

    /**
     * Associate a handler with a request kind, replacing any earlier one.
     */
    register<K extends RequestKind>(kind: K, handler: RequestHandler<K>): this {
        const handlers: { [P in K]?: RequestHandler<P> } = this.handlers;
        handlers[kind] = handler;
        this.kinds.add(kind);
        return this;
    }

    hasHandler(kind: RequestKind): boolean {
        return this.handlers[kind] !== undefined;
    }

    // in first-registration order
    registeredKinds(): RequestKind[] {
        return [...this.kinds];
    }

    /**
     * @throws NoHandlerRegisteredError for the first kind without a handler
     */
    ensureRegistered(...kinds: RequestKind[]): void {
        const missing = kinds.find(kind => !this.hasHandler(kind));
        if (missing !== undefined) throw new NoHandlerRegisteredError(missing);
    }

    /**
     * @throws NoHandlerRegisteredError when nothing handles the request's kind
     * @throws HandlerInvocationError wrapping whatever the handler threw
     */
    async send<K extends RequestKind>(request: DispatchRequest<K>): Promise<RequestResponse<K>> {
        const handler = this.handlers[request.kind];
        if (handler === undefined) {
            throw new NoHandlerRegisteredError(request.kind);
        }

        try {
            return await handler(request.payload);
        } catch (error) {
            throw new HandlerInvocationError(request.kind, error);
        }
    }
}
