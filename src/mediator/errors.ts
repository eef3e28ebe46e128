/**
 * Dispatcher wiring errors. These indicate a misconfigured dispatcher rather
 * than bad order data, so they are thrown instead of folded into a result.
 */

export class NoHandlerRegisteredError extends Error {
    constructor(readonly requestKind: string) {
        super(`No handler registered for request kind ${requestKind}`);
        this.name = 'NoHandlerRegisteredError';
    }
}

export class HandlerInvocationError extends Error {
    readonly originalMessage: string;

    constructor(readonly requestKind: string, cause: unknown) {
        const originalMessage = cause instanceof Error ? cause.message : String(cause);
        super(`Error invoking handler for ${requestKind}: ${originalMessage}`, {cause});
        this.name = 'HandlerInvocationError';
        this.originalMessage = originalMessage;
    }
}
