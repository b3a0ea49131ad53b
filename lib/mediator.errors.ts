export type MediatorErrorCode =
	| "NO_HANDLER_REGISTERED"
	| "HANDLER_EXECUTION_FAILED"
	| "DUPLICATE_HANDLER";

export abstract class MediatorError extends Error {
	abstract readonly code: MediatorErrorCode;

	constructor(
		message: string,
		readonly requestType: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class NoHandlerRegisteredError extends MediatorError {
	readonly code = "NO_HANDLER_REGISTERED";

	constructor(requestType: string) {
		super(`No handler registered for request "${requestType}"`, requestType);
	}
}

/**
 * Wraps whatever the handler threw or rejected with. The original failure is
 * kept untouched as `cause`.
 */
export class HandlerExecutionFailedError extends MediatorError {
	readonly code = "HANDLER_EXECUTION_FAILED";

	constructor(requestType: string, cause: unknown) {
		super(
			`Handler for request "${requestType}" failed: ${describe(cause)}`,
			requestType,
			{ cause },
		);
	}
}

export class DuplicateHandlerError extends MediatorError {
	readonly code = "DUPLICATE_HANDLER";

	constructor(requestType: string) {
		super(
			`Handler for request "${requestType}" is already registered`,
			requestType,
		);
	}
}

/**
 * Registry lookup returned an adapter stored under another request type.
 * Never expected; means the key derivation is broken.
 */
export class MediatorInvariantError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "MediatorInvariantError";
	}
}

// Must not throw: it runs while wrapping the handler's own failure.
function describe(cause: unknown): string {
	if (cause instanceof Error) return cause.message;

	try {
		return typeof cause === "object" && cause !== null
			? JSON.stringify(cause)
			: String(cause);
	} catch {
		return Object.prototype.toString.call(cause);
	}
}
