import { createLogger, type MediatorLogger } from "./logger.js";
import {
	type DuplicateHandlerPolicy,
	loadMediatorConfig,
} from "./mediator.config.js";
import {
	DuplicateHandlerError,
	HandlerExecutionFailedError,
	MediatorInvariantError,
	NoHandlerRegisteredError,
} from "./mediator.errors.js";
import type {
	AnyRequest,
	RequestConstructor,
	RequestHandler,
	ResponseOf,
} from "./mediator.types.js";

export interface MediatorOptions {
	logger?: MediatorLogger;
	duplicateHandlers?: DuplicateHandlerPolicy;
}

/**
 * Type-erased view of a registered handler. Stored under the request class
 * it was built for, and narrowed back with {@link isAdapterFor} on lookup.
 */
interface HandlerAdapter<TRequest extends AnyRequest = AnyRequest> {
	readonly requestType: RequestConstructor<TRequest>;
	readonly handlerName: string;
	invoke(request: TRequest): Promise<ResponseOf<TRequest>>;
}

function isAdapterFor<TRequest extends AnyRequest>(
	adapter: HandlerAdapter,
	request: TRequest,
): adapter is HandlerAdapter<TRequest> {
	return adapter.requestType === request.constructor;
}

function typeName(requestType: unknown): string {
	return typeof requestType === "function" && requestType.name
		? requestType.name
		: "<anonymous>";
}

// Plain-object handlers (see createRequestHandler) go by their function's name.
function handlerNameOf(handler: RequestHandler): string {
	return handler.constructor === Object
		? typeName(handler.handle)
		: typeName(handler.constructor);
}

/**
 * Routes each request to the single handler registered for its class.
 *
 * Registering a second handler for a request class replaces the first under
 * the default `"overwrite"` policy. Registry reads and writes are synchronous
 * and `send` finishes its lookup before the handler can suspend, so a
 * registration never interleaves with a lookup and never changes a call that
 * is already in flight.
 *
 * @example
 * class Ping extends Request<string> {}
 *
 * const mediator = new Mediator();
 * mediator.registerHandler(createRequestHandler(Ping, async () => "pong!"));
 *
 * await mediator.send(new Ping()); // "pong!"
 */
export class Mediator {
	private readonly registry = new Map<unknown, HandlerAdapter>();
	private readonly logger: MediatorLogger;
	private readonly duplicateHandlers: DuplicateHandlerPolicy;

	constructor(options: MediatorOptions = {}) {
		const config =
			options.logger && options.duplicateHandlers
				? undefined
				: loadMediatorConfig();

		this.logger = options.logger ?? createLogger(config?.logLevel);
		this.duplicateHandlers =
			options.duplicateHandlers ?? config?.duplicateHandlers ?? "overwrite";
	}

	registerHandler<TRequest extends AnyRequest>(
		handler: RequestHandler<TRequest>,
	): void {
		const { requestType } = handler;
		const requestName = typeName(requestType);
		const handlerName = handlerNameOf(handler);
		const existing = this.registry.get(requestType);

		if (existing) {
			this.onDuplicate(requestName, existing.handlerName, handlerName);
		}

		const adapter: HandlerAdapter<TRequest> = {
			requestType,
			handlerName,
			invoke: (request) => handler.handle(request),
		};

		this.registry.set(requestType, adapter);
		this.logger.debug(
			{ requestType: requestName, handler: handlerName },
			"handler registered",
		);
	}

	async send<TRequest extends AnyRequest>(
		request: TRequest,
	): Promise<ResponseOf<TRequest>> {
		const requestName = typeName(request.constructor);
		const adapter = this.registry.get(request.constructor);

		if (!adapter) {
			this.logger.debug({ requestType: requestName }, "no handler registered");

			throw new NoHandlerRegisteredError(requestName);
		}

		const servedName = typeName(adapter.requestType);

		if (!isAdapterFor(adapter, request)) {
			throw new MediatorInvariantError(
				`Adapter stored under "${requestName}" serves "${servedName}"`,
			);
		}

		this.logger.debug(
			{ requestType: requestName, handler: adapter.handlerName },
			"dispatching request",
		);

		try {
			return await adapter.invoke(request);
		} catch (error) {
			throw new HandlerExecutionFailedError(requestName, error);
		}
	}

	private onDuplicate(
		requestName: string,
		previous: string,
		next: string,
	): void {
		const context = { requestType: requestName, previous, next };

		switch (this.duplicateHandlers) {
			case "throw":
				throw new DuplicateHandlerError(requestName);
			case "warn":
				this.logger.warn(context, "handler replaced");
				return;
			case "overwrite":
				this.logger.debug(context, "handler replaced");
				return;
		}
	}
}
