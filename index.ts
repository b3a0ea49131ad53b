export type { MediatorLogger } from "./lib/logger.js";
export { createLogger } from "./lib/logger.js";

export { Mediator, type MediatorOptions } from "./lib/mediator.js";

export type {
	DuplicateHandlerPolicy,
	MediatorConfig,
} from "./lib/mediator.config.js";
export { loadMediatorConfig } from "./lib/mediator.config.js";

export {
	registerMediator,
	registerRequestHandlers,
	MEDIATOR_KEY,
	type RequestHandlerConstructor,
} from "./lib/mediator.container.js";

export {
	DuplicateHandlerError,
	HandlerExecutionFailedError,
	MediatorError,
	type MediatorErrorCode,
	MediatorInvariantError,
	NoHandlerRegisteredError,
} from "./lib/mediator.errors.js";

export type {
	AnyRequest,
	RequestConstructor,
	RequestHandler,
	ResponseOf,
} from "./lib/mediator.types.js";
export { createRequestHandler, Request } from "./lib/mediator.types.js";

export { type Outcome, settle } from "./lib/outcome.js";
