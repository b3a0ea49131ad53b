import { type AwilixContainer, asValue, type BuildResolverOptions } from "awilix";

import { Mediator, type MediatorOptions } from "./mediator.js";
import type { RequestHandler } from "./mediator.types.js";

export type RequestHandlerConstructor = {
	new (...args: any[]): RequestHandler;
};

export const MEDIATOR_KEY = "mediator";

export function registerMediator(
	container: AwilixContainer,
	options: MediatorOptions = {},
): Mediator {
	const mediator = new Mediator(options);

	container.register({ [MEDIATOR_KEY]: asValue(mediator) });

	return mediator;
}

/**
 * Builds every handler class from `container`, so constructors receive their
 * dependencies, and registers the instances with the container's mediator.
 */
export function registerRequestHandlers(
	container: AwilixContainer,
	handlerClasses: readonly RequestHandlerConstructor[],
	buildOptions?: BuildResolverOptions<RequestHandler>,
): void {
	if (!container.hasRegistration(MEDIATOR_KEY)) {
		throw new Error(
			`"${MEDIATOR_KEY}" is not registered; call registerMediator first`,
		);
	}

	const mediator = container.resolve<Mediator>(MEDIATOR_KEY);

	for (const HandlerClass of handlerClasses) {
		mediator.registerHandler(container.build(HandlerClass, buildOptions));
	}
}
