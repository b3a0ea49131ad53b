// Type-only marker; requests never hold a value under it.
declare const responseType: unique symbol;

/**
 * Base class of every request. The type argument is the one response type the
 * request produces, so `send` can infer it from the request alone.
 *
 * @example
 * class Ping extends Request<string> {}
 */
export abstract class Request<TResponse> {
	declare readonly [responseType]: TResponse;
}

export type AnyRequest = Request<unknown>;

export type ResponseOf<TRequest extends AnyRequest> =
	TRequest extends Request<infer R> ? R : never;

export type RequestConstructor<TRequest extends AnyRequest = AnyRequest> =
	new (
		...args: any[]
	) => TRequest;

export interface RequestHandler<TRequest extends AnyRequest = AnyRequest> {
	readonly requestType: RequestConstructor<TRequest>;
	handle(request: TRequest): Promise<ResponseOf<TRequest>>;
}

type HandleFn<TRequest extends AnyRequest> = (
	request: TRequest,
) => Promise<ResponseOf<TRequest>>;

export function createRequestHandler<TRequest extends AnyRequest>(
	requestType: RequestConstructor<TRequest>,
	handle: HandleFn<TRequest>,
): RequestHandler<TRequest> {
	return { requestType, handle };
}
