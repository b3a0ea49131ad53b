export type Outcome<T, E = unknown> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

/**
 * Resolves to an {@link Outcome} instead of rejecting.
 *
 * @example
 * const outcome = await settle(mediator.send(new Ping()));
 * if (!outcome.ok) logger.warn(outcome.error);
 */
export async function settle<T>(promise: Promise<T>): Promise<Outcome<T>> {
	try {
		return { ok: true, value: await promise };
	} catch (error) {
		return { ok: false, error };
	}
}
