import { z } from "zod";

export const duplicateHandlerPolicies = ["overwrite", "warn", "throw"] as const;

export type DuplicateHandlerPolicy = (typeof duplicateHandlerPolicies)[number];

const envSchema = z.object({
	MEDIATOR_LOG_LEVEL: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.default("info"),
	MEDIATOR_DUPLICATE_HANDLERS: z
		.enum(duplicateHandlerPolicies)
		.default("overwrite"),
});

export type MediatorConfig = {
	logLevel: z.infer<typeof envSchema>["MEDIATOR_LOG_LEVEL"];
	duplicateHandlers: DuplicateHandlerPolicy;
};

export function loadMediatorConfig(
	env: Record<string, string | undefined> = process.env,
): MediatorConfig {
	const parsed = envSchema.safeParse(env);

	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");

		throw new Error(`Invalid mediator configuration: ${details}`);
	}

	return {
		logLevel: parsed.data.MEDIATOR_LOG_LEVEL,
		duplicateHandlers: parsed.data.MEDIATOR_DUPLICATE_HANDLERS,
	};
}
