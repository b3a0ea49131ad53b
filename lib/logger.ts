import { type Level, type Logger, pino } from "pino";

export type MediatorLogger = Pick<Logger, "debug" | "warn">;

export function createLogger(level: Level | "silent" = "info"): Logger {
	return pino({ name: "mediator", level });
}
