import { describe, expect, it } from "vitest";

import { loadMediatorConfig } from "../lib/mediator.config.js";

describe("loadMediatorConfig", () => {
	it("should fall back to defaults for an empty environment", () => {
		expect(loadMediatorConfig({})).toEqual({
			logLevel: "info",
			duplicateHandlers: "overwrite",
		});
	});

	it("should read the log level and duplicate policy", () => {
		expect(
			loadMediatorConfig({
				MEDIATOR_LOG_LEVEL: "debug",
				MEDIATOR_DUPLICATE_HANDLERS: "throw",
			}),
		).toEqual({ logLevel: "debug", duplicateHandlers: "throw" });
	});

	it("should ignore unrelated variables", () => {
		expect(
			loadMediatorConfig({ NODE_ENV: "test", MEDIATOR_LOG_LEVEL: "silent" }),
		).toEqual({ logLevel: "silent", duplicateHandlers: "overwrite" });
	});

	it("should throw naming the invalid variable", () => {
		expect(() =>
			loadMediatorConfig({ MEDIATOR_DUPLICATE_HANDLERS: "ignore" }),
		).toThrow(/^Invalid mediator configuration: MEDIATOR_DUPLICATE_HANDLERS: /);
	});
});
