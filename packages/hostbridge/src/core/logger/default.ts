import { createConsoleHandler } from "./console-handler";
import { Logger } from "./logger";

/** Process-wide logger used when a component is constructed without a `logger` option. */
export const defaultLogger = new Logger();
defaultLogger.addHandler(createConsoleHandler({ level: "warn" }));
