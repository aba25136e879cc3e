import chalk from "chalk";
import type { Logger } from "./types.ts";

/** Console logger that tags every line, e.g. `[relay] Got new OAuth token`. */
export function createLogger(scope: string, sink: Logger = console): Logger {
	const tag = chalk.dim(`[${scope}]`);
	return {
		log: (...args: unknown[]) => sink.log(tag, ...args),
		warn: (...args: unknown[]) => sink.warn(tag, chalk.yellow("warn"), ...args),
		error: (...args: unknown[]) => sink.error(tag, chalk.red("error"), ...args),
	};
}
