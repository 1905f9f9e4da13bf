import type { Logger } from "@strata/compiler";

/** Logger writing to the console, every line tagged with `prefix`. */
export function createConsoleLogger(prefix = "[strata]", sink: Pick<Console, "log" | "info" | "warn" | "error"> = console): Logger {
  return {
    log: (m: string) => sink.log(`${prefix} ${m}`),
    info: (m: string) => sink.info(`${prefix} ${m}`),
    warn: (m: string) => sink.warn(`${prefix} ${m}`),
    error: (m: string) => sink.error(`${prefix} ${m}`),
  };
}
