export { Client, astring, DEFAULT_FETCH } from "./client";
export { loadConfig, DEFAULT_HOST, DEFAULT_PORT, DEFAULT_LOCK_PATH } from "./config";
export { CommandFailedError, ConfigError, EndOfStreamError, ExpectTimeoutError, type Pattern } from "./errors";
export { Expecter, type Direction, type ExpectMatch, type ExpecterOptions } from "./expect";
export { messageSource, parseFetchResponses } from "./fetch-response";
export { removeLock } from "./lock";
export { main } from "./main";
export { runSession } from "./session";
export * from "./types";
