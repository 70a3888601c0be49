/** Log levels forwarded to the adapter log */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Callback the services log through, mapped onto adapter.log by the adapter
 */
export type LogCallback = (level: LogLevel, message: string) => void;
