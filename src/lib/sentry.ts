import * as Sentry from "@sentry/node";

/** Span status code for errors (OpenTelemetry) */
const SPAN_STATUS_ERROR = 2;

export interface SentryOptions {
	dsn?: string;
	adapterVersion: string;
	adapterNamespace?: string;
}

/**
 * Mask credentials and IP addresses in text sent to Sentry
 *
 * @param text message, exception value or transaction name
 * @returns text with sensitive values replaced
 */
export function scrubSensitiveData(text: string): string {
	return text
		.replace(/password[=:]\s*\w+/gi, "password=***")
		.replace(/api[_-]?key[=:]\s*\w+/gi, "apiKey=***")
		.replace(/token[=:]\s*\w+/gi, "token=***")
		.replace(/secret[=:]\s*\w+/gi, "secret=***")
		.replace(/\bkey=\w+/gi, "key=***")
		.replace(/\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, "xxx.xxx.xxx.xxx");
}

/**
 * Error reporting and tracing for the adapter. Every method is a no-op until init() ran with a DSN.
 */
export class SentryUtils {
	private static initialized = false;

	/**
	 * Initialize Sentry. Without a DSN nothing is reported.
	 *
	 * @param options DSN and adapter identity
	 */
	public static init(options: SentryOptions): void {
		if (this.initialized || !options.dsn) {
			return;
		}

		const isProduction = process.env.NODE_ENV === "production";
		Sentry.init({
			dsn: options.dsn,
			environment: isProduction ? "production" : "development",
			release: `iobroker.climate-insights@${options.adapterVersion}`,
			sendDefaultPii: false,
			sampleRate: isProduction ? 0.1 : 1.0,
			tracesSampleRate: isProduction ? 0.1 : 1.0,
			integrations: [Sentry.httpIntegration()],

			beforeSend(event) {
				event.exception?.values?.forEach(exception => {
					if (exception.value) {
						exception.value = scrubSensitiveData(exception.value);
					}
				});
				event.breadcrumbs?.forEach(breadcrumb => {
					if (breadcrumb.message) {
						breadcrumb.message = scrubSensitiveData(breadcrumb.message);
					}
				});
				return event;
			},

			beforeSendTransaction(event) {
				if (event.transaction) {
					event.transaction = scrubSensitiveData(event.transaction);
				}
				return event;
			},
		});

		if (options.adapterNamespace) {
			Sentry.setUser({ id: options.adapterNamespace });
		}
		Sentry.setTags({
			adapter: "climate-insights",
			version: options.adapterVersion,
			platform: "iobroker",
			node_version: process.version,
		});
		this.initialized = true;
	}

	/**
	 * Run an async operation inside a performance span
	 *
	 * @param name Name of the operation
	 * @param op Operation type, e.g. "adapter.poll"
	 * @param callback operation to trace
	 * @returns result of the callback
	 */
	public static async startSpanAsync<T>(name: string, op: string, callback: () => Promise<T>): Promise<T> {
		if (!this.initialized) {
			return await callback();
		}

		return await Sentry.startSpan({ name, op }, async span => {
			try {
				return await callback();
			} catch (error) {
				span.setStatus({ code: SPAN_STATUS_ERROR, message: "internal_error" });
				span.setAttribute("error", true);
				throw error;
			}
		});
	}

	/**
	 * Capture an exception with Sentry
	 *
	 * @param error The error to capture
	 * @param context Additional context information
	 * @param level Error level
	 */
	public static captureException(
		error: Error,
		context?: Record<string, Record<string, unknown>>,
		level: Sentry.SeverityLevel = "error",
	): void {
		if (!this.initialized) {
			return;
		}

		Sentry.withScope(scope => {
			scope.setLevel(level);
			for (const [key, value] of Object.entries(context ?? {})) {
				scope.setContext(key, value);
			}
			Sentry.captureException(error);
		});
	}

	/**
	 * Close Sentry and flush all pending events
	 *
	 * @param timeout Timeout in milliseconds
	 * @returns false if events could not be sent in time
	 */
	public static async close(timeout = 2000): Promise<boolean> {
		if (!this.initialized) {
			return true;
		}
		this.initialized = false;
		return await Sentry.close(timeout);
	}

	public static isInitialized(): boolean {
		return this.initialized;
	}
}
