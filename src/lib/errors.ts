export type ErrorCode =
	| "CONFIG_ERROR"
	| "TRANSPORT_OPEN_ERROR"
	| "TRANSPORT_READ_ERROR"
	| "LOG_STORE_ERROR"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.details = params.details;
	}
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		message,
		details
	});
}

/**
 * The transport could not be opened at all. The message carries the likely
 * causes so the operator can act on a single log line.
 */
export function transportOpenError(transport: string, hints: readonly string[], cause: unknown): AppError {
	const likely = hints.length > 0 ? `. Likely causes: ${hints.join("; ")}` : "";
	return new AppError({
		code: "TRANSPORT_OPEN_ERROR",
		message: `Could not open ${transport}: ${describeError(cause)}${likely}`,
		details: { transport, hints },
		cause
	});
}

export function transportReadError(transport: string, cause: unknown): AppError {
	return new AppError({
		code: "TRANSPORT_READ_ERROR",
		message: `Read from ${transport} failed: ${describeError(cause)}. Restart the ingestor once the device is back`,
		details: { transport },
		cause
	});
}

export function logStoreError(message: string, cause?: unknown): AppError {
	return new AppError({
		code: "LOG_STORE_ERROR",
		message: cause === undefined ? message : `${message}: ${describeError(cause)}`,
		cause
	});
}
