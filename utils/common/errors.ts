/** Invalid invocation, detected before anything is written. */
export class ConfigurationError extends Error {
	name = "ConfigurationError";
}

/** A failed filesystem call. The message names the path(s) involved. */
export class CopyIOError extends Error {
	name = "CopyIOError";

	constructor(message: string, cause: unknown) {
		super(`${message}: ${describeError(cause)}`, { cause });
	}
}

export const isErrnoException = (
	error: unknown,
): error is NodeJS.ErrnoException =>
	error instanceof Error && "code" in error;

export const describeError = (error: unknown) =>
	error instanceof Error ? error.message : "Unknown error";
