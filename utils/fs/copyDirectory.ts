import { constants } from "node:fs";
import { copyFile, mkdir, rm, stat } from "node:fs/promises";
import { basename, dirname, join, relative, resolve } from "node:path";
import { CopyIOError, isErrnoException } from "@/utils/common/errors";
import type { ProgressHandle } from "@/utils/common/progress";
import type { SharedCounter } from "@/utils/common/sharedCounter";
import { copyAndCreate, type DirectoryEntry } from "@/utils/fs/walk";

export type CopyOutcome = "copied" | "replaced" | "skipped";

export type CopySummary = Record<CopyOutcome, number>;

export type CopyDirectoryOptions = {
	counter: SharedCounter;
	verbose: boolean;
	showProgress: boolean;
};

export const emptySummary = (): CopySummary => ({
	copied: 0,
	replaced: 0,
	skipped: 0,
});

export const makeDirectory = async (path: string) => {
	try {
		await mkdir(path);
	} catch (error: unknown) {
		if (isErrnoException(error) && error.code === "EEXIST") {
			return;
		}
		throw new CopyIOError(`cannot create a directory \`${path}\``, error);
	}
};

const statTarget = async (path: string) => {
	try {
		return await stat(path);
	} catch (error: unknown) {
		throw new CopyIOError(`cannot get the metadata for \`${path}\``, error);
	}
};

/**
 * Copy one file without clobbering an identical-looking target: an existing
 * regular file of the same size is left alone, one of another size is
 * removed and copied again. Anything else in the way is an error.
 */
export const copyEntry = async (
	entry: DirectoryEntry,
	target: string,
): Promise<CopyOutcome> => {
	try {
		await copyFile(entry.path, target, constants.COPYFILE_EXCL);
		return "copied";
	} catch (error: unknown) {
		if (!isErrnoException(error) || error.code !== "EEXIST") {
			throw new CopyIOError(
				`cannot copy \`${entry.path}\` into \`${target}\``,
				error,
			);
		}
	}

	const existing = await statTarget(target);
	if (!existing.isFile()) {
		throw new CopyIOError(
			`cannot copy \`${entry.path}\` into \`${target}\``,
			new Error("target exists and is not a regular file"),
		);
	}
	if (existing.size === entry.size) {
		return "skipped";
	}

	try {
		await rm(target);
	} catch (error: unknown) {
		throw new CopyIOError(`cannot remove \`${target}\``, error);
	}
	try {
		await copyFile(entry.path, target);
	} catch (error: unknown) {
		throw new CopyIOError(
			`cannot copy \`${entry.path}\` into \`${target}\``,
			error,
		);
	}
	return "replaced";
};

/**
 * Mirror the directory `source` into `destination/<basename(source)>`.
 *
 * `destination` must already exist. It is never walked, even when it sits
 * inside `source`.
 */
export const copyDirectory = async (
	progress: ProgressHandle,
	source: string,
	destination: string,
	{ counter, verbose, showProgress }: CopyDirectoryOptions,
) => {
	const absoluteSource = resolve(source);
	const sourceParent = dirname(absoluteSource);
	const mirror = (path: string) =>
		join(destination, relative(sourceParent, path));

	await makeDirectory(join(destination, basename(absoluteSource)));

	const summary = emptySummary();

	await copyAndCreate(
		absoluteSource,
		destination,
		async (entry) => {
			const target = mirror(entry.path);

			if (verbose) {
				progress.println(`cp: ${entry.path} => ${target}`);
			}
			if (showProgress) {
				progress.setLength(counter.load());
			}

			summary[await copyEntry(entry, target)] += 1;

			if (showProgress) {
				progress.inc(1);
			}
		},
		async (entry) => {
			await makeDirectory(mirror(entry.path));
		},
	);

	return summary;
};
