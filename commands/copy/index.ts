import { copyFile, mkdir, stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import { basename, join } from "node:path";
import { createCommand } from "@/utils/cli/createCommand";
import {
	ConfigurationError,
	CopyIOError,
	describeError,
} from "@/utils/common/errors";
import { createProgress } from "@/utils/common/progress";
import { createSharedCounter } from "@/utils/common/sharedCounter";
import { showError, showWarning } from "@/utils/common/showError";
import { countFiles } from "@/utils/fs/countFiles";
import {
	copyDirectory,
	emptySummary,
	type CopySummary,
} from "@/utils/fs/copyDirectory";
import { canonicalize, isDirectory } from "@/utils/fs/walk";

type CopyCommandOptions = {
	recursive?: boolean;
	noise?: boolean;
	progress: boolean;
};

type Source = {
	path: string;
	directory: boolean;
};

const statOrNull = async (path: string): Promise<Stats | null> => {
	try {
		return await stat(path);
	} catch {
		return null;
	}
};

const splitOperands = (paths: string[]) => {
	const destination = paths.at(-1);
	const sources = paths.slice(0, -1);
	if (destination === undefined || sources.length === 0) {
		throw new ConfigurationError("missing destination file operand");
	}
	return { sources, destination };
};

const resolveDestination = async (sources: string[], destination: string) => {
	const [only] = sources;
	if (destination !== "." || sources.length !== 1 || only === undefined) {
		return destination;
	}
	return join(await canonicalize("."), basename(only));
};

// Every check happens before the first write.
const inspectSources = async (
	sources: string[],
	destination: string,
	recursive: boolean,
): Promise<Source[]> => {
	const destinationStats = await statOrNull(destination);
	const canonicalDestination = destinationStats
		? await canonicalize(destination)
		: null;
	const inspected: Source[] = [];

	for (const path of sources) {
		let stats: Stats;
		try {
			stats = await stat(path);
		} catch (error: unknown) {
			throw new CopyIOError(`cannot access \`${path}\``, error);
		}

		// Copying a path onto itself is a no-op, whatever the flags say.
		if ((await canonicalize(path)) === canonicalDestination) {
			continue;
		}

		const directory = stats.isDirectory();
		if (directory && !recursive) {
			throw new ConfigurationError(
				"cannot copy a directory without recursive process.",
			);
		}
		if (directory && destinationStats && !destinationStats.isDirectory()) {
			throw new ConfigurationError(`\`${destination}\` is not a directory.`);
		}
		inspected.push({ path, directory });
	}

	return inspected;
};

const ensureDestination = async (destination: string) => {
	if (await statOrNull(destination)) {
		return;
	}
	try {
		await mkdir(destination);
	} catch (error: unknown) {
		throw new CopyIOError(`cannot create a directory \`${destination}\``, error);
	}
};

const copySingleFile = async (source: string, destination: string) => {
	const target = (await isDirectory(destination))
		? join(destination, basename(source))
		: destination;
	try {
		await copyFile(source, target);
	} catch (error: unknown) {
		throw new CopyIOError(`cannot copy \`${source}\` into \`${target}\``, error);
	}
};

const describeSummary = (summary: CopySummary) => {
	const files = summary.copied + summary.replaced;
	return `Copied ${files} ${files === 1 ? "file" : "files"} (${summary.replaced} replaced, ${summary.skipped} skipped)`;
};

export default createCommand((program) =>
	program
		.command("copy", { isDefault: true })
		.description("Copy files and directories into a destination")
		.argument("<paths...>", "Source paths followed by the destination")
		.option("-r, --recursive", "Copy directories recursively")
		.option("--noise", "Print every copied file")
		.option("--no-progress", "Disable the progress line")
		.action(async (paths: string[], options: CopyCommandOptions) => {
			const recursive = options.recursive ?? false;
			const verbose = options.noise ?? false;
			const showProgress = options.progress;

			let sources: Source[];
			let destination: string;
			try {
				const operands = splitOperands(paths);
				destination = await resolveDestination(
					operands.sources,
					operands.destination,
				);
				sources = await inspectSources(
					operands.sources,
					destination,
					recursive,
				);
				await ensureDestination(destination);
			} catch (error: unknown) {
				showError(describeError(error));
				process.exitCode = 1;
				return;
			}

			const counter = createSharedCounter();
			if (showProgress) {
				for (const source of sources) {
					if (!source.directory) continue;
					void countFiles(source.path, destination, counter, (error) => {
						if (verbose) {
							showWarning(
								`Counting files under '${source.path}' stopped: ${describeError(error)}`,
							);
						}
					});
				}
			}

			const progress = createProgress(showProgress);
			const summary = emptySummary();

			try {
				for (const source of sources) {
					if (source.directory) {
						const result = await copyDirectory(
							progress,
							source.path,
							destination,
							{ counter, verbose, showProgress },
						);
						summary.copied += result.copied;
						summary.replaced += result.replaced;
						summary.skipped += result.skipped;
					} else {
						await copySingleFile(source.path, destination);
						summary.copied += 1;
						progress.inc(1);
					}
				}
			} catch (error: unknown) {
				progress.fail("Copy failed");
				showError(describeError(error));
				process.exitCode = 1;
				return;
			}

			progress.succeed(describeSummary(summary));
		}),
);
