import { readdir, realpath, stat } from "node:fs/promises";
import { join } from "node:path";
import { CopyIOError } from "@/utils/common/errors";

export type DirectoryEntry = {
	path: string;
	kind: "file" | "directory";
	size: number;
};

export type EntryVisitor = (entry: DirectoryEntry) => void | Promise<void>;

export const isDirectory = async (path: string) => {
	try {
		return (await stat(path)).isDirectory();
	} catch {
		return false;
	}
};

export const canonicalize = async (path: string) => {
	try {
		return await realpath(path);
	} catch (error: unknown) {
		throw new CopyIOError(`cannot resolve \`${path}\``, error);
	}
};

const readEntry = async (path: string): Promise<DirectoryEntry> => {
	try {
		const stats = await stat(path);
		return {
			path,
			kind: stats.isDirectory() ? "directory" : "file",
			size: stats.size,
		};
	} catch (error: unknown) {
		throw new CopyIOError(`cannot get the metadata for \`${path}\``, error);
	}
};

const visit = async (
	dir: string,
	excluded: string | null,
	onFile: EntryVisitor,
	onDirectory: EntryVisitor | undefined,
): Promise<void> => {
	let names: string[];
	try {
		names = await readdir(dir);
	} catch (error: unknown) {
		throw new CopyIOError(`cannot read the directory \`${dir}\``, error);
	}

	for (const name of names) {
		const path = join(dir, name);
		if (excluded !== null && (await canonicalize(path)) === excluded) {
			continue;
		}

		const entry = await readEntry(path);
		if (entry.kind === "directory") {
			await onDirectory?.(entry);
			await visit(path, excluded, onFile, onDirectory);
		} else {
			await onFile(entry);
		}
	}
};

/**
 * Depth-first walk of `root`, in directory listing order.
 *
 * Any child whose canonical path equals `exclude` is skipped along with its
 * subtree. `onDirectory` runs before the walk descends into a directory.
 * A `root` that is not a directory is walked as empty. The first failure
 * (listing, resolving, or a visitor) rejects the whole walk.
 */
export const walk = async (
	root: string,
	exclude: string | null,
	onFile: EntryVisitor,
	onDirectory?: EntryVisitor,
) => {
	if (!(await isDirectory(root))) {
		return;
	}
	const excluded = exclude === null ? null : await canonicalize(exclude);
	await visit(root, excluded, onFile, onDirectory);
};

export const countOnly = (
	root: string,
	exclude: string | null,
	onFile: EntryVisitor,
) => walk(root, exclude, onFile);

export const copyAndCreate = (
	root: string,
	exclude: string,
	onFile: EntryVisitor,
	onDirectory: EntryVisitor,
) => walk(root, exclude, onFile, onDirectory);
