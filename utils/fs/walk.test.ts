import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CopyIOError } from "@/utils/common/errors";
import { countOnly, walk, type DirectoryEntry } from "./walk";

describe("walk", () => {
	let root: string;

	beforeEach(() => {
		root = mkdtempSync(join(tmpdir(), "treecp-walk-"));
	});

	afterEach(() => {
		rmSync(root, { recursive: true, force: true });
	});

	it("Should treat a missing root as empty", async () => {
		const files: DirectoryEntry[] = [];
		await walk(join(root, "missing"), null, (entry) => {
			files.push(entry);
		});
		expect(files).toEqual([]);
	});

	it("Should treat a file root as empty", async () => {
		writeFileSync(join(root, "plain.txt"), "abc");
		const files: DirectoryEntry[] = [];
		await walk(join(root, "plain.txt"), null, (entry) => {
			files.push(entry);
		});
		expect(files).toEqual([]);
	});

	it("Should report files with their sizes and directories before their contents", async () => {
		mkdirSync(join(root, "sub"));
		writeFileSync(join(root, "x.txt"), "abc");
		writeFileSync(join(root, "sub", "y.txt"), "hello");

		const events: string[] = [];
		const files: DirectoryEntry[] = [];
		await walk(
			root,
			null,
			(entry) => {
				events.push(`file:${entry.path}`);
				files.push(entry);
			},
			(entry) => {
				events.push(`dir:${entry.path}`);
			},
		);

		expect(files).toHaveLength(2);
		expect(files).toContainEqual({
			path: join(root, "x.txt"),
			kind: "file",
			size: 3,
		});
		expect(files).toContainEqual({
			path: join(root, "sub", "y.txt"),
			kind: "file",
			size: 5,
		});
		expect(events.indexOf(`dir:${join(root, "sub")}`)).toBeLessThan(
			events.indexOf(`file:${join(root, "sub", "y.txt")}`),
		);
	});

	it("Should visit empty directories", async () => {
		mkdirSync(join(root, "empty"));
		const directories: string[] = [];
		await walk(
			root,
			null,
			() => {},
			(entry) => {
				directories.push(entry.path);
			},
		);
		expect(directories).toEqual([join(root, "empty")]);
	});

	it("Should skip the excluded path and everything below it", async () => {
		mkdirSync(join(root, "out", "deep"), { recursive: true });
		writeFileSync(join(root, "x.txt"), "abc");
		writeFileSync(join(root, "out", "deep", "z.txt"), "z");

		const seen: string[] = [];
		await walk(
			root,
			join(root, "out"),
			(entry) => {
				seen.push(entry.path);
			},
			(entry) => {
				seen.push(entry.path);
			},
		);
		expect(seen).toEqual([join(root, "x.txt")]);
	});

	it("Should skip a symlink that resolves to the excluded path", async () => {
		mkdirSync(join(root, "out"));
		writeFileSync(join(root, "out", "z.txt"), "z");
		symlinkSync(join(root, "out"), join(root, "alias"));

		const seen: string[] = [];
		await countOnly(root, join(root, "out"), (entry) => {
			seen.push(entry.path);
		});
		expect(seen).toEqual([]);
	});

	it("Should fail when the excluded path does not exist", async () => {
		writeFileSync(join(root, "x.txt"), "abc");
		await expect(
			walk(root, join(root, "not-yet"), () => {}),
		).rejects.toThrow(CopyIOError);
	});

	it("Should stop at the first visitor failure", async () => {
		writeFileSync(join(root, "a.txt"), "a");
		writeFileSync(join(root, "b.txt"), "b");

		let calls = 0;
		await expect(
			walk(root, null, () => {
				calls += 1;
				throw new Error("visitor failed");
			}),
		).rejects.toThrow("visitor failed");
		expect(calls).toBe(1);
	});
});
