import loading from "loading-cli";
import { createCommand } from "@/utils/cli/createCommand";
import { describeError } from "@/utils/common/errors";
import { showError } from "@/utils/common/showError";
import { countOnly } from "@/utils/fs/walk";

export type TreeTotals = {
	files: number;
	bytes: number;
};

export const measureTree = async (root: string, exclude: string | null) => {
	const totals: TreeTotals = { files: 0, bytes: 0 };
	await countOnly(root, exclude, (entry) => {
		totals.files += 1;
		totals.bytes += entry.size;
	});
	return totals;
};

export default createCommand((program) =>
	program
		.command("count")
		.description("Count the files and bytes under a directory")
		.argument("<path>", "The directory to measure")
		.option("--exclude <path>", "A path to leave out of the count")
		.action(async (path: string, options: { exclude?: string }) => {
			const loader = loading(`Counting files under ${path}...`).start();
			try {
				const { files, bytes } = await measureTree(
					path,
					options.exclude ?? null,
				);
				loader.succeed(`${files} files, ${bytes} bytes`);
			} catch (error: unknown) {
				loader.fail("Failed to count files");
				showError(`Error counting '${path}': ${describeError(error)}`);
				process.exitCode = 1;
			}
		}),
);
