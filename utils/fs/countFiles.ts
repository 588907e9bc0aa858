import type { SharedCounter } from "@/utils/common/sharedCounter";
import { countOnly } from "@/utils/fs/walk";

/**
 * Count the files under `source` (skipping `destination`) into `counter`.
 *
 * Meant to be started without awaiting: the returned promise never rejects,
 * a failed walk goes to `onError` and the count simply stops growing.
 */
export const countFiles = async (
	source: string,
	destination: string,
	counter: SharedCounter,
	onError?: (error: unknown) => void,
) => {
	try {
		await countOnly(source, destination, () => {
			counter.increment();
		});
	} catch (error: unknown) {
		onError?.(error);
	}
};
