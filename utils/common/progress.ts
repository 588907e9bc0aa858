import loading from "loading-cli";

export type ProgressHandle = {
	setLength: (length: number) => void;
	inc: (delta?: number) => void;
	/** Print a line above the progress line without breaking it. */
	println: (line: string) => void;
	succeed: (message: string) => void;
	fail: (message: string) => void;
};

export const formatProgress = (position: number, length: number) => {
	const total = Math.max(length, position);
	const percent = total === 0 ? 0 : Math.floor((position / total) * 100);
	return `${position}/${total} ${percent}%`;
};

/**
 * Progress line backed by a loading-cli spinner.
 * When disabled, only `println` has any effect.
 */
export const createProgress = (enabled: boolean): ProgressHandle => {
	if (!enabled) {
		return {
			setLength: () => {},
			inc: () => {},
			println: (line) => console.log(line),
			succeed: () => {},
			fail: () => {},
		};
	}

	let position = 0;
	let length = 0;
	const loader = loading(formatProgress(position, length)).start();

	const render = () => {
		loader.text = formatProgress(position, length);
	};

	return {
		setLength: (next) => {
			length = next;
			render();
		},
		inc: (delta = 1) => {
			position += delta;
			render();
		},
		println: (line) => {
			loader.stop();
			console.log(line);
			loader.start();
		},
		succeed: (message) => {
			loader.succeed(`${message} [${formatProgress(position, length)}]`);
		},
		fail: (message) => {
			loader.fail(message);
		},
	};
};
