export type SharedCounter = {
	increment: (by?: number) => void;
	load: () => number;
};

// Callbacks run on the event loop thread, so a plain number is enough.
export const createSharedCounter = (initial = 0): SharedCounter => {
	let value = initial;
	return {
		increment: (by = 1) => {
			value += by;
		},
		load: () => value,
	};
};
