import type { Command } from "commander";

export type CommandRegistrar = (program: Command) => Command;

/** Wrap a command definition so every command reports usage on bad input. */
export const createCommand = (
	creator: (program: Command) => Command,
): CommandRegistrar => {
	return (program: Command) => creator(program).showHelpAfterError();
};
