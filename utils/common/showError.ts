import chalk from "chalk";

const isNoColor = () => process.env.NO_COLOR !== undefined;

const paint = (color: (text: string) => string, text: string) =>
	isNoColor() ? text : color(text);

export const showError = (message: string) => {
	console.error(`${paint(chalk.red, "✖")} ${message}`);
};

export const showWarning = (message: string) => {
	console.error(`${paint(chalk.yellow, "⚠")} ${message}`);
};
