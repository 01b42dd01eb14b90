import chalk from "chalk";

export const info = (message: string) => chalk.cyan(message);
export const success = (message: string) => chalk.green(message);
export const warn = (message: string) => chalk.yellow(message);
export const danger = (message: string) => chalk.red(message);
