#!/usr/bin/env node
import chalk from "chalk";
import { main } from "./main.js";

main(process.argv.slice(2)).catch((error: unknown) => {
	const message = error instanceof Error ? error.message : String(error);
	console.error(chalk.red(`Error: ${message}`));
	process.exit(1);
});
