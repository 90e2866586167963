#!/usr/bin/env node
// Sloth executable entry

import { main } from "./cli.js";

main(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error(error);
		process.exitCode = 1;
	},
);
