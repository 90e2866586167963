/**
 * Sloth CLI Utilities
 *
 * Shared pieces of the command-line front end:
 * - Argument parsing into an Options object
 * - Script file loading
 * - Colored line printing
 */

import { readFile } from "node:fs/promises";
import type { Writable } from "node:stream";
import { SlothError } from "./errors.js";
import { kindName, type Token } from "./token.js";

/**
 * CLI options interface
 */
export interface Options {
	help: boolean;
	tokens: boolean;
	ast: boolean;
	banner: boolean;
	color: boolean;
}

/**
 * Parse command-line arguments
 *
 * @param args Argument array (typically from process.argv.slice(2))
 * @returns Object with parsed script path and options
 *
 * Supports:
 *   - Positional script path
 *   - Flags: --help/-h, --tokens, --ast, --no-banner, --no-color
 *   - Subcommand style: help
 */
export function parseArgs(args: string[]): { path: string | null; options: Options } {
	const options: Options = {
		help: false,
		tokens: false,
		ast: false,
		banner: true,
		color: true,
	};
	let path: string | null = null;

	for (const arg of args) {
		switch (arg) {
		case "help":
		case "--help":
		case "-h":
			options.help = true;
			break;
		case "--tokens":
			options.tokens = true;
			break;
		case "--ast":
			options.ast = true;
			break;
		case "--no-banner":
			options.banner = false;
			break;
		case "--no-color":
			options.color = false;
			break;
		default:
			if (arg.startsWith("-")) {
				throw SlothError.usage("Unknown option: " + arg);
			}
			if (path !== null) {
				throw SlothError.usage("Only one script path may be given");
			}
			path = arg;
		}
	}

	return { path, options };
}

/**
 * Read a script file as UTF-8
 *
 * @throws SlothError with code IOError when the file cannot be read
 */
export async function readSourceFile(filePath: string): Promise<string> {
	try {
		return await readFile(filePath, "utf-8");
	} catch (error) {
		throw SlothError.io(filePath, error instanceof Error ? error.message : String(error));
	}
}

//==============================================================================
// Printing
//==============================================================================

// Color codes for terminal output
export const colors = {
	reset: "\x1b[0m",
	bold: "\x1b[1m",
	dim: "\x1b[2m",
	red: "\x1b[31m",
	green: "\x1b[32m",
	yellow: "\x1b[33m",
	cyan: "\x1b[36m",
} as const;

export type Color = keyof typeof colors;

export type Printer = (msg: string, color?: Color) => void;

/**
 * Create a line printer for `out`; with `useColor` off no escape codes are written
 */
export function createPrinter(out: Writable, useColor: boolean): Printer {
	return (msg, color = "reset") => {
		if (!useColor || color === "reset") {
			out.write(msg + "\n");
			return;
		}
		out.write(colors[color] + msg + colors.reset + "\n");
	};
}

/**
 * One-line rendering of a token for --tokens output, e.g. `IDENT x`
 */
export function formatToken(tok: Token): string {
	return tok.literal === "" ? kindName(tok.kind) : kindName(tok.kind) + " " + tok.literal;
}
