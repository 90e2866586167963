// Sloth CLI
// Runs a script file, dumps its tokens or syntax tree, or starts the REPL

import type { Readable, Writable } from "node:stream";
import { stringify } from "./ast.js";
import { createPrinter, formatToken, parseArgs, readSourceFile, type Options, type Printer } from "./cli-utils.js";
import { newEnvironment } from "./env.js";
import { ErrorCodes, SlothError } from "./errors.js";
import { createDefaultBuiltins, Evaluator } from "./evaluator.js";
import { tokenize } from "./lexer.js";
import { parse } from "./parser.js";
import { startRepl } from "./repl.js";
import { inspect } from "./types.js";

export interface CliIO {
	stdin: Readable;
	stdout: Writable;
	stderr: Writable;
}

const defaultIO: CliIO = {
	stdin: process.stdin,
	stdout: process.stdout,
	stderr: process.stderr,
};

export const USAGE = `sloth - a small expression language

Usage:
  sloth [options] [script]

Options:
  --tokens      Print the token stream instead of evaluating
  --ast         Print the parsed program instead of evaluating
  --no-banner   Start the REPL without the greeting
  --no-color    Disable colored output
  -h, --help    Show this help

With no script, an interactive session is started.`;

//==============================================================================
// Script Mode
//==============================================================================

async function runScript(path: string, options: Options, io: CliIO): Promise<number> {
	const out = createPrinter(io.stdout, options.color);
	const err = createPrinter(io.stderr, options.color);
	const source = await readSourceFile(path);

	if (options.tokens) {
		for (const tok of tokenize(source)) {
			out(formatToken(tok));
		}
		return 0;
	}

	const { program, errors } = parse(source);
	if (errors.length > 0) {
		reportParseErrors(err, SlothError.parseError(errors));
		return 1;
	}

	if (options.ast) {
		out(stringify(program));
		return 0;
	}

	const evaluator = new Evaluator(createDefaultBuiltins((line) => { out(line); }));
	const result = evaluator.evaluate(program, newEnvironment());

	if (result.kind === "ERROR") {
		err(inspect(result), "red");
		return 1;
	}
	if (result.kind !== "NULL") {
		out(inspect(result));
	}
	return 0;
}

function reportParseErrors(err: Printer, error: SlothError): void {
	err(error.message, "red");
	for (const diagnostic of error.diagnostics) {
		err("  " + diagnostic, "red");
	}
}

//==============================================================================
// Entry Point
//==============================================================================

/**
 * Run the CLI with `args` (without the node and script entries) and return the exit code
 */
export async function main(args: string[], io: CliIO = defaultIO): Promise<number> {
	const err = createPrinter(io.stderr, !args.includes("--no-color"));

	try {
		const { path, options } = parseArgs(args);

		if (options.help) {
			io.stdout.write(USAGE + "\n");
			return 0;
		}

		if (path === null) {
			await startRepl(io.stdin, io.stdout, {
				banner: options.banner,
				color: options.color,
				tokens: options.tokens,
			});
			return 0;
		}

		return await runScript(path, options, io);
	} catch (error) {
		if (error instanceof SlothError) {
			err("Error: " + error.message, "red");
			if (error.code === ErrorCodes.UsageError) {
				io.stderr.write(USAGE + "\n");
				return 2;
			}
			return 1;
		}
		throw error;
	}
}
