// Sloth REPL
// Reads lines, evaluates each against one persistent environment, prints results

import { userInfo } from "node:os";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { newEnvironment } from "./env.js";
import { createDefaultBuiltins, Evaluator } from "./evaluator.js";
import { createPrinter, formatToken, type Printer } from "./cli-utils.js";
import { tokenize } from "./lexer.js";
import { parse } from "./parser.js";
import { inspect } from "./types.js";

export const PROMPT = ">>> ";
export const SAD_FACE = "(◞‸ ◟)💧";

export interface ReplOptions {
	prompt?: string;
	banner?: boolean;
	color?: boolean;
	/** Print the token stream of each line before evaluating it */
	tokens?: boolean;
	/** Name used in the greeting; defaults to the OS user */
	userName?: string;
}

function currentUserName(): string {
	try {
		return userInfo().username;
	} catch {
		// No passwd entry for the current uid
		return "friend";
	}
}

function printParserErrors(print: Printer, errors: readonly string[]): void {
	print(SAD_FACE, "yellow");
	print("what'd you doooo?!", "yellow");
	print(" parser errors:", "red");
	for (const message of errors) {
		print("\t" + message, "red");
	}
}

/**
 * Run the read-eval-print loop until `.exit` or end of input.
 */
export async function startRepl(
	input: Readable,
	output: Writable,
	options: ReplOptions = {},
): Promise<void> {
	const print = createPrinter(output, options.color ?? true);
	const env = newEnvironment();
	const evaluator = new Evaluator(createDefaultBuiltins((line) => { print(line); }));
	const rl = createInterface({ input, terminal: false });
	const prompt = options.prompt ?? PROMPT;

	if (options.banner ?? true) {
		print("sloth 0.1.0", "bold");
		print("welcom " + (options.userName ?? currentUserName()) + " to sloth.0", "dim");
		print("");
	}

	output.write(prompt);
	try {
		for await (const rawLine of rl) {
			const line = rawLine.trim();

			if (line === ".exit") break;

			if (line === ".env") {
				print(env.names().join(" "), "dim");
			} else if (line !== "") {
				if (options.tokens) {
					for (const tok of tokenize(line)) {
						print(formatToken(tok), "dim");
					}
				}

				const { program, errors } = parse(line);
				if (errors.length > 0) {
					printParserErrors(print, errors);
				} else {
					const result = evaluator.evaluate(program, env);
					const last = program.statements[program.statements.length - 1];
					if (result.kind === "ERROR") {
						print(inspect(result), "red");
					} else if (last !== undefined && last.kind !== "let") {
						print(inspect(result), "cyan");
					}
				}
			}

			output.write(prompt);
		}
	} finally {
		rl.close();
	}
}
