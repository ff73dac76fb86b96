#!/usr/bin/env node
import { createProgram } from "./cli";
import { describeCause } from "./errors";

createProgram()
	.parseAsync(process.argv)
	.catch((err: unknown) => {
		console.error(`Error: ${describeCause(err)}`);
		process.exitCode = 1;
	});
