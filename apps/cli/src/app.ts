#!/usr/bin/env node

import { config as loadEnv } from "dotenv";
import { createLogger, toError } from "threadwatch-core";
import { createProgram } from "./program.js";

// .env in the working directory; variables already set win
loadEnv();

const logger = createLogger("cli");

createProgram()
	.parseAsync(process.argv)
	.catch((error: unknown) => {
		logger.error("Fatal error", { error: toError(error) });
		process.exit(1);
	});
