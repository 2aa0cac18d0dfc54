#!/usr/bin/env node
import { run } from "./cli.js";
import { logger } from "./core/logger.js";

process.exitCode = run(process.argv.slice(2));
logger.shutdown();
