#!/usr/bin/env node
/**
 * banner-forge CLI entry point
 */

import { loadEnvFiles } from "./config.js";
import { createProgram } from "./program.js";

loadEnvFiles();
await createProgram().parseAsync(process.argv);
