#!/usr/bin/env node

/**
 * Shelter CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
