#!/usr/bin/env node

/**
 * quadlet-deploy executable
 */

import { main } from "./src/cli/mod.js";

process.exitCode = await main(process.argv.slice(2));
