#!/usr/bin/env node
import { runDaemon } from "../daemon/daemonMain.js";

const code = await runDaemon(process.argv.slice(2));
process.exit(code);
