#!/usr/bin/env node
import { runClient } from "../client/clientMain.js";

process.exitCode = await runClient(process.argv.slice(2));
