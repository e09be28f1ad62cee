#!/usr/bin/env node
import { runDump } from "./dump.js";

process.exitCode = runDump(process.argv.slice(2));
