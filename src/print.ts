#!/usr/bin/env node
import { runPrint } from './cli.js';

process.exitCode = await runPrint(process.argv.slice(2));
