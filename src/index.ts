#!/usr/bin/env node
import dotenv from 'dotenv';
import { runRender } from './cli.js';

dotenv.config();

process.exitCode = await runRender(process.argv.slice(2));
