#!/usr/bin/env node
import { runFlatten } from '../cli/flatten.js';
import { loadEnvFile } from '../config/env.js';

loadEnvFile();
process.exitCode = await runFlatten(process.argv.slice(2));
