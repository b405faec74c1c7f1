#!/usr/bin/env node
import { runUnflatten } from '../cli/unflatten.js';
import { loadEnvFile } from '../config/env.js';

loadEnvFile();
process.exitCode = await runUnflatten(process.argv.slice(2));
