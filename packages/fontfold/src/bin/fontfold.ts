#!/usr/bin/env node
// fontfold/src/bin/fontfold.ts
// Process entry: environment, interrupt handling, exit code.

import dotenv from 'dotenv';
import { runCli } from '../cli.js';

dotenv.config();

const controller = new AbortController();
process.once('SIGINT', () => {
    console.warn('[fontfold] Interrupted; finishing in-flight steps');
    controller.abort();
});

process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
