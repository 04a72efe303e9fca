#!/usr/bin/env node

/**
 * toolkit CLI entry point.
 * Thin wrapper — dispatch and lifecycle live in program.ts and core.
 */

import 'dotenv/config';

import { main } from './program.js';

await main(process.argv.slice(2));
