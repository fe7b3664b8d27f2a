#!/usr/bin/env node
/**
 * Container Entry Point
 * Image CMD: service-bootstrap main:app
 */

import { main } from './bootstrap.js';

const exitCode = await main(process.argv.slice(2), process.env);
process.exit(exitCode);
