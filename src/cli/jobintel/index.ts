#!/usr/bin/env node
/**
 * CLI entry point for jobintel.
 *
 * @module
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
