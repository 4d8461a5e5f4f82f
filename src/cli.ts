#!/usr/bin/env node
/**
 * hipdiff - CLI Interface
 *
 * Compares two HIP archives and prints the differences side by side.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
