#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * eac-fisheye convert | mask | batch | check
 */

import { createProgram, runProgram } from './program.js';

await runProgram(createProgram());
