#!/usr/bin/env tsx
import { registerBatch } from '../commands/batch.js';
import { createStandaloneProgram, runProgram } from '../program.js';

await runProgram(createStandaloneProgram('eac-batch', registerBatch));
