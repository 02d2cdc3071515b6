#!/usr/bin/env tsx
import { registerMask } from '../commands/mask.js';
import { createStandaloneProgram, runProgram } from '../program.js';

await runProgram(createStandaloneProgram('eac-mask', registerMask));
