#!/usr/bin/env tsx
import { registerConvert } from '../commands/convert.js';
import { createStandaloneProgram, runProgram } from '../program.js';

await runProgram(createStandaloneProgram('eac-convert', registerConvert));
