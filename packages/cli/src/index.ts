#!/usr/bin/env node
import { createProgram } from './program.js';

try {
  createProgram().parse(process.argv);
} catch (err) {
  console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
