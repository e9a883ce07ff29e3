#!/usr/bin/env node
import { createProgram } from '../index.js';
import { reportError } from '../exit-codes.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    reportError(error);
  });
