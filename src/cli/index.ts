#!/usr/bin/env node

import { createProgram } from './program.js';
import { errorMessage, fail } from './output.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    fail(errorMessage(error));
  });
