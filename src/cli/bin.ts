#!/usr/bin/env node
import { describeError } from '../core/errors.js';
import { main } from './main.js';

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(`fatal: ${describeError(error)}\n`);
    process.exitCode = 1;
  });
