#!/usr/bin/env node
import { main } from './cli.js';

main().then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
