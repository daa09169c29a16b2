#!/usr/bin/env node
import { toError } from '@facefix/core';
import { createProgram } from './program.js';
import { InquirerPrompter } from './services/Prompter.js';

const program = createProgram(
  {
    cwd: process.cwd(),
    env: process.env,
    output: {
      log: (line) => console.log(line),
      error: (line) => console.error(line),
    },
    prompter: new InquirerPrompter(),
    stdout: process.stdout,
  },
  (code) => {
    process.exitCode = code;
  }
);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Unexpected error: ${toError(error).message}`);
  process.exitCode = 1;
});
