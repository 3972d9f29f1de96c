#!/usr/bin/env node
import { describeError } from "./core/errors.js";
import { createDefaultRuntime } from "./core/utils/context.js";
import { createProgram } from "./program.js";

const program = createProgram(createDefaultRuntime());

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`Error: ${describeError(error)}\n`);
  process.exit(1);
});
