#!/usr/bin/env node
import { buildProgram, reportFailure } from "./cli.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => reportFailure(err));
