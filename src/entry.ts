#!/usr/bin/env node
import { buildProgram } from "./cli/program/build-program.js";

await buildProgram().parseAsync(process.argv);
