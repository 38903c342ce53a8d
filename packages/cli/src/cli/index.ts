#!/usr/bin/env node
// pattern: Imperative Shell

import { createProgram } from "./program.js";

await createProgram().parseAsync(process.argv);
