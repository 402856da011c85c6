#!/usr/bin/env node
import { createProgram } from "./program.js";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort(new Error("Interrupted")));

await createProgram({ signal: controller.signal }).parseAsync(process.argv);
