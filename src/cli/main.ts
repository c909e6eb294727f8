#!/usr/bin/env node
import { runCli } from "./program.js";

const code = await runCli(process.argv, { out: console, stdin: process.stdin, env: process.env });
process.exitCode = code;
