#!/usr/bin/env node
/**
 * motorcalc - print DC motor characteristics from nameplate values
 */

import { readFileSync } from 'node:fs';
import { runCli } from './cli/run.js';

process.exitCode = runCli(process.argv.slice(2), {
  stdout: text => console.log(text),
  stderr: text => console.error(text),
  readFile: path => readFileSync(path, 'utf8'),
  env: process.env
});
