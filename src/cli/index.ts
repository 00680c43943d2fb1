#!/usr/bin/env node
/**
 * @fileoverview slicebase CLI
 *
 * Commands:
 *   slicebase packages                       - List packages with fetch/build status
 *   slicebase bc-files [--package <p>]       - List compiled units
 *   slicebase num-slices [--package|--bc|--function] - Count slices
 *   slicebase slice <unit> <function> <id>   - Print one slice
 *   slicebase clear <unit>                   - Remove a unit's artifacts
 *   slicebase learn <function> ...           - Run a labeling session
 *
 * @packageDocumentation
 */

import { runCli } from './main.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
