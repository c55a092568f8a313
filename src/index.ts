#!/usr/bin/env node
import { runCli } from './cli';

const start = async () => {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (err) {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  }
};

void start();
