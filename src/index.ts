#!/usr/bin/env node
import { run } from './cli';

try {
  process.exitCode = run(process.argv.slice(2));
} catch (err) {
  process.stderr.write((err instanceof Error ? err.message : String(err)) + '\n');
  process.exitCode = 1;
}
