#!/usr/bin/env node
import { runCli } from './program';
import { ConfigManager } from './utils/config.util';
import { readStdin } from './utils/stdin.util';

runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  isStdinTTY: process.stdin.isTTY === true,
  readStdin: () => readStdin(process.stdin),
  configManager: new ConfigManager(),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('wifiqr failed:', error);
    process.exitCode = 1;
  });
