#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { getPackagePath } from './paths.js';

const args = process.argv.slice(2);
const command = args[0];

if (command === '--version' || command === '-v') {
  console.log(readVersion());
  process.exit(0);
}

if (command === '--help' || command === '-h' || command === undefined) {
  printHelp();
  process.exit(0);
}

if (command === 'start') {
  // Load .env from instance root before anything reads the environment
  const instanceRoot = process.env.OPSBOT_HOME
    ? path.resolve(process.env.OPSBOT_HOME)
    : path.join(os.homedir(), '.opsbot');
  const dotenv = await import('dotenv');
  dotenv.config({ path: path.join(instanceRoot, '.env') });

  const { main } = await import('./index.js');
  await main();
} else {
  console.error(`Unknown command: ${command}\n`);
  printHelp();
  process.exit(1);
}

function readVersion(): string {
  const pkg = JSON.parse(readFileSync(getPackagePath('package.json'), 'utf8')) as { version: string };
  return pkg.version;
}

function printHelp(): void {
  console.log(`
  opsbot v${readVersion()} — channel operator bot core

  Usage:
    opsbot start                  Load plugins from ~/.opsbot/config.toml and run
    opsbot --version              Print version
    opsbot --help                 Show this help

  Environment:
    OPSBOT_HOME                   Instance directory (default ~/.opsbot)
    OPSBOT_LOG_LEVEL              minimal | debug | verbose
`);
}
