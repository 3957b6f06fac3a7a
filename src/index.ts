#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { registerCheckConfigCommand } from './cli/commands/checkConfig.js';
import { registerCleanupCommand } from './cli/commands/cleanup.js';
import { registerStartCommand } from './cli/commands/start.js';
import { logger } from './logger.js';

function resolveVersion(): string {
  try {
    const distDir = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(distDir, '..', 'package.json');
    const raw = readFileSync(pkgPath, 'utf8');
    const parsed = JSON.parse(raw) as { version?: string };
    return parsed.version ?? '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();

program
  .name('runnerkeeper')
  .description('Self-hosted CI runner lifecycle manager')
  .version(resolveVersion());

registerStartCommand(program);
registerCleanupCommand(program);
registerCheckConfigCommand(program);

try {
  await program.parseAsync(process.argv);
} catch (err) {
  logger.error({ err }, 'runnerkeeper failed');
  process.exitCode = 1;
}
