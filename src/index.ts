#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { registerLocalCommands } from './commands/local.js';
import { registerFlyCommands } from './commands/fly.js';
import { registerConfigCommands } from './commands/config.js';

// Read version from package.json at runtime
function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    // src/ and dist/ both sit next to package.json
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}
const version = getVersion();

const program = new Command();

program
  .name('op-env-sync')
  .description('Sync secrets between 1Password secure notes, local .env files and Fly.io apps')
  .version(version);

// Register commands
registerLocalCommands(program);
registerFlyCommands(program);
registerConfigCommands(program);

// Parse arguments
await program.parseAsync();
