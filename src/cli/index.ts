#!/usr/bin/env node

/**
 * Load API keys exported from shell profiles when they are not already set,
 * so hosted gateways work from non-login shells.
 */
import { existsSync as _existsSync, readFileSync } from 'node:fs';
import { homedir as _homedir } from 'node:os';
import { join as _join } from 'node:path';
try {
  const home = _homedir();
  const rcFiles = ['.zshrc', '.bashrc', '.bash_profile', '.profile']
    .map((f) => _join(home, f))
    .filter(_existsSync);

  for (const rc of rcFiles) {
    const content = readFileSync(rc, 'utf-8');
    for (const line of content.split('\n')) {
      // export KEY=VALUE, optionally quoted
      const m = line.match(/^\s*export\s+([A-Za-z_][A-Za-z0-9_]*_API_KEY)=["']?([^"'\n]*)["']?\s*$/);
      if (m && !(m[1] in process.env)) {
        process.env[m[1]] = m[2];
      }
    }
  }
} catch (err) {
  console.error(`warning: could not read shell profile: ${err instanceof Error ? err.message : String(err)}`);
}

import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { ConfigError, PersonaError } from '../errors.js';
import { CLIError } from './helpers.js';
import { registerAskCommand } from './ask.js';
import { registerAdvisorsCommand } from './advisors.js';
import { registerConversationsCommand } from './conversations.js';
import { registerChatCommand } from './chat.js';
import { registerDoctorCommand } from './doctor.js';

const program = new Command();

const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')));
program
  .name('council')
  .description('Ask a council of local language models, have them rank each other, get one answer')
  .version(pkg.version);

registerAskCommand(program);
registerAdvisorsCommand(program);
registerConversationsCommand(program);
registerChatCommand(program);
registerDoctorCommand(program);

// Exit once the command finishes; keep-alive sockets would otherwise hold the loop open
program.hook('postAction', () => {
  process.exit(0);
});

program.parseAsync(process.argv).catch((err) => {
  if (err instanceof CLIError) {
    if (err.message) console.error(err.message);
    process.exit(err.exitCode);
  }
  if (err instanceof ConfigError || err instanceof PersonaError) {
    console.error(chalk.red(err.message));
    process.exit(1);
  }
  throw err;
});
