import type { Command } from 'commander';
import chalk from 'chalk';
import { addAdvisor, loadConfig, removeAdvisor, resolveConfigPath, setChairman } from '../config.js';
import { renderBasicPersona, writePersona } from '../persona.js';
import type { AdvisorSpec } from '../types.js';
import { CLIError, pad, tildefy } from './helpers.js';

interface AddOptions {
  name?: string;
  model?: string;
  prompt?: string;
  description?: string;
}

async function promptMissing(id: string, opts: AddOptions): Promise<AddOptions> {
  if (opts.name && opts.model) return opts;
  if (!process.stdin.isTTY) {
    throw new CLIError(chalk.red('--name and --model are required when not running interactively'));
  }
  const { input } = await import('@inquirer/prompts');
  const name = opts.name ?? (await input({ message: 'Display name:', default: id }));
  const model = opts.model ?? (await input({ message: 'Model:', default: 'llama3.2:latest' }));
  const description =
    opts.description ?? ((await input({ message: 'One-line description (optional):' })) || undefined);
  return { ...opts, name, model, description };
}

export function registerAdvisorsCommand(program: Command): void {
  const advisors = program.command('advisors').description('Manage the advisor roster');

  // --- council advisors list ---
  advisors
    .command('list', { isDefault: true })
    .description('Show the roster and chairman')
    .action(async () => {
      const settings = await loadConfig();
      console.log('');
      console.log(chalk.dim(`Config: ${tildefy(resolveConfigPath())}`));
      if (settings.advisors.length === 0) {
        console.log(chalk.yellow('No advisors configured. Add one with: council advisors add <id>'));
      }
      const width = Math.max(0, ...settings.advisors.map((a) => a.id.length));
      for (const a of settings.advisors) {
        console.log(
          `  ${chalk.bold(pad(a.id, width))}  ${a.name} ${chalk.dim(`(${a.model})`)}  ${chalk.dim(a.prompt)}`,
        );
        if (a.description) console.log(`  ${' '.repeat(width)}  ${chalk.dim(a.description)}`);
      }
      console.log('');
      console.log(`  ${chalk.bold('Chairman')}  ${settings.chairmanModel}`);
      if (settings.titleModel) console.log(`  ${chalk.bold('Titles')}    ${settings.titleModel}`);
      console.log('');
    });

  // --- council advisors add ---
  advisors
    .command('add')
    .description('Add (or replace) an advisor')
    .argument('<id>', 'Short unique id')
    .option('-n, --name <name>', 'Display name')
    .option('-m, --model <model>', 'Model identifier')
    .option('-p, --prompt <file>', 'Existing persona file (default: write a basic one)')
    .option('-d, --description <text>', 'One-line description')
    .action(async (id: string, raw: AddOptions) => {
      const opts = await promptMissing(id, raw);
      if (!opts.name || !opts.model) throw new CLIError(chalk.red('Name and model are required'));

      const settings = await loadConfig();
      let prompt = opts.prompt;
      if (!prompt) {
        prompt = await writePersona(settings.personasDir, opts.name, renderBasicPersona(opts.name, opts.description));
        console.log(chalk.dim(`Wrote persona ${tildefy(settings.personasDir)}/${prompt}`));
      }

      const advisor: AdvisorSpec = {
        id,
        name: opts.name,
        model: opts.model,
        prompt,
        ...(opts.description ? { description: opts.description } : {}),
      };
      const next = await addAdvisor(advisor);
      console.log(chalk.green(`✅ ${advisor.name} joined the council (${next.advisors.length} advisors)`));
    });

  // --- council advisors remove ---
  advisors
    .command('remove')
    .alias('rm')
    .description('Remove an advisor by id or name')
    .argument('<advisor>', 'Advisor id or name')
    .action(async (who: string) => {
      const next = await removeAdvisor(who);
      console.log(chalk.green(`✅ Removed ${who} (${next.advisors.length} advisors left)`));
      if (next.advisors.length === 0) {
        console.log(chalk.yellow('The roster is empty; `council ask` will refuse to run.'));
      }
    });

  // --- council advisors chairman ---
  advisors
    .command('chairman')
    .description('Show or set the chairman model')
    .argument('[model]', 'New chairman model')
    .action(async (model: string | undefined) => {
      if (!model) {
        const settings = await loadConfig();
        console.log(settings.chairmanModel);
        return;
      }
      await setChairman(model);
      console.log(chalk.green(`✅ Chairman set to ${model}`));
    });
}
