import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { generateGroupChatTitle, runGroupChat } from '../group-chat.js';
import { createGateway } from '../providers/base.js';
import { FileGroupChatStore } from '../session.js';
import type { GroupChatSession } from '../types.js';
import { CLIError, parseTimeout, promptLoaderFor, resolveQuestion } from './helpers.js';

interface ChatOptions {
  session?: string;
  message?: string;
  timeout?: string;
  verbose?: boolean;
}

export function registerChatCommand(program: Command): void {
  program
    .command('chat')
    .description('Talk with selected advisors (no ranking or synthesis)')
    .argument('[members...]', 'Advisor ids (default: the session members)')
    .option('-s, --session <id>', 'Continue a group chat session')
    .option('-m, --message <text>', 'Send one message and exit')
    .option('--timeout <seconds>', 'Override per-call timeout in seconds')
    .option('-v, --verbose', 'Show warnings as they happen')
    .action(async (members: string[], opts: ChatOptions) => {
      const settings = await loadConfig();
      const onWarn = (m: string) => {
        if (opts.verbose) console.error(chalk.yellow(`  ⚠ ${m}`));
      };
      const store = new FileGroupChatStore(settings.dataDir, onWarn);

      let session: GroupChatSession;
      if (opts.session) {
        const found = await store.get(opts.session);
        if (!found) throw new CLIError(chalk.red(`Group chat not found: ${opts.session}`));
        session = found;
      } else {
        if (members.length === 0) throw new CLIError(chalk.red('Name at least one advisor id'));
        const known = new Set(settings.advisors.map((a) => a.id));
        const unknown = members.filter((m) => !known.has(m));
        if (unknown.length > 0) {
          throw new CLIError(
            chalk.red(`Unknown advisor(s): ${unknown.join(', ')}`) +
              '\n' +
              chalk.dim(`Available: ${[...known].join(', ')}`),
          );
        }
        session = await store.create(members);
      }

      const memberIds = members.length > 0 && opts.session ? members : session.memberIds;
      const gateway = createGateway(settings.gateway);
      const timeoutMs = parseTimeout(opts.timeout);
      const loadSystemPrompt = promptLoaderFor(settings);

      const callOptions = { loadSystemPrompt, onWarn, ...(timeoutMs !== undefined ? { timeoutMs } : {}) };

      const exchange = async (question: string) => {
        const first = session.messages.length === 0;
        const responses = await runGroupChat(
          settings,
          gateway,
          { question, memberIds, history: session.messages },
          callOptions,
        );
        for (const r of responses) {
          console.log('');
          console.log(chalk.bold(r.advisorName) + chalk.dim(` (${r.model})`));
          console.log(r.response || chalk.yellow('(no answer)'));
        }
        const title = first ? await generateGroupChatTitle(settings, gateway, question, callOptions) : undefined;
        session = await store.addExchange(session.id, question, responses, title);
      };

      if (opts.message || !process.stdin.isTTY) {
        await exchange(await resolveQuestion(opts.message, 'Usage: council chat <members...> -m "message"'));
      } else {
        const { input } = await import('@inquirer/prompts');
        console.log(chalk.dim('Empty line to quit.'));
        for (;;) {
          const question = (await input({ message: 'You:' })).trim();
          if (!question) break;
          await exchange(question);
          console.log('');
        }
      }
      console.log(chalk.dim(`\nSession ${session.id}`));
    });
}
