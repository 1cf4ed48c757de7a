import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { FileConversationStore } from '../session.js';
import type { AssistantMessage } from '../types.js';
import { CLIError, formatAggregate, formatTime } from './helpers.js';

function printAssistant(msg: AssistantMessage, full: boolean): void {
  if (full) {
    for (const r of msg.stage1) {
      console.log(chalk.bold(`  ${r.advisor}`) + chalk.dim(` (${r.model})`));
      console.log(r.response ? indent(r.response) : chalk.yellow('    (no answer)'));
      console.log('');
    }
  }
  if (msg.metadata) {
    for (const line of formatAggregate(msg.metadata.aggregate)) console.log(line);
    console.log('');
  }
  console.log(chalk.bold(`  Chairman`) + chalk.dim(` (${msg.stage3.model})`));
  console.log(msg.stage3.response ? indent(msg.stage3.response) : chalk.yellow('    (no answer)'));
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((l) => `    ${l}`)
    .join('\n');
}

export function registerConversationsCommand(program: Command): void {
  const conversations = program.command('conversations').alias('conv').description('Stored conversations');

  conversations
    .command('list', { isDefault: true })
    .description('List conversations, newest first')
    .action(async () => {
      const settings = await loadConfig();
      const store = new FileConversationStore(settings.dataDir, (m) => console.error(chalk.yellow(m)));
      const all = await store.list();
      if (all.length === 0) {
        console.log(chalk.dim('No conversations yet.'));
        return;
      }
      for (const c of all) {
        console.log(`${chalk.dim(formatTime(c.createdAt))}  ${chalk.bold(c.title)}  ${chalk.dim(`${c.messageCount} msg · ${c.id}`)}`);
      }
    });

  conversations
    .command('show')
    .description('Print a conversation')
    .argument('<id>', 'Conversation id')
    .option('--full', 'Include every advisor answer')
    .action(async (id: string, opts: { full?: boolean }) => {
      const settings = await loadConfig();
      const conversation = await new FileConversationStore(settings.dataDir).get(id);
      if (!conversation) throw new CLIError(chalk.red(`Conversation not found: ${id}`));

      console.log('');
      console.log(chalk.bold.cyan(conversation.title) + chalk.dim(`  ${formatTime(conversation.createdAt)}`));
      for (const msg of conversation.messages) {
        console.log('');
        if (msg.role === 'user') console.log(chalk.bold('You: ') + msg.content);
        else printAssistant(msg, opts.full ?? false);
      }
      console.log('');
    });

  conversations
    .command('delete')
    .alias('rm')
    .description('Delete a conversation')
    .argument('<id>', 'Conversation id')
    .action(async (id: string) => {
      const settings = await loadConfig();
      const removed = await new FileConversationStore(settings.dataDir).delete(id);
      if (!removed) throw new CLIError(chalk.red(`Conversation not found: ${id}`));
      console.log(chalk.green(`✅ Deleted ${id}`));
    });
}
