import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { Council } from '../council.js';
import { DeliberationError, EmptyRosterError } from '../errors.js';
import { StatsRecorder } from '../monitoring.js';
import { createGateway } from '../providers/base.js';
import { FileConversationStore } from '../session.js';
import type { Conversation, CouncilSettings, DeliberationEvent, DeliberationResult } from '../types.js';
import {
  CLIError,
  formatAggregate,
  formatStats,
  parseTimeout,
  promptLoaderFor,
  resolveQuestion,
  splitList,
} from './helpers.js';

interface AskOptions {
  advisors?: string;
  chairman?: string;
  timeout?: string;
  conversation?: string;
  save: boolean;
  title: boolean;
  strict?: boolean;
  verbose?: boolean;
  stats?: boolean;
  json?: boolean;
}

/** Narrow the roster to the given ids or names, keeping roster order. */
export function selectAdvisors(settings: CouncilSettings, selection: string | undefined): CouncilSettings {
  if (!selection) return settings;
  const wanted = new Set(splitList(selection));
  const advisors = settings.advisors.filter((a) => wanted.has(a.id) || wanted.has(a.name));
  if (advisors.length === 0) {
    throw new CLIError(
      chalk.red(`No matching advisors: ${selection}`) +
        '\n' +
        chalk.dim(`Available: ${settings.advisors.map((a) => a.id).join(', ')}`),
    );
  }
  return { ...settings, advisors };
}

const STAGE_LABELS: Record<string, string> = {
  stage1: 'answers',
  stage2: 'rankings',
  stage3: 'synthesis',
};

function renderEvent(event: DeliberationEvent, startedAt: Map<string, number>): void {
  switch (event.type) {
    case 'stage1_start':
    case 'stage2_start':
    case 'stage3_start': {
      const stage = event.type.replace('_start', '');
      startedAt.set(stage, Date.now());
      process.stdout.write(chalk.bold(`  ▸ ${STAGE_LABELS[stage] ?? stage} `));
      break;
    }
    case 'stage1_complete':
      for (const r of event.data) {
        process.stdout.write(`${r.response ? chalk.green('✓') : chalk.yellow('⚠')}${chalk.dim(r.advisor)} `);
      }
      console.log(chalk.dim(elapsed(startedAt, 'stage1')));
      break;
    case 'stage2_complete':
      for (const r of event.data) {
        process.stdout.write(`${r.parsedRanking.length > 0 ? chalk.green('✓') : chalk.yellow('⚠')}${chalk.dim(r.advisor)} `);
      }
      console.log(chalk.dim(elapsed(startedAt, 'stage2')));
      break;
    case 'stage3_complete':
      process.stdout.write(event.data.response ? chalk.green('✓') : chalk.yellow('⚠'));
      console.log(chalk.dim(` ${event.data.model} ${elapsed(startedAt, 'stage3')}`));
      break;
    case 'title_complete':
      console.log(chalk.dim(`  Title: ${event.title}`));
      break;
    case 'error':
      console.log('');
      console.error(chalk.red(`  ✗ ${event.message}`));
      break;
    case 'complete':
      break;
  }
}

function elapsed(startedAt: Map<string, number>, stage: string): string {
  const start = startedAt.get(stage);
  return start === undefined ? '' : `(${((Date.now() - start) / 1000).toFixed(1)}s)`;
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Ask the council a question')
    .argument('[question]', 'Question to ask (or pipe via stdin)')
    .option('-a, --advisors <ids>', 'Comma-separated advisor ids or names')
    .option('-c, --chairman <model>', 'Override the chairman model')
    .option('--timeout <seconds>', 'Override per-call timeout in seconds')
    .option('--conversation <id>', 'Append to an existing conversation')
    .option('--no-save', 'Do not store the exchange')
    .option('--no-title', 'Skip title generation for new conversations')
    .option('--strict', 'Fail when the chairman produces no answer')
    .option('-v, --verbose', 'Show warnings as they happen')
    .option('--stats', 'Print call statistics at the end')
    .option('--json', 'Print each pipeline event as one JSON line')
    .action(async (arg: string | undefined, opts: AskOptions) => {
      const question = await resolveQuestion(
        arg,
        'Usage: council ask "your question"  (or pipe: echo "question" | council ask)',
      );

      let settings = selectAdvisors(await loadConfig(), opts.advisors);
      if (opts.chairman) settings = { ...settings, chairmanModel: opts.chairman };
      const timeoutMs = parseTimeout(opts.timeout);
      const isJSON = opts.json ?? false;

      const warnings: string[] = [];
      const onWarn = (message: string) => {
        warnings.push(message);
        if (opts.verbose && !isJSON) console.error(chalk.yellow(`  ⚠ ${message}`));
      };

      const store = new FileConversationStore(settings.dataDir, onWarn);
      let conversation: Conversation | null = null;
      if (opts.conversation) {
        conversation = await store.get(opts.conversation);
        if (!conversation) throw new CLIError(chalk.red(`Conversation not found: ${opts.conversation}`));
      }
      const isFirstMessage = opts.save && (conversation === null || conversation.messages.length === 0);

      const stats = new StatsRecorder();
      const startedAt = new Map<string, number>();
      const council = new Council(settings, {
        gateway: createGateway(settings.gateway),
        loadSystemPrompt: promptLoaderFor(settings),
        observer: stats,
        onWarn,
        ...(timeoutMs !== undefined ? { timeoutMs } : {}),
        failOnEmptySynthesis: opts.strict ?? false,
        onEvent(event) {
          if (isJSON) console.log(JSON.stringify(event));
          else renderEvent(event, startedAt);
        },
      });

      if (!isJSON) {
        console.log('');
        console.log(chalk.bold.cyan(`🏛  Council of ${settings.advisors.length}`) + chalk.dim(` (chairman: ${settings.chairmanModel})`));
      }

      let result: DeliberationResult;
      try {
        result = await council.deliberate(question, { title: isFirstMessage && opts.title });
      } catch (err) {
        if (err instanceof EmptyRosterError) {
          throw new CLIError(chalk.red(err.message) + '\n' + chalk.dim('Add one with: council advisors add <id>'));
        }
        if (err instanceof DeliberationError) throw new CLIError(isJSON ? '' : chalk.red(err.message));
        throw err;
      }

      if (opts.save) {
        conversation ??= await store.create();
        await store.addUserMessage(conversation.id, question);
        await store.addAssistantMessage(conversation.id, {
          stage1: result.stage1,
          stage2: result.stage2,
          stage3: result.stage3,
          metadata: result.metadata,
        });
        if (result.title) await store.setTitle(conversation.id, result.title);
      }

      if (isJSON) return;

      console.log('');
      console.log(chalk.bold('Aggregate ranking'));
      for (const line of formatAggregate(result.metadata.aggregate)) console.log(line);
      console.log('');
      console.log(chalk.bold(`Chairman (${result.stage3.model})`));
      console.log(result.stage3.response || chalk.yellow('(no answer; the chairman call failed)'));
      console.log('');

      if (!opts.verbose && warnings.length > 0) {
        console.log(chalk.yellow(`${warnings.length} warning(s); rerun with --verbose for details`));
      }
      if (opts.stats) {
        for (const line of formatStats(stats.snapshot())) console.log(line);
      }
      if (conversation && opts.save) console.log(chalk.dim(`Saved to conversation ${conversation.id}`));
    });
}
