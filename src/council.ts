/**
 * Council: three-stage deliberation.
 *
 * Stages: collect (every advisor answers) → rank (every advisor ranks the
 * anonymized answers) → synthesize (the chairman writes the final answer).
 *
 * Each stage fans out to all advisors concurrently and joins before the next
 * stage starts. A failed call degrades to empty content for that advisor;
 * only an empty roster or an unexpected exception stops the pipeline.
 */

import { EmptyRosterError, DeliberationError, errorMessage } from './errors.js';
import { boundedCall, personaFor, type CallOutcome, type CallSite, type Caller } from './invoke.js';
import { buildChairmanPrompt, buildRankingPrompt } from './prompts.js';
import { aggregateRankings, buildLabelMap, parseRanking } from './ranking.js';
import { cleanResponse } from './sanitize.js';
import { DEFAULT_TITLE, generateTitle } from './title.js';
import type {
  AdvisorResponse,
  AdvisorSpec,
  AggregateRankingEntry,
  CallObserver,
  CouncilSettings,
  DeliberationEvent,
  DeliberationResult,
  LabelMap,
  ChatMessage,
  ModelGateway,
  PipelineState,
  Stage,
  RankingEntry,
  Stage2Output,
  SynthesisResult,
  SystemPromptLoader,
} from './types.js';

export interface CouncilOptions {
  gateway: ModelGateway;
  /** Resolves an advisor's prompt reference to its system prompt */
  loadSystemPrompt?: SystemPromptLoader;
  observer?: CallObserver;
  onEvent?: (event: DeliberationEvent) => void;
  onWarn?: (message: string) => void;
  /** Per-call bound in ms; defaults to the gateway timeout from settings */
  timeoutMs?: number;
  /** Treat an empty chairman answer as a pipeline error instead of an empty result */
  failOnEmptySynthesis?: boolean;
}

export interface DeliberateOptions {
  /** Generate a conversation title alongside the stages */
  title?: boolean;
}

export { DEFAULT_TITLE };

const RUNNING: ReadonlySet<PipelineState> = new Set([
  'stage1_running',
  'stage1_done',
  'stage2_running',
  'stage2_done',
  'stage3_running',
]);

export class Council {
  private settings: CouncilSettings;
  private gateway: ModelGateway;
  private loadSystemPrompt: SystemPromptLoader | null;
  private observer: CallObserver | null;
  private emit: (event: DeliberationEvent) => void;
  private warn: (message: string) => void;
  private timeoutMs: number;
  private failOnEmptySynthesis: boolean;
  private currentState: PipelineState = 'not_started';

  constructor(settings: CouncilSettings, options: CouncilOptions) {
    this.settings = settings;
    this.gateway = options.gateway;
    this.loadSystemPrompt = options.loadSystemPrompt ?? null;
    this.observer = options.observer ?? null;
    this.emit = options.onEvent ?? (() => {});
    this.warn = options.onWarn ?? (() => {});
    this.timeoutMs = options.timeoutMs ?? settings.gateway.timeout * 1000;
    this.failOnEmptySynthesis = options.failOnEmptySynthesis ?? false;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  // ── Stage 1 ──

  /**
   * Ask every advisor the question, concurrently. One entry per advisor, in
   * roster order; a failed advisor gets an empty response.
   */
  async collectResponses(
    question: string,
    advisors: ReadonlyArray<Readonly<AdvisorSpec>> = this.settings.advisors,
  ): Promise<AdvisorResponse[]> {
    return Promise.all(
      advisors.map(async (advisor) => {
        const system = await this.systemPromptFor(advisor);
        const outcome = await this.call(
          'stage1',
          { name: advisor.name, model: advisor.model },
          [{ role: 'user', content: question }],
          system,
        );
        return {
          advisor: advisor.name,
          model: advisor.model,
          response: outcome.ok ? cleanResponse(outcome.content) : '',
        };
      }),
    );
  }

  // ── Stage 2 ──

  /**
   * Label the non-empty Stage-1 answers and have each advisor who produced
   * one rank them all, itself included. Rankers come from the answers
   * themselves; `advisors` only supplies their personas.
   */
  async collectRankings(
    question: string,
    stage1: readonly AdvisorResponse[],
    advisors: ReadonlyArray<Readonly<AdvisorSpec>> = this.settings.advisors,
  ): Promise<Stage2Output> {
    const answered = stage1.filter((r) => r.response.length > 0);
    const labelMap = buildLabelMap(answered);
    const prompt = buildRankingPrompt(
      question,
      Object.keys(labelMap).map((label, i) => ({ label, text: answered[i].response })),
    );

    const specs = new Map(advisors.map((a) => [a.name, a]));

    const rankings = await Promise.all(
      answered.map(async ({ advisor: name, model }): Promise<RankingEntry> => {
        const spec = specs.get(name);
        const system = spec ? await this.systemPromptFor(spec) : undefined;
        const outcome = await this.call('stage2', { name, model }, [{ role: 'user', content: prompt }], system);
        const ranking = outcome.ok ? cleanResponse(outcome.content) : '';
        const parsedRanking = parseRanking(ranking);
        if (outcome.ok && parsedRanking.length === 0) {
          const tail = ranking.slice(-120).replace(/\n/g, ' ').trim();
          this.warn(`${name}: ranking could not be parsed (tail: "${tail}")`);
        }
        return { advisor: name, model, ranking, parsedRanking };
      }),
    );

    return { rankings, labelMap };
  }

  aggregate(rankings: readonly RankingEntry[], labelMap: LabelMap): AggregateRankingEntry[] {
    return aggregateRankings(rankings, labelMap);
  }

  // ── Stage 3 ──

  /**
   * One call to the chairman model with the full transcript. Failure yields
   * an empty response; nothing is retried.
   */
  async synthesize(
    question: string,
    stage1: readonly AdvisorResponse[],
    stage2: Stage2Output,
  ): Promise<SynthesisResult> {
    const model = this.settings.chairmanModel;
    if (!stage1.some((r) => r.response.length > 0)) {
      this.warn('No advisor answered; skipping synthesis');
      return { model, response: '' };
    }

    const prompt = buildChairmanPrompt(question, stage1, stage2.rankings, stage2.labelMap);
    const outcome = await this.call('stage3', { name: 'chairman', model }, [
      { role: 'user', content: prompt },
    ]);
    return { model, response: outcome.ok ? cleanResponse(outcome.content) : '' };
  }

  // ── Auxiliary ──

  /** Short conversation title. Never rejects; falls back to DEFAULT_TITLE. */
  async generateTitle(question: string): Promise<string> {
    const model = this.settings.titleModel ?? this.settings.chairmanModel;
    return (await generateTitle(this.site(), model, question)) ?? DEFAULT_TITLE;
  }

  // ── Pipeline ──

  /**
   * Run all three stages. One deliberation at a time per instance: `state`
   * tracks a single run, so a call made while another is running is refused.
   */
  async deliberate(question: string, options: DeliberateOptions = {}): Promise<DeliberationResult> {
    if (RUNNING.has(this.currentState)) {
      throw new DeliberationError(`A deliberation is already running (${this.currentState})`);
    }
    if (this.settings.advisors.length === 0) {
      this.currentState = 'errored';
      throw new EmptyRosterError();
    }

    // Runs beside the stages; joined after Stage 3
    const titleTask = options.title ? this.generateTitle(question) : null;

    try {
      this.currentState = 'stage1_running';
      this.emit({ type: 'stage1_start' });
      const stage1 = await this.collectResponses(question);
      this.currentState = 'stage1_done';
      this.emit({ type: 'stage1_complete', data: stage1 });

      this.currentState = 'stage2_running';
      this.emit({ type: 'stage2_start' });
      const stage2 = await this.collectRankings(question, stage1);
      const aggregate = this.aggregate(stage2.rankings, stage2.labelMap);
      this.currentState = 'stage2_done';
      this.emit({
        type: 'stage2_complete',
        data: stage2.rankings,
        labelMap: stage2.labelMap,
        aggregate,
      });

      this.currentState = 'stage3_running';
      this.emit({ type: 'stage3_start' });
      const stage3 = await this.synthesize(question, stage1, stage2);
      if (!stage3.response) {
        this.warn(`Chairman ${stage3.model} produced no answer`);
        if (this.failOnEmptySynthesis) {
          throw new DeliberationError(`Chairman ${stage3.model} failed to synthesize an answer`);
        }
      }
      this.emit({ type: 'stage3_complete', data: stage3 });

      const result: DeliberationResult = {
        question,
        stage1,
        stage2: stage2.rankings,
        stage3,
        metadata: { labelMap: stage2.labelMap, aggregate },
      };

      if (titleTask) {
        result.title = await titleTask;
        this.emit({ type: 'title_complete', title: result.title });
      }

      this.currentState = 'complete';
      this.emit({ type: 'complete' });
      return result;
    } catch (err) {
      this.currentState = 'errored';
      this.emit({ type: 'error', message: errorMessage(err) });
      if (err instanceof DeliberationError) throw err;
      throw new DeliberationError(`Deliberation failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  // ── Internals ──

  private systemPromptFor(advisor: Readonly<AdvisorSpec>): Promise<string | undefined> {
    return personaFor(this.loadSystemPrompt, advisor, this.warn);
  }

  private site(): CallSite {
    return {
      gateway: this.gateway,
      timeoutMs: this.timeoutMs,
      observer: this.observer,
      warn: this.warn,
    };
  }

  private call(stage: Stage, caller: Caller, messages: ChatMessage[], systemPrompt?: string): Promise<CallOutcome> {
    return boundedCall(this.site(), stage, caller, messages, systemPrompt);
  }
}
