import { ChangeSet, changeCount, isEmptyChangeSet } from '../git/types';
import { GitStateExtractor } from '../git/extractor';
import { DiffNormalizer } from './normalizer';
import { PromptBuilder } from './prompt-builder';
import { ResultAssembler } from './result-assembler';
import { PromptPayload, Result, TaskRequest } from './types';
import { ProviderGateway } from '../../infra/api/gateway';
import { SuccessfulResponse } from '../../infra/api/types';
import { AbortedByUserError } from '../../shared/errors';
import { Logger, silentLogger } from '../../shared/logger';

export interface PreparedTask {
  task: TaskRequest;
  changeSet: ChangeSet;
  // null when there is nothing to send
  payload: PromptPayload | null;
  // commit task found nothing staged and used the whole working tree
  stagedFallback: boolean;
  // a selector left out part of what was extracted
  narrowed: boolean;
}

/**
 * Lets the caller keep part of an extracted ChangeSet before it is normalized
 */
export type ChangeSelector = (changeSet: ChangeSet) => Promise<ChangeSet>;

export interface PipelineRun extends PreparedTask {
  result: Result;
  response: SuccessfulResponse | null;
}

export interface PipelineDeps {
  extractor: GitStateExtractor;
  normalizer: DiffNormalizer;
  promptBuilder: PromptBuilder;
  gateway: ProviderGateway;
  assembler?: ResultAssembler;
  logger?: Logger;
}

/**
 * Extractor -> Normalizer -> Prompt Builder -> Provider Gateway -> Result Assembler
 */
export class SummaryPipeline {
  private readonly assembler: ResultAssembler;
  private readonly logger: Logger;

  constructor(private readonly deps: PipelineDeps) {
    this.assembler = deps.assembler ?? new ResultAssembler();
    this.logger = deps.logger ?? silentLogger;
  }

  async prepare(task: TaskRequest, select?: ChangeSelector): Promise<PreparedTask> {
    const extracted = await this.extractFor(task);
    const { stagedFallback } = extracted;

    if (isEmptyChangeSet(extracted.changeSet)) {
      return { task, changeSet: extracted.changeSet, payload: null, stagedFallback, narrowed: false };
    }

    const changeSet = select ? await select(extracted.changeSet) : extracted.changeSet;
    const narrowed = changeCount(changeSet) < changeCount(extracted.changeSet);
    if (isEmptyChangeSet(changeSet)) {
      return { task, changeSet, payload: null, stagedFallback, narrowed };
    }

    const payload = this.deps.normalizer.normalize(changeSet, task.kind);
    this.logger.debug('payload normalized', { task: task.kind, used: payload.used, budget: payload.budget, truncated: payload.truncated });
    return { task, changeSet, payload, stagedFallback, narrowed };
  }

  async generate(prepared: PreparedTask, signal?: AbortSignal): Promise<PipelineRun> {
    if (prepared.payload === null) {
      return { ...prepared, result: { kind: 'nothing', task: prepared.task.kind }, response: null };
    }

    const prompt = this.deps.promptBuilder.build(prepared.payload, prepared.task);
    const response = await this.deps.gateway.complete(
      { prompt: prompt.text, ...prompt.generation },
      signal
    );
    if (signal?.aborted) throw new AbortedByUserError();

    const result = this.assembler.assemble(prepared.task, response.text, prepared.changeSet);
    return { ...prepared, result, response };
  }

  private async extractFor(task: TaskRequest): Promise<{ changeSet: ChangeSet; stagedFallback: boolean }> {
    const { extractor } = this.deps;
    switch (task.kind) {
      case 'status':
        return { changeSet: await extractor.extract({ mode: 'uncommitted' }), stagedFallback: false };
      case 'commit': {
        if (!task.stagedFirst) {
          return { changeSet: await extractor.extract({ mode: 'uncommitted' }), stagedFallback: false };
        }
        const staged = await extractor.extract({ mode: 'staged' });
        if (!isEmptyChangeSet(staged)) {
          return { changeSet: staged, stagedFallback: false };
        }
        const all = await extractor.extract({ mode: 'uncommitted' });
        return { changeSet: all, stagedFallback: !isEmptyChangeSet(all) };
      }
      case 'report':
        return { changeSet: await extractor.extract({ mode: 'last-n-days', days: task.days }), stagedFallback: false };
    }
  }

  async run(task: TaskRequest, signal?: AbortSignal, select?: ChangeSelector): Promise<PipelineRun> {
    return this.generate(await this.prepare(task, select), signal);
  }
}
