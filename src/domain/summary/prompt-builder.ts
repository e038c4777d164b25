import { BuiltPrompt, GenerationParams, PromptPayload, TaskRequest } from './types';
import { PromptContext } from '../../i18n/prompts/types';
import { SupportedLanguage, promptsFor } from '../../i18n';

const MAX_LISTED_FILES = 20;
const COMMIT_MAX_OUTPUT_TOKENS = 256;
const COMMIT_MAX_TEMPERATURE = 0.2;

/**
 * Pure: the same payload, task and settings always give the same prompt
 */
export class PromptBuilder {
  constructor(
    private readonly language: SupportedLanguage,
    private readonly generation: GenerationParams
  ) {}

  build(payload: PromptPayload, task: TaskRequest): BuiltPrompt {
    if (payload.task !== task.kind) {
      throw new Error(`Payload was normalized for ${payload.task}, not ${task.kind}`);
    }

    const templates = promptsFor(this.language);
    const context = this.context(payload);

    switch (task.kind) {
      case 'status':
        return { text: templates.status(context), generation: { ...this.generation } };
      case 'commit':
        return {
          text: templates.commit(context, task.subjectMaxLength),
          generation: {
            maxOutputTokens: Math.min(this.generation.maxOutputTokens, COMMIT_MAX_OUTPUT_TOKENS),
            temperature: Math.min(this.generation.temperature, COMMIT_MAX_TEMPERATURE)
          }
        };
      case 'report':
        return {
          text: templates.report(context, task.days, payload.commits.length),
          generation: { ...this.generation }
        };
    }
  }

  private context(payload: PromptPayload): PromptContext {
    const listed = payload.files.slice(0, MAX_LISTED_FILES).map(file => {
      const where = file.commit ? ` [${file.commit}]` : '';
      return `  - ${file.path}${where} (${file.kind}, +${file.additions} -${file.deletions})`;
    });
    if (payload.files.length > MAX_LISTED_FILES) {
      listed.push(`  ... and ${payload.files.length - MAX_LISTED_FILES} more files`);
    }

    const { files, additions, deletions } = payload.totals;
    return {
      content: payload.content,
      fileList: listed.join('\n'),
      stats: `${files} files changed, +${additions}, -${deletions}`,
      truncated: payload.truncated
    };
  }
}
