import fs from 'fs';
import { i18n } from '../i18n';
import { AppConfig, ConfigManager } from '../infra/config/manager';
import { SimpleGitSource } from '../infra/git/simple-git-source';
import { createProviders } from '../infra/api/registry';
import { ProviderGateway } from '../infra/api/gateway';
import { MarkdownExporter } from '../infra/export/markdown';
import { SlackSender } from '../infra/slack/sender';
import { GitStateExtractor } from '../domain/git/extractor';
import { DiffNormalizer } from '../domain/summary/normalizer';
import { PromptBuilder } from '../domain/summary/prompt-builder';
import { SummaryPipeline } from '../domain/summary/pipeline';
import { NotAGitRepositoryError } from '../shared/errors';
import { ConsoleLogger, Logger } from '../shared/logger';
import { CommandContext } from './commands';
import { Renderer } from './render';
import { Prompter } from './prompter';

type Env = Record<string, string | undefined>;

export interface Bootstrap {
  config: AppConfig;
  logger: Logger;
  context: CommandContext;
}

// outside a repository the extractor reports NotAGitRepositoryError on first use
async function resolveRoot(source: SimpleGitSource, cwd: string): Promise<string> {
  return (await source.isRepository()) ? source.topLevel() : cwd;
}

/**
 * Wires one invocation: config, language, providers and the pipeline.
 * `cwd` is the directory given with --path, or the process directory.
 */
export async function bootstrap(cwd: string, env: Env, signal: AbortSignal, prompter?: Prompter): Promise<Bootstrap> {
  if (!fs.existsSync(cwd) || !fs.statSync(cwd).isDirectory()) {
    throw new NotAGitRepositoryError(cwd);
  }

  const found = new SimpleGitSource(cwd);
  const repoRoot = await resolveRoot(found, cwd);
  const source = repoRoot === cwd ? found : new SimpleGitSource(repoRoot);

  const config = ConfigManager.load(repoRoot, env, new ConsoleLogger());
  const logger = new ConsoleLogger(config.debug);
  i18n().setLanguage(config.language);

  const providers = createProviders(config);
  logger.debug('providers resolved', { order: providers.map(provider => provider.id) });

  const extractor = new GitStateExtractor(source, repoRoot, { logger });
  const gateway = new ProviderGateway(providers, { policy: config.retry, logger });
  const pipeline = new SummaryPipeline({
    extractor,
    normalizer: new DiffNormalizer(config.prompt.maxChars),
    promptBuilder: new PromptBuilder(config.language, config.generation),
    gateway,
    logger
  });

  return {
    config,
    logger,
    context: {
      repoRoot,
      pipeline,
      extractor,
      renderer: new Renderer(),
      exporter: new MarkdownExporter(),
      notifier: new SlackSender(config.slackWebhookUrl),
      committer: source,
      providerLabel: gateway.primaryLabel(),
      subjectMaxLength: config.prompt.subjectMaxLength,
      now: () => new Date(),
      prompter,
      signal
    }
  };
}
