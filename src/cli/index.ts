#!/usr/bin/env node

import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import { i18n } from '../i18n';
import { ConfigManager } from '../infra/config/manager';
import { ErrorHandler } from '../shared/error-handler';
import { CONFIG_FILE } from '../shared/constants';
import { Bootstrap, bootstrap } from './context';
import { CommandContext, runCommit, runReport, runStatus } from './commands';
import { ReadlinePrompter } from './prompter';
import { ResolvedRequest, Wizard, parseDays } from './wizard';

dotenv.config();

const controller = new AbortController();
// a second Ctrl+C falls through to the default handler
process.once('SIGINT', () => controller.abort());

function daysOption(value: string): number {
  const days = parseDays(value);
  if (days === null) {
    throw new InvalidArgumentError('Expected a whole number of days between 1 and 365.');
  }
  return days;
}

async function execute(
  operation: string,
  repoPath: string | undefined,
  action: (boot: Bootstrap) => Promise<unknown>,
  prompter?: ReadlinePrompter
): Promise<void> {
  let debug = false;
  try {
    const boot = await bootstrap(path.resolve(repoPath ?? '.'), process.env, controller.signal, prompter);
    debug = boot.config.debug;
    await action(boot);
  } catch (error) {
    process.exitCode = ErrorHandler.handle(error, { operation, debug });
  } finally {
    prompter?.close();
  }
}

// requests from the guided flow always let the user pick files or commits
async function dispatch(ctx: CommandContext, request: ResolvedRequest): Promise<void> {
  switch (request.task) {
    case 'status':
      await runStatus(ctx, { showDiff: request.showDiff, slack: request.slack, select: true });
      return;
    case 'commit':
      await runCommit(ctx, { apply: request.apply, select: true, confirm: false, stagedFirst: true });
      return;
    case 'report':
      await runReport(ctx, { days: request.days, save: request.save, slack: request.slack, select: true });
      return;
  }
}

const PATH_FLAGS = '-p, --path <repo>';
const PATH_HELP = 'path to the git repository';

const program = new Command();

program
  .name('gitbrief')
  .description(i18n().getOutputs().appDescription)
  .version('0.1.0')
  // lets every subcommand take its own --path
  .enablePositionalOptions();

program
  .command('status')
  .alias('s')
  .description('Summarize uncommitted changes')
  .option(PATH_FLAGS, PATH_HELP)
  .option('-i, --interactive', 'choose which files to summarize')
  .option('-d, --show-diff', 'show a preview of the raw diff')
  .option('--slack', 'send the summary to Slack')
  .action(async (options: { path?: string; interactive?: boolean; showDiff?: boolean; slack?: boolean }) => {
    const prompter = options.interactive ? new ReadlinePrompter() : undefined;
    await execute('status', options.path, ({ context }) => runStatus(context, {
      showDiff: options.showDiff ?? false,
      slack: options.slack ?? false,
      select: options.interactive ?? false
    }), prompter);
  });

program
  .command('commit')
  .alias('c')
  .description('Suggest a commit message for staged (or all uncommitted) changes')
  .option(PATH_FLAGS, PATH_HELP)
  .option('-a, --apply', 'run git commit with the generated message')
  .option('-i, --interactive', 'choose files, then ask before committing')
  .option('--all', 'use all uncommitted changes even when some are staged')
  .action(async (options: { path?: string; apply?: boolean; interactive?: boolean; all?: boolean }) => {
    const interactive = options.interactive ?? false;
    const prompter = interactive ? new ReadlinePrompter() : undefined;
    await execute('commit', options.path, ({ context }) => runCommit(context, {
      apply: options.apply ?? false,
      select: interactive,
      confirm: interactive,
      stagedFirst: !options.all
    }), prompter);
  });

program
  .command('report')
  .alias('r')
  .description('Generate a progress report from recent commits')
  .option(PATH_FLAGS, PATH_HELP)
  .option('-d, --days <days>', 'number of days to look back', daysOption)
  .option('-s, --save <path>', 'save the report as Markdown')
  .option('--slack', 'send the report to Slack')
  .option('-i, --interactive', 'choose the period, outputs and commits interactively')
  .action(async (options: { path?: string; days?: number; save?: string; slack?: boolean; interactive?: boolean }) => {
    const prompter = options.interactive ? new ReadlinePrompter() : undefined;
    await execute('report', options.path, async ({ config, context }) => {
      if (prompter && options.days === undefined) {
        const wizard = new Wizard(prompter, { slackAvailable: Boolean(config.slackWebhookUrl) });
        await dispatch(context, await wizard.collect('report'));
        return;
      }
      await runReport(context, {
        days: options.days ?? config.days,
        save: options.save ?? null,
        slack: options.slack ?? false,
        select: prompter !== undefined
      });
    }, prompter);
  });

program
  .command('init')
  .description(`Create a default ${CONFIG_FILE} in the repository`)
  .option(PATH_FLAGS, PATH_HELP)
  .action(async (options: { path?: string }) => {
    await execute('init', options.path, async ({ context }) => {
      const outputs = i18n().getOutputs();
      const configPath = ConfigManager.configPath(context.repoRoot);
      if (ConfigManager.createDefault(context.repoRoot)) {
        context.renderer.success(outputs.initDone(configPath));
      } else {
        context.renderer.info(outputs.initExists(configPath));
      }
    });
  });

// no subcommand: guided mode
program
  .option(PATH_FLAGS, PATH_HELP)
  .action(async (options: { path?: string }) => {
    const prompter = new ReadlinePrompter();
    await execute('wizard', options.path, async ({ config, context }) => {
      const outputs = i18n().getOutputs();
      context.renderer.header(outputs.headers.wizard);
      const wizard = new Wizard(prompter, { slackAvailable: Boolean(config.slackWebhookUrl) });
      const request = await wizard.run();
      if (request === null) {
        context.renderer.info(outputs.wizard.goodbye);
        return;
      }
      await dispatch(context, request);
    }, prompter);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.exitCode = ErrorHandler.handle(error, { operation: 'gitbrief' });
});
