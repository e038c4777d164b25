import { i18n } from '../i18n';
import { TIME_CONSTANTS } from '../shared/constants';
import { Prompter } from './prompter';

export type WizardTask = 'status' | 'commit' | 'report';

export type ResolvedRequest =
  | { task: 'status'; showDiff: boolean; slack: boolean }
  | { task: 'commit'; apply: boolean }
  | { task: 'report'; days: number; save: string | null; slack: boolean };

export type WizardState =
  | { step: 'select-task' }
  | { step: 'select-parameters'; task: WizardTask }
  | { step: 'confirm'; request: ResolvedRequest }
  | { step: 'execute'; request: ResolvedRequest }
  | { step: 'exit' };

export interface WizardOptions {
  slackAvailable: boolean;
}

const CUSTOM_DAYS = -1;

export function parseDays(raw: string): number | null {
  if (!/^\d+$/.test(raw.trim())) return null;
  const days = Number.parseInt(raw, 10);
  return days >= 1 && days <= TIME_CONSTANTS.MAX_LOOKBACK_DAYS ? days : null;
}

export function describeRequest(request: ResolvedRequest): string {
  switch (request.task) {
    case 'status':
      return `status${request.showDiff ? ' --show-diff' : ''}${request.slack ? ' --slack' : ''}`;
    case 'commit':
      return `commit${request.apply ? ' --apply' : ''}`;
    case 'report':
      return `report --days ${request.days}${request.save ? ` --save ${request.save}` : ''}${request.slack ? ' --slack' : ''}`;
  }
}

/**
 * Guided flow: select task, select parameters, confirm, execute.
 * Collects a fully resolved request and hands it back; it never runs anything itself.
 */
export class Wizard {
  constructor(
    private readonly prompter: Prompter,
    private readonly options: WizardOptions
  ) {}

  async run(): Promise<ResolvedRequest | null> {
    let state: WizardState = { step: 'select-task' };
    for (;;) {
      if (state.step === 'execute') return state.request;
      if (state.step === 'exit') return null;
      state = await this.advance(state);
    }
  }

  async advance(state: WizardState): Promise<WizardState> {
    const outputs = i18n().getOutputs().wizard;

    switch (state.step) {
      case 'select-task': {
        const task = await this.prompter.choose<WizardTask | 'exit'>(outputs.selectTask, [
          { label: outputs.tasks.status, value: 'status' },
          { label: outputs.tasks.commit, value: 'commit' },
          { label: outputs.tasks.report, value: 'report' },
          { label: outputs.tasks.exit, value: 'exit' }
        ]);
        return task === 'exit' ? { step: 'exit' } : { step: 'select-parameters', task };
      }
      case 'select-parameters':
        return { step: 'confirm', request: await this.collect(state.task) };
      case 'confirm': {
        const go = await this.prompter.confirm(outputs.confirm(describeRequest(state.request)));
        return go ? { step: 'execute', request: state.request } : { step: 'select-task' };
      }
      case 'execute':
      case 'exit':
        return state;
    }
  }

  // parameters for one task; also used by `report --interactive`
  async collect(task: WizardTask): Promise<ResolvedRequest> {
    const outputs = i18n().getOutputs().wizard;

    switch (task) {
      case 'status': {
        const showDiff = await this.prompter.confirm(outputs.showDiff, false);
        const slack = this.options.slackAvailable && await this.prompter.confirm(outputs.sendSlack, false);
        return { task, showDiff, slack };
      }
      case 'commit':
        return { task, apply: await this.prompter.confirm(outputs.applyCommit, false) };
      case 'report': {
        const days = await this.days();
        const save = (await this.prompter.input(outputs.savePath)).trim();
        const slack = this.options.slackAvailable && await this.prompter.confirm(outputs.sendSlack, false);
        return { task, days, save: save === '' ? null : save, slack };
      }
    }
  }

  private async days(): Promise<number> {
    const outputs = i18n().getOutputs().wizard;
    const picked = await this.prompter.choose(outputs.selectDays, [
      ...outputs.dayChoices.map(choice => ({ label: choice.label, value: choice.days })),
      { label: outputs.customDays, value: CUSTOM_DAYS }
    ]);
    if (picked !== CUSTOM_DAYS) return picked;

    for (;;) {
      const days = parseDays(await this.prompter.input(outputs.enterDays));
      if (days !== null) return days;
      this.prompter.say(outputs.invalidDays);
    }
  }
}
