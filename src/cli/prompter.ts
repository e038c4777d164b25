import readline, { Interface } from 'readline';
import chalk from 'chalk';
import { i18n } from '../i18n';
import { AbortedByUserError } from '../shared/errors';

export interface Choice<T> {
  label: string;
  value: T;
}

/**
 * Line-oriented user input. The wizard only talks to this interface.
 */
export interface Prompter {
  choose<T>(message: string, choices: Choice<T>[]): Promise<T>;
  // several at once; every choice starts selected
  pick<T>(message: string, choices: Choice<T>[]): Promise<T[]>;
  input(message: string): Promise<string>;
  confirm(message: string, defaultYes?: boolean): Promise<boolean>;
  say(message: string): void;
  close(): void;
}

/**
 * Parses "1,3-4" style answers into zero-based indices. An empty answer keeps
 * every item; null means the answer names something outside 1..count.
 */
export function parseSelection(answer: string, count: number): number[] | null {
  const trimmed = answer.trim();
  if (trimmed === '') return Array.from({ length: count }, (_, i) => i);

  const picked = new Set<number>();
  for (const token of trimmed.split(/[\s,]+/).filter(Boolean)) {
    const range = /^(\d+)(?:-(\d+))?$/.exec(token);
    if (!range) return null;
    const from = Number(range[1]);
    const to = range[2] === undefined ? from : Number(range[2]);
    if (from < 1 || to > count || from > to) return null;
    for (let n = from; n <= to; n++) picked.add(n - 1);
  }
  return [...picked].sort((a, b) => a - b);
}

export class ReadlinePrompter implements Prompter {
  private rl: Interface | null = null;

  constructor(
    private readonly stdin: NodeJS.ReadableStream = process.stdin,
    private readonly stdout: NodeJS.WritableStream = process.stdout
  ) {}

  async choose<T>(message: string, choices: Choice<T>[]): Promise<T> {
    this.stdout.write(`\n${chalk.bold(message)}\n`);
    choices.forEach((choice, index) => {
      this.stdout.write(`  ${chalk.cyan(String(index + 1))}) ${choice.label}\n`);
    });

    for (;;) {
      const answer = await this.ask('> ');
      const index = Number.parseInt(answer, 10) - 1;
      const picked = choices[index];
      if (Number.isInteger(index) && picked) return picked.value;
      this.say(i18n().getOutputs().wizard.invalidChoice);
    }
  }

  async pick<T>(message: string, choices: Choice<T>[]): Promise<T[]> {
    this.stdout.write(`\n${chalk.bold(message)}\n`);
    choices.forEach((choice, index) => {
      this.stdout.write(`  ${chalk.cyan(String(index + 1))}) ${choice.label}\n`);
    });

    const outputs = i18n().getOutputs();
    for (;;) {
      const indices = parseSelection(await this.ask(`${outputs.pickHint} `), choices.length);
      if (indices !== null) return indices.map(index => choices[index].value);
      this.say(outputs.wizard.invalidChoice);
    }
  }

  input(message: string): Promise<string> {
    return this.ask(`${message} `);
  }

  async confirm(message: string, defaultYes = true): Promise<boolean> {
    const hint = defaultYes ? '(Y/n)' : '(y/N)';
    const answer = (await this.ask(`${message} ${hint} `)).toLowerCase();
    if (answer === '') return defaultYes;
    return answer === 'y' || answer === 'yes';
  }

  say(message: string): void {
    this.stdout.write(chalk.yellow(`${message}\n`));
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private ask(query: string): Promise<string> {
    const rl = this.session();
    return new Promise((resolve, reject) => {
      const onClose = () => reject(new AbortedByUserError());
      rl.once('close', onClose);
      rl.question(query, answer => {
        rl.off('close', onClose);
        resolve(answer.trim());
      });
    });
  }

  private session(): Interface {
    if (!this.rl) {
      const rl = readline.createInterface({ input: this.stdin, output: this.stdout });
      rl.on('SIGINT', () => rl.close());
      this.rl = rl;
      return rl;
    }
    return this.rl;
  }
}
