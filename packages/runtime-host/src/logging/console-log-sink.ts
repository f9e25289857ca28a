/**
 * Rigger Runtime Host — Console Log Sink
 *
 * Human-readable LogSink for the terminal. Every line is prefixed with the
 * node, the user and, while a trigger is running, the task:
 *
 *   [web1] deploy apply:nginx $ sudo apt-get install -y nginx
 *   [web1] deploy apply:nginx   Reading package lists...
 *   [web1] deploy apply:nginx ! debconf: unable to initialize frontend
 *   [web1] deploy (dry-run) sudo systemctl reload nginx
 *
 * Captured output is split into lines; blank lines are dropped.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { LogSink, TargetNode } from '@rigger/kernel';

export interface ConsoleTheme {
  readonly node: ChalkInstance;
  readonly user: ChalkInstance;
  readonly task: ChalkInstance;
  readonly command: ChalkInstance;
  readonly local: ChalkInstance;
  readonly output: ChalkInstance;
  readonly error: ChalkInstance;
  readonly mock: ChalkInstance;
}

export function consoleTheme(c: ChalkInstance = chalk): ConsoleTheme {
  return {
    node: c.hex('#4FC3F7'),
    user: c.hex('#666666'),
    task: c.hex('#F2F2EC'),
    command: c.hex('#81D4FA'),
    local: c.hex('#D4880A'),
    output: c.hex('#C8C8C0'),
    error: c.hex('#CF6679'),
    mock: c.hex('#81C784'),
  };
}

export interface ConsoleLogSinkOptions {
  /** Line writer; defaults to process.stdout. */
  readonly write?: ((line: string) => void) | undefined;
  readonly theme?: ConsoleTheme | undefined;
}

interface NodeLabel {
  readonly name: string;
  readonly user: string;
}

export class ConsoleLogSink implements LogSink {
  private readonly write: (line: string) => void;
  private readonly theme: ConsoleTheme;
  private task: string | undefined;

  constructor(
    private readonly node: NodeLabel,
    options: ConsoleLogSinkOptions = {},
  ) {
    this.write = options.write ?? ((line) => { process.stdout.write(line + '\n'); });
    this.theme = options.theme ?? consoleTheme();
  }

  private prefix(): string {
    const t = this.theme;
    const head = `${t.node(`[${this.node.name}]`)} ${t.user(this.node.user)}`;
    return this.task === undefined ? head : `${head} ${t.task(this.task)}`;
  }

  private lines(text: string): string[] {
    return text.split('\n').filter((line) => line.trim() !== '');
  }

  log(message: string): void {
    this.write(`${this.prefix()} ${message}`);
  }

  local(command: string): void {
    this.write(`${this.prefix()} ${this.theme.local('local$')} ${command}`);
  }

  remote(command: string): void {
    this.write(`${this.prefix()} ${this.theme.command('$')} ${command}`);
  }

  stdout(text: string): void {
    for (const line of this.lines(text)) {
      this.write(`${this.prefix()}   ${this.theme.output(line)}`);
    }
  }

  stderr(text: string): void {
    for (const line of this.lines(text)) {
      this.write(`${this.prefix()} ${this.theme.error('!')} ${line}`);
    }
  }

  mockExecute(description: string): void {
    this.write(`${this.prefix()} ${this.theme.mock('(dry-run)')} ${description}`);
  }

  setTask(name: string | undefined): string | undefined {
    const previous = this.task;
    this.task = name;
    return previous;
  }

  cloneForNode(node: TargetNode): ConsoleLogSink {
    const clone = new ConsoleLogSink(node, { write: this.write, theme: this.theme });
    clone.task = this.task;
    return clone;
  }
}
