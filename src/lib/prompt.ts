/**
 * Interactive prompt utilities
 *
 * Every question the tool asks goes through a `Prompter`, so the collector,
 * the phases and teardown can be driven by scripted answers in tests.
 * A prompt that the user aborts (Ctrl+C, Esc) resolves to `undefined`;
 * callers turn that into an `InterruptError`.
 */

import chalk from 'chalk';
import prompts, { type PromptObject } from 'prompts';

export interface TextQuestion {
  message: string;
  initial?: string;
  /** Hide the typed characters (passwords, keys) */
  mask?: boolean;
}

export interface Choice<T> {
  title: string;
  value: T;
  description?: string;
}

export interface Prompter {
  text(question: TextQuestion): Promise<string | undefined>;
  select<T>(message: string, choices: Choice<T>[], initial?: number): Promise<T | undefined>;
  confirm(message: string, initial?: boolean): Promise<boolean | undefined>;
  /** Informational line between questions */
  note(message: string): void;
  warn(message: string): void;
}

/**
 * Ask a single question; `undefined` when the user cancelled it
 */
async function ask(question: Omit<PromptObject<'value'>, 'name'>): Promise<unknown> {
  let cancelled = false;
  const response = await prompts(
    { ...question, name: 'value' },
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }
  );
  return cancelled ? undefined : response.value;
}

/**
 * Terminal prompter backed by `prompts`
 *
 * @example
 * ```typescript
 * const prompter = new PromptsPrompter();
 * const proceed = await prompter.confirm('Continue with deployment?', true);
 * ```
 */
export class PromptsPrompter implements Prompter {
  async text(question: TextQuestion): Promise<string | undefined> {
    const value = await ask({
      type: question.mask ? 'password' : 'text',
      message: question.message,
      initial: question.initial,
    });
    return typeof value === 'string' ? value.trim() : undefined;
  }

  async select<T>(message: string, choices: Choice<T>[], initial: number = 0): Promise<T | undefined> {
    // prompts hands back whatever value the choice carries; use indices so the result stays typed
    const index = await ask({
      type: 'select',
      message,
      initial,
      choices: choices.map((choice, position) => ({
        title: choice.title,
        value: position,
        description: choice.description,
      })),
    });
    return typeof index === 'number' ? choices[index]?.value : undefined;
  }

  async confirm(message: string, initial: boolean = false): Promise<boolean | undefined> {
    const value = await ask({ type: 'confirm', message, initial });
    return typeof value === 'boolean' ? value : undefined;
  }

  note(message: string): void {
    console.log(chalk.gray(message));
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠️  ${message}`));
  }
}
