import inquirer from 'inquirer';
import { SELECT_PAGE_SIZE } from '../config/constants';

export interface Choice<T> {
  name: string;
  value: T;
}

/**
 * Interactive questions asked while organizing. Tests supply scripted answers.
 */
export interface Prompter {
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  input(message: string, initialValue: string): Promise<string>;
  select<T>(message: string, choices: Choice<T>[], defaultIndex?: number): Promise<T>;
}

export class InquirerPrompter implements Prompter {
  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      { type: 'confirm', name: 'confirmed', message, default: defaultValue },
    ]);
    return confirmed;
  }

  async input(message: string, initialValue: string): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([
      { type: 'input', name: 'value', message, default: initialValue || undefined },
    ]);
    return value.trim();
  }

  async select<T>(message: string, choices: Choice<T>[], defaultIndex = 0): Promise<T> {
    const { index } = await inquirer.prompt<{ index: number }>([
      {
        type: 'list',
        name: 'index',
        message,
        pageSize: SELECT_PAGE_SIZE,
        default: defaultIndex,
        choices: choices.map((choice, i) => ({ name: choice.name, value: i })),
      },
    ]);
    return choices[index].value;
  }
}
