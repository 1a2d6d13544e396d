import inquirer from 'inquirer';
import type { InputProvider } from './types';

interface InputAnswer {
  value: string;
}

export class InquirerInputProvider implements InputProvider {
  async ask(message: string): Promise<string> {
    const answers = await inquirer.prompt<InputAnswer>([
      {
        type: 'input',
        name: 'value',
        message,
      },
    ]);
    return answers.value;
  }
}
