import inquirer from 'inquirer';

export interface UserInterface {
  confirm(message: string, details?: string, defaultNo?: boolean): Promise<boolean>;
}

export class ConsoleUI implements UserInterface {
  async confirm(message: string, details?: string, defaultNo?: boolean): Promise<boolean> {
    if (details) {
      console.log('\n' + details + '\n');
    }
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message: message,
        default: !defaultNo,
      },
    ]);
    return confirmed;
  }
}
