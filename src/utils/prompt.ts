import readline from 'readline';

export type Confirm = (question: string) => Promise<boolean>;

/**
 * Ask on the terminal; only a literal "yes" confirms.
 */
export const confirmOnTerminal: Confirm = (question) =>
  new Promise((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    rl.question(`${question} (yes/no): `, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase() === 'yes');
    });
  });
