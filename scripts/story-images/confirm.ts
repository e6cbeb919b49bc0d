import readline from 'node:readline';

export const CONFIRMATION_WORD = 'yes';

export function isConfirmed(answer: string) {
  return answer.trim() === CONFIRMATION_WORD;
}

export function promptConfirmation(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: Boolean(process.stdin.isTTY && process.stdout.isTTY),
  });
  return new Promise((resolve) => {
    let answered = false;
    // stdin closing without an answer counts as a refusal
    rl.once('close', () => {
      if (!answered) resolve(false);
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(isConfirmed(answer));
    });
  });
}
