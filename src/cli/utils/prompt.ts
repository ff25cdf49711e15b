import { createInterface } from 'node:readline';
import { stdin, stdout } from 'node:process';

/** Where `add` reads values that were not given on the command line. */
export interface InputSource {
  ask(question: string): Promise<string>;
}

export async function promptInput(question: string): Promise<string> {
  const rl = createInterface({ input: stdin, output: stdout });
  const answer = await new Promise<string>((resolve) => {
    rl.question(question, (value) => {
      rl.close();
      resolve(value);
    });
    // Ctrl-D or a closed pipe ends input without an answer.
    rl.once('close', () => resolve(''));
  });
  return answer.trim();
}

export const terminalInput: InputSource = {
  ask: promptInput
};
