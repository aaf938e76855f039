import { createInterface } from 'node:readline/promises';

export interface QuestionOptions {
  signal?: AbortSignal;
  /** Called on Ctrl-C while the prompt owns the terminal. */
  onInterrupt?: () => void;
}

/**
 * Ask one question on stdin/stdout. Rejects with an AbortError when `signal`
 * fires before an answer arrives.
 */
export async function askQuestion(question: string, options: QuestionOptions = {}): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const onInterrupt = options.onInterrupt;
  if (onInterrupt) rl.on('SIGINT', onInterrupt);
  try {
    return await rl.question(question, options.signal ? { signal: options.signal } : {});
  } finally {
    rl.close();
  }
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}
