import { createInterface } from 'node:readline/promises';

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Asks a yes/no question. Only "y" / "yes" confirms; Ctrl+C or a closed
 * input counts as "no".
 */
export async function confirm(
  question: string,
  streams: PromptStreams = { input: process.stdin, output: process.stdout },
): Promise<boolean> {
  const rl = createInterface({ input: streams.input, output: streams.output });
  const controller = new AbortController();
  const cancel = () => controller.abort();
  rl.on('SIGINT', cancel);
  rl.on('close', cancel);

  try {
    const answer = await rl.question(`${question} (y/n): `, { signal: controller.signal });
    const normalized = answer.trim().toLowerCase();
    return normalized === 'y' || normalized === 'yes';
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') return false;
    throw error;
  } finally {
    rl.off('close', cancel);
    rl.close();
  }
}
