export const PAUSE_PROMPT = 'Press any key to continue . . .';

/**
 * Minimal view of stdin the prompt needs; process.stdin satisfies it.
 */
export interface KeypressInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface PausePromptStreams {
  input: KeypressInput;
  output: { write(chunk: string): unknown };
}

/**
 * Prints the prompt and resolves on the first keypress.
 *
 * Non-TTY input (pipes, CI) cannot deliver a keypress, so the prompt is
 * skipped and the promise resolves immediately with false.
 *
 * @returns true if a key was awaited
 */
export function waitForKeypress(
  streams: PausePromptStreams = { input: process.stdin, output: process.stdout }
): Promise<boolean> {
  const { input, output } = streams;

  if (!input.isTTY) {
    return Promise.resolve(false);
  }

  output.write(PAUSE_PROMPT);

  return new Promise<boolean>((resolve) => {
    const wasRaw = input.isRaw ?? false;
    input.setRawMode?.(true);
    input.resume();

    input.once('data', () => {
      input.setRawMode?.(wasRaw);
      input.pause();
      output.write('\n');
      resolve(true);
    });
  });
}
