import readline from 'readline';

export type ConfirmPrompt = (question: string) => Promise<boolean>;

export const EXIT_QUESTION = 'Are you sure you want to exit? (y or n): ';

export function askYesNo(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase() === 'y');
    });
  });
}

export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * SIGINT and SIGTERM ask for confirmation, then abort `controller`. The
 * handler only flags the run; the driver decides when to tear down.
 * Returns a function that removes the handlers.
 */
export function installSignalHandlers(
  controller: AbortController,
  confirm: ConfirmPrompt = askYesNo,
  target: SignalTarget = process,
): () => void {
  let prompting = false;

  const onSignal = () => {
    if (controller.signal.aborted) {
      console.log('tearing down, please wait');
      return;
    }
    if (prompting) return;

    prompting = true;
    void confirm(EXIT_QUESTION)
      .then((confirmed) => {
        if (confirmed) {
          console.log('tearing down');
          controller.abort();
        }
      })
      .catch((error: unknown) => {
        console.error('❌ Could not read confirmation:', error);
      })
      .finally(() => {
        prompting = false;
      });
  };

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach(signal => target.on(signal, onSignal));

  return () => {
    signals.forEach(signal => target.off(signal, onSignal));
  };
}
