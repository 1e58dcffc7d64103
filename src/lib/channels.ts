import { createSubscription } from "./state";

/**
 * Stateless two-way channel: producers put inputs, a worker turns them into
 * outputs, watchers receive the outputs.
 */

export function createChannel<TInput, TOutput>() {
  // Producers put data in this channel
  const inputChannel = createSubscription<TInput>();
  // Consumers pull data from this channel
  const outputChannel = createSubscription<TOutput>();

  return {
    in: inputChannel,
    out: outputChannel,
    // Register a worker that turns each input into at most one output,
    // either by returning it or through resolve()
    work: (
      workerFn: (
        input: TInput,
        resolve: (output: TOutput | undefined) => void
      ) => TOutput | undefined | void
    ) => {
      const cleanup = inputChannel.subscribe((input) => {
        const output = workerFn(input, (outAsync) => {
          if (outAsync) {
            outputChannel.notify(outAsync);
          }
        });

        if (output) {
          outputChannel.notify(output);
        }
      });
      return () => {
        cleanup();
      };
    },
    watch: (watcherFn: (output: TOutput) => void) => {
      const cleanup = outputChannel.subscribe(watcherFn);
      return () => {
        cleanup();
      };
    },
    put: (input: TInput) => {
      inputChannel.notify(input);
    },
    // Termination only
    clear: () => {
      inputChannel.clear();
      outputChannel.clear();
    },
  };
}

export type Channel<TInput, TOutput> = ReturnType<
  typeof createChannel<TInput, TOutput>
>;
