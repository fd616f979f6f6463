export interface StopSignal {
  /** True once the first stop request has arrived */
  readonly stopping: boolean;
  /** Signal handler: first call asks the loop to stop, a second one exits */
  handle(): void;
}

export function createStopSignal(exit: (code: number) => void = (code) => process.exit(code)): StopSignal {
  let stopping = false;
  return {
    get stopping() {
      return stopping;
    },
    handle() {
      if (stopping) {
        console.log('Forcing exit');
        exit(1);
        return;
      }
      console.log('Stopping after the current poll... (press Ctrl+C again to force)');
      stopping = true;
    },
  };
}
