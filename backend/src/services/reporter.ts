/** Sink for the human-readable progress and summary lines of an import. */
export interface Reporter {
  line(message: string): void;
}

export const consoleReporter: Reporter = {
  line(message) {
    console.log(message);
  },
};
