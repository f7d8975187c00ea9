export type Logger = (message: string) => void;

type Sink = (line: string) => void;

const stderrSink: Sink = (line) => {
  process.stderr.write(`${line}\n`);
};

export function createLogger(scope: string, sink: Sink = stderrSink): Logger {
  return (message: string) => sink(`[${scope}] ${message}`);
}
