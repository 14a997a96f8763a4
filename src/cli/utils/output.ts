/**
 * Sink for command output. Commands write through this so tests can capture
 * what would reach stdout.
 */
export type Output = (content: string) => void;

export const writeStdout: Output = (content: string) => {
  process.stdout.write(content);
};

export function writeLine(out: Output, line = ''): void {
  out(`${line}\n`);
}
