export type Writer = (line: string) => void;

export interface CommandIO {
  stdout: Writer;
  stderr: Writer;
}

export const processIO: CommandIO = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};
