/**
 * Output sinks for command actions; tests substitute collectors.
 */
export interface CommandIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const defaultIO: CommandIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    console.error(text);
  },
};
