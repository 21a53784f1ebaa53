/** Line-oriented sink the commands report through. */
export interface CommandConsole {
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
}

export const processConsole: CommandConsole = {
  info: (message) => writeStdout(`${message}\n`),
  warn: (message) => writeStderr(`${message}\n`),
};

export async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

export async function writeStderr(message: string): Promise<void> {
  await new Promise<void>((resolve) => {
    process.stderr.write(message, () => resolve());
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
