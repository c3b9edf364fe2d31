export interface Logger {
  info(event: string, detail?: string): void;
  warn(event: string, detail?: string): void;
  error(event: string, detail?: string): void;
}

const formatLine = (event: string, detail?: string): string => (detail ? `${event}: ${detail}\n` : `${event}\n`);

export const processLogger: Logger = {
  info: (event, detail) => {
    process.stdout.write(formatLine(event, detail));
  },
  warn: (event, detail) => {
    process.stderr.write(formatLine(`warn ${event}`, detail));
  },
  error: (event, detail) => {
    process.stderr.write(formatLine(event, detail));
  }
};
