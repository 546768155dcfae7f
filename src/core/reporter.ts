export interface Reporter {
  info(line: string): void;
  warn(line: string): void;
}

export const silentReporter: Reporter = {
  info: () => {},
  warn: () => {}
};

export function streamReporter(out: NodeJS.WritableStream): Reporter {
  return {
    info: (line) => {
      out.write(`${line}\n`);
    },
    warn: (line) => {
      out.write(`${line}\n`);
    }
  };
}

/** Collects lines in memory; the gateway echoes them back to the client. */
export function bufferReporter(): Reporter & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (line) => {
      lines.push(line);
    },
    warn: (line) => {
      lines.push(line);
    }
  };
}
