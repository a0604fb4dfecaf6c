import { formatError } from "../errors";
import { getFlags } from "../context/flags";
import { OutputSink } from "../lookup/types";

export function createConsoleOutput(): OutputSink {
  return {
    info: (line) => {
      if (!getFlags().quiet) {
        console.log(line);
      }
    },
    success: (line) => console.log(line),
    warn: (line) => console.log(`Warning: ${line}`),
    error: (code, line) => console.log(formatError(code, line))
  };
}
