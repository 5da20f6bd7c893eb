import { AuditProgress } from '../services/method-auditor.service';

interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

const CLEAR_LINE = '\r\x1b[2K';

export interface ProgressRenderer {
  update(progress: AuditProgress): void;
  /** Clear the progress line so a log line written next starts at column 0 */
  interrupt(): void;
}

/**
 * Single-line progress on an interactive terminal; silent otherwise.
 * The line is cleared after the last user so the report starts on a clean line.
 */
export function createProgressRenderer(stream: ProgressStream = process.stderr): ProgressRenderer {
  let lineShown = false;

  return {
    update({ current, total, userPrincipalName }) {
      if (!stream.isTTY) {
        return;
      }
      const percent = total > 0 ? Math.floor((current / total) * 100) : 100;
      stream.write(`${CLEAR_LINE}Checking authentication methods ${current}/${total} (${percent}%): ${userPrincipalName}`);
      lineShown = current < total;
      if (!lineShown) {
        stream.write(CLEAR_LINE);
      }
    },
    interrupt() {
      if (lineShown) {
        stream.write(CLEAR_LINE);
        lineShown = false;
      }
    }
  };
}
