import { logError, logInfo, logWarn } from "../../shared/logger.js";

export type Severity = "info" | "success" | "warning" | "error";

export interface ProgressReporter {
  report(line: string, severity: Severity): void;
}

/** Reporter failures are logged and never reach the dispatch loop. */
export function safeReporter(inner: ProgressReporter): ProgressReporter {
  return {
    report(line, severity) {
      try {
        inner.report(line, severity);
      } catch (e) {
        logError("dispatch.reporter", e, { line, severity });
      }
    },
  };
}

export function createLogReporter(scope: string): ProgressReporter {
  return {
    report(line, severity) {
      if (severity === "warning") logWarn(scope, line);
      else if (severity === "error") logError(scope, line);
      else logInfo(scope, line, severity === "success" ? { ok: true } : undefined);
    },
  };
}
