import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "../core/logger";

type StepKind =
  | "plan"
  | "dispatch"
  | "worker"
  | "synthesize"
  | "generate"
  | "evaluate"
  | "revise"
  | "chain"
  | "classify"
  | "handle"
  | "aggregate";

type StepStatus = "ok" | "error" | "dropped";

interface ExecutionLogRecord {
  timestamp: string;
  step_kind: StepKind;
  task_id?: number;
  iteration?: number;
  status: StepStatus;
  detail?: string;
  data?: Record<string, unknown>;
}

type ExecutionLogEntry = Omit<ExecutionLogRecord, "timestamp">;

interface ExecutionLog {
  record: (entry: ExecutionLogEntry) => void;
  flush: () => Promise<void>;
}

interface MemoryExecutionLog extends ExecutionLog {
  records: ExecutionLogRecord[];
}

const stampRecord = (entry: ExecutionLogEntry): ExecutionLogRecord => ({
  timestamp: new Date().toISOString(),
  ...entry,
});

const describeRecord = (record: ExecutionLogRecord) => {
  const taskId = record.task_id === undefined ? "" : ` task=${record.task_id}`;
  const iteration =
    record.iteration === undefined ? "" : ` iteration=${record.iteration}`;
  const detail = record.detail ? ` (${record.detail})` : "";
  return `${record.step_kind}${taskId}${iteration}: ${record.status}${detail}`;
};

// Appends serialize on one promise chain, so each JSONL line is written whole and in record order.
const createFileExecutionLog = (path: string, logger: Logger): ExecutionLog => {
  let pending: Promise<void> = mkdir(dirname(path), { recursive: true })
    .then(() => undefined)
    .catch((error: unknown) => {
      logger.warn(`Unable to prepare execution log directory for ${path}.`, {
        data: error,
      });
    });

  const record = (entry: ExecutionLogEntry) => {
    const line = `${JSON.stringify(stampRecord(entry))}\n`;
    pending = pending
      .then(() => appendFile(path, line, "utf-8"))
      .catch((error: unknown) => {
        logger.warn(`Unable to write execution log record to ${path}.`, {
          data: error,
        });
      });
  };

  const flush = () => pending;

  return { record, flush };
};

const createLoggerExecutionLog = (logger: Logger): ExecutionLog => ({
  record: (entry) => {
    const stamped = stampRecord(entry);
    logger.debug(describeRecord(stamped), { scope: "log", data: stamped.data });
  },
  flush: async () => undefined,
});

const createMemoryExecutionLog = (): MemoryExecutionLog => {
  const records: ExecutionLogRecord[] = [];
  return {
    records,
    record: (entry) => {
      records.push(stampRecord(entry));
    },
    flush: async () => undefined,
  };
};

const createExecutionLog = (logFile: string | undefined, logger: Logger) =>
  logFile ? createFileExecutionLog(logFile, logger) : createLoggerExecutionLog(logger);

export {
  createExecutionLog,
  createFileExecutionLog,
  createLoggerExecutionLog,
  createMemoryExecutionLog,
  describeRecord,
};
export type {
  ExecutionLog,
  ExecutionLogEntry,
  ExecutionLogRecord,
  MemoryExecutionLog,
  StepKind,
  StepStatus,
};
