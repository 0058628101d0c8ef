import type {
  RegisterSnapshot,
  RunStatus,
  StackSnapshot,
  TraceEntry,
} from "@/arm64-engine";

export type { RegisterSnapshot, StackSnapshot };

export const EMULATION_SCHEMA_VERSION = "1.0.0" as const;

export type EmulationResult = {
  /** 互換性管理のためのスキーマバージョン */
  schemaVersion: typeof EMULATION_SCHEMA_VERSION;
  /** 終了理由。エラーで止まった場合は "error" */
  status: RunStatus | "error";
  /** 実行した命令数（エラーを起こした命令を含む） */
  steps: number;
  instructionCount: number;
  trace: TraceEntry[];
  /** パースに失敗した場合は存在しない */
  registers?: RegisterSnapshot;
  stack?: StackSnapshot;
  error?: EmulationError;
};

export type EmulationErrorType =
  | "ParseError"
  | "InvalidRegisterIndex"
  | "InvalidOperand"
  | "UndefinedLabelError"
  | "MemoryBoundsError"
  | "InvalidPC"
  | "ConfigError"
  | "InternalError";

export type EmulationError = {
  type: EmulationErrorType;
  message: string;
  detail?: unknown;
};
