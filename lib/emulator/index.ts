import { ParseError, parseProgram, type Program } from "@/arm64-ast";
import {
  EmulationError as EngineError,
  RegisterFile,
  StackMemory,
  normalizeRunOptions,
  runProgram,
  type NormalizedRunOptions,
  type RunOptions,
  type TraceEntry,
} from "@/arm64-engine";
import {
  EMULATION_SCHEMA_VERSION,
  type EmulationError,
  type EmulationErrorType,
  type EmulationResult,
} from "@/lib/emulator-schema";

export type EmulateOptions = Omit<RunOptions, "registers" | "stack" | "onStep">;

const ENGINE_ERROR_TYPES: ReadonlySet<string> = new Set<EmulationErrorType>([
  "InvalidRegisterIndex",
  "InvalidOperand",
  "UndefinedLabelError",
  "MemoryBoundsError",
  "InvalidPC",
]);

const isEngineErrorType = (name: string): name is EmulationErrorType =>
  ENGINE_ERROR_TYPES.has(name);

function toEmulationError(err: unknown): EmulationError {
  if (err instanceof ParseError) {
    return { type: "ParseError", message: err.message, detail: err.detail };
  }
  if (err instanceof EngineError && isEngineErrorType(err.name)) {
    return { type: err.name, message: err.message, detail: err.detail };
  }
  if (err instanceof RangeError) {
    return { type: "ConfigError", message: err.message, detail: err };
  }
  const message =
    err instanceof Error ? err.message : "実行中に例外が発生しました";
  return { type: "InternalError", message, detail: err };
}

function buildErrorResult(
  err: unknown,
  extras: Partial<EmulationResult> = {},
): EmulationResult {
  return {
    schemaVersion: EMULATION_SCHEMA_VERSION,
    status: "error",
    steps: 0,
    instructionCount: 0,
    trace: [],
    ...extras,
    error: toEmulationError(err),
  };
}

/**
 * ソース文字列 → プログラム構築 → 実行 までをまとめたファサード。
 * 例外は投げず、error フィールドに種別とメッセージを入れて返す。
 */
export function emulate(
  source: string,
  options: EmulateOptions = {},
): EmulationResult {
  let opts: NormalizedRunOptions;
  let program: Program;
  try {
    opts = normalizeRunOptions(options);
    program = parseProgram(source);
  } catch (err) {
    return buildErrorResult(err);
  }

  const registers = new RegisterFile();
  const stack = new StackMemory({ base: opts.stackBase, size: opts.stackSize });
  const trace: TraceEntry[] = [];
  let steps = 0;

  const snapshot = () => ({
    instructionCount: program.instructions.length,
    registers: registers.snapshot(),
    stack: stack.snapshot(),
  });

  try {
    const outcome = runProgram(program, {
      maxSteps: opts.maxSteps,
      initialSp: opts.initialSp ?? stack.base,
      registers,
      stack,
      onStep: (entry) => {
        steps = entry.step;
        if (opts.trace) trace.push(entry);
      },
    });
    return {
      schemaVersion: EMULATION_SCHEMA_VERSION,
      status: outcome.status,
      steps: outcome.steps,
      trace,
      ...snapshot(),
    };
  } catch (err) {
    // 失敗した命令までの状態をそのまま返す
    return buildErrorResult(err, { steps, trace, ...snapshot() });
  }
}
