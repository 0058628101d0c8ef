import { endAddress, type Program } from "@/arm64-ast";
import { RegisterFile } from "../core/registers";
import { DEFAULT_STACK_SIZE, StackMemory } from "../core/stack";
import { fetchInstruction, step } from "../semantics";

export const DEFAULT_MAX_STEPS = 100_000;

export type RunOptions = {
  maxSteps?: number;
  stackBase?: bigint;
  stackSize?: number;
  /** 省略時はスタックのベースアドレス */
  initialSp?: bigint;
  trace?: boolean;
  /** 各命令の実行直前に呼ばれる */
  onStep?: (entry: TraceEntry) => void;
  /**
   * 既存のレジスタファイルを使う。この場合 SP は initialSp 指定時だけ上書きする。
   */
  registers?: RegisterFile;
  stack?: StackMemory;
};

export type NormalizedRunOptions = {
  maxSteps: number;
  stackBase: bigint;
  stackSize: number;
  initialSp?: bigint;
  trace: boolean;
};

// halted: RET で停止 / finished: 終端番兵に到達 / step-limit: 呼び出し側の上限で打ち切り
export type RunStatus = "halted" | "finished" | "step-limit";

export type TraceEntry = {
  step: number;
  pc: bigint;
  index: number;
  sourceLine: number;
  text: string;
};

export type RunOutcome = {
  status: RunStatus;
  steps: number;
  trace: TraceEntry[];
  registers: RegisterFile;
  stack: StackMemory;
};

export function normalizeRunOptions(
  options: RunOptions = {},
): NormalizedRunOptions {
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  const stackSize = options.stackSize ?? DEFAULT_STACK_SIZE;

  if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
    throw new RangeError(
      `maxSteps は正の整数で指定してください (got: ${String(maxSteps)})`,
    );
  }
  if (!Number.isInteger(stackSize) || stackSize <= 0) {
    throw new RangeError(
      `stackSize は正の整数で指定してください (got: ${String(stackSize)})`,
    );
  }

  return {
    maxSteps,
    stackBase: options.stackBase ?? 0n,
    stackSize,
    initialSp: options.initialSp,
    trace: options.trace ?? false,
  };
}

/**
 * PC=0 から step を繰り返す駆動ループ。
 * 後方分岐があると終わらないので maxSteps で打ち切る。エンジンの例外はそのまま投げる。
 */
export function runProgram(
  program: Program,
  options: RunOptions = {},
): RunOutcome {
  const opts = normalizeRunOptions(options);
  const stack =
    options.stack ??
    new StackMemory({ base: opts.stackBase, size: opts.stackSize });
  const registers = options.registers ?? new RegisterFile();

  if (opts.initialSp !== undefined) {
    registers.writeSP(opts.initialSp);
  } else if (!options.registers) {
    registers.writeSP(stack.base);
  }

  const end = BigInt(endAddress(program));
  const trace: TraceEntry[] = [];
  let pc = 0n;
  let steps = 0;
  registers.writePC(pc);

  const outcome = (status: RunStatus): RunOutcome => ({
    status,
    steps,
    trace,
    registers,
    stack,
  });

  while (pc !== end) {
    if (steps >= opts.maxSteps) return outcome("step-limit");

    if (opts.trace || options.onStep) {
      const instr = fetchInstruction(program, pc);
      const entry: TraceEntry = {
        step: steps + 1,
        pc,
        index: instr.index,
        sourceLine: instr.sourceLine,
        text: instr.decoded.text,
      };
      if (opts.trace) trace.push(entry);
      options.onStep?.(entry);
    }

    steps += 1;
    const next = step(program, registers, stack, pc);
    pc = registers.readPC();
    if (!next) break;
  }

  return outcome(pc === end ? "finished" : "halted");
}
