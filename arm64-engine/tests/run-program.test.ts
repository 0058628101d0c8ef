import { describe, it, expect, vi } from "vitest";
import { parseProgram } from "@/arm64-ast";
import {
  DEFAULT_MAX_STEPS,
  RegisterFile,
  UndefinedLabelError,
  normalizeRunOptions,
  runProgram,
  type TraceEntry,
} from "..";

const SUM_LOOP = `
start:
  MOV X0, #0
  MOV X1, #0
loop:
  ADD X0, X0, #1
  ADD X1, X1, X0
  CMP X0, #4
  B.LE loop
  STR X1, [SP, #16]
  LDR X2, [SP, #16]
  RET
`;

describe("runProgram", () => {
  it("最終命令の後に到達したら finished", () => {
    const program = parseProgram("MOV X0, #1\nMOV X1, #2\nADD X2, X0, X1");
    const outcome = runProgram(program);
    expect(outcome.status).toBe("finished");
    expect(outcome.steps).toBe(3);
    expect(outcome.registers.readPC()).toBe(12n);
    expect(outcome.registers.readX(2)).toBe(3n);
  });

  it("RET で halted になり PC は RET を指す", () => {
    const outcome = runProgram(parseProgram(SUM_LOOP));
    expect(outcome.status).toBe("halted");
    // 2 + 4 命令 x 5 周 + 3
    expect(outcome.steps).toBe(25);
    expect(outcome.registers.readX(1)).toBe(15n);
    expect(outcome.registers.readX(2)).toBe(15n);
    expect(outcome.registers.readPC()).toBe(32n);
    expect(outcome.stack.read8(16n)).toBe(15);
  });

  it("数字ラベルのループを回し切る", () => {
    const outcome = runProgram(
      parseProgram("MOV X0, #0\n1: ADD X0, X0, #1\nCMP X0, #3\nB.LE 1"),
    );
    expect(outcome.status).toBe("finished");
    expect(outcome.registers.readX(0)).toBe(4n);
    expect(outcome.registers.readPC()).toBe(16n);
  });

  it("上限に達したら step-limit で打ち切る", () => {
    const outcome = runProgram(parseProgram("loop: B loop"), { maxSteps: 10 });
    expect(outcome.status).toBe("step-limit");
    expect(outcome.steps).toBe(10);
    expect(outcome.registers.readPC()).toBe(0n);
  });

  it("空のプログラムは即座に finished", () => {
    const outcome = runProgram(parseProgram("// nothing\n"));
    expect(outcome.status).toBe("finished");
    expect(outcome.steps).toBe(0);
  });

  it("trace 指定時は実行前の命令を記録する", () => {
    const outcome = runProgram(parseProgram("MOV X0, #1\nRET"), {
      trace: true,
    });
    expect(outcome.trace).toEqual<TraceEntry[]>([
      { step: 1, pc: 0n, index: 1, sourceLine: 1, text: "MOV X0, #1" },
      { step: 2, pc: 4n, index: 2, sourceLine: 2, text: "RET" },
    ]);
  });

  it("onStep は trace なしでも呼ばれる", () => {
    const onStep = vi.fn();
    const outcome = runProgram(parseProgram("NOP\nNOP"), { onStep });
    expect(onStep).toHaveBeenCalledTimes(2);
    expect(onStep).toHaveBeenLastCalledWith(
      expect.objectContaining({ step: 2, pc: 4n }),
    );
    expect(outcome.trace).toEqual([]);
  });

  it("SP の初期値はスタックのベースアドレス", () => {
    const outcome = runProgram(parseProgram("NOP"), {
      stackBase: 0x100n,
      stackSize: 32,
    });
    expect(outcome.registers.readSP()).toBe(0x100n);
    expect(outcome.stack.base).toBe(0x100n);
    expect(outcome.stack.size).toBe(32);
  });

  it("initialSp を指定するとそれを使う", () => {
    const outcome = runProgram(parseProgram("STRB W0, [SP]"), {
      initialSp: 0x80n,
    });
    expect(outcome.registers.readSP()).toBe(0x80n);
  });

  it("渡されたレジスタファイルの SP は保持する", () => {
    const registers = new RegisterFile();
    registers.writeSP(16n);
    registers.writeX(0, 9n);
    const outcome = runProgram(parseProgram("STR X0, [SP]"), { registers });
    expect(outcome.registers).toBe(registers);
    expect(registers.readSP()).toBe(16n);
    expect(outcome.stack.read8(16n)).toBe(9);
  });

  it("実行エンジンの例外はそのまま送出する", () => {
    expect(() => runProgram(parseProgram("NOP\nB nowhere"))).toThrow(
      UndefinedLabelError,
    );
  });
});

describe("normalizeRunOptions", () => {
  it("既定値を埋める", () => {
    expect(normalizeRunOptions()).toEqual({
      maxSteps: DEFAULT_MAX_STEPS,
      stackBase: 0n,
      stackSize: 256,
      initialSp: undefined,
      trace: false,
    });
  });

  it("正の整数でない値は RangeError", () => {
    expect(() => normalizeRunOptions({ maxSteps: 0 })).toThrow(RangeError);
    expect(() => normalizeRunOptions({ stackSize: 1.5 })).toThrow(
      "stackSize は正の整数で指定してください (got: 1.5)",
    );
  });
});
