import type { DecodedInstruction } from "../types/instruction";
import type { Operand, OperandKind } from "../types/operand";
import { ParseError } from "./errors";
import { classifyOperand, splitTopLevel } from "./operand";

type Validator = (operands: readonly Operand[]) => string | undefined;

// 各位置で許されるオペランド種別の並び
const shape =
  (...slots: OperandKind[][]): Validator =>
  (operands) => {
    if (operands.length !== slots.length) {
      return `オペランドは ${slots.length} 個必要です (got: ${operands.length})`;
    }
    for (let i = 0; i < slots.length; i += 1) {
      const allowed = slots[i];
      const actual = operands[i].kind;
      if (!allowed.includes(actual)) {
        return `第 ${i + 1} オペランドは ${allowed.join(" | ")} である必要があります (got: ${actual})`;
      }
    }
    return undefined;
  };

const REG: OperandKind[] = ["reg"];
const REG_OR_IMM: OperandKind[] = ["reg", "imm"];
const MEM: OperandKind[] = ["mem"];
const LABEL: OperandKind[] = ["label"];

const arithmetic = shape(REG, REG, REG_OR_IMM);
const memoryAccess = shape(REG, MEM);
const branch = shape(LABEL);
const noOperands = shape();

const VALIDATORS: ReadonlyMap<string, Validator> = new Map<string, Validator>([
  ["NOP", noOperands],
  [
    "RET",
    (operands) =>
      operands.length === 0 ? undefined : shape(REG)(operands),
  ],
  ["MOV", shape(REG, REG_OR_IMM)],
  ["ADD", arithmetic],
  ["SUB", arithmetic],
  ["AND", arithmetic],
  ["EOR", arithmetic],
  ["MUL", arithmetic],
  ["CMP", shape(REG, REG_OR_IMM)],
  ["LDR", memoryAccess],
  ["LDRB", memoryAccess],
  ["STR", memoryAccess],
  ["STRB", memoryAccess],
  ["B", branch],
  ["B.GT", branch],
  ["B.LE", branch],
]);

// 表にないニーモニックは何でも受け付ける（実行時は NOP 扱い）
const permissive: Validator = () => undefined;

export function stripComment(line: string): string {
  const cut = [line.indexOf("//"), line.indexOf(";")].filter((i) => i >= 0);
  return cut.length > 0 ? line.slice(0, Math.min(...cut)) : line;
}

export function isValidatedMnemonic(mnemonic: string): boolean {
  return VALIDATORS.has(mnemonic.toUpperCase());
}

/**
 * 1 行を命令にデコードする。空行・コメント行は undefined。
 * ラベルの除去は呼び出し側 (buildProgram) の責務。
 */
export function decodeLine(
  line: string,
  sourceLine?: number,
): DecodedInstruction | undefined {
  const text = stripComment(line).trim();
  if (text === "") return undefined;

  const match = text.match(/^(\S+)\s*(.*)$/);
  if (!match) return undefined;
  const [, head, rest] = match;
  const mnemonic = head.toUpperCase();

  let operands: Operand[];
  try {
    operands =
      rest.trim() === "" ? [] : splitTopLevel(rest).map(classifyOperand);
  } catch (err) {
    if (err instanceof ParseError) {
      throw new ParseError(err.message, {
        sourceLine,
        mnemonic,
        cause: err.detail,
      });
    }
    throw err;
  }

  const validate = VALIDATORS.get(mnemonic) ?? permissive;
  const problem = validate(operands);
  if (problem !== undefined) {
    throw new ParseError(`${mnemonic}: ${problem}`, { sourceLine, mnemonic });
  }

  return { mnemonic, operands, text };
}
