import {
  endAddress,
  resolveLabel,
  INSTRUCTION_SIZE,
  type AsmInstruction,
  type Operand,
  type Program,
} from "@/arm64-ast";
import { InvalidOperand, InvalidPC, UndefinedLabelError } from "../core/errors";
import type { RegisterFile } from "../core/registers";
import type { StackMemory } from "../core/stack";
import { effectiveAddress, loadLE, storeLE } from "./address";
import { compareFlags, conditionHolds } from "./flags";
import { readValue, resolveRegister, widthOf } from "./operands";

const HEX_ADDRESS_RE = /^0x[0-9a-f]+$/i;

export function fetchInstruction(
  program: Program,
  pc: bigint,
): AsmInstruction {
  const index =
    pc <= BigInt(Number.MAX_SAFE_INTEGER)
      ? program.addressToIndex.get(Number(pc))
      : undefined;
  if (index === undefined) {
    throw new InvalidPC(`PC が命令を指していません: 0x${pc.toString(16)}`, {
      pc,
    });
  }
  return program.instructions[index];
}

export function resolveBranchTarget(
  program: Program,
  operand: Operand,
): bigint {
  const text = operand.text.trim();
  const address = resolveLabel(program, text);
  if (address !== undefined) return BigInt(address);
  if (HEX_ADDRESS_RE.test(text)) return BigInt(text);
  throw new UndefinedLabelError(`未定義のラベル '${text}'`, { label: text });
}

/**
 * pc の命令を 1 つ実行し、次の PC をレジスタに書く。
 * 続行できるなら true、終端番兵に達したか RET なら false。
 */
export function step(
  program: Program,
  registers: RegisterFile,
  stack: StackMemory,
  pc: bigint,
): boolean {
  const end = BigInt(endAddress(program));
  if (pc === end) return false;

  const instr = fetchInstruction(program, pc);
  const { mnemonic } = instr.decoded;
  const operand = (i: number) => operandAt(instr, i);
  let nextPc = pc + BigInt(INSTRUCTION_SIZE);

  switch (mnemonic) {
    case "NOP":
      break;
    case "RET":
      // PC 位置に関係なく即停止。PC は RET を指したまま
      return false;
    case "MOV": {
      const dest = resolveRegister(operand(0));
      const value = readValue(registers, operand(1));
      registers.write(dest, value);
      break;
    }
    case "ADD":
    case "SUB":
    case "AND":
    case "EOR":
    case "MUL": {
      // フラグは更新しない (S 付きでない形)
      const dest = resolveRegister(operand(0));
      const a = readValue(registers, operand(1));
      const b = readValue(registers, operand(2));
      registers.write(dest, alu(mnemonic, a, b));
      break;
    }
    case "CMP": {
      const rn = resolveRegister(operand(0));
      const b = readValue(registers, operand(1));
      registers.setFlags(compareFlags(registers.read(rn), b, widthOf(rn)));
      break;
    }
    case "LDR":
    case "LDRB": {
      const rt = resolveRegister(operand(0));
      const width = mnemonic === "LDRB" ? 1 : widthOf(rt) / 8;
      const address = effectiveAddress(registers, operand(1));
      registers.write(rt, loadLE(stack, address, width));
      break;
    }
    case "STR":
    case "STRB": {
      const rt = resolveRegister(operand(0));
      const width = mnemonic === "STRB" ? 1 : widthOf(rt) / 8;
      const value = registers.read(rt);
      const address = effectiveAddress(registers, operand(1));
      storeLE(stack, address, width, value);
      break;
    }
    case "B":
      nextPc = resolveBranchTarget(program, operand(0));
      break;
    case "B.GT":
    case "B.LE": {
      const cond = mnemonic === "B.GT" ? "GT" : "LE";
      if (conditionHolds(cond, registers.flags)) {
        nextPc = resolveBranchTarget(program, operand(0));
      }
      break;
    }
    default:
      // 未対応のニーモニックは NOP として実行する
      break;
  }

  registers.writePC(nextPc);
  return nextPc !== end;
}

function operandAt(instr: AsmInstruction, i: number): Operand {
  const op = instr.decoded.operands.at(i);
  if (!op) {
    throw new InvalidOperand(
      `${instr.decoded.mnemonic}: 第 ${i + 1} オペランドがありません`,
      { address: instr.address, mnemonic: instr.decoded.mnemonic },
    );
  }
  return op;
}

// 結果の切り詰めは書き込み先の幅に任せる
function alu(mnemonic: string, a: bigint, b: bigint): bigint {
  switch (mnemonic) {
    case "ADD":
      return a + b;
    case "SUB":
      return a - b;
    case "AND":
      return a & b;
    case "EOR":
      return a ^ b;
    case "MUL":
      return a * b;
    default:
      throw new InvalidOperand(`算術命令ではありません: ${mnemonic}`);
  }
}
