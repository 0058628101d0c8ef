import {
  isRegisterName,
  toRegisterRef,
  type Operand,
  type RegisterRef,
  type RegisterWidth,
} from "@/arm64-ast";
import { InvalidOperand, InvalidRegisterIndex } from "../core/errors";
import type { RegisterFile } from "../core/registers";

export function widthOf(ref: RegisterRef): RegisterWidth {
  return ref.kind === "sp" ? 64 : ref.width;
}

export function resolveRegister(operand: Operand): RegisterRef {
  if (operand.kind !== "reg") {
    throw new InvalidOperand(`レジスタが必要です (got: '${operand.text}')`, {
      operand: operand.text,
    });
  }
  const ref = toRegisterRef(operand.name);
  if (!ref) {
    throw new InvalidRegisterIndex(`無効なレジスタです: ${operand.text}`, {
      operand: operand.text,
    });
  }
  return ref;
}

// メモリオペランドのベース/インデックス用。綴りが正しくても番号外なら不正扱い
export function resolveAddressRegister(name: string): RegisterRef {
  const ref = isRegisterName(name) ? toRegisterRef(name) : undefined;
  if (!ref) {
    throw new InvalidOperand(`アドレス計算に使えないレジスタです: ${name}`, {
      register: name,
    });
  }
  return ref;
}

/** レジスタなら自身の幅で、即値なら 64 ビットに丸めて読む */
export function readValue(registers: RegisterFile, operand: Operand): bigint {
  if (operand.kind === "imm") return BigInt.asUintN(64, operand.value);
  return registers.read(resolveRegister(operand));
}
