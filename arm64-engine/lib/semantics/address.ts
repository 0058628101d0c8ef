import type { Operand } from "@/arm64-ast";
import { InvalidOperand, MemoryBoundsError } from "../core/errors";
import type { RegisterFile } from "../core/registers";
import type { StackMemory } from "../core/stack";
import { resolveAddressRegister } from "./operands";

export function effectiveAddress(
  registers: RegisterFile,
  operand: Operand,
): bigint {
  if (operand.kind !== "mem") {
    throw new InvalidOperand(
      `メモリオペランドが必要です (got: '${operand.text}')`,
      { operand: operand.text },
    );
  }

  // SP / XZR / Xn いずれもベースは 64 ビット値 (Wn でも Xn 全体を使う)
  const baseRef = resolveAddressRegister(operand.base);
  const base =
    baseRef.kind === "gpr"
      ? registers.readX(baseRef.index)
      : registers.read(baseRef);

  const offset = operand.offset;
  if (!offset) return base;

  if (offset.kind === "imm") {
    return BigInt.asUintN(64, base + offset.value);
  }

  const indexRef = resolveAddressRegister(offset.register);
  // Wn インデックスはゼロ拡張 (read が幅に合わせて切り詰める)
  const index = registers.read(indexRef);
  return BigInt.asUintN(64, base + (index << BigInt(offset.shift)));
}

function checkWindow(stack: StackMemory, address: bigint, width: number) {
  if (!stack.contains(address, width)) {
    throw new MemoryBoundsError(
      `スタック範囲外へのアクセスです: 0x${address.toString(16)} (+${width})`,
      { address, width, base: stack.base, size: stack.size },
    );
  }
}

/** width バイトをリトルエンディアンで読む */
export function loadLE(
  stack: StackMemory,
  address: bigint,
  width: number,
): bigint {
  checkWindow(stack, address, width);
  let value = 0n;
  for (let i = 0; i < width; i += 1) {
    value |= BigInt(stack.read8(address + BigInt(i))) << BigInt(i * 8);
  }
  return value;
}

// 窓全体を検査してから 1 バイトずつ書く
export function storeLE(
  stack: StackMemory,
  address: bigint,
  width: number,
  value: bigint,
): void {
  checkWindow(stack, address, width);
  for (let i = 0; i < width; i += 1) {
    stack.write8(address + BigInt(i), Number((value >> BigInt(i * 8)) & 0xffn));
  }
}
