import type { DecodedInstruction, Operand } from "@/arm64-ast";
import { GPR_COUNT, type RegisterSnapshot } from "../core/registers";
import type { StackSnapshot } from "../core/stack";

const SEPARATOR = "-".repeat(72);
const BYTES_PER_ROW = 16;

export const hex64 = (value: bigint): string =>
  `0x${BigInt.asUintN(64, value).toString(16).padStart(16, "0")}`;

const hex8 = (value: bigint): string => value.toString(16).padStart(8, "0");

const bit = (b: boolean) => (b ? "1" : "0");

// [X1, #8] --> X1 + 8 の形で実効アドレスの式を添える
export function describeOperand(operand: Operand): string {
  if (operand.kind !== "mem" || !operand.offset) return operand.text;
  const { offset } = operand;
  const term =
    offset.kind === "imm"
      ? offset.text.replace(/^#/, "")
      : offset.shift > 0
        ? `(${offset.register} << ${offset.shift})`
        : offset.register;
  return `${operand.text} --> ${operand.base} + ${term}`;
}

export function formatDecoded(
  index: number,
  decoded: DecodedInstruction,
): string {
  const lines = [
    SEPARATOR,
    `Instruction #${index}:`,
    SEPARATOR,
    `Instruction: ${decoded.mnemonic}`,
    ...decoded.operands.map(
      (op, i) => `Operand #${i + 1}: ${describeOperand(op)}`,
    ),
  ];
  return lines.join("\n");
}

/** X0..X29 を 3 列 (n, n+10, n+20) で並べ、最後に SP / PC / X30 とフラグ */
export function formatRegisters(registers: RegisterSnapshot): string {
  const rows: string[] = [SEPARATOR, "Registers:", SEPARATOR];
  const column = (n: number) => `X${n}: ${hex64(registers.x[n] ?? 0n)}`;
  for (let n = 0; n < 10; n += 1) {
    rows.push([column(n), column(n + 10), column(n + 20)].join(" "));
  }
  rows.push(
    [
      `SP: ${hex64(registers.sp)}`,
      `PC: ${hex64(registers.pc)}`,
      column(GPR_COUNT - 1),
    ].join(" "),
  );
  const { N, Z, C, V } = registers.flags;
  rows.push(`NZCV: N=${bit(N)} Z=${bit(Z)} C=${bit(C)} V=${bit(V)}`);
  return rows.join("\n");
}

export function formatStack(stack: StackSnapshot): string {
  const { bytes } = stack;
  const rows: string[] = [SEPARATOR, "Stack:", SEPARATOR];
  for (let off = 0; off < bytes.length; off += BYTES_PER_ROW) {
    const chunk = Array.from(bytes.subarray(off, off + BYTES_PER_ROW));
    const hex = chunk.map((b) => b.toString(16).padStart(2, "0")).join(" ");
    const ascii = chunk
      .map((b) => (b >= 0x20 && b <= 0x7e ? String.fromCharCode(b) : "."))
      .join("");
    rows.push(`${hex8(stack.base + BigInt(off))} ${hex} |${ascii}|`);
  }
  rows.push(hex8(stack.base + BigInt(bytes.length)));
  return rows.join("\n");
}
