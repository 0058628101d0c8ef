import type { RegisterWidth } from "@/arm64-ast";
import type { Flags } from "../core/registers";

export type Condition = "GT" | "LE";

/**
 * a - b を width ビットの 2 の補数で計算したときの NZCV。
 * C はキャリーアウトではなく「借りなし」(unsigned a >= b)。
 */
export function compareFlags(
  a: bigint,
  b: bigint,
  width: RegisterWidth,
): Flags {
  const w = BigInt(width);
  const lhs = BigInt.asUintN(width, a);
  const rhs = BigInt.asUintN(width, b);
  const result = BigInt.asUintN(width, lhs - rhs);
  const sign = (v: bigint) => ((v >> (w - 1n)) & 1n) === 1n;

  return {
    N: sign(result),
    Z: result === 0n,
    C: lhs >= rhs,
    V: sign(lhs) !== sign(rhs) && sign(result) !== sign(lhs),
  };
}

export function conditionHolds(cond: Condition, flags: Flags): boolean {
  switch (cond) {
    case "GT":
      return !flags.Z && flags.N === flags.V;
    case "LE":
      return flags.Z || flags.N !== flags.V;
  }
}
