import type { RegisterRef } from "@/arm64-ast";
import { InvalidRegisterIndex } from "./errors";

export type Flags = {
  N: boolean; // Negative
  Z: boolean; // Zero
  C: boolean; // Carry (減算では借りなし)
  V: boolean; // Overflow
};

export type RegisterSnapshot = {
  x: bigint[]; // X0..X30
  sp: bigint;
  pc: bigint;
  flags: Flags;
};

export const GPR_COUNT = 31;
export const ZR_INDEX = 31;

const clearFlags = (): Flags => ({ N: false, Z: false, C: false, V: false });

/**
 * X0..X30 と SP / PC / NZCV を保持するレジスタファイル。
 * index 31 はゼロレジスタ (読むと 0、書き込みは捨てる)。
 */
export class RegisterFile {
  private readonly x = new BigUint64Array(GPR_COUNT);
  private sp = 0n;
  private pc = 0n;
  private nzcv: Flags = clearFlags();

  readX(n: number): bigint {
    checkIndex(n);
    if (n === ZR_INDEX) return 0n;
    return this.x[n];
  }

  writeX(n: number, value: bigint): void {
    checkIndex(n);
    if (n === ZR_INDEX) return;
    this.x[n] = BigInt.asUintN(64, value);
  }

  readW(n: number): bigint {
    return BigInt.asUintN(32, this.readX(n));
  }

  // 上位 32 ビットはゼロクリア
  writeW(n: number, value: bigint): void {
    checkIndex(n);
    if (n === ZR_INDEX) return;
    this.x[n] = BigInt.asUintN(32, value);
  }

  read(ref: RegisterRef): bigint {
    switch (ref.kind) {
      case "sp":
        return this.sp;
      case "zr":
        return 0n;
      case "gpr":
        return ref.width === 32 ? this.readW(ref.index) : this.readX(ref.index);
    }
  }

  write(ref: RegisterRef, value: bigint): void {
    switch (ref.kind) {
      case "sp":
        this.writeSP(value);
        return;
      case "zr":
        return;
      case "gpr":
        if (ref.width === 32) {
          this.writeW(ref.index, value);
        } else {
          this.writeX(ref.index, value);
        }
        return;
    }
  }

  readSP(): bigint {
    return this.sp;
  }

  writeSP(value: bigint): void {
    this.sp = BigInt.asUintN(64, value);
  }

  readPC(): bigint {
    return this.pc;
  }

  writePC(value: bigint): void {
    this.pc = BigInt.asUintN(64, value);
  }

  get flags(): Readonly<Flags> {
    return { ...this.nzcv };
  }

  setFlags(flags: Partial<Flags>): void {
    this.nzcv = { ...this.nzcv, ...flags };
  }

  snapshot(): RegisterSnapshot {
    return {
      x: Array.from(this.x),
      sp: this.sp,
      pc: this.pc,
      flags: { ...this.nzcv },
    };
  }

  reset(): void {
    this.x.fill(0n);
    this.sp = 0n;
    this.pc = 0n;
    this.nzcv = clearFlags();
  }
}

function checkIndex(n: number): void {
  if (!Number.isInteger(n) || n < 0 || n > ZR_INDEX) {
    throw new InvalidRegisterIndex(`無効なレジスタ番号です: ${n}`, {
      index: n,
    });
  }
}
