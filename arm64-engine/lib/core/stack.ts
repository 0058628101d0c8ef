import { MemoryBoundsError } from "./errors";

export const DEFAULT_STACK_SIZE = 256;

export type StackOptions = {
  base?: bigint;
  size?: number;
};

export type StackSnapshot = {
  base: bigint;
  bytes: Uint8Array;
};

/**
 * base から size バイトの固定長スタック領域。
 * アドレスは絶対値で受け取り、1 バイト単位で境界チェックする。
 * 複数バイトの読み書きは実行エンジン側でこのプリミティブから組み立てる。
 */
export class StackMemory {
  readonly base: bigint;
  readonly size: number;
  private readonly mem: Uint8Array;

  constructor(options: StackOptions = {}) {
    this.base = BigInt.asUintN(64, options.base ?? 0n);
    this.size = options.size ?? DEFAULT_STACK_SIZE;
    this.mem = new Uint8Array(this.size);
  }

  get end(): bigint {
    return this.base + BigInt(this.size);
  }

  /** [address, address + width) が領域内に収まるか */
  contains(address: bigint, width: number): boolean {
    return address >= this.base && address + BigInt(width) <= this.end;
  }

  read8(address: bigint): number {
    return this.mem[this.offsetOf(address)];
  }

  write8(address: bigint, value: number): void {
    this.mem[this.offsetOf(address)] = value & 0xff;
  }

  bytes(): Uint8Array {
    return this.mem.slice();
  }

  snapshot(): StackSnapshot {
    return { base: this.base, bytes: this.bytes() };
  }

  clear(): void {
    this.mem.fill(0);
  }

  private offsetOf(address: bigint): number {
    if (!this.contains(address, 1)) {
      throw new MemoryBoundsError(
        `スタック範囲外へのアクセスです: 0x${address.toString(16)}`,
        { address, width: 1, base: this.base, size: this.size },
      );
    }
    return Number(address - this.base);
  }
}
