import { describe, it, expect } from "vitest";
import { InvalidRegisterIndex, RegisterFile } from "..";

describe("RegisterFile", () => {
  it("starts zeroed", () => {
    const regs = new RegisterFile();
    const snap = regs.snapshot();
    expect(snap.x).toHaveLength(31);
    expect(snap.x.every((v) => v === 0n)).toBe(true);
    expect(snap.sp).toBe(0n);
    expect(snap.pc).toBe(0n);
    expect(snap.flags).toEqual({ N: false, Z: false, C: false, V: false });
  });

  it("masks 64-bit writes", () => {
    const regs = new RegisterFile();
    regs.writeX(3, -1n);
    expect(regs.readX(3)).toBe(0xffff_ffff_ffff_ffffn);
    regs.writeX(3, 1n << 64n);
    expect(regs.readX(3)).toBe(0n);
  });

  it("zero-extends W writes and truncates W reads", () => {
    const regs = new RegisterFile();
    regs.writeX(1, 0x1234_5678_9abc_def0n);
    expect(regs.readW(1)).toBe(0x9abc_def0n);
    regs.writeW(1, 0x1_0000_0005n);
    expect(regs.readX(1)).toBe(5n);
  });

  it("round-trips X writes and zero-extends W writes for every X0..X30", () => {
    const regs = new RegisterFile();
    for (let n = 0; n <= 30; n += 1) {
      const value = 0x8000_0000_0000_0000n | BigInt(n);
      regs.writeX(n, value);
      expect(regs.readX(n)).toBe(value);

      regs.writeW(n, 0xffff_ffff_0000_0000n | BigInt(n + 1));
      expect(regs.readX(n)).toBe(BigInt(n + 1));
    }
  });

  it("treats index 31 as the zero register", () => {
    const regs = new RegisterFile();
    regs.writeX(31, 99n);
    regs.writeW(31, 99n);
    expect(regs.readX(31)).toBe(0n);
    expect(regs.readW(31)).toBe(0n);
  });

  it("rejects indices outside 0..31", () => {
    const regs = new RegisterFile();
    expect(() => regs.readX(32)).toThrow(InvalidRegisterIndex);
    expect(() => regs.writeX(-1, 0n)).toThrow(InvalidRegisterIndex);
    expect(() => regs.readW(1.5)).toThrow("無効なレジスタ番号です: 1.5");
  });

  it("dispatches tagged references", () => {
    const regs = new RegisterFile();
    regs.write({ kind: "gpr", index: 2, width: 64 }, 0xaabb_ccdd_0011_2233n);
    expect(regs.read({ kind: "gpr", index: 2, width: 32 })).toBe(0x0011_2233n);
    regs.write({ kind: "sp" }, 0x100n);
    expect(regs.readSP()).toBe(0x100n);
    regs.write({ kind: "zr", width: 64 }, 7n);
    expect(regs.read({ kind: "zr", width: 64 })).toBe(0n);
  });

  it("merges partial flag updates and returns a copy", () => {
    const regs = new RegisterFile();
    regs.setFlags({ Z: true, C: true });
    regs.setFlags({ C: false });
    const flags = regs.flags;
    expect(flags).toEqual({ N: false, Z: true, C: false, V: false });
  });

  it("resets every field", () => {
    const regs = new RegisterFile();
    regs.writeX(0, 1n);
    regs.writeSP(8n);
    regs.writePC(4n);
    regs.setFlags({ N: true });
    regs.reset();
    expect(regs.readX(0)).toBe(0n);
    expect(regs.readSP()).toBe(0n);
    expect(regs.readPC()).toBe(0n);
    expect(regs.flags.N).toBe(false);
  });
});
