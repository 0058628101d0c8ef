// オペランドとレジスタ参照の型定義

export type RegisterWidth = 32 | 64;

// 31 番や SP を番号で表さず、種類ごとに分けて持つ
export type RegisterRef =
  | { kind: "gpr"; index: number; width: RegisterWidth }
  | { kind: "sp" }
  | { kind: "zr"; width: RegisterWidth };

export type MemoryOffset =
  | { kind: "imm"; text: string; value: bigint }
  | { kind: "index"; text: string; register: string; shift: number };

export type Operand =
  | { kind: "reg"; text: string; name: string }
  | { kind: "imm"; text: string; value: bigint }
  | { kind: "mem"; text: string; base: string; offset?: MemoryOffset }
  | { kind: "label"; text: string; name: string };

export type OperandKind = Operand["kind"];
