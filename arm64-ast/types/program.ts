// プログラム構造の型定義

import type { AsmInstruction } from "./instruction";

// 大文字化したラベル名 -> アドレス
export type LabelTable = ReadonlyMap<string, number>;

export type Program = {
  readonly instructions: readonly AsmInstruction[];
  readonly labels: LabelTable;
  // instructions から導出する索引。命令本体は持たない
  readonly addressToIndex: ReadonlyMap<number, number>;
};

export const INSTRUCTION_SIZE = 4;
