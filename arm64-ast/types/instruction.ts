// 命令 AST の型定義

import type { Operand } from "./operand";

export type DecodedInstruction = {
  /** 大文字に正規化したニーモニック (例: "B.GT") */
  readonly mnemonic: string;
  readonly operands: readonly Operand[];
  /** コメントとラベルを除いた元テキスト */
  readonly text: string;
};

export type AsmInstruction = {
  readonly address: number;
  /** 1 始まりの命令番号 */
  readonly index: number;
  readonly decoded: DecodedInstruction;
  readonly sourceLine: number;
};
