import type { MemoryOffset, Operand, RegisterRef } from "../types/operand";
import { ParseError } from "./errors";

const INTEGER_RE = /^([+-])?(0x[0-9a-f]+|[0-9]+)$/i;
const REGISTER_RE = /^([XW])([0-9]+)$/;
const SHIFT_RE = /^LSL\s*#?\s*([0-9]+)$/i;

export const MAX_GPR_INDEX = 30;

/**
 * 10 進または 0x 付き 16 進の整数を符号付きで読む。
 * 形式が合わなければ undefined。
 */
export function parseInteger(text: string): bigint | undefined {
  const match = text.trim().match(INTEGER_RE);
  if (!match) return undefined;
  const [, sign, digits] = match;
  const magnitude = BigInt(digits);
  return sign === "-" ? -magnitude : magnitude;
}

// 番号の範囲は見ず、レジスタの綴りかどうかだけを判定する
export function isRegisterName(text: string): boolean {
  const u = text.trim().toUpperCase();
  return u === "SP" || u === "XZR" || u === "WZR" || REGISTER_RE.test(u);
}

export function toRegisterRef(text: string): RegisterRef | undefined {
  const u = text.trim().toUpperCase();
  if (u === "SP") return { kind: "sp" };
  if (u === "XZR") return { kind: "zr", width: 64 };
  if (u === "WZR") return { kind: "zr", width: 32 };
  const match = u.match(REGISTER_RE);
  if (!match) return undefined;
  const index = Number(match[2]);
  if (index > MAX_GPR_INDEX) return undefined;
  return { kind: "gpr", index, width: match[1] === "W" ? 32 : 64 };
}

/** ブラケット内のカンマでは分割しないカンマ区切り */
export function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const ch of text) {
    if (ch === "[") depth += 1;
    if (ch === "]") depth = Math.max(0, depth - 1);
    if (ch === "," && depth === 0) {
      parts.push(current.trim());
      current = "";
      continue;
    }
    current += ch;
  }
  parts.push(current.trim());
  return parts;
}

export function classifyOperand(token: string): Operand {
  const text = token.trim();
  if (text === "") {
    throw new ParseError("空のオペランドです");
  }

  if (text.startsWith("#")) {
    const value = parseInteger(text.slice(1));
    if (value === undefined) {
      throw new ParseError(`無効な即値 '${text}'`, { operand: text });
    }
    return { kind: "imm", text, value };
  }

  if (text.startsWith("[") && text.endsWith("]")) {
    return classifyMemory(text);
  }

  if (isRegisterName(text)) {
    return { kind: "reg", text, name: text.toUpperCase() };
  }

  return { kind: "label", text, name: text };
}

function classifyMemory(text: string): Operand {
  const inner = text.slice(1, -1).trim();
  const [base, ...rest] = splitTopLevel(inner);
  if (!base) {
    throw new ParseError(`メモリオペランドのベースがありません '${text}'`, {
      operand: text,
    });
  }
  if (rest.length === 0) {
    return { kind: "mem", text, base: base.toUpperCase() };
  }
  return {
    kind: "mem",
    text,
    base: base.toUpperCase(),
    offset: parseMemoryOffset(rest, text),
  };
}

function parseMemoryOffset(parts: string[], text: string): MemoryOffset {
  const [head, shiftText, ...extra] = parts;
  if (!head || extra.length > 0) {
    throw new ParseError(`無効なメモリオペランド '${text}'`, {
      operand: text,
    });
  }

  if (head.startsWith("#") || /^[+-]?[0-9]/.test(head)) {
    const value = parseInteger(head.replace(/^#/, ""));
    if (value === undefined || shiftText !== undefined) {
      throw new ParseError(`無効なオフセット '${head}'`, { operand: text });
    }
    return { kind: "imm", text: head, value };
  }

  let shift = 0;
  if (shiftText !== undefined) {
    const match = shiftText.match(SHIFT_RE);
    if (!match) {
      throw new ParseError(`無効なシフト指定 '${shiftText}'`, {
        operand: text,
      });
    }
    shift = Number(match[1]);
    if (shift > 63) {
      throw new ParseError(`シフト量が大きすぎます '${shiftText}'`, {
        operand: text,
      });
    }
  }
  return {
    kind: "index",
    text: shiftText === undefined ? head : `${head}, ${shiftText}`,
    register: head.toUpperCase(),
    shift,
  };
}
