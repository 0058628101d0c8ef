import { promises as fs } from "node:fs";
import type { AsmInstruction } from "../types/instruction";
import { INSTRUCTION_SIZE, type Program } from "../types/program";
import { decodeLine, stripComment } from "./decoder";
import { IOError } from "./errors";

// 空白を含まない任意の語をラベルとみなす (数字だけの "1:" も可)
const LABEL_RE = /^\S+$/;

export function buildProgram(lines: Iterable<string>): Program {
  const labels = new Map<string, number>();
  const instructions: AsmInstruction[] = [];
  const addressToIndex = new Map<number, number>();

  let sourceLine = 0;
  for (const rawLine of lines) {
    sourceLine += 1;
    const nextAddress = instructions.length * INSTRUCTION_SIZE;

    const { found, rest } = stripLabels(stripComment(rawLine));
    for (const label of found) {
      // ラベルは自分の行ではなく、次に出力される命令のアドレスを指す。
      // 同名のラベルは後の定義で上書きする
      labels.set(label.toUpperCase(), nextAddress);
    }

    const decoded = decodeLine(rest, sourceLine);
    if (!decoded) continue;

    addressToIndex.set(nextAddress, instructions.length);
    instructions.push({
      address: nextAddress,
      index: instructions.length + 1,
      decoded,
      sourceLine,
    });
  }

  return { instructions, labels, addressToIndex };
}

export function parseProgram(source: string): Program {
  return buildProgram(source.split(/\r?\n/));
}

export async function loadProgram(path: string): Promise<Program> {
  let source: string;
  try {
    source = await fs.readFile(path, "utf8");
  } catch (err) {
    throw new IOError(`ファイルを読み込めませんでした: ${path}`, {
      path,
      cause: err,
    });
  }
  return parseProgram(source);
}

/** 最終命令の直後 = 自然終了を表す番兵アドレス */
export function endAddress(program: Program): number {
  return program.instructions.length * INSTRUCTION_SIZE;
}

export function resolveLabel(
  program: Program,
  name: string,
): number | undefined {
  return program.labels.get(name.trim().toUpperCase());
}

// 行頭の "name:" を繰り返し剥がす。左辺が空か空白を含めばそこで止める
function stripLabels(line: string): { found: string[]; rest: string } {
  const found: string[] = [];
  let rest = line.trim();
  while (true) {
    const colon = rest.indexOf(":");
    if (colon < 0) break;
    const candidate = rest.slice(0, colon).trim();
    if (!LABEL_RE.test(candidate)) break;
    found.push(candidate);
    rest = rest.slice(colon + 1).trim();
  }
  return { found, rest };
}
